import type { ActionExecutionDetail, StageState } from "@aws-sdk/client-codepipeline";
import type { AwsApiClient } from "./client.js";

export async function getPipelineStageStates(client: AwsApiClient, input: {
  pipelineName: string;
}): Promise<StageState[]> {
  const output = await client.call(
    "get_pipeline_state",
    { name: input.pipelineName },
    (request) => client.codepipeline.getPipelineState(request)
  );
  return output.stageStates ?? [];
}

export async function listPipelineActionExecutions(client: AwsApiClient, input: {
  pipelineName: string;
  pipelineExecutionId: string;
}): Promise<ActionExecutionDetail[]> {
  const details: ActionExecutionDetail[] = [];
  let nextToken: string | undefined;
  do {
    const output = await client.call(
      "list_action_executions",
      {
        pipelineName: input.pipelineName,
        filter: { pipelineExecutionId: input.pipelineExecutionId },
        nextToken,
      },
      (request) => client.codepipeline.listActionExecutions(request)
    );
    details.push(...(output.actionExecutionDetails ?? []));
    nextToken = output.nextToken;
  } while (nextToken);
  return details;
}
