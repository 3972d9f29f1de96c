import { describe, expect, it, vi } from "vitest";
import type { GetPipelineStateCommandInput, ListActionExecutionsCommandInput } from "@aws-sdk/client-codepipeline";
import { createTestRuntime, outputLines, runCli } from "../helpers.js";
import { ACTION_EXECUTIONS, STAGE_STATES } from "../pipeline-fixtures.js";

function pipelineApi() {
  return {
    getPipelineState: vi.fn(async (_input: GetPipelineStateCommandInput) => ({
      $metadata: {},
      stageStates: STAGE_STATES,
    })),
    listActionExecutions: vi.fn(async (input: ListActionExecutionsCommandInput) => ({
      $metadata: {},
      actionExecutionDetails: ACTION_EXECUTIONS[input.filter?.pipelineExecutionId ?? ""] ?? [],
    })),
  };
}

const LINK =
  "link: https://us-east-1.console.aws.amazon.com/codesuite/codepipeline/pipelines/service_master/view?region=us-east-1";

describe("pipeline", () => {
  it("shows stage status with absolute dates and commit history", async () => {
    const api = pipelineApi();
    const { runtime, out } = createTestRuntime({ codepipeline: api });

    await runCli(runtime, ["pipeline", "--master", "--absolute", "--commits"]);

    expect(api.getPipelineState).toHaveBeenCalledWith({ name: "service_master" });
    expect(api.listActionExecutions).toHaveBeenCalledWith({
      pipelineName: "service_master",
      filter: { pipelineExecutionId: "e2" },
    });
    expect(outputLines(out)).toEqual([
      LINK,
      "┏━━━━━━━━━┳━━━━━━━━━━━━┳━━━━━━━━━━━━━━━━━━━━━┳━━━━━━━━━━━┳━━━━━━━━━━━━━━━━━━┳━━━━━━━━━━━━━━━┓",
      "┃ stage   ┃ status     ┃ updated             ┃ commit    ┃ summary          ┃ error         ┃",
      "┡━━━━━━━━━╇━━━━━━━━━━━━╇━━━━━━━━━━━━━━━━━━━━━╇━━━━━━━━━━━╇━━━━━━━━━━━━━━━━━━╇━━━━━━━━━━━━━━━┩",
      "│ Source  │ Succeeded  │ 2024-05-01 11:55:00 │ #89abcdef │ Merge feature    │               │",
      "│ Approve │ InProgress │ 2024-05-01 11:57:00 │ #89abcdef │ InProgress...    │               │",
      "│ Deploy  │ Failed     │ 2024-05-01 11:00:00 │ #76543210 │ Approved by dave │ Deploy failed │",
      "└─────────┴────────────┴─────────────────────┴───────────┴──────────────────┴───────────────┘",
      "commits:",
      "┏━━━┳━━━━━━━━━━━┳━━━━━━━━━━━━━━━━━━━━━┳━━━━━━━━━━━┳━━━━━━━━━━━━━━━┓",
      "┃ # ┃ commit    ┃ updated             ┃ build     ┃ summary       ┃",
      "┡━━━╇━━━━━━━━━━━╇━━━━━━━━━━━━━━━━━━━━━╇━━━━━━━━━━━╇━━━━━━━━━━━━━━━┩",
      "│ 1 │ #89abcdef │ 2024-05-01 11:55:00 │           │ Merge feature │",
      "│ 2 │ #76543210 │ 2024-05-01 10:30:00 │ #34567890 │ Older change  │",
      "└───┴───────────┴─────────────────────┴───────────┴───────────────┘",
      "",
    ]);
  });

  it("shows relative update times by default", async () => {
    const { runtime, out } = createTestRuntime({ codepipeline: pipelineApi() });

    await runCli(runtime, ["p", "-n", "service_master"]);

    expect(outputLines(out)[4]).toBe(
      "│ Source  │ Succeeded  │ 5 minutes ago │ #89abcdef │ Merge feature    │               │"
    );
  });

  it("derives the pipeline name from the current branch", async () => {
    const api = pipelineApi();
    const { runtime, opened } = createTestRuntime({
      codepipeline: api,
      env: {},
      git: {
        "rev-parse --show-toplevel": "/work/service\n",
        "symbolic-ref --quiet --short HEAD": "master\n",
      },
    });

    await runCli(runtime, ["pipeline", "--web"]);

    expect(api.getPipelineState).toHaveBeenCalledWith({ name: "service_master" });
    expect(opened).toEqual([
      "https://us-east-1.console.aws.amazon.com/codesuite/codepipeline/pipelines/service_master/view?region=us-east-1",
    ]);
  });

  it("prints the status model as json", async () => {
    const { runtime, out } = createTestRuntime({ codepipeline: pipelineApi() });

    await runCli(runtime, ["pipeline", "--branch", "master", "--json"]);

    const parsed: unknown = JSON.parse(out.text());
    expect(parsed).toMatchObject({
      name: "service_master",
      stages: [{ stage: "Source" }, { stage: "Approve", approval: "InProgress" }, { stage: "Deploy", stale: true }],
    });
  });
});
