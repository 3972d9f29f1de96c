import {
  CodeCommitClient,
  CreatePullRequestCommand,
  EvaluatePullRequestApprovalRulesCommand,
  GetBlobCommand,
  GetCommentsForPullRequestCommand,
  GetDifferencesCommand,
  GetFolderCommand,
  GetPullRequestCommand,
  ListBranchesCommand,
  ListPullRequestsCommand,
  ListRepositoriesCommand,
  MergePullRequestByFastForwardCommand,
  MergePullRequestBySquashCommand,
  MergePullRequestByThreeWayCommand,
  PostCommentForPullRequestCommand,
  UpdatePullRequestApprovalStateCommand,
  UpdatePullRequestStatusCommand,
} from "@aws-sdk/client-codecommit";
import type {
  CreatePullRequestCommandInput,
  CreatePullRequestCommandOutput,
  EvaluatePullRequestApprovalRulesCommandInput,
  EvaluatePullRequestApprovalRulesCommandOutput,
  GetBlobCommandInput,
  GetBlobCommandOutput,
  GetCommentsForPullRequestCommandInput,
  GetCommentsForPullRequestCommandOutput,
  GetDifferencesCommandInput,
  GetDifferencesCommandOutput,
  GetFolderCommandInput,
  GetFolderCommandOutput,
  GetPullRequestCommandInput,
  GetPullRequestCommandOutput,
  ListBranchesCommandInput,
  ListBranchesCommandOutput,
  ListPullRequestsCommandInput,
  ListPullRequestsCommandOutput,
  ListRepositoriesCommandInput,
  ListRepositoriesCommandOutput,
  MergePullRequestByFastForwardCommandInput,
  MergePullRequestByFastForwardCommandOutput,
  MergePullRequestBySquashCommandInput,
  MergePullRequestBySquashCommandOutput,
  MergePullRequestByThreeWayCommandInput,
  MergePullRequestByThreeWayCommandOutput,
  PostCommentForPullRequestCommandInput,
  PostCommentForPullRequestCommandOutput,
  UpdatePullRequestApprovalStateCommandInput,
  UpdatePullRequestApprovalStateCommandOutput,
  UpdatePullRequestStatusCommandInput,
  UpdatePullRequestStatusCommandOutput,
} from "@aws-sdk/client-codecommit";
import { CodePipelineClient, GetPipelineStateCommand, ListActionExecutionsCommand } from "@aws-sdk/client-codepipeline";
import type {
  GetPipelineStateCommandInput,
  GetPipelineStateCommandOutput,
  ListActionExecutionsCommandInput,
  ListActionExecutionsCommandOutput,
} from "@aws-sdk/client-codepipeline";

/** CodeCommit operations used by the CLI. */
export interface CodeCommitApi {
  listRepositories(input: ListRepositoriesCommandInput): Promise<ListRepositoriesCommandOutput>;
  listBranches(input: ListBranchesCommandInput): Promise<ListBranchesCommandOutput>;
  listPullRequests(input: ListPullRequestsCommandInput): Promise<ListPullRequestsCommandOutput>;
  getPullRequest(input: GetPullRequestCommandInput): Promise<GetPullRequestCommandOutput>;
  evaluatePullRequestApprovalRules(
    input: EvaluatePullRequestApprovalRulesCommandInput
  ): Promise<EvaluatePullRequestApprovalRulesCommandOutput>;
  getDifferences(input: GetDifferencesCommandInput): Promise<GetDifferencesCommandOutput>;
  getBlob(input: GetBlobCommandInput): Promise<GetBlobCommandOutput>;
  getFolder(input: GetFolderCommandInput): Promise<GetFolderCommandOutput>;
  getCommentsForPullRequest(input: GetCommentsForPullRequestCommandInput): Promise<GetCommentsForPullRequestCommandOutput>;
  postCommentForPullRequest(input: PostCommentForPullRequestCommandInput): Promise<PostCommentForPullRequestCommandOutput>;
  createPullRequest(input: CreatePullRequestCommandInput): Promise<CreatePullRequestCommandOutput>;
  updatePullRequestApprovalState(
    input: UpdatePullRequestApprovalStateCommandInput
  ): Promise<UpdatePullRequestApprovalStateCommandOutput>;
  updatePullRequestStatus(input: UpdatePullRequestStatusCommandInput): Promise<UpdatePullRequestStatusCommandOutput>;
  mergePullRequestByFastForward(
    input: MergePullRequestByFastForwardCommandInput
  ): Promise<MergePullRequestByFastForwardCommandOutput>;
  mergePullRequestBySquash(input: MergePullRequestBySquashCommandInput): Promise<MergePullRequestBySquashCommandOutput>;
  mergePullRequestByThreeWay(
    input: MergePullRequestByThreeWayCommandInput
  ): Promise<MergePullRequestByThreeWayCommandOutput>;
}

/** CodePipeline operations used by the CLI. */
export interface CodePipelineApi {
  getPipelineState(input: GetPipelineStateCommandInput): Promise<GetPipelineStateCommandOutput>;
  listActionExecutions(input: ListActionExecutionsCommandInput): Promise<ListActionExecutionsCommandOutput>;
}

export type ServiceApis = {
  codecommit: CodeCommitApi;
  codepipeline: CodePipelineApi;
  region: () => Promise<string>;
};

export function createServiceApis(options: { region?: string }): ServiceApis {
  const codecommitClient = new CodeCommitClient({ region: options.region });
  const codepipelineClient = new CodePipelineClient({ region: options.region });

  return {
    codecommit: createCodeCommitApi(codecommitClient),
    codepipeline: createCodePipelineApi(codepipelineClient),
    region: () => codecommitClient.config.region(),
  };
}

function createCodeCommitApi(client: CodeCommitClient): CodeCommitApi {
  return {
    listRepositories: (input) => client.send(new ListRepositoriesCommand(input)),
    listBranches: (input) => client.send(new ListBranchesCommand(input)),
    listPullRequests: (input) => client.send(new ListPullRequestsCommand(input)),
    getPullRequest: (input) => client.send(new GetPullRequestCommand(input)),
    evaluatePullRequestApprovalRules: (input) => client.send(new EvaluatePullRequestApprovalRulesCommand(input)),
    getDifferences: (input) => client.send(new GetDifferencesCommand(input)),
    getBlob: (input) => client.send(new GetBlobCommand(input)),
    getFolder: (input) => client.send(new GetFolderCommand(input)),
    getCommentsForPullRequest: (input) => client.send(new GetCommentsForPullRequestCommand(input)),
    postCommentForPullRequest: (input) => client.send(new PostCommentForPullRequestCommand(input)),
    createPullRequest: (input) => client.send(new CreatePullRequestCommand(input)),
    updatePullRequestApprovalState: (input) => client.send(new UpdatePullRequestApprovalStateCommand(input)),
    updatePullRequestStatus: (input) => client.send(new UpdatePullRequestStatusCommand(input)),
    mergePullRequestByFastForward: (input) => client.send(new MergePullRequestByFastForwardCommand(input)),
    mergePullRequestBySquash: (input) => client.send(new MergePullRequestBySquashCommand(input)),
    mergePullRequestByThreeWay: (input) => client.send(new MergePullRequestByThreeWayCommand(input)),
  };
}

function createCodePipelineApi(client: CodePipelineClient): CodePipelineApi {
  return {
    getPipelineState: (input) => client.send(new GetPipelineStateCommand(input)),
    listActionExecutions: (input) => client.send(new ListActionExecutionsCommand(input)),
  };
}
