import type { File as FolderFile } from "@aws-sdk/client-codecommit";
import type { AwsApiClient } from "./client.js";

export type FolderListing = {
  folders: string[];
  files: Array<{ path: string; blobId: string }>;
};

export async function listRepositoryNames(client: AwsApiClient): Promise<string[]> {
  const names: string[] = [];
  let nextToken: string | undefined;
  do {
    const output = await client.call(
      "list_repositories",
      { nextToken },
      (input) => client.codecommit.listRepositories(input)
    );
    for (const repository of output.repositories ?? []) {
      if (repository.repositoryName) {
        names.push(repository.repositoryName);
      }
    }
    nextToken = output.nextToken;
  } while (nextToken);
  return names;
}

export async function listRepositoryBranches(client: AwsApiClient, input: {
  repositoryName: string;
}): Promise<string[]> {
  const branches: string[] = [];
  let nextToken: string | undefined;
  do {
    const output = await client.call(
      "list_branches",
      { repositoryName: input.repositoryName, nextToken },
      (request) => client.codecommit.listBranches(request)
    );
    branches.push(...(output.branches ?? []));
    nextToken = output.nextToken;
  } while (nextToken);
  return branches;
}

/** Sub folders and regular files of one folder; symlinks, submodules and executables are skipped. */
export async function getRepositoryFolder(client: AwsApiClient, input: {
  repositoryName: string;
  commitSpecifier: string;
  folderPath: string;
}): Promise<FolderListing> {
  const output = await client.call(
    "get_folder",
    {
      repositoryName: input.repositoryName,
      commitSpecifier: input.commitSpecifier,
      folderPath: input.folderPath,
    },
    (request) => client.codecommit.getFolder(request)
  );

  const folders = (output.subFolders ?? [])
    .map((folder) => folder.absolutePath)
    .filter((value): value is string => Boolean(value));
  const files = (output.files ?? [])
    .filter((file) => file.fileMode === "NORMAL")
    .flatMap((file) => toFileEntry(file));
  return { folders, files };
}

export async function getBlobText(client: AwsApiClient, input: {
  repositoryName: string;
  blobId: string;
  cacheSecs?: number;
}): Promise<string> {
  const output = await client.call(
    "get_blob",
    { repositoryName: input.repositoryName, blobId: input.blobId },
    (request) => client.codecommit.getBlob(request),
    { cacheSecs: input.cacheSecs }
  );
  return output.content ? new TextDecoder("utf-8").decode(output.content) : "";
}

function toFileEntry(file: FolderFile): Array<{ path: string; blobId: string }> {
  if (!file.absolutePath || !file.blobId) {
    return [];
  }
  return [{ path: file.absolutePath, blobId: file.blobId }];
}
