import { Octokit } from "@octokit/rest";
import axios from "axios";
import type {
  ActionsClient,
  ArtifactRef,
  RepositoryRef,
  RunRef,
  RunStatus,
  WorkflowRef,
} from "./types.ts";

export interface GitHubClientOptions {
  token?: string;
  // Replaces the fetch Octokit sends its requests through.
  fetch?: typeof globalThis.fetch;
}

export function createGitHubClient({
  token,
  fetch,
}: GitHubClientOptions = {}): ActionsClient {
  const githubClient = new Octokit({
    auth: token,
    request: fetch ? { fetch } : undefined,
  });

  return {
    async listWorkflows({
      owner,
      repo,
    }: RepositoryRef): Promise<WorkflowRef[]> {
      const resp = await githubClient.actions.listRepoWorkflows({
        owner,
        repo,
      });
      return resp.data.workflows.map(({ id, name }) => ({ id, name }));
    },

    async listWorkflowRuns(
      { owner, repo }: RepositoryRef,
      workflowId: number,
      status?: RunStatus,
    ): Promise<RunRef[]> {
      const resp = await githubClient.actions.listWorkflowRuns({
        owner,
        repo,
        workflow_id: workflowId,
        ...(status ? { status } : {}),
      });
      return resp.data.workflow_runs.map(({ id, created_at }) => ({
        id,
        created_at,
      }));
    },

    async listRunArtifacts(
      { owner, repo }: RepositoryRef,
      runId: number,
    ): Promise<ArtifactRef[]> {
      const resp = await githubClient.actions.listWorkflowRunArtifacts({
        owner,
        repo,
        run_id: runId,
      });
      return resp.data.artifacts.map((artifact) => ({
        name: artifact.name,
        download_url: artifact.archive_download_url,
        size_in_bytes: artifact.size_in_bytes,
      }));
    },

    async downloadArchive(url: string): Promise<Buffer> {
      const artifact_data = await axios.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
        headers: token ? { Authorization: `Bearer ${token}` } : {},
      });
      return Buffer.from(artifact_data.data);
    },
  };
}
