export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface WorkflowRef {
  id: number;
  name: string;
}

export interface RunRef {
  id: number;
  created_at: string;
}

export interface ArtifactRef {
  name: string;
  download_url: string;
  size_in_bytes: number;
}

// Values accepted by the `status` filter of the list-workflow-runs endpoint.
export const RUN_STATUSES = [
  "completed",
  "action_required",
  "cancelled",
  "failure",
  "neutral",
  "skipped",
  "stale",
  "success",
  "timed_out",
  "in_progress",
  "queued",
  "requested",
  "waiting",
  "pending",
] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

/**
 * The four read-only GitHub Actions calls the fetch is built on.
 */
export interface ActionsClient {
  listWorkflows(repository: RepositoryRef): Promise<WorkflowRef[]>;
  listWorkflowRuns(
    repository: RepositoryRef,
    workflowId: number,
    status?: RunStatus,
  ): Promise<RunRef[]>;
  listRunArtifacts(
    repository: RepositoryRef,
    runId: number,
  ): Promise<ArtifactRef[]>;
  downloadArchive(url: string): Promise<Buffer>;
}

export interface FetchConfig {
  token?: string;
  repository: RepositoryRef;
  workflowName: string;
  // Picks the first artifact when unset.
  artifactName?: string;
  runStatus?: RunStatus;
  destDir: string;
}

export interface FetchResult {
  workflow: WorkflowRef;
  run: RunRef;
  artifact: ArtifactRef;
  destDir: string;
  files: string[];
}
