import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import AdmZip from "adm-zip";
import { createLogger } from "./logger.ts";
import type {
  ActionsClient,
  ArtifactRef,
  FetchConfig,
  FetchResult,
  RepositoryRef,
  RunRef,
  RunStatus,
  WorkflowRef,
} from "./types.ts";

const log = createLogger("artifact-fetcher");

/**
 * A lookup in the workflow → run → artifact chain came back empty.
 */
export class ResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResolutionError";
  }
}

export async function resolveWorkflow(
  client: ActionsClient,
  repository: RepositoryRef,
  name: string,
): Promise<WorkflowRef> {
  const workflows = await client.listWorkflows(repository);
  const workflow = workflows.find((workflow) => workflow.name === name);
  if (workflow === undefined) {
    throw new ResolutionError("workflow not found");
  }
  log.debug("resolved workflow %s to id %d", name, workflow.id);
  return workflow;
}

/**
 * Picks the most recently created run. Runs sharing a timestamp keep the
 * order the API returned them in.
 */
export async function resolveLatestRun(
  client: ActionsClient,
  repository: RepositoryRef,
  workflowId: number,
  status?: RunStatus,
): Promise<RunRef> {
  const runs = await client.listWorkflowRuns(repository, workflowId, status);
  const latest = [...runs].sort(
    (a, b) => Date.parse(b.created_at) - Date.parse(a.created_at),
  )[0];
  if (latest === undefined) {
    throw new ResolutionError("workflow runs not found");
  }
  log.debug("latest run of workflow %d is %d", workflowId, latest.id);
  return latest;
}

export async function resolveArtifact(
  client: ActionsClient,
  repository: RepositoryRef,
  runId: number,
  name?: string,
): Promise<ArtifactRef> {
  const artifacts = await client.listRunArtifacts(repository, runId);
  const artifact =
    name === undefined
      ? artifacts[0]
      : artifacts.find((artifact) => artifact.name === name);
  if (artifact === undefined) {
    throw new ResolutionError("artifacts not found");
  }
  log.debug("selected artifact %s of run %d", artifact.name, runId);
  return artifact;
}

/**
 * Downloads the artifact's zip payload into `<destDir>/<name>.zip`, unpacks
 * it into destDir and removes the archive again, also when unpacking fails.
 *
 * @returns the names of the extracted files
 */
export async function downloadAndExtract(
  client: ActionsClient,
  artifact: ArtifactRef,
  destDir: string,
): Promise<string[]> {
  const payload = await client.downloadArchive(artifact.download_url);
  await mkdir(destDir, { recursive: true });
  const archivePath = join(destDir, `${artifact.name}.zip`);
  try {
    await writeFile(archivePath, payload);
    // AdmZip holds the whole archive in memory, so the file can go before
    // extraction, which may write an entry of the same name.
    const zip = new AdmZip(archivePath);
    await rm(archivePath, { force: true });
    zip.extractAllTo(destDir, true);
    return zip
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.entryName);
  } finally {
    await rm(archivePath, { force: true });
  }
}

export async function fetchLatestArtifact(
  client: ActionsClient,
  config: FetchConfig,
): Promise<FetchResult> {
  const { repository, destDir } = config;
  const workflow = await resolveWorkflow(
    client,
    repository,
    config.workflowName,
  );
  const run = await resolveLatestRun(
    client,
    repository,
    workflow.id,
    config.runStatus,
  );
  const artifact = await resolveArtifact(
    client,
    repository,
    run.id,
    config.artifactName,
  );
  const files = await downloadAndExtract(client, artifact, destDir);
  return { workflow, run, artifact, destDir, files };
}
