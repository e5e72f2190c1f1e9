import { ResolutionError, fetchLatestArtifact } from "./artifact_fetcher.ts";
import { createLogger, type Logger } from "./logger.ts";
import type { ActionsClient, FetchConfig } from "./types.ts";
import { formatDuration, humanFileSize } from "./utils.ts";

/**
 * Fetches the configured artifact and maps the outcome to a process exit
 * code. Errors other than an empty lookup are rethrown.
 */
export async function run(
  config: FetchConfig,
  client: ActionsClient,
  log: Logger = createLogger("run"),
): Promise<number> {
  const { owner, repo } = config.repository;
  const started = Date.now();
  log.info(
    "fetching latest %s artifact of %s/%s",
    config.workflowName,
    owner,
    repo,
  );
  try {
    const result = await fetchLatestArtifact(client, config);
    log.info(
      "extracted %s (%s, %d files) from run %d into %s in %s",
      result.artifact.name,
      humanFileSize(result.artifact.size_in_bytes),
      result.files.length,
      result.run.id,
      result.destDir,
      formatDuration(Date.now() - started),
    );
    return 0;
  } catch (error) {
    if (error instanceof ResolutionError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }
}
