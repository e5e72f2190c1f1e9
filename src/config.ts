import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";
import { RUN_STATUSES, type FetchConfig } from "./types.ts";

export const DEFAULT_REPOSITORY = "kitao/pyxel";
export const DEFAULT_WORKFLOW = "build";
export const DEFAULT_DEST_DIR = "dist";

// Blank values in a .env file count as unset.
const blankToUndefined = (value: unknown) => (value === "" ? undefined : value);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  GITHUB_TOKEN: optionalString,
  ARTIFACT_REPOSITORY: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "expected <owner>/<repo>")
    .default(DEFAULT_REPOSITORY),
  ARTIFACT_WORKFLOW: z.string().min(1).default(DEFAULT_WORKFLOW),
  ARTIFACT_NAME: optionalString,
  ARTIFACT_RUN_STATUS: z.preprocess(
    blankToUndefined,
    z.enum(RUN_STATUSES).optional(),
  ),
  ARTIFACT_DEST_DIR: z.string().min(1).default(DEFAULT_DEST_DIR),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(LOG_LEVELS).default("info"),
  ),
});

export interface AppConfig extends FetchConfig {
  logLevel: LogLevel;
}

/**
 * Builds the fetch configuration from environment variables.
 *
 * @throws ZodError when a variable is present but malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.parse(env);
  const [owner, repo] = parsed.ARTIFACT_REPOSITORY.split("/");
  return {
    token: parsed.GITHUB_TOKEN,
    repository: { owner, repo },
    workflowName: parsed.ARTIFACT_WORKFLOW,
    artifactName: parsed.ARTIFACT_NAME,
    runStatus: parsed.ARTIFACT_RUN_STATUS,
    destDir: parsed.ARTIFACT_DEST_DIR,
    logLevel: parsed.LOG_LEVEL,
  };
}
