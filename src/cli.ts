import "dotenv/config";
import { loadConfig } from "./config.ts";
import { createGitHubClient } from "./github_client.ts";
import { createLogger, setLogLevel } from "./logger.ts";
import { run } from "./run.ts";

const config = loadConfig(process.env);
setLogLevel(config.logLevel);
if (config.token === undefined) {
  createLogger("cli").warn(
    "GITHUB_TOKEN is not set, requests are unauthenticated",
  );
}
const client = createGitHubClient({ token: config.token });
process.exitCode = await run(config, client);
