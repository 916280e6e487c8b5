/**
 * otactl: process bootstrap: parse argv, resolve configuration, dispatch.
 */

import { ClientError } from "@otactl/sdk";
import { createLogger } from "@otactl/shared";
import type { ClientConfig } from "@otactl/shared";
import { createCommandDispatcher, createEventLoop } from "@otactl/core";
import { resolveClientConfig } from "./config.js";
import { connectUpdateEngine } from "./service/update-engine-proxy.js";
import { parseArgs } from "./utils/args.js";

const logger = createLogger("otactl");

export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  "update",
  "suspend",
  "resume",
  "cancel",
  "follow",
  "help",
]);

export const USAGE = [
  "Usage: otactl [options]",
  "",
  "Drive the update engine and exit with the outcome of the request.",
  "",
  "Options:",
  "  --update            Start applying the payload given by --payload",
  "  --payload <uri>     Payload URI (default: http://127.0.0.1:8080/payload)",
  "  --headers <lines>   Newline-separated 'key: value' headers for --update",
  "  --suspend           Suspend an ongoing update and exit",
  "  --resume            Resume a suspended update and exit",
  "  --cancel            Cancel an ongoing update and exit",
  "  --follow            Follow the update until it completes",
  "  --help, -h          Show this help message",
  "",
  "Environment:",
  "  UPDATE_ENGINE_SOCKET           Socket path of the update engine",
  "  UPDATE_ENGINE_CALL_TIMEOUT_MS  Per-call timeout in ms (default: 0, no timeout)",
  "  LOG_LEVEL                      debug | info | warn | error (default: info)",
  "  LOG_FORMAT                     json for structured output",
].join("\n");

function loadConfig(env: NodeJS.ProcessEnv): ClientConfig | null {
  try {
    return resolveClientConfig(env);
  } catch (err) {
    if (err instanceof ClientError) {
      logger.error(err.message, { code: err.code });
      return null;
    }
    throw err;
  }
}

/** Run the client. Resolves to the process exit code. */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const parsed = parseArgs(argv, BOOLEAN_FLAGS);
  const { help, h, ...flags } = parsed.flags;

  if (help === true || h === true) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(env);
  if (!config) {
    return 1;
  }
  logger.setContext({ endpoint: config.socketPath });

  const loop = createEventLoop();
  const dispatcher = createCommandDispatcher({
    loop,
    connect: () => connectUpdateEngine(config, loop),
  });
  return dispatcher.run({ flags, positional: parsed.positional });
}
