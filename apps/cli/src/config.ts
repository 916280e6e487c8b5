/**
 * Client configuration from the environment.
 *
 *   UPDATE_ENGINE_SOCKET           socket path or named pipe of the update engine
 *   UPDATE_ENGINE_CALL_TIMEOUT_MS  per-call timeout; 0 (default) waits forever
 */

import { ConfigError } from "@otactl/sdk";
import { ClientConfigSchema, validateInput } from "@otactl/shared";
import type { ClientConfig } from "@otactl/shared";
import { getDefaultSocketPath } from "./transport/platform.js";

export function resolveClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = validateInput(ClientConfigSchema, {
    socketPath: env.UPDATE_ENGINE_SOCKET ?? getDefaultSocketPath(),
    callTimeoutMs: env.UPDATE_ENGINE_CALL_TIMEOUT_MS,
  });
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }
  return result.data;
}
