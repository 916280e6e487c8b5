export { createLogger, isLogLevel } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { splitHeaders } from "./utils/headers.js";

export {
  DEFAULT_PAYLOAD_URI,
  OptionFlagsSchema,
  OptionSetSchema,
  ClientConfigSchema,
} from "./utils/config-schema.js";
export type { OptionSet, ClientConfig } from "./utils/config-schema.js";

export { updateStatusToString, errorCodeToString } from "./status/strings.js";
