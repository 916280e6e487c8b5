/**
 * Zod schemas for the client's option set and environment configuration.
 */

import { z } from "zod";
import { splitHeaders } from "./headers.js";

export const DEFAULT_PAYLOAD_URI = "http://127.0.0.1:8080/payload";

/** Flags as they come out of the argument parser. Unknown flags are rejected. */
export const OptionFlagsSchema = z
  .object({
    update: z.boolean().default(false),
    payload: z.string().default(DEFAULT_PAYLOAD_URI),
    headers: z.string().default(""),
    suspend: z.boolean().default(false),
    resume: z.boolean().default(false),
    cancel: z.boolean().default(false),
    follow: z.boolean().default(false),
  })
  .strict();

/** The immutable option set the dispatcher works from. */
export const OptionSetSchema = OptionFlagsSchema.transform((flags) =>
  Object.freeze({
    ...flags,
    headers: Object.freeze(splitHeaders(flags.headers)),
  }),
);

export type OptionSet = z.output<typeof OptionSetSchema>;

export const ClientConfigSchema = z.object({
  socketPath: z.string().min(1, "Socket path must not be empty"),
  /** 0 waits forever for a reply. */
  callTimeoutMs: z.coerce.number().int().nonnegative().default(0),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
