/**
 * Human-readable names for update statuses and error codes.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { UpdateStatus } from "@otactl/sdk";

const ERROR_CODE_TABLE = new URL("../../data/error-codes.json", import.meta.url);

const ErrorCodeTableSchema = z.record(z.string().regex(/^\d+$/), z.string().min(1));

const STATUS_NAMES = new Map<number, string>(
  Object.entries(UpdateStatus).map(([name, value]) => [value, `UPDATE_STATUS_${name}`]),
);

let errorCodeNames: Map<number, string> | null = null;

function loadErrorCodeNames(): Map<number, string> {
  if (!errorCodeNames) {
    const table = ErrorCodeTableSchema.parse(JSON.parse(readFileSync(ERROR_CODE_TABLE, "utf-8")));
    errorCodeNames = new Map(Object.entries(table).map(([code, name]) => [Number(code), name]));
  }
  return errorCodeNames;
}

/** e.g. 3 → "UPDATE_STATUS_DOWNLOADING". */
export function updateStatusToString(status: number): string {
  return STATUS_NAMES.get(status) ?? "UPDATE_STATUS_UNKNOWN";
}

/** e.g. 14 → "DOWNLOAD_WRITE_ERROR". */
export function errorCodeToString(code: number): string {
  return loadErrorCodeNames().get(code) ?? "UNKNOWN_ERROR_CODE";
}
