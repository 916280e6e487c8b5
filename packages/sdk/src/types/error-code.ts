/**
 * Error codes carried by call results and the completion notification.
 *
 * Only SUCCESS has client-side meaning; the rest are opaque failures.
 * The full name table lives in @otactl/shared (errorCodeToString).
 */
export const ErrorCode = {
  SUCCESS: 0,
  ERROR: 1,
  DOWNLOAD_TRANSFER_ERROR: 9,
  PAYLOAD_HASH_MISMATCH_ERROR: 10,
  PAYLOAD_SIZE_MISMATCH_ERROR: 11,
  DOWNLOAD_PAYLOAD_VERIFICATION_ERROR: 12,
  DOWNLOAD_WRITE_ERROR: 14,
  USER_CANCELED: 48,
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
