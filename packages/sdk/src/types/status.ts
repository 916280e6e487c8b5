/**
 * Update progress states reported by the update engine.
 *
 * Numeric values are fixed by the service's wire contract.
 */
export const UpdateStatus = {
  IDLE: 0,
  CHECKING_FOR_UPDATE: 1,
  UPDATE_AVAILABLE: 2,
  DOWNLOADING: 3,
  VERIFYING: 4,
  FINALIZING: 5,
  UPDATED_NEED_REBOOT: 6,
  REPORTING_ERROR_EVENT: 7,
  ATTEMPTING_ROLLBACK: 8,
  DISABLED: 9,
} as const;

export type UpdateStatusValue = (typeof UpdateStatus)[keyof typeof UpdateStatus];
