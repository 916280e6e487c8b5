/**
 * Callback interface: notifications pushed by the update engine once bound.
 *
 * Any object with these two handlers can be bound; implementations do not
 * share a base class.
 */
export interface UpdateEngineCallback {
  /** Progress report. Observational only. */
  onStatusUpdate(status: number, progress: number): void;

  /** Terminal notification for an applied (or failed) payload. */
  onPayloadApplicationComplete(errorCode: number): void;
}
