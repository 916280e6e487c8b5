/**
 * Platform utilities for cross-platform IPC.
 *
 * On Windows, Unix domain sockets are not supported.
 * Named pipes (\\.\pipe\name) are used instead.
 */

export const isWindows = process.platform === "win32";

export const DEFAULT_UNIX_SOCKET = "/run/update_engine/update_engine.sock";
export const DEFAULT_NAMED_PIPE = "\\\\.\\pipe\\update_engine";

export function getDefaultSocketPath(windows: boolean = isWindows): string {
  return windows ? DEFAULT_NAMED_PIPE : DEFAULT_UNIX_SOCKET;
}
