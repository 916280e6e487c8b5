/**
 * Split a raw multi-line header value into header lines.
 *
 * Empty lines are discarded; whitespace inside a line is kept as-is.
 */
export function splitHeaders(raw: string): string[] {
  return raw.split("\n").filter((line) => line.length > 0);
}
