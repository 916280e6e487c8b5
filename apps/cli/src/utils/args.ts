/**
 * CLI argument parser.
 *
 * Hand-rolled minimal parser - no external CLI framework needed.
 */

export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positional: string[];
}

/**
 * Parse CLI arguments into flags and positional arguments.
 *
 * Supported formats:
 *   - Boolean flag: --follow, -h
 *   - Explicit boolean: --follow=false
 *   - Flag with value: --payload=file:///tmp/payload.bin, --payload file:///tmp/payload.bin
 *   - "--" ends flag parsing; everything after it is positional
 *
 * Flags named in `booleanFlags` never consume the next argument; any other
 * flag written as `--key value` always does, even when the value starts with "-".
 *
 * Examples:
 *   parseArgs(["--update", "--payload", "http://host/p"], new Set(["update"]))
 *     → { flags: { update: true, payload: "http://host/p" }, positional: [] }
 *   parseArgs(["--follow=false", "now"], new Set(["follow"]))
 *     → { flags: { follow: false }, positional: ["now"] }
 */
export function parseArgs(argv: string[], booleanFlags: ReadonlySet<string> = new Set()): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--") && arg.length > 2) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");

      // --key=value
      if (eq !== -1) {
        const key = body.slice(0, eq);
        const value = body.slice(eq + 1);
        flags[key] = booleanFlags.has(key) ? parseBoolean(value) : value;
        continue;
      }

      // --key value: a non-boolean flag always takes the next argument
      const next = argv[i + 1];
      if (!booleanFlags.has(body) && next !== undefined) {
        flags[body] = next;
        i++;
        continue;
      }

      flags[body] = true;
      continue;
    }

    // Short flag: -h
    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    positional.push(arg);
  }

  return { flags, positional };
}

/** "true"/"false" become booleans; anything else is kept for the schema to reject. */
function parseBoolean(value: string): string | boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  return value;
}
