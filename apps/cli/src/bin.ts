#!/usr/bin/env node

/**
 * otactl entry point.
 *
 *   otactl --update --payload=https://ota.example.test/payload.bin --follow
 *   otactl --suspend | --resume | --cancel
 */

import { main } from "./main.js";

// Always run: this file is the CLI entry point
main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
