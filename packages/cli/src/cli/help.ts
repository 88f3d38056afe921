/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
introgen - special function analysis for introspected libraries v${VERSION}

USAGE:
  introgen <command> [options]

COMMANDS:
  analyze <model.json>      Classify the special functions of every type

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Trace classification per type
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: introgen.json)

ANALYZE OPTIONS:
  --json                    Print the report as JSON
  --trust-nullability       Trust return value nullability on every type
  --min-cfg-version <ver>   Oldest supported library version

EXAMPLES:
  introgen analyze gdk.model.json
  introgen analyze gdk.model.json --json --min-cfg-version 3.22
`);
};
