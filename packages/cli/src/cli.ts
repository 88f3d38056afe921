/**
 * Argument parsing and dispatch for the `introgen` binary
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
