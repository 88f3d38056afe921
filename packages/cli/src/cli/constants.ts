/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

/**
 * Process exit codes
 */
export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_CONFIG = 2;
export const EXIT_MODEL = 3;
