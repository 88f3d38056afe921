/**
 * introgen analysis - special function classification
 */

export * from "./special-functions/index.js";
export * from "./imports.js";
export * from "./analyze-type.js";
