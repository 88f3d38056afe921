export * from "./kinds.js";
export * from "./registry.js";
export { isStringify } from "./stringify.js";
export { extract } from "./extract.js";
export { unhide } from "./unhide.js";
export * from "./analyze-imports.js";
