export { createProgram, formatSummary, EXIT_FAILURE, EXIT_INCOMPLETE, EXIT_OK } from "./program.js";
export type { CliDependencies, CliIo } from "./program.js";
