/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
export { loadDescription, parseDescription } from "../description-loader.js";
export { resolveConfig } from "../config.js";
export { generateCommand } from "../commands/generate.js";
export type { GenerateResult } from "../commands/generate.js";
export type { CliOptions, ResolvedConfig, Result } from "../types.js";
