/**
 * Configuration resolution
 */

import { dirname, join, resolve } from "node:path";
import type { PackageDescription } from "@rockgen/backend";
import type { CliOptions, ResolvedConfig } from "./types.js";

export const DEFAULT_OUTPUT_NAME = "CMakeLists.txt";
export const STDOUT_PATH = "-";

/**
 * Resolve the output path: explicit --out (relative to cwd), else
 * CMakeLists.txt next to the description
 */
const resolveOutputPath = (
  cliOptions: CliOptions,
  descriptionPath: string
): string => {
  if (cliOptions.out === STDOUT_PATH) {
    return STDOUT_PATH;
  }
  if (cliOptions.out) {
    return resolve(cliOptions.out);
  }
  return join(dirname(resolve(descriptionPath)), DEFAULT_OUTPUT_NAME);
};

/**
 * Resolve final configuration from description + CLI args
 */
export const resolveConfig = (
  description: PackageDescription,
  cliOptions: CliOptions,
  descriptionPath: string
): ResolvedConfig => ({
  descriptionPath,
  description: cliOptions.name
    ? { ...description, package: cliOptions.name }
    : description,
  outputPath: resolveOutputPath(cliOptions, descriptionPath),
  verbose: cliOptions.verbose ?? false,
  // Progress output would end up inside the script on stdout
  quiet: (cliOptions.quiet ?? false) || cliOptions.out === STDOUT_PATH,
});
