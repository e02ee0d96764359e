/**
 * rockgen generate command - Write CMakeLists.txt for a description
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, relative } from "node:path";
import { generateFromDescription } from "@rockgen/backend";
import { STDOUT_PATH } from "../config.js";
import type { ResolvedConfig, Result } from "../types.js";

export type GenerateResult = {
  readonly outputPath: string;
  readonly script: string;
  readonly errors: readonly string[];
};

/**
 * Generate the CMake script and write it out
 *
 * Errors recorded while generating are part of the script, not a failure
 * of this command.
 */
export const generateCommand = (
  config: ResolvedConfig
): Result<GenerateResult, string> => {
  const { script, errors } = generateFromDescription(config.description);

  if (config.verbose) {
    for (const error of errors) {
      console.error(`Warning: ${error}`);
    }
  }

  if (config.outputPath === STDOUT_PATH) {
    process.stdout.write(script);
    return { ok: true, value: { outputPath: STDOUT_PATH, script, errors } };
  }

  try {
    mkdirSync(dirname(config.outputPath), { recursive: true });
    writeFileSync(config.outputPath, script, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: `Failed to write ${config.outputPath}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!config.quiet) {
    const relativePath = relative(process.cwd(), config.outputPath);
    console.log(`✓ Generated ${relativePath || config.outputPath}`);
    if (errors.length > 0) {
      console.log(
        `  ${errors.length} configuration error(s) will stop the CMake run`
      );
    }
  }

  return { ok: true, value: { outputPath: config.outputPath, script, errors } };
};
