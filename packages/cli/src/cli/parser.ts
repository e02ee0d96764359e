/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (
  args: string[]
): {
  command: string;
  descriptionFile?: string;
  options: CliOptions;
} => {
  const options: CliOptions = {};
  let command = "";
  let descriptionFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (description file)
    if (command && !descriptionFile && !arg.startsWith("-")) {
      descriptionFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "-n":
      case "--name":
        options.name = args[++i] ?? "";
        break;
    }
  }

  return { command, descriptionFile, options };
};
