/**
 * CLI command dispatcher
 */

import { isValidName, loadDescription } from "../description-loader.js";
import { resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { platformsCommand } from "../commands/platforms.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`rockgen v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  switch (parsed.command) {
    case "platforms":
      platformsCommand();
      return 0;

    case "generate": {
      if (!parsed.descriptionFile) {
        console.error("Error: Description file required");
        console.error("Usage: rockgen generate <description> [-o <file>]");
        return 2;
      }

      const packageName = parsed.options.name;
      if (packageName !== undefined && !isValidName(packageName)) {
        console.error(`Error: Invalid package name '${packageName}'`);
        return 2;
      }

      const descriptionResult = loadDescription(parsed.descriptionFile);
      if (!descriptionResult.ok) {
        console.error(`Error: ${descriptionResult.error}`);
        return 1;
      }

      const config = resolveConfig(
        descriptionResult.value,
        parsed.options,
        parsed.descriptionFile
      );

      const result = generateCommand(config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 5;
      }
      return 0;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'rockgen --help' for usage information");
      return 2;
  }
};
