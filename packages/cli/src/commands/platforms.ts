/**
 * rockgen platforms command - Print the platform translation table
 */

import { listPlatforms } from "@rockgen/backend";

/**
 * Format the platform table, one `<platform> <CMake variable>` row per line
 */
export const formatPlatformTable = (): string => {
  const platforms = listPlatforms();
  const width = Math.max(...platforms.map((p) => p.id.length));
  return platforms
    .map((p) => `  ${p.id.padEnd(width)}  ${p.token}`)
    .join("\n");
};

export const platformsCommand = (): void => {
  console.log(formatPlatformTable());
};
