/**
 * Platform translation table
 *
 * Maps the platform identifiers used in package descriptions to the
 * CMake variables that are true when configuring on that platform.
 */

const PLATFORM_TOKENS = Object.freeze({
  unix: "UNIX",
  windows: "WIN32",
  win32: "WIN32",
  cygwin: "CYGWIN",
  macosx: "APPLE",
  linux: "UNIX",
  freebsd: "UNIX",
  mingw32: "MINGW",
  msys: "MSYS",
} as const);

export type PlatformId = keyof typeof PLATFORM_TOKENS;

export type PlatformToken = (typeof PLATFORM_TOKENS)[PlatformId];

/**
 * Check whether a platform identifier has a CMake equivalent
 */
export const isValidPlatform = (platform: string): platform is PlatformId =>
  Object.prototype.hasOwnProperty.call(PLATFORM_TOKENS, platform);

/**
 * CMake token of a known platform
 */
export const platformToken = (platform: PlatformId): PlatformToken =>
  PLATFORM_TOKENS[platform];

/**
 * Translate a platform identifier to its CMake token
 */
export const translatePlatform = (
  platform: string
): PlatformToken | undefined =>
  isValidPlatform(platform) ? platformToken(platform) : undefined;

/**
 * All known platforms in table order
 */
export const listPlatforms = (): readonly {
  readonly id: PlatformId;
  readonly token: PlatformToken;
}[] =>
  Object.keys(PLATFORM_TOKENS)
    .filter(isValidPlatform)
    .map((id) => ({ id, token: PLATFORM_TOKENS[id] }));
