/**
 * Configuration state and its setters
 *
 * Every setter that takes a platform validates it first. An unknown platform
 * is recorded as a fatal error and nothing else is changed.
 */

import { isValidPlatform, type PlatformId } from "./platforms.js";
import type { ConfigurationState } from "./types.js";

/**
 * Create an empty configuration for a package
 */
export const createConfiguration = (
  packageName: string
): ConfigurationState => ({
  packageName,
  errors: [],
  supportedPlatforms: [],
  unsupportedPlatforms: [],
  variables: new Map(),
  platformVariables: new Map(),
  scriptTargets: [],
  platformScriptTargets: new Map(),
  nativeTargets: [],
  platformNativeTargets: new Map(),
});

/**
 * Error message recorded for a platform without a CMake equivalent
 */
export const unsupportedPlatformMessage = (platform: string): string =>
  `unsupported platform '${platform}': no build-tool equivalent defined`;

/**
 * Record a fatal error, emitted as an abort directive
 */
export const recordFatalError = (
  state: ConfigurationState,
  message: string
): void => {
  state.errors.push(message);
};

const checkPlatform = (
  state: ConfigurationState,
  platform: string
): platform is PlatformId => {
  if (isValidPlatform(platform)) {
    return true;
  }
  recordFatalError(state, unsupportedPlatformMessage(platform));
  return false;
};

const overrideList = (
  table: Map<PlatformId, string[]>,
  platform: PlatformId
): string[] => {
  const existing = table.get(platform);
  if (existing) {
    return existing;
  }
  const created: string[] = [];
  table.set(platform, created);
  return created;
};

export const addSupportedPlatform = (
  state: ConfigurationState,
  platform: string
): void => {
  if (checkPlatform(state, platform)) {
    state.supportedPlatforms.push(platform);
  }
};

export const addUnsupportedPlatform = (
  state: ConfigurationState,
  platform: string
): void => {
  if (checkPlatform(state, platform)) {
    state.unsupportedPlatforms.push(platform);
  }
};

/**
 * Bind a CMake variable, by default or for one platform only
 */
export const setVariable = (
  state: ConfigurationState,
  name: string,
  value: string,
  platform?: string
): void => {
  if (platform === undefined) {
    state.variables.set(name, value);
    return;
  }
  if (!checkPlatform(state, platform)) {
    return;
  }

  const scoped =
    state.platformVariables.get(platform) ?? new Map<string, string>();
  scoped.set(name, value);
  state.platformVariables.set(platform, scoped);
};

/**
 * Register a script module to be installed
 */
export const addScriptTarget = (
  state: ConfigurationState,
  name: string,
  platform?: string
): void => {
  if (platform === undefined) {
    state.scriptTargets.push(name);
    return;
  }
  if (checkPlatform(state, platform)) {
    overrideList(state.platformScriptTargets, platform).push(name);
  }
};

/**
 * Register a native module to be compiled and installed
 */
export const addNativeTarget = (
  state: ConfigurationState,
  name: string,
  platform?: string
): void => {
  if (platform === undefined) {
    state.nativeTargets.push(name);
    return;
  }
  if (checkPlatform(state, platform)) {
    overrideList(state.platformNativeTargets, platform).push(name);
  }
};
