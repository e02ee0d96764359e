/**
 * CMakeLists.txt generation from a populated configuration
 */

import {
  renderPreamble,
  renderFatalErrors,
  renderUnsupportedPlatformGuards,
  renderSupportedPlatformGuard,
  renderVariables,
  renderPlatformVariables,
  renderInstallCopy,
  renderScriptModules,
  renderPlatformScriptModules,
  renderNativeModules,
  renderPlatformNativeModules,
} from "./templates.js";
import type { ReadonlyConfiguration } from "./types.js";

/**
 * Generate complete CMakeLists.txt content
 *
 * Configuration errors never fail generation; they are written as
 * FATAL_ERROR messages ahead of any other logic so CMake stops on them.
 */
export const generateCMakeLists = (config: ReadonlyConfiguration): string => {
  const sections = [
    renderPreamble(config.packageName),
    renderFatalErrors(config.errors),
    renderUnsupportedPlatformGuards(config.unsupportedPlatforms),
    renderSupportedPlatformGuard(config.supportedPlatforms),
    renderVariables(config.variables),
    renderPlatformVariables(config.platformVariables),
    renderInstallCopy(),
    renderScriptModules(config.scriptTargets),
    renderPlatformScriptModules(
      config.platformScriptTargets,
      config.scriptTargets
    ),
    renderNativeModules(config.nativeTargets),
    renderPlatformNativeModules(
      config.platformNativeTargets,
      config.nativeTargets
    ),
  ];

  return `${sections.join("").trimEnd()}\n`;
};
