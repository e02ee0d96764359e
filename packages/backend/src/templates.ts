/**
 * CMake fragments, one renderer per script section
 *
 * Every renderer is pure and returns either an empty string or text ending
 * in a blank line, so sections compose by concatenation.
 */

import { escapeQuoted, indentLines } from "./cmake-syntax.js";
import { platformToken, type PlatformId } from "./platforms.js";

export const SCRIPT_EXTENSION = "lua";

const paragraph = (lines: readonly string[]): string =>
  lines.length === 0 ? "" : `${lines.join("\n")}\n\n`;

const fatalError = (message: string): string =>
  `message(FATAL_ERROR "${escapeQuoted(message)}")`;

/**
 * Wrap a fragment in an `if` block
 */
export const conditionalBlock = (condition: string, body: string): string =>
  `if (${condition})
${indentLines(body)}
endif()

`;

/**
 * Project declaration and install path defaults
 */
export const renderPreamble = (packageName: string): string =>
  `# Generated CMake file begin
cmake_minimum_required(VERSION 3.1)

project(${packageName} C CXX)

find_package(Lua)

## INSTALL DEFAULTS (Relative to CMAKE_INSTALL_PREFIX)
# Primary paths
set(INSTALL_BIN bin CACHE PATH "Where to install binaries to.")
set(INSTALL_LIB lib CACHE PATH "Where to install libraries to.")
set(INSTALL_ETC etc CACHE PATH "Where to store configuration files")
set(INSTALL_SHARE share CACHE PATH "Directory for shared data.")

set(INSTALL_LMOD \${INSTALL_LIB}/lua CACHE PATH "Directory to install Lua modules.")
set(INSTALL_CMOD \${INSTALL_LIB}/lua CACHE PATH "Directory to install Lua binary modules.")

`;

export const renderFatalErrors = (errors: readonly string[]): string =>
  errors.map((message) => `${fatalError(message)}\n\n`).join("");

export const renderUnsupportedPlatformGuards = (
  platforms: readonly PlatformId[]
): string =>
  platforms
    .map((platform) =>
      conditionalBlock(
        platformToken(platform),
        fatalError(
          "Unsupported platform (your platform was explicitly marked as not supported)"
        )
      )
    )
    .join("");

/**
 * Condition that holds when none of the given platforms match
 */
export const supportedPlatformCondition = (
  platforms: readonly PlatformId[]
): string =>
  platforms.map((platform) => `NOT ${platformToken(platform)}`).join(" AND ");

export const renderSupportedPlatformGuard = (
  platforms: readonly PlatformId[]
): string =>
  platforms.length === 0
    ? ""
    : conditionalBlock(
        supportedPlatformCondition(platforms),
        fatalError(
          "Unsupported platform (your platform is not in list of supported platforms)"
        )
      );

const variableLines = (variables: ReadonlyMap<string, string>): string[] =>
  [...variables].map(([name, value]) => `set(${name} ${value})`);

export const renderVariables = (
  variables: ReadonlyMap<string, string>
): string => paragraph(variableLines(variables));

export const renderPlatformVariables = (
  platformVariables: ReadonlyMap<PlatformId, ReadonlyMap<string, string>>
): string =>
  [...platformVariables]
    .filter(([, variables]) => variables.size > 0)
    .map(([platform, variables]) =>
      conditionalBlock(
        platformToken(platform),
        variableLines(variables).join("\n")
      )
    )
    .join("");

/**
 * Install rules for the files and directories listed in the description
 */
export const renderInstallCopy = (): string =>
  `install(DIRECTORY \${BUILD_COPY_DIRECTORIES} DESTINATION \${CMAKE_INSTALL_PREFIX})
install(FILES \${BUILD_INSTALL_LUA} DESTINATION \${INSTALL_LMOD})
install(FILES \${BUILD_INSTALL_LIB} DESTINATION \${INSTALL_LIB})
install(FILES \${BUILD_INSTALL_CONF} DESTINATION \${INSTALL_ETC})
install(PROGRAMS \${BUILD_INSTALL_BIN} DESTINATION \${INSTALL_BIN})

`;

/**
 * Install a script module under its dotted name, e.g. `a.b.c` is installed
 * as `a/b/c.lua` below INSTALL_LMOD
 */
export const scriptModuleInstall = (name: string): string => {
  const parts = name.split(".");
  const leaf = parts.pop() ?? name;
  const destination = ["${INSTALL_LMOD}", ...parts].join("/");
  return `install(FILES \${${name}_SOURCES} DESTINATION ${destination} RENAME ${leaf}.${SCRIPT_EXTENSION})`;
};

const platformOnly = (
  targets: readonly string[],
  defaults: readonly string[]
): string[] => targets.filter((name) => !defaults.includes(name));

export const renderScriptModules = (names: readonly string[]): string =>
  paragraph(names.map(scriptModuleInstall));

export const renderPlatformScriptModules = (
  platformTargets: ReadonlyMap<PlatformId, readonly string[]>,
  defaults: readonly string[]
): string =>
  [...platformTargets]
    .map(([platform, targets]) => {
      const lines = platformOnly(targets, defaults).map(scriptModuleInstall);
      return lines.length === 0
        ? ""
        : conditionalBlock(platformToken(platform), lines.join("\n"));
    })
    .join("");

/**
 * Library target, library lookup, compile settings and install rule for a
 * native module
 */
export const nativeModuleTarget = (name: string): string =>
  `add_library(${name} \${${name}_SOURCES})

foreach(LIBRARY \${${name}_LIBRARIES})
    find_library(\${LIBRARY} \${LIBRARY} \${${name}_LIBDIRS})
endforeach(LIBRARY)

target_include_directories(${name} PRIVATE \${${name}_INCDIRS})
target_compile_definitions(${name} PRIVATE \${${name}_DEFINES})
target_link_libraries(${name} PRIVATE \${${name}_LIBRARIES})
install(TARGETS ${name} DESTINATION \${INSTALL_CMOD})`;

export const renderNativeModules = (names: readonly string[]): string =>
  names.map((name) => `${nativeModuleTarget(name)}\n\n`).join("");

export const renderPlatformNativeModules = (
  platformTargets: ReadonlyMap<PlatformId, readonly string[]>,
  defaults: readonly string[]
): string =>
  [...platformTargets]
    .map(([platform, targets]) => {
      const modules = platformOnly(targets, defaults).map(nativeModuleTarget);
      return modules.length === 0
        ? ""
        : conditionalBlock(platformToken(platform), modules.join("\n\n"));
    })
    .join("");
