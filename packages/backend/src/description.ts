/**
 * Populate a configuration from a structured package description
 */

import { formatArgument, formatCMakeList } from "./cmake-syntax.js";
import {
  createConfiguration,
  recordFatalError,
  addSupportedPlatform,
  addUnsupportedPlatform,
  setVariable,
  addScriptTarget,
  addNativeTarget,
} from "./configuration.js";
import { generateCMakeLists } from "./script-generator.js";
import type {
  BuildSettings,
  ConfigurationState,
  InstallDeclaration,
  NativeModuleDeclaration,
  PackageDescription,
  VariableValue,
} from "./types.js";

export const BUILTIN_BUILD_TYPE = "builtin";

const INSTALL_VARIABLES: readonly [keyof InstallDeclaration, string][] = [
  ["lua", "BUILD_INSTALL_LUA"],
  ["lib", "BUILD_INSTALL_LIB"],
  ["conf", "BUILD_INSTALL_CONF"],
  ["bin", "BUILD_INSTALL_BIN"],
];

const NATIVE_MODULE_LISTS: readonly [
  Exclude<keyof NativeModuleDeclaration, "name" | "sources">,
  string,
][] = [
  ["libraries", "LIBRARIES"],
  ["libdirs", "LIBDIRS"],
  ["incdirs", "INCDIRS"],
  ["defines", "DEFINES"],
];

// A string is one literal argument; only a list value becomes a CMake list
const formatValue = (value: VariableValue): string =>
  typeof value === "string" ? formatArgument(value) : formatCMakeList(value);

const setListVariable = (
  state: ConfigurationState,
  name: string,
  items: readonly string[] | undefined,
  platform: string | undefined
): void => {
  if (items && items.length > 0) {
    setVariable(state, name, formatCMakeList(items), platform);
  }
};

/**
 * Apply variables, install lists and modules, either by default or for a
 * single platform
 */
const applySettings = (
  state: ConfigurationState,
  settings: BuildSettings,
  platform?: string
): void => {
  const variables: Readonly<Record<string, VariableValue>> =
    settings.variables ?? {};
  for (const [name, value] of Object.entries(variables)) {
    setVariable(state, name, formatValue(value), platform);
  }

  for (const [key, variable] of INSTALL_VARIABLES) {
    setListVariable(state, variable, settings.install?.[key], platform);
  }

  for (const mod of settings.scriptModules ?? []) {
    setListVariable(state, `${mod.name}_SOURCES`, mod.sources, platform);
    addScriptTarget(state, mod.name, platform);
  }

  for (const mod of settings.nativeModules ?? []) {
    setListVariable(state, `${mod.name}_SOURCES`, mod.sources, platform);
    for (const [key, suffix] of NATIVE_MODULE_LISTS) {
      setListVariable(
        state,
        `${mod.name}_${suffix}`,
        mod[key],
        platform
      );
    }
    addNativeTarget(state, mod.name, platform);
  }
};

/**
 * Record everything a description declares into the configuration
 */
export const applyDescription = (
  state: ConfigurationState,
  description: PackageDescription
): void => {
  const buildType = description.buildType ?? BUILTIN_BUILD_TYPE;
  if (buildType !== BUILTIN_BUILD_TYPE) {
    recordFatalError(
      state,
      `build type '${buildType}' is not supported, only '${BUILTIN_BUILD_TYPE}' builds can be generated`
    );
  }

  for (const message of description.errors ?? []) {
    recordFatalError(state, message);
  }

  for (const platform of description.supportedPlatforms ?? []) {
    addSupportedPlatform(state, platform);
  }
  for (const platform of description.unsupportedPlatforms ?? []) {
    addUnsupportedPlatform(state, platform);
  }

  applySettings(state, description);
  setListVariable(
    state,
    "BUILD_COPY_DIRECTORIES",
    description.copyDirectories,
    undefined
  );

  const overrides: Readonly<Record<string, BuildSettings>> =
    description.platforms ?? {};
  for (const [platform, settings] of Object.entries(overrides)) {
    applySettings(state, settings, platform);
  }
};

/**
 * Build the configuration for a description and render it
 */
export const generateFromDescription = (
  description: PackageDescription
): { readonly script: string; readonly errors: readonly string[] } => {
  const state = createConfiguration(description.package);
  applyDescription(state, description);
  return { script: generateCMakeLists(state), errors: state.errors };
};
