/**
 * Type definitions for CMake script generation
 */

import type { PlatformId } from "./platforms.js";

/**
 * Mutable accumulator for a single generation run.
 *
 * Only the setters in configuration.ts write to it; the renderer reads it
 * through ReadonlyConfiguration.
 */
export type ConfigurationState = {
  readonly packageName: string;
  readonly errors: string[];
  readonly supportedPlatforms: PlatformId[];
  readonly unsupportedPlatforms: PlatformId[];
  readonly variables: Map<string, string>;
  readonly platformVariables: Map<PlatformId, Map<string, string>>;
  readonly scriptTargets: string[];
  readonly platformScriptTargets: Map<PlatformId, string[]>;
  readonly nativeTargets: string[];
  readonly platformNativeTargets: Map<PlatformId, string[]>;
};

/**
 * Read-only view of a populated configuration
 */
export type ReadonlyConfiguration = {
  readonly packageName: string;
  readonly errors: readonly string[];
  readonly supportedPlatforms: readonly PlatformId[];
  readonly unsupportedPlatforms: readonly PlatformId[];
  readonly variables: ReadonlyMap<string, string>;
  readonly platformVariables: ReadonlyMap<
    PlatformId,
    ReadonlyMap<string, string>
  >;
  readonly scriptTargets: readonly string[];
  readonly platformScriptTargets: ReadonlyMap<PlatformId, readonly string[]>;
  readonly nativeTargets: readonly string[];
  readonly platformNativeTargets: ReadonlyMap<PlatformId, readonly string[]>;
};

/**
 * Variable value in a description: plain string or a list
 */
export type VariableValue = string | readonly string[];

/**
 * Module installed as its interpreted source file
 */
export type ScriptModuleDeclaration = {
  readonly name: string;
  readonly sources: readonly string[];
};

/**
 * Module compiled to a native library
 */
export type NativeModuleDeclaration = {
  readonly name: string;
  readonly sources: readonly string[];
  readonly libraries?: readonly string[];
  readonly libdirs?: readonly string[];
  readonly incdirs?: readonly string[];
  readonly defines?: readonly string[];
};

/**
 * Extra files installed alongside the modules
 */
export type InstallDeclaration = {
  readonly lua?: readonly string[];
  readonly lib?: readonly string[];
  readonly conf?: readonly string[];
  readonly bin?: readonly string[];
};

/**
 * Settings that can be overridden per platform
 */
export type BuildSettings = {
  readonly variables?: Readonly<Record<string, VariableValue>>;
  readonly scriptModules?: readonly ScriptModuleDeclaration[];
  readonly nativeModules?: readonly NativeModuleDeclaration[];
  readonly install?: InstallDeclaration;
};

/**
 * Structured package build description
 */
export type PackageDescription = BuildSettings & {
  readonly package: string;
  readonly buildType?: string;
  readonly supportedPlatforms?: readonly string[];
  readonly unsupportedPlatforms?: readonly string[];
  readonly errors?: readonly string[];
  readonly copyDirectories?: readonly string[];
  readonly platforms?: Readonly<Record<string, BuildSettings>>;
};
