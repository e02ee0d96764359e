/**
 * Rockgen Backend - CMake script generation
 */

// Export platform table
export {
  isValidPlatform,
  translatePlatform,
  platformToken,
  listPlatforms,
} from "./platforms.js";
export type { PlatformId, PlatformToken } from "./platforms.js";

// Export configuration state and setters
export {
  createConfiguration,
  recordFatalError,
  addSupportedPlatform,
  addUnsupportedPlatform,
  setVariable,
  addScriptTarget,
  addNativeTarget,
  unsupportedPlatformMessage,
} from "./configuration.js";

// Export generation
export { generateCMakeLists } from "./script-generator.js";
export {
  applyDescription,
  generateFromDescription,
  BUILTIN_BUILD_TYPE,
} from "./description.js";
export { formatArgument, formatCMakeList } from "./cmake-syntax.js";

// Export types
export type {
  ConfigurationState,
  ReadonlyConfiguration,
  PackageDescription,
  BuildSettings,
  ScriptModuleDeclaration,
  NativeModuleDeclaration,
  InstallDeclaration,
  VariableValue,
} from "./types.js";
