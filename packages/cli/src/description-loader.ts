/**
 * Package description loading and shape validation
 */

import { readFileSync, existsSync } from "node:fs";
import YAML from "yaml";
import type {
  BuildSettings,
  InstallDeclaration,
  NativeModuleDeclaration,
  PackageDescription,
  ScriptModuleDeclaration,
  VariableValue,
} from "@rockgen/backend";
import type { Result } from "./types.js";

type RawObject = Readonly<Record<string, unknown>>;

// Characters CMake accepts in an unquoted variable reference
const NAME_PATTERN = /^[A-Za-z0-9_.+-]+$/;

const SETTINGS_FIELDS = [
  "variables",
  "scriptModules",
  "nativeModules",
  "install",
] as const;

const DESCRIPTION_FIELDS = [
  "package",
  "buildType",
  "supportedPlatforms",
  "unsupportedPlatforms",
  "errors",
  "copyDirectories",
  "platforms",
  ...SETTINGS_FIELDS,
] as const;

/**
 * Check a package, module or variable name
 */
export const isValidName = (name: string): boolean => NAME_PATTERN.test(name);

const isObject = (value: unknown): value is RawObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Collects shape problems so that all of them are reported at once
 */
type Issues = string[];

const checkFields = (
  raw: RawObject,
  allowed: readonly string[],
  where: string,
  issues: Issues
): void => {
  for (const key of Object.keys(raw)) {
    if (!allowed.includes(key)) {
      issues.push(`${where}: unknown field '${key}'`);
    }
  }
};

const readString = (
  value: unknown,
  where: string,
  issues: Issues
): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    issues.push(`${where}: expected a string`);
    return undefined;
  }
  return value;
};

const readName = (
  value: unknown,
  where: string,
  issues: Issues
): string | undefined => {
  if (value === undefined) {
    issues.push(`${where}: a name is required`);
    return undefined;
  }
  const name = readString(value, where, issues);
  if (name === undefined) return undefined;
  if (!isValidName(name)) {
    issues.push(`${where}: invalid name '${name}'`);
    return undefined;
  }
  return name;
};

const readStringList = (
  value: unknown,
  where: string,
  issues: Issues
): readonly string[] | undefined => {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    issues.push(`${where}: expected a list of strings`);
    return undefined;
  }
  const items: string[] = [];
  value.forEach((item: unknown, index) => {
    const text = readString(item, `${where}[${index}]`, issues);
    if (text !== undefined) items.push(text);
  });
  return items;
};

const readVariables = (
  value: unknown,
  where: string,
  issues: Issues
): Record<string, VariableValue> | undefined => {
  if (value === undefined) return undefined;
  if (!isObject(value)) {
    issues.push(`${where}: expected a mapping of variable names to values`);
    return undefined;
  }
  const variables: [string, VariableValue][] = [];
  for (const [key, item] of Object.entries(value)) {
    const name = readName(key, `${where}`, issues);
    const itemWhere = `${where}.${key}`;
    const parsed = Array.isArray(item)
      ? readStringList(item, itemWhere, issues)
      : readString(item ?? "", itemWhere, issues);
    if (name !== undefined && parsed !== undefined) {
      variables.push([name, parsed]);
    }
  }
  // fromEntries defines own properties, so `__proto__` is kept as a key
  return Object.fromEntries(variables);
};

const readModules = <T>(
  value: unknown,
  where: string,
  issues: Issues,
  readModule: (raw: RawObject, where: string) => T | undefined
): readonly T[] | undefined => {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    issues.push(`${where}: expected a list of modules`);
    return undefined;
  }
  const modules: T[] = [];
  value.forEach((item: unknown, index) => {
    const itemWhere = `${where}[${index}]`;
    if (!isObject(item)) {
      issues.push(`${itemWhere}: expected a module declaration`);
      return;
    }
    const mod = readModule(item, itemWhere);
    if (mod !== undefined) modules.push(mod);
  });
  return modules;
};

const readSources = (
  raw: RawObject,
  where: string,
  issues: Issues
): readonly string[] | undefined => {
  if (raw.sources === undefined) {
    issues.push(`${where}: 'sources' is required`);
    return undefined;
  }
  return typeof raw.sources === "string"
    ? [raw.sources]
    : readStringList(raw.sources, `${where}.sources`, issues);
};

const readScriptModule =
  (issues: Issues) =>
  (raw: RawObject, where: string): ScriptModuleDeclaration | undefined => {
    checkFields(raw, ["name", "sources"], where, issues);
    const name = readName(raw.name, `${where}.name`, issues);
    const sources = readSources(raw, where, issues);
    return name !== undefined && sources !== undefined
      ? { name, sources }
      : undefined;
  };

const readNativeModule =
  (issues: Issues) =>
  (raw: RawObject, where: string): NativeModuleDeclaration | undefined => {
    checkFields(
      raw,
      ["name", "sources", "libraries", "libdirs", "incdirs", "defines"],
      where,
      issues
    );
    const name = readName(raw.name, `${where}.name`, issues);
    const sources = readSources(raw, where, issues);
    if (name === undefined || sources === undefined) {
      return undefined;
    }
    return {
      name,
      sources,
      libraries: readStringList(raw.libraries, `${where}.libraries`, issues),
      libdirs: readStringList(raw.libdirs, `${where}.libdirs`, issues),
      incdirs: readStringList(raw.incdirs, `${where}.incdirs`, issues),
      defines: readStringList(raw.defines, `${where}.defines`, issues),
    };
  };

const readInstall = (
  value: unknown,
  where: string,
  issues: Issues
): InstallDeclaration | undefined => {
  if (value === undefined) return undefined;
  if (!isObject(value)) {
    issues.push(`${where}: expected a mapping`);
    return undefined;
  }
  checkFields(value, ["lua", "lib", "conf", "bin"], where, issues);
  return {
    lua: readStringList(value.lua, `${where}.lua`, issues),
    lib: readStringList(value.lib, `${where}.lib`, issues),
    conf: readStringList(value.conf, `${where}.conf`, issues),
    bin: readStringList(value.bin, `${where}.bin`, issues),
  };
};

const readSettings = (
  raw: RawObject,
  where: string,
  issues: Issues
): BuildSettings => ({
  variables: readVariables(raw.variables, `${where}variables`, issues),
  scriptModules: readModules(
    raw.scriptModules,
    `${where}scriptModules`,
    issues,
    readScriptModule(issues)
  ),
  nativeModules: readModules(
    raw.nativeModules,
    `${where}nativeModules`,
    issues,
    readNativeModule(issues)
  ),
  install: readInstall(raw.install, `${where}install`, issues),
});

const readPlatforms = (
  value: unknown,
  issues: Issues
): Record<string, BuildSettings> | undefined => {
  if (value === undefined) return undefined;
  if (!isObject(value)) {
    issues.push("platforms: expected a mapping of platform overrides");
    return undefined;
  }
  const platforms: [string, BuildSettings][] = [];
  for (const [platform, settings] of Object.entries(value)) {
    const where = `platforms.${platform}`;
    if (!isObject(settings)) {
      issues.push(`${where}: expected a mapping`);
      continue;
    }
    checkFields(settings, SETTINGS_FIELDS, where, issues);
    platforms.push([platform, readSettings(settings, `${where}.`, issues)]);
  }
  return Object.fromEntries(platforms);
};

/**
 * Validate parsed data as a package description
 *
 * Platform identifiers are not checked here: unknown platforms are left for
 * the generator, which writes them into the script as fatal errors.
 */
export const parseDescription = (
  raw: unknown
): Result<PackageDescription, string> => {
  if (!isObject(raw)) {
    return { ok: false, error: "description must be a mapping" };
  }

  const issues: Issues = [];
  checkFields(raw, DESCRIPTION_FIELDS, "description", issues);

  const packageName = readName(raw.package, "package", issues);
  const description: PackageDescription = {
    package: packageName ?? "",
    buildType: readString(raw.buildType, "buildType", issues),
    supportedPlatforms: readStringList(
      raw.supportedPlatforms,
      "supportedPlatforms",
      issues
    ),
    unsupportedPlatforms: readStringList(
      raw.unsupportedPlatforms,
      "unsupportedPlatforms",
      issues
    ),
    errors: readStringList(raw.errors, "errors", issues),
    copyDirectories: readStringList(
      raw.copyDirectories,
      "copyDirectories",
      issues
    ),
    platforms: readPlatforms(raw.platforms, issues),
    ...readSettings(raw, "", issues),
  };

  if (issues.length > 0) {
    return { ok: false, error: issues.join("\n") };
  }
  return { ok: true, value: description };
};

/**
 * Load a package description from a YAML or JSON file
 */
export const loadDescription = (
  descriptionPath: string
): Result<PackageDescription, string> => {
  if (!existsSync(descriptionPath)) {
    return {
      ok: false,
      error: `Description file not found: ${descriptionPath}`,
    };
  }

  try {
    const content = readFileSync(descriptionPath, "utf-8");
    // Every scalar stays a string: `5.10` must not become 5.1
    const parsed: unknown = YAML.parse(content, { schema: "failsafe" });
    const result = parseDescription(parsed);
    if (!result.ok) {
      return {
        ok: false,
        error: `Invalid description ${descriptionPath}:\n${result.error}`,
      };
    }
    return result;
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${descriptionPath}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};
