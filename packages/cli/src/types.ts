/**
 * Type definitions for CLI
 */

import type { PackageDescription } from "@rockgen/backend";

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  out?: string;
  name?: string; // Package name override
};

/**
 * Combined configuration (from description file + CLI args)
 */
export type ResolvedConfig = {
  readonly descriptionPath: string;
  readonly description: PackageDescription;
  readonly outputPath: string; // "-" writes to stdout
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Result type for operations
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };
