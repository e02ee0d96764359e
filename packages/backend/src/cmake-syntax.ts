/**
 * Helpers for writing CMake arguments
 */

const NEEDS_QUOTING = /[\s"()#;$\\]/;

/**
 * Escape text for use inside a quoted argument
 */
export const escapeQuoted = (text: string): string =>
  text.replace(/[\\"$]/g, (ch) => `\\${ch}`);

/**
 * Write a single argument, quoting it only when CMake would split or
 * interpret it otherwise
 */
export const formatArgument = (value: string): string =>
  value === "" || NEEDS_QUOTING.test(value)
    ? `"${escapeQuoted(value)}"`
    : value;

/**
 * Write a list of arguments as a space separated CMake list
 */
export const formatCMakeList = (items: readonly string[]): string =>
  items.map(formatArgument).join(" ");

/**
 * Indent every non-empty line of a fragment
 */
export const indentLines = (text: string, indent = "    "): string =>
  text
    .split("\n")
    .map((line) => (line === "" ? line : `${indent}${line}`))
    .join("\n");
