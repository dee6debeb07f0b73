/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

const DEFAULT_ROOT = "./data";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the data directory
 * Priority: CLI option > TODOQUERY_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.TODOQUERY_ROOT ?? DEFAULT_ROOT;
  return path.resolve(expandTilde(root));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag?: boolean): boolean {
  return flag === true || process.env.TODOQUERY_CLI_DEBUG === "1";
}
