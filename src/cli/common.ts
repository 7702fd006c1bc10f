/**
 * Helpers shared by the command-line entry points.
 */

import { existsSync, realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { ConfigError, RunConfigError } from "../config/index.js";
import { StageFailure } from "../pipeline/index.js";

export const EXIT_CODES = {
  pass: 0,
  fail: 1,
  error: 2,
} as const;

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

export function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function printVerdict(pass: boolean, reason: string): void {
  console.log("");
  console.log("─".repeat(60));
  console.log(pass ? c("green", `✓ PASS: ${reason}`) : c("red", `✗ FAIL: ${reason}`));
  console.log("─".repeat(60));
  console.log("");
}

/**
 * Parse an optional positive number option.
 *
 * @throws ConfigError if the value is present but not a positive number
 */
export function parsePositiveNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`--${name} must be a positive number, got: ${value}`);
  }
  return parsed;
}

/**
 * Message for an error reaching the top level.
 */
export function describeError(err: unknown): string {
  if (err instanceof RunConfigError || err instanceof StageFailure) {
    return err.format();
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

/**
 * Whether the module at `moduleUrl` is the script node was started with.
 * Symlinks (such as npm bin links) are resolved first.
 */
export function isEntryPoint(
  moduleUrl: string,
  scriptPath: string | undefined = process.argv[1]
): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) {
    return false;
  }
  return pathToFileURL(realpathSync(scriptPath)).href === moduleUrl;
}
