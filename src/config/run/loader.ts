/**
 * Suite configuration loader and validator.
 *
 * Responsible for:
 * - Validating a steering file against the schema
 * - Resolving input paths relative to the steering file
 * - Confirming that every referenced input exists before anything runs
 * - Freezing the result
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { ConfigError } from "../env.js";
import { INPUT_EXTENSIONS, type InputField } from "./enums.js";
import { SuiteConfigSchema, type SuiteConfig } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "missing_file" */
  code: string;
}

/**
 * Structured validation error for suite configuration.
 */
export class RunConfigError extends ConfigError {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "RunConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Suite configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface LoadSuiteOptions {
  /** Directory relative input paths resolve against (default: cwd) */
  baseDir?: string;
  /** Fail when an input file does not exist (default: true) */
  checkFiles?: boolean;
}

const INPUT_FIELDS = Object.keys(INPUT_EXTENSIONS).filter(
  (key): key is InputField => key in INPUT_EXTENSIONS
);

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function resolveInput(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Validate and load a suite configuration.
 *
 * @param input - Raw configuration object (e.g. parsed steering JSON)
 * @returns Validated, path-resolved and frozen SuiteConfig
 * @throws RunConfigError if a field is invalid or an input file is missing
 */
export function loadSuiteConfig(
  input: unknown,
  options: LoadSuiteOptions = {}
): Readonly<SuiteConfig> {
  const baseDir = resolve(options.baseDir ?? process.cwd());
  const result = SuiteConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new RunConfigError(
      `Invalid suite configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  const suite: SuiteConfig = { ...result.data };
  for (const field of INPUT_FIELDS) {
    suite[field] = resolveInput(baseDir, suite[field]);
  }

  if (options.checkFiles ?? true) {
    const missing: ConfigValidationIssue[] = INPUT_FIELDS.filter(
      (field) => !existsSync(suite[field])
    ).map((field) => ({
      path: [field],
      message: `File not found: ${suite[field]}`,
      code: "missing_file",
    }));

    if (missing.length > 0) {
      throw new RunConfigError(
        `Suite configuration references ${missing.length} missing input file(s)`,
        missing
      );
    }
  }

  return deepFreeze(suite);
}

/**
 * Read a steering JSON file and load it. Relative paths inside the file
 * resolve against the file's own directory.
 *
 * @throws ConfigError if the file cannot be read or parsed
 * @throws RunConfigError if validation fails
 */
export function loadSuiteConfigFile(
  filePath: string,
  options: Omit<LoadSuiteOptions, "baseDir"> = {}
): Readonly<SuiteConfig> {
  const absolute = resolve(filePath);
  let raw: string;
  try {
    raw = readFileSync(absolute, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Failed to read suite configuration ${absolute}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Suite configuration ${absolute} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return loadSuiteConfig(parsed, { ...options, baseDir: dirname(absolute) });
}
