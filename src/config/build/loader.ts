/**
 * Run configuration loader and validator.
 *
 * Validates raw input against the schemas with fail-fast behavior and
 * freezes the result so nothing downstream can mutate it mid-run.
 */

import type { ZodIssue, ZodType, ZodTypeDef } from "zod";
import { ValidationError, type ValidationIssue } from "../../errors/index.js";
import {
  ContainerConfigSchema,
  GenerateConfigSchema,
  InstallConfigSchema,
  type ContainerConfig,
  type GenerateConfig,
  type InstallConfig,
  type SourceSelection,
} from "./schema.js";

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function parseOrThrow<T extends object>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  label: string
): Readonly<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ValidationError(
      `Invalid ${label} configuration: ${issues.length} validation error(s)`,
      issues,
      "config"
    );
  }
  return deepFreeze(result.data);
}

/**
 * Validate and load an installation run configuration.
 *
 * @throws ValidationError if validation fails
 */
export function loadInstallConfig(input: unknown): Readonly<InstallConfig> {
  return parseOrThrow(InstallConfigSchema, input, "install");
}

/**
 * Validate and load a generation run configuration.
 *
 * @throws ValidationError if validation fails
 */
export function loadGenerateConfig(input: unknown): Readonly<GenerateConfig> {
  return parseOrThrow(GenerateConfigSchema, input, "generate");
}

/**
 * Validate and load container re-invocation settings.
 *
 * @throws ValidationError if validation fails
 */
export function loadContainerConfig(input: unknown): Readonly<ContainerConfig> {
  return parseOrThrow(ContainerConfigSchema, input, "container");
}

/**
 * Apply a default pinned version when the caller chose neither a version
 * nor a local source. An explicit choice is passed through untouched so
 * that "both" still fails validation.
 */
export function withDefaultVersion(
  selection: SourceSelection,
  defaultVersion: string
): SourceSelection {
  if (selection.version || selection.source) {
    return selection;
  }
  return { version: defaultVersion };
}
