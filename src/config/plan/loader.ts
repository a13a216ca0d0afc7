/**
 * Merge plan loader and validator.
 *
 * Responsible for:
 * - Validating plans against the schema with fail-fast behavior
 * - Loading plan overrides from JSON files
 * - Freezing the result so a run cannot change its own plan
 */

import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";
import type { ZodIssue } from "zod";
import { MergePlanSchema, type MergePlan, type SourceEntry } from "./schema.js";

/**
 * Structured validation error for merge plans.
 */
export class MergePlanError extends Error {
  public readonly issues: PlanValidationIssue[];

  constructor(message: string, issues: PlanValidationIssue[]) {
    super(message);
    this.name = "MergePlanError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Merge plan validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface PlanValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code, or "unreadable" / "invalid_json" for plan files */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): PlanValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load a merge plan.
 *
 * @returns Validated, deep-frozen plan
 * @throws MergePlanError if validation fails
 */
export function loadMergePlan(input: unknown): Readonly<MergePlan> {
  const result = MergePlanSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new MergePlanError(
      `Invalid merge plan: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate a merge plan without loading it.
 */
export function validateMergePlan(input: unknown): {
  success: boolean;
  plan?: MergePlan;
  errors?: PlanValidationIssue[];
} {
  const result = MergePlanSchema.safeParse(input);

  if (result.success) {
    return { success: true, plan: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Load a merge plan from a JSON file.
 */
export function loadMergePlanFile(path: string): Readonly<MergePlan> {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MergePlanError(`Cannot read merge plan ${path}`, [
      { path: [], message: reason, code: "unreadable" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MergePlanError(`Merge plan ${path} is not valid JSON`, [
      { path: [], message: reason, code: "invalid_json" },
    ]);
  }

  return loadMergePlan(parsed);
}

/**
 * Display name of a source: its label, or the file name without extension.
 */
export function sourceLabel(source: SourceEntry): string {
  if (source.label) {
    return source.label;
  }
  const name = basename(source.file);
  return basename(name, extname(name));
}
