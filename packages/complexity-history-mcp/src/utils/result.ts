/**
 * Result helpers for per-item parsing
 */

import type { ParseIssue, Result } from '../types.js';

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(file: string, stage: ParseIssue['stage'], cause: unknown): Result<T> {
  return {
    ok: false,
    error: { file, stage, message: describeError(cause) },
  };
}

/**
 * Run a parser and capture any thrown error as an Err
 */
export function attempt<T>(file: string, stage: ParseIssue['stage'], run: () => T): Result<T> {
  try {
    return ok(run());
  } catch (error) {
    return fail(file, stage, error);
  }
}

/**
 * Unwrap a result, collecting the issue and falling back to an empty value
 */
export function valueOr<T, F>(result: Result<T>, fallback: F, issues: ParseIssue[]): T | F {
  if (result.ok) return result.value;
  issues.push(result.error);
  return fallback;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
