/**
 * Analyzer error taxonomy.
 *
 * Only ValidationError reaches the caller as an error. Transport and parse
 * errors are absorbed by the stage that made the call; BudgetExceededError
 * moves the pipeline straight to assembly; InternalInvariantViolation is a
 * programming defect and is always re-thrown.
 *
 * @module analyzer/errors
 */

import type { ErrorCategory } from "../error-classification";

export type ReasoningOperation = "detect" | "explain" | "rewrite";

export type ValidationErrorCode =
  | "invalid_type"
  | "empty"
  | "too_short"
  | "too_long"
  | "language_mismatch";

export class ValidationError extends Error {
  constructor(
    public readonly code: ValidationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ReasoningServiceTransportError extends Error {
  constructor(
    message: string,
    public readonly operation: ReasoningOperation,
    public readonly category: ErrorCategory,
    public readonly retriable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReasoningServiceTransportError";
  }
}

export class ReasoningServiceParseError extends Error {
  constructor(
    message: string,
    public readonly operation: ReasoningOperation,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ReasoningServiceParseError";
  }
}

export class BudgetExceededError extends Error {
  constructor(
    public readonly stage: string,
    public readonly budgetMs: number,
  ) {
    super(`Analysis budget of ${budgetMs}ms exhausted during ${stage}`);
    this.name = "BudgetExceededError";
  }
}

export class InternalInvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalInvariantViolation";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
