/**
 * Transport retry for reasoning-service calls.
 *
 * Each attempt gets its own timeout. Transport failures that classify as
 * retriable are retried after a fixed delay, up to the policy's limit. Parse
 * errors and budget exhaustion are never retried.
 *
 * @module analyzer/reasoning-retry
 */

import { classifyError } from "../error-classification";
import { raceWithSignal } from "./deadline";
import {
  BudgetExceededError,
  ReasoningServiceParseError,
  ReasoningServiceTransportError,
  type ReasoningOperation,
} from "./errors";
import type { ReasoningCallOptions, ReasoningCallPolicy } from "./reasoning-service-types";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: SleepFn = (ms, signal) => {
  if (ms <= 0) return Promise.resolve();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const delay = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return raceWithSignal(delay, signal).finally(() => clearTimeout(timer));
};

class AttemptTimeout extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Reasoning call timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

function toTransportError(operation: ReasoningOperation, error: unknown): ReasoningServiceTransportError {
  if (error instanceof ReasoningServiceTransportError) return error;
  if (error instanceof AttemptTimeout) {
    return new ReasoningServiceTransportError(error.message, operation, "timeout", true, { cause: error });
  }
  const classified = classifyError(error);
  return new ReasoningServiceTransportError(
    classified.message,
    operation,
    classified.category,
    classified.retriable,
    { cause: error },
  );
}

/**
 * Run one attempt with a per-call timeout, linked to the caller's signal.
 */
async function runAttempt<T>(
  attempt: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer: AbortSignal | undefined,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new AttemptTimeout(timeoutMs)), timeoutMs);
  const onOuterAbort = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", onOuterAbort, { once: true });

  try {
    return await raceWithSignal(attempt(controller.signal), controller.signal);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener("abort", onOuterAbort);
  }
}

export async function callWithTransportRetry<T>(
  operation: ReasoningOperation,
  attempt: (signal: AbortSignal) => Promise<T>,
  policy: ReasoningCallPolicy,
  options: ReasoningCallOptions = {},
  sleep: SleepFn = defaultSleep,
): Promise<T> {
  const { signal, onEvent } = options;
  const maxAttempts = policy.maxTransportRetries + 1;

  for (let attemptNo = 1; ; attemptNo++) {
    if (signal?.aborted) throw signal.reason;

    try {
      return await runAttempt(attempt, policy.callTimeoutMs, signal);
    } catch (error) {
      // Budget exhaustion belongs to the caller, not to this call
      if (signal?.aborted || error instanceof BudgetExceededError) {
        throw signal?.aborted ? signal.reason : error;
      }
      if (error instanceof ReasoningServiceParseError) throw error;

      const transportError = toTransportError(operation, error);
      if (transportError.category === "timeout") {
        onEvent?.({
          type: "call_timeout",
          stage: operation,
          message: transportError.message,
          detail: { attempt: attemptNo, timeoutMs: policy.callTimeoutMs },
        });
      }

      if (!transportError.retriable) throw transportError;

      if (attemptNo >= maxAttempts) {
        onEvent?.({
          type: "retry_exhausted",
          stage: operation,
          message: `Giving up after ${attemptNo} attempts: ${transportError.message}`,
          detail: { attempts: attemptNo, category: transportError.category },
        });
        throw transportError;
      }

      onEvent?.({
        type: "transport_retry",
        stage: operation,
        message: `Attempt ${attemptNo}/${maxAttempts} failed (${transportError.category}); retrying in ${policy.retryDelayMs}ms`,
        detail: { attempt: attemptNo, category: transportError.category },
      });
      await sleep(policy.retryDelayMs, signal);
    }
  }
}
