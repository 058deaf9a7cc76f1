/**
 * Request deadline for cooperative budget enforcement.
 *
 * The orchestrator creates one Deadline per request and threads it through the
 * stages. Stage boundaries call `isExpired()`; calls already in flight observe
 * `signal`, which aborts with a BudgetExceededError once the budget runs out.
 * The clock is injectable so tests can move time without waiting.
 *
 * @module analyzer/deadline
 */

import { BudgetExceededError } from "./errors";

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export class Deadline {
  readonly expiresAt: number;
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null;
  private currentStage = "Detecting";

  constructor(
    readonly budgetMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    this.expiresAt = clock.now() + budgetMs;
    this.timer = setTimeout(() => this.expire(), budgetMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Tag used in the BudgetExceededError raised when the deadline fires */
  enterStage(stage: string): void {
    this.currentStage = stage;
  }

  isExpired(): boolean {
    if (this.controller.signal.aborted) return true;
    if (this.clock.now() >= this.expiresAt) {
      this.expire();
      return true;
    }
    return false;
  }

  /** Stop the background timer; call once the request is finished. */
  dispose(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private expire(): void {
    this.dispose();
    if (!this.controller.signal.aborted) {
      this.controller.abort(new BudgetExceededError(this.currentStage, this.budgetMs));
    }
  }
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts. The losing promise is left to settle on its own.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    promise.then(undefined, () => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
