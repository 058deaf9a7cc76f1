import { describe, expect, it, vi } from "vitest";

import type { DiagnosticInput } from "@/lib/analyzer/diagnostics";
import {
  BudgetExceededError,
  ReasoningServiceParseError,
  ReasoningServiceTransportError,
} from "@/lib/analyzer/errors";
import { callWithTransportRetry } from "@/lib/analyzer/reasoning-retry";
import type { ReasoningCallPolicy } from "@/lib/analyzer/reasoning-service-types";
import { never } from "@test/helpers/test-helpers";

const POLICY: ReasoningCallPolicy = { callTimeoutMs: 8000, maxTransportRetries: 2, retryDelayMs: 500 };

function setup() {
  const events: DiagnosticInput[] = [];
  const sleep = vi.fn(async () => undefined);
  const onEvent = (event: DiagnosticInput) => {
    events.push(event);
  };
  return { events, sleep, onEvent };
}

describe("callWithTransportRetry", () => {
  it("returns the first successful attempt", async () => {
    const { sleep, onEvent, events } = setup();
    const attempt = vi.fn(async () => "ok");

    await expect(callWithTransportRetry("detect", attempt, POLICY, { onEvent }, sleep)).resolves.toBe("ok");
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(events).toEqual([]);
  });

  it("retries transport failures with a fixed delay", async () => {
    const { sleep, onEvent, events } = setup();
    const attempt = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error("fetch failed"))
      .mockRejectedValueOnce(new Error("fetch failed"))
      .mockResolvedValueOnce("ok");

    await expect(callWithTransportRetry("explain", attempt, POLICY, { onEvent }, sleep)).resolves.toBe("ok");
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500, undefined);
    expect(events.map((e) => e.type)).toEqual(["transport_retry", "transport_retry"]);
    expect(events[0].message).toBe("Attempt 1/3 failed (network); retrying in 500ms");
  });

  it("gives up after three attempts", async () => {
    const { sleep, onEvent, events } = setup();
    const attempt = vi.fn(async (): Promise<string> => {
      throw new Error("fetch failed");
    });

    const call = callWithTransportRetry("detect", attempt, POLICY, { onEvent }, sleep);
    await expect(call).rejects.toBeInstanceOf(ReasoningServiceTransportError);
    await expect(call).rejects.toMatchObject({ category: "network", operation: "detect", retriable: true });
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(events.map((e) => e.type)).toEqual(["transport_retry", "transport_retry", "retry_exhausted"]);
    expect(events[2].message).toBe("Giving up after 3 attempts: fetch failed");
  });

  it("never retries a parse failure", async () => {
    const { sleep, onEvent } = setup();
    const parseError = new ReasoningServiceParseError("Malformed detect response: root: Invalid input", "detect");
    const attempt = vi.fn(async (): Promise<string> => {
      throw parseError;
    });

    await expect(callWithTransportRetry("detect", attempt, POLICY, { onEvent }, sleep)).rejects.toBe(parseError);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it("does not retry non-retriable transport errors", async () => {
    const { sleep, onEvent, events } = setup();
    const attempt = vi.fn(async (): Promise<string> => {
      throw Object.assign(new Error("Unauthorized"), { statusCode: 401 });
    });

    await expect(callWithTransportRetry("rewrite", attempt, POLICY, { onEvent }, sleep)).rejects.toMatchObject({
      name: "ReasoningServiceTransportError",
      category: "provider_outage",
      retriable: false,
    });
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(events).toEqual([]);
  });

  it("classifies a per-call timeout as a transport failure", async () => {
    const { sleep, onEvent, events } = setup();
    const attempt = vi.fn((_signal: AbortSignal) => never<string>());

    const call = callWithTransportRetry(
      "explain",
      attempt,
      { callTimeoutMs: 20, maxTransportRetries: 0, retryDelayMs: 0 },
      { onEvent },
      sleep,
    );
    await expect(call).rejects.toMatchObject({
      name: "ReasoningServiceTransportError",
      category: "timeout",
      message: "Reasoning call timed out after 20ms",
    });
    expect(events.map((e) => e.type)).toEqual(["call_timeout", "retry_exhausted"]);
  });

  it("hands the attempt an abort signal that fires on timeout", async () => {
    const { sleep } = setup();
    let seen: AbortSignal | undefined;
    const attempt = vi.fn((signal: AbortSignal) => {
      seen = signal;
      return never<string>();
    });

    await expect(
      callWithTransportRetry("detect", attempt, { callTimeoutMs: 10, maxTransportRetries: 0, retryDelayMs: 0 }, {}, sleep),
    ).rejects.toBeInstanceOf(ReasoningServiceTransportError);
    expect(seen?.aborted).toBe(true);
  });

  it("stops immediately when the request budget runs out mid-call", async () => {
    const { sleep, onEvent, events } = setup();
    const controller = new AbortController();
    const attempt = vi.fn((_signal: AbortSignal) => never<string>());

    const call = callWithTransportRetry("explain", attempt, POLICY, { signal: controller.signal, onEvent }, sleep);
    controller.abort(new BudgetExceededError("Explaining", 10_000));

    await expect(call).rejects.toBeInstanceOf(BudgetExceededError);
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(events).toEqual([]);
  });

  it("does not start when the signal is already aborted", async () => {
    const { sleep } = setup();
    const controller = new AbortController();
    controller.abort(new BudgetExceededError("Rewriting", 10_000));
    const attempt = vi.fn(async () => "never used");

    await expect(
      callWithTransportRetry("rewrite", attempt, POLICY, { signal: controller.signal }, sleep),
    ).rejects.toBeInstanceOf(BudgetExceededError);
    expect(attempt).not.toHaveBeenCalled();
  });
});
