/**
 * Unit tests for ConfirmationReconciler (per-link single-flight state machine).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { WireId } from "@qosd/core";
import type { Logger } from "@qosd/common";
import { ConfirmationReconciler, type OperationExecutor } from "./confirmation-reconciler.js";
import type { LinkOperation, RemoveOperation } from "./operations.js";

const silentLogger: Logger = {
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function removal(...wireIds: WireId[]): RemoveOperation {
  return { kind: "remove", principal: 1000, wireIds };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("ConfirmationReconciler", () => {
  let executed: Array<{ linkName: string; op: LinkOperation }>;
  let awaiting: WireId[][];
  let executor: OperationExecutor;
  let onFatalError: (err: unknown) => void;

  function createReconciler(): ConfirmationReconciler {
    return new ConfirmationReconciler({
      executor,
      confirmationTimeoutMs: 1500,
      clock: { now: () => 42 },
      onFatalError,
      loggerFactory: silentLogger,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    vi.clearAllMocks();
    executed = [];
    awaiting = [];
    // Each execution resolves with the next queued answer, or nothing awaiting.
    executor = (linkName, op) => {
      executed.push({ linkName, op });
      return Promise.resolve(awaiting.shift() ?? []);
    };
    onFatalError = vi.fn();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should keep at most one operation in flight per link", async () => {
    const reconciler = createReconciler();
    const first = removal(3);
    const second = removal(4);
    awaiting.push([3]);
    reconciler.enqueue("wlan0", first);
    reconciler.enqueue("wlan0", second);

    reconciler.advance("wlan0");
    expect(reconciler.stateOf("wlan0")).toBe("submitting");
    reconciler.advance("wlan0");
    expect(executed).toHaveLength(1);

    await flush();
    expect(reconciler.stateOf("wlan0")).toBe("awaiting-confirmation");
    expect(reconciler.outstandingFor("wlan0")).toEqual({ expectedWireIds: [3], armedAt: 42 });

    reconciler.advance("wlan0");
    expect(executed).toHaveLength(1);
    expect(reconciler.queuedCount("wlan0")).toBe(1);

    reconciler.onConfirmation("wlan0", [3]);
    expect(executed.map((e) => e.op)).toEqual([first, second]);

    await flush();
    expect(reconciler.stateOf("wlan0")).toBe("idle");
    expect(reconciler.outstandingFor("wlan0")).toBeUndefined();
  });

  it("should run links independently", async () => {
    const reconciler = createReconciler();
    awaiting.push([1], [1]);
    reconciler.enqueue("wlan0", removal(1));
    reconciler.enqueue("wlan1", removal(1));

    reconciler.advanceAll();
    await flush();

    expect(executed.map((e) => e.linkName)).toEqual(["wlan0", "wlan1"]);
    expect(reconciler.stateOf("wlan0")).toBe("awaiting-confirmation");
    expect(reconciler.stateOf("wlan1")).toBe("awaiting-confirmation");

    reconciler.onConfirmation("wlan1", [1]);
    expect(reconciler.stateOf("wlan0")).toBe("awaiting-confirmation");
    expect(reconciler.stateOf("wlan1")).toBe("idle");
  });

  it("should return to idle at once when nothing awaits confirmation", async () => {
    const reconciler = createReconciler();
    reconciler.enqueue("wlan0", removal(1));
    reconciler.enqueue("wlan0", removal(2));

    reconciler.advance("wlan0");
    await flush();

    expect(executed).toHaveLength(2);
    expect(reconciler.stateOf("wlan0")).toBe("idle");
  });

  it("should ignore a confirmation that does not match the expected set", async () => {
    const reconciler = createReconciler();
    awaiting.push([5, 3]);
    reconciler.enqueue("wlan0", removal(3, 5));
    reconciler.enqueue("wlan0", removal(7));
    reconciler.advance("wlan0");
    await flush();

    expect(reconciler.outstandingFor("wlan0")?.expectedWireIds).toEqual([3, 5]);

    reconciler.onConfirmation("wlan0", [3]);
    expect(reconciler.stateOf("wlan0")).toBe("awaiting-confirmation");
    expect(executed).toHaveLength(1);

    reconciler.onConfirmation("wlan0", [5, 3]);
    expect(reconciler.stateOf("wlan0")).toBe("submitting");
    expect(executed).toHaveLength(2);
  });

  it("should discard a confirmation on a link with nothing outstanding", () => {
    const reconciler = createReconciler();

    reconciler.onConfirmation("wlan9", [1]);

    expect(reconciler.stateOf("wlan9")).toBe("idle");
    expect(silentLogger.info).toHaveBeenCalledWith(
      { linkName: "wlan9" },
      "qos-dispatcher:reconciler:onConfirmation - Confirmation was not expected on this link"
    );
  });

  it("should release the link once when the confirmation times out", async () => {
    const reconciler = createReconciler();
    awaiting.push([3]);
    reconciler.enqueue("wlan0", removal(3));
    reconciler.enqueue("wlan0", removal(4));
    reconciler.advance("wlan0");
    await flush();

    vi.advanceTimersByTime(1499);
    expect(reconciler.stateOf("wlan0")).toBe("awaiting-confirmation");
    expect(executed).toHaveLength(1);

    vi.advanceTimersByTime(1);
    expect(executed).toHaveLength(2);
    await flush();
    expect(reconciler.stateOf("wlan0")).toBe("idle");

    vi.advanceTimersByTime(5000);
    expect(executed).toHaveLength(2);
  });

  it("should cancel the watchdog when the confirmation arrives", async () => {
    const reconciler = createReconciler();
    awaiting.push([3]);
    reconciler.enqueue("wlan0", removal(3));
    reconciler.advance("wlan0");
    await flush();

    reconciler.onConfirmation("wlan0", [3]);
    vi.advanceTimersByTime(1500);

    expect(silentLogger.error).not.toHaveBeenCalledWith(
      expect.anything(),
      "qos-dispatcher:reconciler:onTimeout - Confirmation timed out"
    );
  });

  it("should report executor failures as fatal", async () => {
    const failure = new Error("executor broke");
    executor = () => Promise.reject(failure);
    const reconciler = createReconciler();
    reconciler.enqueue("wlan0", removal(1));

    reconciler.advance("wlan0");
    await flush();

    expect(onFatalError).toHaveBeenCalledWith(failure);
  });

  it("should describe queues in the snapshot", async () => {
    const reconciler = createReconciler();
    awaiting.push([3]);
    reconciler.enqueue("wlan0", removal(3));
    reconciler.enqueue("wlan0", removal(4));
    reconciler.advance("wlan0");
    await flush();

    expect(reconciler.snapshot()).toEqual([
      {
        linkName: "wlan0",
        state: "awaiting-confirmation",
        current: "remove(wireIds=[3], principal=1000)",
        queued: ["remove(wireIds=[4], principal=1000)"],
        outstanding: { expectedWireIds: [3], armedAt: 42 },
      },
    ]);
  });

  it("should cancel timers and drop queued work on stop", async () => {
    const reconciler = createReconciler();
    awaiting.push([3]);
    reconciler.enqueue("wlan0", removal(3));
    reconciler.enqueue("wlan0", removal(4));
    reconciler.advance("wlan0");
    await flush();

    reconciler.stop();
    vi.advanceTimersByTime(1500);

    expect(executed).toHaveLength(1);
    expect(reconciler.queuedCount("wlan0")).toBe(0);
    expect(reconciler.outstandingFor("wlan0")).toBeUndefined();
  });
});
