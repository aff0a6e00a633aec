/**
 * Per-link queues and the confirmation state machine.
 *
 *   idle ──dequeue head──▶ submitting ──nothing to confirm──▶ idle
 *                              │
 *                              └──policies sent──▶ awaiting-confirmation
 *                                                    │ matching event ─▶ idle
 *                                                    │ timeout ────────▶ idle
 *
 * Dequeuing from idle is the only way into submitting, so a link never has
 * more than one operation in flight, one outstanding record, or one timer.
 */

import type { WireId } from "@qosd/core";
import {
  QosError,
  errorMessage,
  matchesSortedIds,
  resolveLogger,
  sortWireIds,
  type Logger,
  type LoggerFactory,
} from "@qosd/common";
import { describeOperation, type LinkOperation } from "./operations.js";

const SERVICE_NAME = "qos-dispatcher:reconciler";

export type LinkState = "idle" | "submitting" | "awaiting-confirmation";

/**
 * Runs one operation on a link. Resolves with the wire ids that were sent to
 * the access point and now await a confirmation event (empty when none).
 */
export type OperationExecutor = (linkName: string, op: LinkOperation) => Promise<WireId[]>;

interface Outstanding {
  expectedWireIds: WireId[];
  armedAt: number;
  timer: ReturnType<typeof setTimeout>;
}

interface LinkQueue {
  state: LinkState;
  pending: LinkOperation[];
  current?: LinkOperation;
  outstanding?: Outstanding;
}

export interface LinkQueueSnapshot {
  linkName: string;
  state: LinkState;
  current?: string;
  queued: string[];
  outstanding?: { expectedWireIds: WireId[]; armedAt: number };
}

export class ConfirmationReconciler {
  private links = new Map<string, LinkQueue>();
  private executor: OperationExecutor;
  private confirmationTimeoutMs: number;
  private clock: { now(): number };
  private onFatalError: (err: unknown) => void;
  private log: Logger;
  private stopped = false;

  constructor(params: {
    executor: OperationExecutor;
    confirmationTimeoutMs: number;
    clock?: { now(): number };
    /** Called with invariant breaks and unexpected executor failures. */
    onFatalError?: (err: unknown) => void;
    loggerFactory?: LoggerFactory;
  }) {
    this.executor = params.executor;
    this.confirmationTimeoutMs = params.confirmationTimeoutMs;
    this.clock = params.clock ?? { now: () => Date.now() };
    this.onFatalError =
      params.onFatalError ??
      ((err: unknown) => {
        queueMicrotask(() => {
          throw err;
        });
      });
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  enqueue(linkName: string, op: LinkOperation): void {
    this.queueFor(linkName).pending.push(op);
  }

  /**
   * Start the head operation if the link is idle. An empty queue leaves it idle.
   */
  advance(linkName: string): void {
    if (this.stopped) return;
    const link = this.links.get(linkName);
    if (!link || link.state !== "idle") return;

    const op = link.pending.shift();
    if (!op) return;

    link.state = "submitting";
    link.current = op;
    this.log.debug?.(
      { linkName, operation: describeOperation(op), remaining: link.pending.length },
      `${SERVICE_NAME}:advance - Submitting`
    );

    this.executor(linkName, op)
      .then((awaiting) => this.onSubmitted(linkName, link, awaiting))
      .catch((err: unknown) => this.fail(linkName, err));
  }

  advanceAll(): void {
    for (const linkName of this.links.keys()) {
      this.advance(linkName);
    }
  }

  /**
   * Match a confirmation event against the link's outstanding record.
   * Unexpected or non-matching events are logged and discarded.
   */
  onConfirmation(linkName: string, reportedWireIds: readonly WireId[]): void {
    const link = this.links.get(linkName);
    const outstanding = link?.outstanding;
    if (!link || !outstanding) {
      this.log.info?.({ linkName }, `${SERVICE_NAME}:onConfirmation - Confirmation was not expected on this link`);
      return;
    }

    if (!matchesSortedIds(outstanding.expectedWireIds, reportedWireIds)) {
      this.log.info?.(
        { linkName, expected: outstanding.expectedWireIds, reported: [...reportedWireIds] },
        `${SERVICE_NAME}:onConfirmation - Confirmation was unsolicited`
      );
      return;
    }

    this.log.info?.({ linkName }, `${SERVICE_NAME}:onConfirmation - Expected confirmation was received`);
    clearTimeout(outstanding.timer);
    this.release(linkName, link);
  }

  stateOf(linkName: string): LinkState {
    return this.links.get(linkName)?.state ?? "idle";
  }

  queuedCount(linkName: string): number {
    return this.links.get(linkName)?.pending.length ?? 0;
  }

  outstandingFor(linkName: string): { expectedWireIds: WireId[]; armedAt: number } | undefined {
    const outstanding = this.links.get(linkName)?.outstanding;
    if (!outstanding) return undefined;
    return { expectedWireIds: [...outstanding.expectedWireIds], armedAt: outstanding.armedAt };
  }

  snapshot(): LinkQueueSnapshot[] {
    return [...this.links.entries()].map(([linkName, link]) => ({
      linkName,
      state: link.state,
      current: link.current ? describeOperation(link.current) : undefined,
      queued: link.pending.map(describeOperation),
      outstanding: this.outstandingFor(linkName),
    }));
  }

  /**
   * Cancel every armed timer. Submissions still in flight complete without
   * arming anything; queued operations are dropped.
   */
  stop(): void {
    this.stopped = true;
    for (const link of this.links.values()) {
      if (link.outstanding) clearTimeout(link.outstanding.timer);
      link.outstanding = undefined;
      link.pending = [];
    }
  }

  private queueFor(linkName: string): LinkQueue {
    let link = this.links.get(linkName);
    if (!link) {
      link = { state: "idle", pending: [] };
      this.links.set(linkName, link);
    }
    return link;
  }

  private onSubmitted(linkName: string, link: LinkQueue, awaiting: WireId[]): void {
    if (link.state !== "submitting") {
      throw new QosError({
        code: "INVARIANT_VIOLATION",
        message: `${SERVICE_NAME}:onSubmitted - Link ${linkName} completed a submission while ${link.state}`,
      });
    }

    if (awaiting.length === 0 || this.stopped) {
      this.release(linkName, link);
      return;
    }

    if (link.outstanding) {
      throw new QosError({
        code: "INVARIANT_VIOLATION",
        message: `${SERVICE_NAME}:onSubmitted - Link ${linkName} already has an outstanding confirmation`,
      });
    }

    const expectedWireIds = sortWireIds(awaiting);
    const outstanding: Outstanding = {
      expectedWireIds,
      armedAt: this.clock.now(),
      timer: setTimeout(() => this.onTimeout(linkName, outstanding), this.confirmationTimeoutMs),
    };
    link.outstanding = outstanding;
    link.state = "awaiting-confirmation";
    this.log.debug?.(
      { linkName, expectedWireIds },
      `${SERVICE_NAME}:onSubmitted - ${expectedWireIds.length} policies were sent and are awaiting confirmation`
    );
  }

  private onTimeout(linkName: string, expired: Outstanding): void {
    const link = this.links.get(linkName);
    if (!link || link.outstanding !== expired) return;

    this.log.error?.(
      { linkName, expectedWireIds: expired.expectedWireIds, armedAt: expired.armedAt },
      `${SERVICE_NAME}:onTimeout - Confirmation timed out`
    );
    this.release(linkName, link);
  }

  /** Return the link to idle and start the next operation. */
  private release(linkName: string, link: LinkQueue): void {
    link.outstanding = undefined;
    link.current = undefined;
    link.state = "idle";
    this.advance(linkName);
  }

  private fail(linkName: string, err: unknown): void {
    this.log.error?.({ linkName, error: errorMessage(err) }, `${SERVICE_NAME}:fail - Fatal dispatch error`);
    this.onFatalError(err);
  }
}
