/**
 * QosRequestDispatcher: mediates application add/remove requests for QoS
 * policies onto every eligible link.
 *
 * Each logical request touches the registry exactly once, before fan-out.
 * The resulting operations are queued on every eligible link and run one at
 * a time per link by the ConfirmationReconciler. For add requests, the first
 * link to complete a batch decides its statuses; the caller hears back once,
 * when every batch has been decided.
 */

import {
  PolicyIdListSchema,
  PolicyListSchema,
  PrincipalSchema,
  awaitsConfirmation,
  splitIntoBatches,
  toRequestStatus,
  toWirePolicy,
  uniformStatusList,
  type PolicyId,
  type Principal,
  type QosPolicy,
  type QosRequestStatus,
  type TrackedPolicy,
  type WireId,
  type WirePolicy,
} from "@qosd/core";
import { QosError, errorMessage, resolveLogger, type Logger, type LoggerFactory } from "@qosd/common";
import { defaultDispatcherConfig, type DispatcherConfig } from "../config.js";
import { CallerLifecycleTracker } from "../lifecycle/caller-tracker.js";
import type { Owner } from "../lifecycle/liveness.js";
import type { LinkDirectory } from "../links/link-directory.js";
import type { PolicyRegistry } from "../registry/policy-registry.js";
import { PolicyTrackingTable } from "../registry/tracking-table.js";
import type { LinkSubmitResult, LinkTransport } from "../transport/link-transport.js";
import { ConfirmationReconciler } from "./confirmation-reconciler.js";
import { renderDump, type DispatcherSnapshot } from "./dump.js";
import type { AddOperation, AddRequest, LinkOperation, RemoveOperation, ReplayOperation } from "./operations.js";
import { ResultSink, type StatusListener } from "./result-sink.js";

const SERVICE_NAME = "qos-dispatcher";

export interface QosRequestDispatcherOptions {
  transport: LinkTransport;
  links: LinkDirectory;
  /** Defaults to an in-memory PolicyTrackingTable over the full wire id range */
  registry?: PolicyRegistry;
  config?: Partial<DispatcherConfig>;
  clock?: { now(): number };
  /** Receives invariant breaks; defaults to rethrowing them outside the event handler */
  onFatalError?: (err: unknown) => void;
  loggerFactory?: LoggerFactory;
}

export class QosRequestDispatcher {
  private registry: PolicyRegistry;
  private transport: LinkTransport;
  private links: LinkDirectory;
  private reconciler: ConfirmationReconciler;
  private lifecycle: CallerLifecycleTracker;
  private unsubscribeConfirmations: () => void;
  private log: Logger;

  constructor(options: QosRequestDispatcherOptions) {
    const config = { ...defaultDispatcherConfig, ...options.config };
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
    this.registry = options.registry ?? new PolicyTrackingTable();
    this.transport = options.transport;
    this.links = options.links;

    this.lifecycle = new CallerLifecycleTracker({
      registry: this.registry,
      onCallerTerminated: (principal) => this.submitRemoveAll({ principal }),
      loggerFactory: options.loggerFactory,
    });
    this.reconciler = new ConfirmationReconciler({
      executor: (linkName, op) => this.execute(linkName, op),
      confirmationTimeoutMs: config.confirmationTimeoutMs,
      clock: options.clock,
      onFatalError: options.onFatalError,
      loggerFactory: options.loggerFactory,
    });
    this.unsubscribeConfirmations = this.transport.onConfirmation((linkName, results) =>
      this.reconciler.onConfirmation(
        linkName,
        results.map((r) => r.wireId)
      )
    );
  }

  // ── Caller API ───────────────────────────────────────────────────

  /**
   * Request to add policies. `callback` is invoked exactly once with one status per policy.
   *
   * @throws QosError INVALID_ARGUMENT when the policies or principal are malformed
   */
  requestAdd(policies: QosPolicy[], owner: Owner, callback: StatusListener): void {
    this.assertPrincipal(owner.principal, "requestAdd");
    const parsed = PolicyListSchema.safeParse(policies);
    if (!parsed.success) {
      throw new QosError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:requestAdd - Invalid policy list`,
        details: parsed.error.flatten(),
      });
    }
    this.submitAdd(parsed.data, owner, new ResultSink(callback, this.log));
  }

  /**
   * Request to remove policies owned by the caller. Unknown ids are ignored.
   *
   * @throws QosError INVALID_ARGUMENT when the ids or principal are malformed
   */
  requestRemove(policyIds: PolicyId[], owner: Owner): void {
    this.assertPrincipal(owner.principal, "requestRemove");
    const parsed = PolicyIdListSchema.safeParse(policyIds);
    if (!parsed.success) {
      throw new QosError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:requestRemove - Invalid policy id list`,
        details: parsed.error.flatten(),
      });
    }
    this.submitRemove(parsed.data, owner);
  }

  requestRemoveAll(owner: Owner): void {
    this.assertPrincipal(owner.principal, "requestRemoveAll");
    this.submitRemoveAll(owner);
  }

  // ── Core operations ──────────────────────────────────────────────

  submitAdd(policies: QosPolicy[], owner: Owner, sink: ResultSink): void {
    this.log.info?.(
      { principal: owner.principal, size: policies.length },
      `${SERVICE_NAME}:submitAdd - Queueing add request`
    );

    const links = this.links.eligibleLinks();
    if (links.length === 0) {
      sink.deliver(uniformStatusList(policies.length, "insufficient-resources"));
      return;
    }

    const statuses = this.registry.admit(policies, owner.principal);
    const admitted: number[] = [];
    statuses.forEach((status, index) => {
      if (status === "tracking") admitted.push(index);
    });
    if (admitted.length === 0) {
      // Table full, or every policy is already tracked.
      sink.deliver(statuses);
      return;
    }

    const wireIds = policies.map((policy, index) =>
      statuses[index] === "tracking" ? this.registry.translate([policy.policyId], owner.principal)[0] : undefined
    );
    const batches = splitIntoBatches(admitted, this.transport.maxPoliciesPerRequest);
    const request: AddRequest = {
      owner,
      policies,
      statuses,
      wireIds,
      sink,
      unresolvedBatches: batches.length,
    };
    for (const indexes of batches) {
      const op: AddOperation = { kind: "add", request, indexes, resolved: false };
      for (const linkName of links) {
        this.reconciler.enqueue(linkName, op);
      }
    }
    this.advanceLinks(links);
  }

  submitRemove(policyIds: PolicyId[], owner: Owner): void {
    const principal = owner.principal;
    this.log.info?.({ principal, size: policyIds.length }, `${SERVICE_NAME}:submitRemove - Queueing remove request`);

    const wireIds = this.registry.translate(policyIds, principal);
    if (wireIds.length === 0) {
      this.log.debug?.({ principal }, `${SERVICE_NAME}:submitRemove - None of the policies are tracked`);
      return;
    }
    this.registry.remove(policyIds, principal);
    this.lifecycle.unregisterIfNotOwning(principal);

    const links = this.links.eligibleLinks();
    for (const batch of splitIntoBatches(wireIds, this.transport.maxPoliciesPerRequest)) {
      const op: RemoveOperation = { kind: "remove", principal, wireIds: batch };
      for (const linkName of links) {
        this.reconciler.enqueue(linkName, op);
      }
    }
    this.advanceLinks(links);
  }

  submitRemoveAll(owner: Owner): void {
    const owned = this.registry.policyIdsOwnedBy(owner.principal);
    this.log.info?.(
      { principal: owner.principal, numOwnedPolicies: owned.length },
      `${SERVICE_NAME}:submitRemoveAll - Queueing remove-all request`
    );
    if (owned.length === 0) return;
    this.submitRemove(owned, owner);
  }

  /**
   * Send every tracked policy to a newly available link. Replayed policies
   * bypass admission and have no caller waiting.
   */
  onLinkAdded(linkName: string): void {
    const tracked = this.registry.allCurrentPolicies();
    this.log.info?.(
      { linkName, numPolicies: tracked.length },
      `${SERVICE_NAME}:onLinkAdded - Queueing all policies on link`
    );
    if (tracked.length === 0) return;

    for (const batch of splitIntoBatches(tracked, this.transport.maxPoliciesPerRequest)) {
      const op: ReplayOperation = { kind: "replay", policies: batch };
      this.reconciler.enqueue(linkName, op);
    }
    this.reconciler.advance(linkName);
  }

  // ── Diagnostics ──────────────────────────────────────────────────

  snapshot(): DispatcherSnapshot {
    return {
      links: this.reconciler.snapshot(),
      registry: this.registry.snapshot(),
      watchedPrincipals: this.lifecycle.watchedPrincipals(),
    };
  }

  dump(): string {
    return renderDump(this.snapshot());
  }

  /** Cancel timers, drop queued operations and release liveness watches. */
  stop(): void {
    this.unsubscribeConfirmations();
    this.reconciler.stop();
    this.lifecycle.stop();
    this.log.info?.({}, `${SERVICE_NAME}:stop - Stopped`);
  }

  // ── Link processing ──────────────────────────────────────────────

  private advanceLinks(links: readonly string[]): void {
    for (const linkName of links) {
      this.reconciler.advance(linkName);
    }
  }

  private execute(linkName: string, op: LinkOperation): Promise<WireId[]> {
    switch (op.kind) {
      case "add":
        return this.executeAdd(linkName, op);
      case "replay":
        return this.executeReplay(linkName, op);
      case "remove":
        return this.executeRemove(linkName, op);
    }
  }

  private async executeAdd(linkName: string, op: AddOperation): Promise<WireId[]> {
    const { request } = op;
    const principal = request.owner.principal;

    if (request.owner.liveness && !request.owner.liveness.isAlive()) {
      this.log.warn?.({ linkName, principal }, `${SERVICE_NAME}:executeAdd - Requesting application died before processing`);
      if (!op.resolved) {
        // Nobody will remove these later; release their wire ids now.
        const abandoned = this.admittedEntries(op).map(toWirePolicy);
        this.resolveBatch(op, abandoned, {
          ok: false,
          error: { code: "INTERNAL_ERROR", message: "Requesting application terminated" },
        });
      }
      return [];
    }

    // Policies evicted or removed since admission are not sent.
    const entries = this.admittedEntries(op);
    if (entries.length === 0) {
      this.log.warn?.({ linkName, principal }, `${SERVICE_NAME}:executeAdd - All policies were removed during filtering`);
      if (!op.resolved) this.resolveBatch(op, [], { ok: true, statuses: [] });
      return [];
    }

    const wirePolicies = entries.map(toWirePolicy);
    const result = await this.submitChecked(linkName, wirePolicies.length, () =>
      this.transport.submit(linkName, wirePolicies)
    );

    if (!op.resolved) {
      this.resolveBatch(op, wirePolicies, result);
    }
    return awaitingWireIds(wirePolicies.map((p) => p.wireId), result);
  }

  /** Batch policies still tracked under the wire id they were admitted with. */
  private admittedEntries(op: AddOperation): TrackedPolicy[] {
    const { request } = op;
    const entries: TrackedPolicy[] = [];
    for (const index of op.indexes) {
      const [entry] = this.registry.tracked([request.policies[index].policyId], request.owner.principal);
      if (entry && entry.wireId === request.wireIds[index]) entries.push(entry);
    }
    return entries;
  }

  /**
   * First completion of a batch: merge link statuses into the request, evict
   * rejected policies, and deliver once every batch is decided. Policies that
   * were not sent because they left the registry resolve `failure-unknown`.
   */
  private resolveBatch(op: AddOperation, sent: WirePolicy[], result: LinkSubmitResult): void {
    op.resolved = true;
    const { request } = op;
    const principal = request.owner.principal;

    const sentIndexByPolicyId = new Map<PolicyId, number>();
    sent.forEach((policy, j) => sentIndexByPolicyId.set(policy.policyId, j));

    const rejected: WirePolicy[] = [];
    for (const index of op.indexes) {
      const j = sentIndexByPolicyId.get(request.policies[index].policyId);
      if (j === undefined) {
        request.statuses[index] = "failure-unknown";
        continue;
      }
      const status: QosRequestStatus = result.ok ? toRequestStatus(result.statuses[j].status) : "failure-unknown";
      request.statuses[index] = status;
      if (status !== "tracking") rejected.push(sent[j]);
    }

    // Only the wire ids this batch sent; a re-admitted policy holds a new one.
    if (rejected.length > 0) {
      this.registry.evict(rejected, principal);
    }

    request.unresolvedBatches -= 1;
    if (request.unresolvedBatches === 0) {
      request.sink.deliver(request.statuses);
    }

    this.lifecycle.registerIfOwning(request.owner);
    this.lifecycle.unregisterIfNotOwning(principal);
  }

  private async executeReplay(linkName: string, op: ReplayOperation): Promise<WireId[]> {
    const wirePolicies = op.policies.map(toWirePolicy);
    const result = await this.submitChecked(linkName, wirePolicies.length, () =>
      this.transport.submit(linkName, wirePolicies)
    );
    return awaitingWireIds(wirePolicies.map((p) => p.wireId), result);
  }

  private async executeRemove(linkName: string, op: RemoveOperation): Promise<WireId[]> {
    const result = await this.submitChecked(linkName, op.wireIds.length, () =>
      this.transport.submitRemoval(linkName, op.wireIds)
    );
    return awaitingWireIds(op.wireIds, result);
  }

  /**
   * Run a link submission; a rejected promise or a status list of the wrong
   * length is reported as a failed submission.
   */
  private async submitChecked(
    linkName: string,
    expectedCount: number,
    submit: () => Promise<LinkSubmitResult>
  ): Promise<LinkSubmitResult> {
    let result: LinkSubmitResult;
    try {
      result = await submit();
    } catch (err) {
      result = { ok: false, error: { code: "TRANSPORT_ERROR", message: errorMessage(err), retryable: true } };
    }

    if (result.ok && result.statuses.length !== expectedCount) {
      result = {
        ok: false,
        error: {
          code: "DECODE_ERROR",
          message: `Link returned ${result.statuses.length} statuses for ${expectedCount} policies`,
        },
      };
    }

    if (!result.ok) {
      this.log.warn?.(
        { linkName, code: result.error.code, error: result.error.message },
        `${SERVICE_NAME}:submitChecked - Link submission failed`
      );
    }
    return result;
  }

  private assertPrincipal(principal: Principal, method: string): void {
    if (!PrincipalSchema.safeParse(principal).success) {
      throw new QosError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:${method} - Invalid principal`,
      });
    }
  }
}

/** Submitted wire ids whose synchronous status says a confirmation will follow. */
function awaitingWireIds(submitted: readonly WireId[], result: LinkSubmitResult): WireId[] {
  if (!result.ok) return [];
  const awaiting: WireId[] = [];
  result.statuses.forEach((status, j) => {
    if (awaitsConfirmation(status.status)) awaiting.push(submitted[j]);
  });
  return awaiting;
}
