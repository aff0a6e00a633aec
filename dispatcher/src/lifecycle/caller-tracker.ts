/**
 * Caller lifecycle tracker.
 *
 * Watches the liveness handle of every application that owns at least one
 * tracked policy. When an application terminates its bookkeeping is dropped
 * and a remove-all is synthesized for its principal.
 */

import type { Principal } from "@qosd/core";
import { resolveLogger, type Logger, type LoggerFactory } from "@qosd/common";
import type { PolicyRegistry } from "../registry/policy-registry.js";
import type { LivenessHandle, Owner } from "./liveness.js";

const SERVICE_NAME = "qos-dispatcher:caller-tracker";

interface Watch {
  handle: LivenessHandle;
  unsubscribe: () => void;
}

export class CallerLifecycleTracker {
  private registry: PolicyRegistry;
  private onCallerTerminated: (principal: Principal) => void;
  private watches = new Map<Principal, Watch>();
  private handles = new Map<LivenessHandle, Principal>();
  private stopped = false;
  private log: Logger;

  constructor(params: {
    registry: PolicyRegistry;
    /** Invoked after a watched application terminates (normally a remove-all). */
    onCallerTerminated: (principal: Principal) => void;
    loggerFactory?: LoggerFactory;
  }) {
    this.registry = params.registry;
    this.onCallerTerminated = params.onCallerTerminated;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /**
   * Start watching the owner's liveness handle if it owns policies and is not watched yet.
   * No-op once stopped.
   */
  registerIfOwning(owner: Owner): void {
    const handle = owner.liveness;
    if (!handle || this.stopped) return;
    if (this.watches.has(owner.principal)) return;
    if (!this.registry.hasAnyPolicyFor(owner.principal)) return;

    const principal = owner.principal;
    // Set before subscribing: an already-terminated handle fires synchronously.
    const watch: Watch = { handle, unsubscribe: () => undefined };
    this.watches.set(principal, watch);
    this.handles.set(handle, principal);
    watch.unsubscribe = handle.onTerminated(() => this.handleTermination(handle));

    this.log.debug?.({ principal }, `${SERVICE_NAME}:registerIfOwning - Watching caller`);
  }

  /**
   * Stop watching the principal once it owns no policies.
   */
  unregisterIfNotOwning(principal: Principal): void {
    const watch = this.watches.get(principal);
    if (!watch) return;
    if (this.registry.hasAnyPolicyFor(principal)) return;

    watch.unsubscribe();
    this.watches.delete(principal);
    this.handles.delete(watch.handle);
    this.log.debug?.({ principal }, `${SERVICE_NAME}:unregisterIfNotOwning - Released caller`);
  }

  isWatching(principal: Principal): boolean {
    return this.watches.has(principal);
  }

  watchedPrincipals(): Principal[] {
    return [...this.watches.keys()];
  }

  /** Release every watch without synthesizing removals. */
  stop(): void {
    this.stopped = true;
    for (const watch of this.watches.values()) {
      watch.unsubscribe();
    }
    this.watches.clear();
    this.handles.clear();
  }

  private handleTermination(handle: LivenessHandle): void {
    const principal = this.handles.get(handle);
    this.log.info?.({ principal }, `${SERVICE_NAME}:handleTermination - Caller terminated`);
    if (principal === undefined) return;

    this.handles.delete(handle);
    this.watches.delete(principal);
    this.onCallerTerminated(principal);
  }
}
