/**
 * Caller sessions for remote applications.
 *
 * Each principal gets one heartbeat lease backed by an AbortController. The
 * lease ends when the caller stops sending heartbeats for longer than the
 * session timeout or ends its session explicitly; either way the liveness
 * handle reports termination and the dispatcher cleans up the caller's policies.
 */

import type { Principal } from "@qosd/core";
import { resolveLogger, type Logger, type LoggerFactory } from "@qosd/common";
import { livenessFromSignal, type LivenessHandle } from "@qosd/dispatcher";

const SERVICE_NAME = "qosd:session-monitor";

interface Session {
  controller: AbortController;
  liveness: LivenessHandle;
  timer: ReturnType<typeof setTimeout>;
}

export class SessionMonitor {
  private sessions = new Map<Principal, Session>();
  private sessionTimeoutMs: number;
  private log: Logger;

  constructor(params: { sessionTimeoutMs: number; loggerFactory?: LoggerFactory }) {
    this.sessionTimeoutMs = params.sessionTimeoutMs;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /**
   * Liveness handle for the principal's current session. A request counts as
   * activity: the lease is opened or renewed.
   */
  livenessFor(principal: Principal): LivenessHandle {
    return this.touch(principal).liveness;
  }

  heartbeat(principal: Principal): void {
    this.touch(principal);
  }

  /** End the principal's session. Returns false when none was active. */
  end(principal: Principal): boolean {
    const session = this.sessions.get(principal);
    if (!session) return false;
    this.log.info?.({ principal }, `${SERVICE_NAME}:end - Session ended by caller`);
    this.terminate(principal, session);
    return true;
  }

  isActive(principal: Principal): boolean {
    return this.sessions.has(principal);
  }

  activePrincipals(): Principal[] {
    return [...this.sessions.keys()];
  }

  /** Cancel every lease timer without terminating the sessions. */
  stop(): void {
    for (const session of this.sessions.values()) {
      clearTimeout(session.timer);
    }
    this.sessions.clear();
  }

  private touch(principal: Principal): Session {
    const existing = this.sessions.get(principal);
    if (existing) {
      clearTimeout(existing.timer);
      existing.timer = this.arm(principal, existing);
      return existing;
    }

    const controller = new AbortController();
    const session: Session = {
      controller,
      liveness: livenessFromSignal(controller.signal),
      timer: setTimeout(() => this.expire(principal, session), this.sessionTimeoutMs),
    };
    this.sessions.set(principal, session);
    this.log.debug?.({ principal }, `${SERVICE_NAME}:touch - Session opened`);
    return session;
  }

  private arm(principal: Principal, session: Session): ReturnType<typeof setTimeout> {
    return setTimeout(() => this.expire(principal, session), this.sessionTimeoutMs);
  }

  private expire(principal: Principal, session: Session): void {
    if (this.sessions.get(principal) !== session) return;
    this.log.warn?.(
      { principal, sessionTimeoutMs: this.sessionTimeoutMs },
      `${SERVICE_NAME}:expire - Session lease expired`
    );
    this.terminate(principal, session);
  }

  private terminate(principal: Principal, session: Session): void {
    clearTimeout(session.timer);
    this.sessions.delete(principal);
    session.controller.abort();
  }
}
