/**
 * Once-only delivery of a status list to the requesting application.
 */

import type { QosRequestStatus } from "@qosd/core";
import { errorMessage, type Logger } from "@qosd/common";

const SERVICE_NAME = "qos-dispatcher:result-sink";

export type StatusListener = (statuses: QosRequestStatus[]) => void;

export class ResultSink {
  private listener?: StatusListener;
  private log?: Logger;

  constructor(listener?: StatusListener, log?: Logger) {
    this.listener = listener;
    this.log = log;
  }

  /**
   * Deliver the statuses if nothing was delivered yet. Returns whether the listener was called.
   * The listener is discarded before it runs, so a re-entrant delivery is dropped too.
   */
  deliver(statuses: readonly QosRequestStatus[]): boolean {
    const listener = this.listener;
    if (!listener) return false;
    this.listener = undefined;
    try {
      listener([...statuses]);
    } catch (err) {
      this.log?.error?.({ error: errorMessage(err) }, `${SERVICE_NAME}:deliver - Listener threw`);
    }
    return true;
  }

  get pending(): boolean {
    return this.listener !== undefined;
  }
}
