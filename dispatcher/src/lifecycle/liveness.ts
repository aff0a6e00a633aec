/**
 * Liveness handles: termination tokens associated with a requesting application.
 */

import type { Principal } from "@qosd/core";

export interface LivenessHandle {
  isAlive(): boolean;
  /**
   * Register a listener invoked once when the application terminates.
   * Returns a function that removes the listener.
   */
  onTerminated(listener: () => void): () => void;
}

/** Requesting application: principal plus optional liveness handle. */
export interface Owner {
  principal: Principal;
  liveness?: LivenessHandle;
}

/**
 * Adapt an AbortSignal: aborting the signal terminates the application.
 */
export function livenessFromSignal(signal: AbortSignal): LivenessHandle {
  return {
    isAlive: () => !signal.aborted,
    onTerminated(listener: () => void): () => void {
      if (signal.aborted) {
        listener();
        return () => undefined;
      }
      signal.addEventListener("abort", listener, { once: true });
      return () => signal.removeEventListener("abort", listener);
    },
  };
}
