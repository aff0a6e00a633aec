/**
 * Dispatcher configuration.
 */

export interface DispatcherConfig {
  /**
   * Local watchdog for confirmation events, in milliseconds. The link protocol
   * bounds its own wait at about 1000 ms; this only unblocks a link whose
   * confirmation was lost. Default: 1500
   */
  confirmationTimeoutMs: number;
}

export const defaultDispatcherConfig: DispatcherConfig = {
  confirmationTimeoutMs: 1500,
};
