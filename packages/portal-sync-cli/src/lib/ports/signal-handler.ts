/**
 * Abstraction for process interrupt handling.
 * Allows testing cancellation without actual process signals.
 */
export interface SignalHandler {
  /**
   * Register a callback for the first SIGINT/SIGTERM.
   * A second signal terminates the process immediately.
   */
  onInterrupt(callback: () => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
