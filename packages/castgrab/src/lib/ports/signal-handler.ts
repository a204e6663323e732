/**
 * Abstraction for process signal handling.
 * Allows testing interrupt logic without actual process signals.
 */
export interface SignalHandler {
  /** Register a callback for interrupt signals (SIGINT, SIGTERM) */
  onInterrupt(callback: (signal: NodeJS.Signals) => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
