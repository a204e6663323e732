import type { SignalHandler } from "../ports/signal-handler.js";

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Create a signal handler for interrupt signals.
 * The process keeps running after a signal; callers decide when to exit.
 */
export function createProcessSignalHandler(): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => void> = [];

  const handleSignal = (signal: NodeJS.Signals) => {
    for (const handler of handlers) {
      handler(signal);
    }
  };

  return {
    onInterrupt(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        for (const signal of INTERRUPT_SIGNALS) {
          process.on(signal, handleSignal);
        }
      }
    },
    removeAll() {
      handlers.length = 0;
      for (const signal of INTERRUPT_SIGNALS) {
        process.off(signal, handleSignal);
      }
    },
  };
}
