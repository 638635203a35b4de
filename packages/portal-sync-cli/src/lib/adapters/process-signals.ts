import type { SignalHandler } from "../ports/signal-handler.js";

/** Conventional exit status for a process stopped by SIGINT */
const FORCED_EXIT_CODE = 130;

/**
 * Create a signal handler that turns the first SIGINT/SIGTERM into a
 * cooperative stop and the second into an immediate exit.
 */
export function createProcessSignalHandler(): SignalHandler {
  const handlers: Array<() => void> = [];
  let interrupted = false;

  const handleSignal = () => {
    if (interrupted) {
      process.exit(FORCED_EXIT_CODE);
    }
    interrupted = true;
    for (const handler of handlers) {
      handler();
    }
  };

  return {
    onInterrupt(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}
