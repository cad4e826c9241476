import type { Logger } from '../observability/logger';

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

// Conventional exit status for a process ended by an interrupt.
const FORCED_EXIT_CODE = 130;

export interface SignalTarget {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownOptions {
  controller: AbortController;
  logger: Logger;
  target?: SignalTarget;
  exit?: (code: number) => void;
}

/**
 * The first SIGINT/SIGTERM aborts `controller` so the loop finishes its
 * current cycle; a second one exits right away. Returns a function that
 * removes the listeners.
 */
export function installShutdownHandlers(options: ShutdownOptions): () => void {
  const { controller } = options;
  const target = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const logger = options.logger.child({ component: 'shutdown' });

  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, 'Second shutdown signal received, exiting immediately');
      exit(FORCED_EXIT_CODE);
      return;
    }
    logger.info({ signal }, 'Shutting down after the current cycle');
    controller.abort();
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    target.on(signal, onSignal);
  }
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      target.off(signal, onSignal);
    }
  };
}
