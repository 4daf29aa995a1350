import type { Supervisor } from './server.js';
import { createLogger, describeError } from './utils/logger.js';

const log = createLogger('signals');

export interface SignalTarget {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SignalOptions {
  /** Where signals are received; defaults to the process */
  target?: SignalTarget;
  exit?: (code: number) => void;
}

/**
 * SIGTERM and SIGINT drain and exit, SIGHUP reloads configuration.
 * Returns a function that removes the handlers.
 */
export function installSignalHandlers(supervisor: Supervisor, options: SignalOptions = {}): () => void {
  const target: SignalTarget = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let terminating = false;

  const terminate = (signal: NodeJS.Signals) => {
    if (terminating) {
      log.warn(`Received ${signal} while shutting down, ignoring`);
      return;
    }
    terminating = true;
    log.info(`Received ${signal}, shutting down...`);

    void supervisor.shutdown(signal).then(
      (result) => exit(result.state === 'stopped' ? 0 : 1),
      (error: unknown) => {
        log.error('Shutdown failed', describeError(error));
        exit(1);
      },
    );
  };

  const reload = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, reloading configuration`);
    try {
      supervisor.reload();
    } catch (error) {
      log.error('Reload failed, keeping current configuration', describeError(error));
    }
  };

  target.on('SIGTERM', terminate);
  target.on('SIGINT', terminate);
  target.on('SIGHUP', reload);

  return () => {
    target.off('SIGTERM', terminate);
    target.off('SIGINT', terminate);
    target.off('SIGHUP', reload);
  };
}
