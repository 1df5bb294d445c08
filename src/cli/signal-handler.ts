/**
 * Signal Handler
 * Handles Unix signals for graceful shutdown.
 */

import { createLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/mcp-response.js';

const logger = createLogger('signal-handler');

export type ShutdownSignal = 'SIGTERM' | 'SIGINT';

/**
 * Something that must finish before the process exits
 */
export interface ShutdownTarget {
  name: string;
  stop(): Promise<void>;
}

/**
 * Stop every target in order; a failing target does not block the rest
 * @returns true when every target stopped cleanly
 */
export async function runShutdown(targets: ShutdownTarget[]): Promise<boolean> {
  let clean = true;
  for (const target of targets) {
    try {
      await target.stop();
      logger.debug({ target: target.name }, 'Stopped');
    } catch (error) {
      clean = false;
      logger.error({ target: target.name, err: getErrorMessage(error) }, 'Shutdown step failed');
    }
  }
  return clean;
}

/**
 * Setup signal handlers for graceful shutdown.
 *
 * - SIGTERM: Initiates graceful shutdown
 * - SIGINT: Initiates graceful shutdown (Ctrl+C)
 *
 * A second signal while shutting down exits immediately.
 */
export function setupSignalHandlers(
  targets: ShutdownTarget[],
  exit: (code: number) => void = (code) => process.exit(code)
): void {
  let shuttingDown = false;

  const onSignal = (signal: ShutdownSignal): void => {
    if (shuttingDown) {
      logger.warn({ signal }, 'Second signal received, exiting now');
      exit(1);
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received signal, initiating graceful shutdown');

    runShutdown(targets)
      .then((clean) => exit(clean ? 0 : 1))
      .catch((error: unknown) => {
        logger.error({ err: getErrorMessage(error) }, 'Shutdown failed');
        exit(1);
      });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  logger.debug('Signal handlers registered for SIGTERM and SIGINT');
}
