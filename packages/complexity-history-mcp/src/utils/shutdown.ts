/**
 * Signal handling for the stdio server
 */

import { whenRepositoriesIdle } from '../history/repository-lock.js';
import { describeError } from './result.js';

export interface ShutdownHooks {
  /** Close the MCP transport */
  close: () => Promise<void>;
  exit: (code: number) => void;
  log?: (message: string) => void;
  /** Defaults to waiting for every queued repository run */
  idle?: () => Promise<void>;
}

/**
 * Build the SIGINT/SIGTERM handler. Running analyses finish, and so
 * restore their working trees, before the transport closes. Repeated
 * signals while draining are ignored.
 */
export function createShutdownHandler(hooks: ShutdownHooks): (signal: NodeJS.Signals) => Promise<void> {
  const log = hooks.log ?? ((message: string) => console.error(message));
  const idle = hooks.idle ?? whenRepositoriesIdle;
  let draining = false;

  return async signal => {
    if (draining) return;
    draining = true;

    log(`Received ${signal}, waiting for running analyses to restore their working trees`);
    try {
      await idle();
      await hooks.close();
    } catch (error) {
      log(`Shutdown failed: ${describeError(error)}`);
      hooks.exit(1);
      return;
    }
    hooks.exit(0);
  };
}
