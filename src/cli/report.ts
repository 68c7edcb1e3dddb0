import * as p from '@clack/prompts';
import pc from 'picocolors';
import {
  AlreadyCompletedError,
  ConfigError,
  DirectoryExistsError,
  PreconditionError,
} from '../errors.js';

/**
 * Print a failure so each error kind reads differently, and return the
 * exit code for it.
 */
export function reportError(err: unknown): number {
  if (err instanceof AlreadyCompletedError) {
    p.log.error(`Already completed: ${err.message}`);
    p.log.message(pc.dim(`Setup log: ${err.directory}`));
    return 1;
  }

  if (err instanceof DirectoryExistsError) {
    p.log.error(`Already exists on disk: ${err.message}`);
    p.log.message(pc.dim('The setup log has no record of this step; an earlier run may have stopped halfway.'));
    return 1;
  }

  if (err instanceof PreconditionError) {
    p.log.error(`Invalid input: ${err.message}`);
    return 1;
  }

  if (err instanceof ConfigError) {
    p.log.error(`Configuration error: ${err.message}`);
    return 1;
  }

  const message = err instanceof Error ? err.message : String(err);
  p.log.error(message);
  return 1;
}
