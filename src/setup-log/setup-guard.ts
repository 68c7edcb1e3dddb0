/**
 * Idempotency guard for one-time setup steps.
 *
 * Each guarded operation checks the setup log of the directory it works in
 * before touching the filesystem, and records itself only after every side
 * effect succeeded. A run that failed halfway therefore leaves no marker;
 * the next attempt runs into the directories it already created and fails
 * with DirectoryExistsError instead of AlreadyCompletedError.
 *
 * The read-check-append sequence is not atomic and takes no lock.
 */

import { AlreadyCompletedError, PreconditionError } from '../errors.js';
import { DEFAULT_LOG_FILE, OPERATION_NAME_PATTERN, SetupLog } from './setup-log.js';
import type { SetupLogEntry } from './setup-log.js';

export type Clock = () => Date;

export interface SetupGuardOptions {
  /** File name of the per-directory log (default: setup_log.txt) */
  logFile?: string;
  /** Source of entry timestamps (default: wall clock) */
  clock?: Clock;
}

export class SetupGuard {
  readonly logFile: string;
  private readonly clock: Clock;

  constructor(options: SetupGuardOptions = {}) {
    this.logFile = options.logFile ?? DEFAULT_LOG_FILE;
    this.clock = options.clock ?? (() => new Date());
  }

  private log(directory: string): SetupLog {
    return new SetupLog(directory, this.logFile);
  }

  logPath(directory: string): string {
    return this.log(directory).filePath;
  }

  async hasRun(directory: string, operation: string): Promise<boolean> {
    const entries = await this.log(directory).read();
    return entries.some((entry) => entry.operation === operation);
  }

  /**
   * @throws {AlreadyCompletedError} if the log records the operation
   */
  async ensureNotRun(directory: string, operation: string): Promise<void> {
    if (await this.hasRun(directory, operation)) {
      throw new AlreadyCompletedError(operation, directory);
    }
  }

  /**
   * Append a timestamped marker for the operation.
   *
   * @param metadata - Free-form notes, e.g. the folders that were created
   */
  async record(directory: string, operation: string, metadata: readonly string[] = []): Promise<SetupLogEntry> {
    if (!OPERATION_NAME_PATTERN.test(operation)) {
      throw new PreconditionError(`Invalid operation name: "${operation}"`);
    }
    const entry: SetupLogEntry = {
      operation,
      timestamp: this.clock().toISOString(),
      metadata: [...metadata],
    };
    await this.log(directory).append(entry);
    return entry;
  }

  async history(directory: string): Promise<SetupLogEntry[]> {
    return this.log(directory).read();
  }
}
