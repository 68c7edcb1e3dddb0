/**
 * Setup log barrel exports.
 *
 * - Line format and per-directory store
 * - Guard that blocks re-running one-time operations
 */

export { SetupLog, formatEntry, parseEntry, DEFAULT_LOG_FILE, OPERATION_NAME_PATTERN } from './setup-log.js';
export type { SetupLogEntry } from './setup-log.js';

export { SetupGuard } from './setup-guard.js';
export type { SetupGuardOptions, Clock } from './setup-guard.js';
