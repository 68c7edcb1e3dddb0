/**
 * Config file reader with Zod validation.
 *
 * Reads `coursekit.json`, parses it through the schema and resolves `root`
 * against the directory that holds the config file, so the course tree
 * never depends on the shell's working directory.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ConfigError, isErrnoException } from '../errors.js';
import { CourseKitConfigSchema } from './schema.js';
import type { CourseKitConfig } from './schema.js';

/** Default path for the config file. */
export const DEFAULT_CONFIG_PATH = 'coursekit.json';

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate raw input against the config schema (no I/O).
 *
 * `root` is returned exactly as written.
 */
export function validateConfig(
  raw: unknown,
): { valid: true; config: CourseKitConfig } | { valid: false; errors: string[] } {
  const result = CourseKitConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return { valid: false, errors: formatIssues(result.error.issues) };
}

/**
 * Read and validate the config from disk.
 *
 * @throws {ConfigError} when the file is missing, is not JSON, or fails validation
 */
export async function readConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<CourseKitConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new ConfigError(`No configuration found at ${configPath}`);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = CourseKitConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return {
    ...result.data,
    root: resolve(dirname(configPath), result.data.root),
  };
}
