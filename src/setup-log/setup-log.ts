/**
 * Plain-text setup log kept beside the directory it documents.
 *
 * One line per completed operation:
 *
 *   operation `structure` deployed on 2024-09-02T09:15:00.000Z | Teaching Material; Assessment
 *
 * The operation name sits between backticks so lookups compare it exactly
 * instead of searching for a substring. Everything after ` | ` is free-form
 * metadata, split on `; `, with `;` and `\` inside an item escaped by a
 * backslash. Lines that do not match the format are skipped.
 *
 * The file is append-only: entries are never rewritten, rotated or pruned.
 */

import { appendFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isErrnoException } from '../errors.js';

/** Default file name of the setup log */
export const DEFAULT_LOG_FILE = 'setup_log.txt';

/** Operation names are kebab-case identifiers */
export const OPERATION_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;

const ENTRY_PATTERN = /^operation `([^`]+)` deployed on (\S+)(?: \| (.*))?$/;
const METADATA_SEPARATOR = '; ';

export interface SetupLogEntry {
  operation: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  metadata: string[];
}

// `;` and `\` inside an item are backslash-escaped
function escapeMetadata(item: string): string {
  return item.replace(/[\\;]/g, (ch) => `\\${ch}`);
}

function splitMetadata(text: string): string[] {
  const items: string[] = [];
  let current = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\' && i + 1 < text.length) {
      current += text[i + 1];
      i++;
    } else if (text.startsWith(METADATA_SEPARATOR, i)) {
      items.push(current);
      current = '';
      i += METADATA_SEPARATOR.length - 1;
    } else {
      current += ch;
    }
  }
  items.push(current);
  return items;
}

/**
 * Render an entry as a single log line (without the trailing newline).
 */
export function formatEntry(entry: SetupLogEntry): string {
  const marker = `operation \`${entry.operation}\` deployed on ${entry.timestamp}`;
  const metadata = entry.metadata
    .map((item) => item.replace(/[\r\n]+/g, ' ').trim())
    .filter((item) => item !== '')
    .map(escapeMetadata);
  return metadata.length > 0 ? `${marker} | ${metadata.join(METADATA_SEPARATOR)}` : marker;
}

/**
 * Parse one log line. Returns null for lines that are not entries.
 */
export function parseEntry(line: string): SetupLogEntry | null {
  const match = ENTRY_PATTERN.exec(line.trim());
  if (!match) return null;
  const [, operation, timestamp, metadata] = match;
  return {
    operation,
    timestamp,
    metadata: metadata ? splitMetadata(metadata) : [],
  };
}

export class SetupLog {
  private readonly directory: string;
  private readonly fileName: string;

  constructor(directory: string, fileName: string = DEFAULT_LOG_FILE) {
    this.directory = directory;
    this.fileName = fileName;
  }

  get filePath(): string {
    return join(this.directory, this.fileName);
  }

  /**
   * Read all entries in file order. A missing log reads as empty.
   */
  async read(): Promise<SetupLogEntry[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const entries: SetupLogEntry[] = [];
    for (const line of content.split('\n')) {
      const entry = parseEntry(line);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  /**
   * Append an entry, creating the file if needed. The directory itself must
   * already exist: the log only ever documents a directory that was created.
   */
  async append(entry: SetupLogEntry): Promise<void> {
    await appendFile(this.filePath, formatEntry(entry) + '\n', 'utf-8');
  }
}
