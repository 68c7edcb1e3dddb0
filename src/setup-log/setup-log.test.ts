/**
 * Tests for the setup log line format and store.
 *
 * Covers:
 * - Formatting with and without metadata
 * - Parsing entries and rejecting unrelated lines
 * - Line breaks in metadata flattened
 * - Separators and backslashes inside metadata items escaped
 * - Missing file reads as empty
 * - Append creates the file and preserves order
 * - Foreign lines in the file are skipped
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { SetupLog, formatEntry, parseEntry, DEFAULT_LOG_FILE } from './setup-log.js';

describe('formatEntry', () => {
  it('renders the marker line without metadata', () => {
    const line = formatEntry({ operation: 'structure', timestamp: '2024-09-02T09:00:00.000Z', metadata: [] });
    expect(line).toBe('operation `structure` deployed on 2024-09-02T09:00:00.000Z');
  });

  it('appends metadata after a pipe, joined by semicolons', () => {
    const line = formatEntry({
      operation: 'structure',
      timestamp: '2024-09-02T09:00:00.000Z',
      metadata: ['Teaching Material', 'Assessment'],
    });
    expect(line).toBe('operation `structure` deployed on 2024-09-02T09:00:00.000Z | Teaching Material; Assessment');
  });

  it('flattens line breaks inside metadata and drops empty items', () => {
    const line = formatEntry({
      operation: 'copy-documents',
      timestamp: '2024-09-02T09:00:00.000Z',
      metadata: ['first\nsecond', '  '],
    });
    expect(line).toBe('operation `copy-documents` deployed on 2024-09-02T09:00:00.000Z | first second');
  });

  it('escapes semicolons and backslashes inside metadata items', () => {
    const line = formatEntry({
      operation: 'teaching-structure',
      timestamp: '2024-09-02T09:00:00.000Z',
      metadata: ['Week 1 - Sets; Logic', 'Week 2 - A\\B'],
    });
    expect(line).toBe(
      'operation `teaching-structure` deployed on 2024-09-02T09:00:00.000Z | Week 1 - Sets\\; Logic; Week 2 - A\\\\B',
    );
  });
});

describe('parseEntry', () => {
  it('reads escaped metadata back as the original items', () => {
    const entry = {
      operation: 'teaching-structure',
      timestamp: '2024-09-02T09:00:00.000Z',
      metadata: ['Week 1 - Sets; Logic', 'Week 2 - A\\', 'Week 3 - Proof;Induction'],
    };
    expect(parseEntry(formatEntry(entry))).toEqual(entry);
  });

  it('parses a marker line with metadata', () => {
    expect(parseEntry('operation `teaching-structure` deployed on 2024-09-02T09:00:00.000Z | Week 1; Week 2')).toEqual({
      operation: 'teaching-structure',
      timestamp: '2024-09-02T09:00:00.000Z',
      metadata: ['Week 1', 'Week 2'],
    });
  });

  it('parses a marker line without metadata', () => {
    expect(parseEntry('operation `graders-list` deployed on 2024-09-02T09:00:00.000Z')).toEqual({
      operation: 'graders-list',
      timestamp: '2024-09-02T09:00:00.000Z',
      metadata: [],
    });
  });

  it('returns null for lines that are not entries', () => {
    expect(parseEntry('')).toBeNull();
    expect(parseEntry('Module MA4001 created')).toBeNull();
    expect(parseEntry("'structure' method deployed on 2024-09-02")).toBeNull();
  });
});

describe('SetupLog', () => {
  const testDir = join(tmpdir(), `setup-log-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('uses setup_log.txt by default', () => {
    const log = new SetupLog(testDir);
    expect(log.filePath).toBe(join(testDir, DEFAULT_LOG_FILE));
    expect(DEFAULT_LOG_FILE).toBe('setup_log.txt');
  });

  it('reads an empty list when the file does not exist', async () => {
    const log = new SetupLog(testDir);
    expect(await log.read()).toEqual([]);
  });

  it('creates the file on first append and keeps entries in order', async () => {
    const log = new SetupLog(testDir, 'custom.log');
    await log.append({ operation: 'structure', timestamp: '2024-09-02T09:00:00.000Z', metadata: ['A'] });
    await log.append({ operation: 'teaching-structure', timestamp: '2024-09-03T09:00:00.000Z', metadata: [] });

    const content = await readFile(join(testDir, 'custom.log'), 'utf-8');
    expect(content).toBe(
      'operation `structure` deployed on 2024-09-02T09:00:00.000Z | A\n' +
        'operation `teaching-structure` deployed on 2024-09-03T09:00:00.000Z\n',
    );

    const entries = await log.read();
    expect(entries.map((e) => e.operation)).toEqual(['structure', 'teaching-structure']);
  });

  it('skips lines that are not entries', async () => {
    await writeFile(
      join(testDir, DEFAULT_LOG_FILE),
      'hand-written note\noperation `structure` deployed on 2024-09-02T09:00:00.000Z\n\n',
      'utf-8',
    );
    const entries = await new SetupLog(testDir).read();
    expect(entries).toHaveLength(1);
    expect(entries[0].operation).toBe('structure');
  });

  it('fails to append when the documented directory does not exist', async () => {
    const log = new SetupLog(join(testDir, 'missing'));
    await expect(
      log.append({ operation: 'structure', timestamp: '2024-09-02T09:00:00.000Z', metadata: [] }),
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
