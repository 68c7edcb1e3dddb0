/**
 * Tests for the structure CLI command.
 *
 * Covers:
 * - Help flag
 * - Missing unit code
 * - Successful structure
 * - Distinct messages for already-completed, already-on-disk, unknown unit
 *   and missing config
 */

import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { mkdir, rm, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { structureCommand } from './structure.js';

// Mock @clack/prompts to capture output
vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
  },
  intro: vi.fn(),
  outro: vi.fn(),
}));

import * as p from '@clack/prompts';

describe('structureCommand', () => {
  const testDir = join(tmpdir(), `structure-cmd-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  const configPath = join(testDir, 'coursekit.json');
  const unitDir = join(testDir, 'courses', 'MA4001 AUT 2024-25');
  const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

  beforeEach(async () => {
    vi.clearAllMocks();
    await mkdir(testDir, { recursive: true });
    await writeFile(
      configPath,
      JSON.stringify({
        root: 'courses',
        units: [{ name: 'Calculus 1', code: 'MA4001', year: '2024-25', term: 'AUT', owner: 'Dr Test' }],
      }),
      'utf-8',
    );
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  afterAll(() => {
    consoleLogSpy.mockRestore();
  });

  it('--help prints help text and returns 0', async () => {
    expect(await structureCommand(['--help'])).toBe(0);
    const output = consoleLogSpy.mock.calls.map((c) => c[0]).join('\n');
    expect(output).toContain('coursekit structure <unit-code>');
  });

  it('returns 1 without a unit code', async () => {
    expect(await structureCommand([`--config=${configPath}`])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith('Missing unit code');
  });

  it('creates the unit tree and returns 0', async () => {
    expect(await structureCommand(['MA4001', `--config=${configPath}`])).toBe(0);
    expect(p.log.success).toHaveBeenCalledWith('Structured CourseUnit(Calculus 1, MA4001, 2024-25, AUT, Dr Test)');
    expect((await readdir(unitDir)).sort()).toEqual([
      'Assessment',
      'Module Documents',
      'Teaching Material',
      'setup_log.txt',
    ]);
  });

  it('reports a second run as already completed', async () => {
    await structureCommand(['MA4001', `--config=${configPath}`]);
    vi.clearAllMocks();

    expect(await structureCommand(['MA4001', `--config=${configPath}`])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      `Already completed: The 'structure' operation has already been executed in ${unitDir}. ` +
        'Running it again risks overwriting work.',
    );
  });

  it('reports a leftover directory as already existing on disk', async () => {
    await mkdir(unitDir, { recursive: true });

    expect(await structureCommand(['MA4001', `--config=${configPath}`])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      `Already exists on disk: Directory already exists: ${unitDir}. ` +
        'Use the existing directory or delete it and run the operation again.',
    );
  });

  it('reports an unknown unit as invalid input', async () => {
    expect(await structureCommand(['CS4001', `--config=${configPath}`])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      'Invalid input: Unknown course unit "CS4001". Configured units: MA4001',
    );
  });

  it('reports a missing config file', async () => {
    const missing = join(testDir, 'missing.json');
    expect(await structureCommand(['MA4001', `--config=${missing}`])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(`Configuration error: No configuration found at ${missing}`);
  });
});
