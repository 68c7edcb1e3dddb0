/**
 * Tests for the config CLI command.
 *
 * Covers:
 * - validate (default subcommand) on valid, invalid and missing files
 * - show prints the effective config with defaults and a resolved root
 * - Unknown subcommand
 */

import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { configCommand } from './config.js';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
  },
}));

import * as p from '@clack/prompts';

describe('configCommand', () => {
  const testDir = join(tmpdir(), `config-cmd-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  const configPath = join(testDir, 'coursekit.json');
  const configFlag = `--config=${configPath}`;
  const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

  async function writeConfig(config: unknown): Promise<void> {
    await writeFile(configPath, JSON.stringify(config), 'utf-8');
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  afterAll(() => {
    consoleLogSpy.mockRestore();
  });

  it('validates by default', async () => {
    await writeConfig({
      root: 'courses',
      units: [{ name: 'Calculus 1', code: 'MA4001', year: '2024-25', term: 'AUT', owner: 'Dr Test' }],
    });

    expect(await configCommand([configFlag])).toBe(0);
    expect(p.log.success).toHaveBeenCalledWith(`${configPath} is valid: 1 unit(s), 0 assessment(s)`);
  });

  it('reports field errors', async () => {
    await writeConfig({
      root: 'courses',
      units: [{ name: 'Calculus 1', code: 'MA4001', year: '2024-25', term: 'WIN', owner: 'Dr Test' }],
    });

    expect(await configCommand(['validate', configFlag])).toBe(1);
    const message = vi.mocked(p.log.error).mock.calls[0][0];
    expect(message).toMatch(/^Configuration error: Config validation failed:\n/);
    expect(message).toContain('units.0.term: ');
  });

  it('reports a missing file', async () => {
    expect(await configCommand(['validate', configFlag])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(`Configuration error: No configuration found at ${configPath}`);
  });

  it('reports malformed JSON', async () => {
    await writeFile(configPath, '{ "root": ', 'utf-8');
    expect(await configCommand(['validate', configFlag])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(`Configuration error: Invalid JSON in config file: ${configPath}`);
  });

  it('shows the effective config', async () => {
    await writeConfig({ root: 'courses' });

    expect(await configCommand(['show', configFlag])).toBe(0);

    const shown: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(shown).toMatchObject({
      root: join(testDir, 'courses'),
      logFile: 'setup_log.txt',
      teaching: { weeks: 13 },
      documents: { overwrite: 'always-confirm' },
      units: [],
      assessments: [],
    });
  });

  it('rejects an unknown subcommand', async () => {
    expect(await configCommand(['edit', configFlag])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith('Unknown subcommand: edit');
  });
});
