import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { teachingCommand } from './teaching.js';
import { structureCommand } from './structure.js';

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

describe('teachingCommand', () => {
  const testDir = join(tmpdir(), `teaching-cmd-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  const configPath = join(testDir, 'coursekit.json');
  const configFlag = `--config=${configPath}`;
  const materialDir = join(testDir, 'courses', 'MA4001 AUT 2024-25', 'Teaching Material');

  beforeEach(async () => {
    vi.clearAllMocks();
    await mkdir(testDir, { recursive: true });
    await writeFile(
      configPath,
      JSON.stringify({
        root: 'courses',
        teaching: { weeks: 4 },
        units: [{ name: 'Calculus 1', code: 'MA4001', year: '2024-25', term: 'AUT', owner: 'Dr Test' }],
      }),
      'utf-8',
    );
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('requires the unit to be structured first', async () => {
    expect(await teachingCommand(['MA4001', configFlag])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      `Invalid input: Course unit MA4001 has not been structured under ${join(testDir, 'courses')}`,
    );
  });

  it('uses the configured week count by default', async () => {
    await structureCommand(['MA4001', configFlag]);

    expect(await teachingCommand(['MA4001', configFlag])).toBe(0);
    expect(p.log.success).toHaveBeenCalledWith('Created 4 teaching week folders for MA4001');
    expect((await readdir(materialDir)).sort()).toEqual(['Week 1', 'Week 2', 'Week 3', 'Week 4']);
  });

  it('takes weeks and topics from flags', async () => {
    await structureCommand(['MA4001', configFlag]);

    expect(await teachingCommand(['MA4001', '--weeks=2', '--topics=Limits, Derivatives', configFlag])).toBe(0);
    expect((await readdir(materialDir)).sort()).toEqual(['Week 1 - Limits', 'Week 2 - Derivatives']);
  });

  it('reports an invalid week count without creating folders', async () => {
    await structureCommand(['MA4001', configFlag]);

    expect(await teachingCommand(['MA4001', '--weeks=0', configFlag])).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      'Invalid input: The number of weeks must be a whole number greater than 0 (got 0)',
    );
    expect(await readdir(materialDir)).toEqual([]);
  });

  it('refuses a second run', async () => {
    await structureCommand(['MA4001', configFlag]);
    await teachingCommand(['MA4001', configFlag]);
    vi.clearAllMocks();

    expect(await teachingCommand(['MA4001', configFlag])).toBe(1);
    expect(vi.mocked(p.log.error).mock.calls[0][0]).toMatch(/^Already completed: The 'teaching-structure' operation/);
  });
});
