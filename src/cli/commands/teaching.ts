/**
 * CLI command: `coursekit teaching <unit>`
 *
 * Creates one folder per teaching week inside the unit's teaching folder.
 *
 * @module cli/commands/teaching
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { extractFlag, parseCommaSeparated, positionals, wantsHelp } from '../args.js';
import { loadWorkspace } from '../context.js';
import { reportError } from '../report.js';

export async function teachingCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const [code] = positionals(args);
  if (!code) {
    p.log.error('Missing unit code');
    p.log.message(`Run ${pc.cyan('coursekit teaching --help')} for usage.`);
    return 1;
  }

  const weeksArg = extractFlag(args, 'weeks');
  const topics = parseCommaSeparated(extractFlag(args, 'topics'));

  try {
    const workspace = await loadWorkspace(args);
    const weeks = weeksArg !== undefined ? Number(weeksArg) : workspace.config.teaching.weeks;
    const unit = await workspace.openUnit(code);
    const result = await unit.teachingStructure({ weeks, topics });

    p.log.success(`Created ${result.created.length} teaching week folders for ${unit.code}`);
    p.log.message(`${pc.dim(result.root)}\n${result.created.map((name) => `  ${name}`).join('\n')}`);
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function showHelp(): void {
  console.log(`
coursekit teaching - Create the weekly teaching-material folders

Usage:
  coursekit teaching <unit-code> [--weeks=N] [--topics=a,b,...] [--config=<path>]

Options:
  --weeks=N          Number of teaching weeks (default: teaching.weeks, 13)
  --topics=a,b,...   One topic per week; folders become "Week N - <topic>"

Runs once per unit; a second run is refused.
`);
}
