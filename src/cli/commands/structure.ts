/**
 * CLI command: `coursekit structure <unit>`
 *
 * Creates `<root>/{code} {term} {year}` with the organizational folders
 * and records the step in the unit's setup log.
 *
 * @module cli/commands/structure
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { positionals, wantsHelp } from '../args.js';
import { loadWorkspace } from '../context.js';
import { reportError } from '../report.js';

export async function structureCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const [code] = positionals(args);
  if (!code) {
    p.log.error('Missing unit code');
    p.log.message(`Run ${pc.cyan('coursekit structure --help')} for usage.`);
    return 1;
  }

  try {
    const workspace = await loadWorkspace(args);
    const unit = workspace.unit(code);
    const result = await unit.structure();

    p.log.success(`Structured ${unit.describe()}`);
    p.log.message(`${pc.dim(result.root)}\n${result.created.map((name) => `  ${name}`).join('\n')}`);
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function showHelp(): void {
  console.log(`
coursekit structure - Create the folder tree of a course unit

Usage:
  coursekit structure <unit-code> [--config=<path>]

Creates "<root>/<code> <term> <year>" and its organizational folders.
Runs once per unit; a second run is refused.
`);
}
