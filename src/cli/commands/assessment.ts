/**
 * CLI command: `coursekit assessment <unit> <assessment>`
 *
 * Creates `<unit root>/Assessment/<name> (<kind>)` for an assessment
 * declared in the config.
 *
 * @module cli/commands/assessment
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { positionals, wantsHelp } from '../args.js';
import { loadWorkspace } from '../context.js';
import { reportError } from '../report.js';

export async function assessmentCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const [code, name] = positionals(args);
  if (!code || !name) {
    p.log.error('Missing unit code or assessment name');
    p.log.message(`Run ${pc.cyan('coursekit assessment --help')} for usage.`);
    return 1;
  }

  try {
    const workspace = await loadWorkspace(args);
    const assessment = await workspace.assessment(code, name);
    const result = await assessment.structure();

    p.log.success(`Structured ${assessment.describe()}`);
    p.log.message(`${pc.dim(result.root)}\n${result.created.map((folder) => `  ${folder}`).join('\n')}`);
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function showHelp(): void {
  console.log(`
coursekit assessment - Create the folder tree of an assessment

Usage:
  coursekit assessment <unit-code> <assessment-name> [--config=<path>]

The unit must be structured first. Runs once per assessment.
`);
}
