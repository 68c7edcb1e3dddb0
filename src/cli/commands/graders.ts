/**
 * CLI command: `coursekit graders <unit> <assessment> <name>...`
 *
 * Writes the grader roster of a structured assessment.
 *
 * @module cli/commands/graders
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { positionals, wantsHelp } from '../args.js';
import { loadWorkspace } from '../context.js';
import { reportError } from '../report.js';

export async function gradersCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const [code, name, ...graders] = positionals(args);
  if (!code || !name) {
    p.log.error('Missing unit code or assessment name');
    p.log.message(`Run ${pc.cyan('coursekit graders --help')} for usage.`);
    return 1;
  }

  try {
    const workspace = await loadWorkspace(args);
    const assessment = await workspace.openAssessment(code, name);
    const path = await assessment.graderList(graders);

    p.log.success(`Wrote ${graders.length} grader(s) to ${path}`);
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function showHelp(): void {
  console.log(`
coursekit graders - Write the grader roster of an assessment

Usage:
  coursekit graders <unit-code> <assessment-name> <grader>... [--config=<path>] [-- <grader>...]

Names are written one per line in the order given. Runs once per assessment.
Put names that start with a dash after "--", e.g.
  coursekit graders MA4001 Midterm -- "-Ana"
`);
}
