/**
 * CLI command: `coursekit log <unit> [assessment]`
 *
 * Shows the setup-log history of a unit or of one of its assessments.
 *
 * @module cli/commands/log
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { positionals, wantsHelp } from '../args.js';
import { loadWorkspace } from '../context.js';
import { reportError } from '../report.js';
import type { SetupLogEntry } from '../../setup-log/setup-log.js';

export async function logCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const [code, name] = positionals(args);
  if (!code) {
    p.log.error('Missing unit code');
    p.log.message(`Run ${pc.cyan('coursekit log --help')} for usage.`);
    return 1;
  }

  const jsonMode = args.includes('--json');

  try {
    const workspace = await loadWorkspace(args);
    let label: string;
    let entries: SetupLogEntry[];
    if (name) {
      const assessment = await workspace.assessment(code, name);
      label = assessment.describe();
      entries = await assessment.history();
    } else {
      const unit = workspace.unit(code);
      label = unit.describe();
      entries = await unit.history();
    }

    if (jsonMode) {
      console.log(JSON.stringify(entries, null, 2));
      return 0;
    }

    if (entries.length === 0) {
      p.log.info(`No setup steps recorded for ${label}`);
      return 0;
    }

    p.log.info(label);
    for (const entry of entries) {
      const details = entry.metadata.length > 0 ? `\n${pc.dim(entry.metadata.map((m) => `  ${m}`).join('\n'))}` : '';
      p.log.message(`${pc.cyan(entry.operation)}  ${entry.timestamp}${details}`);
    }
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function showHelp(): void {
  console.log(`
coursekit log - Show which setup steps have run

Usage:
  coursekit log <unit-code> [assessment-name] [--json] [--config=<path>]
`);
}
