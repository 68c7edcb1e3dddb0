/**
 * CLI command: `coursekit config [validate|show]`
 *
 * - validate: Runs the schema over the config file and reports field errors
 * - show: Prints the effective config (file merged with defaults) as JSON
 *
 * Exit codes:
 * - 0: Config is valid
 * - 1: Config is missing, unparseable or invalid
 *
 * @module cli/commands/config
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readConfig } from '../../config/reader.js';
import { configPathFrom, positionals, wantsHelp } from '../args.js';
import { reportError } from '../report.js';

export async function configCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const subcommand = positionals(args)[0] ?? 'validate';
  const configPath = configPathFrom(args);

  switch (subcommand) {
    case 'validate':
      try {
        const config = await readConfig(configPath);
        p.log.success(
          `${configPath} is valid: ${config.units.length} unit(s), ${config.assessments.length} assessment(s)`,
        );
        p.log.message(pc.dim(`Root: ${config.root}`));
        return 0;
      } catch (err) {
        return reportError(err);
      }
    case 'show':
      try {
        const config = await readConfig(configPath);
        console.log(JSON.stringify(config, null, 2));
        return 0;
      } catch (err) {
        return reportError(err);
      }
    default:
      p.log.error(`Unknown subcommand: ${subcommand}`);
      p.log.message(`Run ${pc.cyan('coursekit config --help')} for usage.`);
      return 1;
  }
}

function showHelp(): void {
  console.log(`
coursekit config - Check the configuration file

Usage:
  coursekit config [validate|show] [--config=<path>]

Subcommands:
  validate   Validate the config file (default)
  show       Print the effective config with defaults filled in
`);
}
