#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { structureCommand } from './cli/commands/structure.js';
import { teachingCommand } from './cli/commands/teaching.js';
import { copyCommand } from './cli/commands/copy.js';
import { assessmentCommand } from './cli/commands/assessment.js';
import { gradersCommand } from './cli/commands/graders.js';
import { logCommand } from './cli/commands/log.js';
import { configCommand } from './cli/commands/config.js';

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js    ${process.version}`);
  console.log(`Platform   ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  if (command === '--version' || command === '-V') {
    printVersion();
    return;
  }

  let exitCode = 0;

  switch (command) {
    case 'structure':
    case 'st':
      exitCode = await structureCommand(rest);
      break;

    case 'teaching':
    case 'tm':
      exitCode = await teachingCommand(rest);
      break;

    case 'copy':
    case 'cp':
      exitCode = await copyCommand(rest);
      break;

    case 'assessment':
    case 'as':
      exitCode = await assessmentCommand(rest);
      break;

    case 'graders':
    case 'gr':
      exitCode = await gradersCommand(rest);
      break;

    case 'log':
      exitCode = await logCommand(rest);
      break;

    case 'config':
    case 'cfg':
      exitCode = await configCommand(rest);
      break;

    case 'help':
    case '-h':
    case '--help':
      showHelp();
      break;

    default:
      if (command) {
        p.log.error(`Unknown command: ${command}`);
      }
      showHelp();
      exitCode = command ? 1 : 0;
  }

  if (exitCode !== 0) process.exit(exitCode);
}

function showHelp() {
  console.log(`
coursekit - Scaffold course unit folders

Usage:
  coursekit <command> [options]

Commands:
  structure, st     Create the folder tree of a course unit
  teaching, tm      Create the weekly teaching-material folders
  copy, cp          Copy documents into a unit folder
  assessment, as    Create the folder tree of an assessment
  graders, gr       Write the grader roster of an assessment
  log               Show which setup steps have run
  config, cfg       Validate or show the configuration

Options:
  --config=<path>   Configuration file (default: coursekit.json)
  --help, -h        Show help (also after a command)
  --version, -V     Show version

Examples:
  coursekit structure MA4001
  coursekit teaching MA4001 --weeks=12
  coursekit teaching MA4001 --weeks=3 --topics="Limits,Derivatives,Integrals"
  coursekit copy MA4001 handbook.pdf grading-rubric.docx
  coursekit copy MA4001                  # prompt for paths
  coursekit assessment MA4001 Midterm
  coursekit graders MA4001 Midterm "A. Byrne" "C. Doyle"
  coursekit log MA4001

Setup Log:
  Each unit and assessment directory holds a setup_log.txt recording which
  one-time steps have run there. Steps already in the log are refused.
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
