/**
 * CLI command: `coursekit copy <unit> [files...]`
 *
 * Copies documents into a folder of the unit. Without file arguments the
 * paths are gathered interactively. Overwrites are confirmed once per batch.
 *
 * @module cli/commands/copy
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { extractFlag, positionals, wantsHelp } from '../args.js';
import { loadWorkspace } from '../context.js';
import { confirmOverwrite, gatherDocuments } from '../prompts.js';
import { reportError } from '../report.js';

export async function copyCommand(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    showHelp();
    return 0;
  }

  const [code, ...files] = positionals(args);
  if (!code) {
    p.log.error('Missing unit code');
    p.log.message(`Run ${pc.cyan('coursekit copy --help')} for usage.`);
    return 1;
  }

  try {
    const workspace = await loadWorkspace(args);
    const unit = await workspace.openUnit(code);

    let documents = files;
    if (documents.length === 0) {
      const gathered = await gatherDocuments();
      if (gathered === null) return 0;
      documents = gathered;
    }

    if (documents.length === 0) {
      p.log.info('No documents selected. Nothing to copy.');
      return 0;
    }

    const result = await unit.copyDocuments(documents, {
      into: extractFlag(args, 'into'),
      confirm: confirmOverwrite,
    });

    if (result.declined) {
      p.log.info('Copy cancelled. No files were copied.');
      return 0;
    }

    p.log.success(`Copied ${result.copied.length} document(s) to ${result.destination}`);
    p.log.message(result.copied.map((name) => `  ${name}`).join('\n'));
    return 0;
  } catch (err) {
    return reportError(err);
  }
}

function showHelp(): void {
  console.log(`
coursekit copy - Copy documents into a course unit

Usage:
  coursekit copy <unit-code> [files...] [--into=<folder>] [--config=<path>] [-- <files...>]

Options:
  --into=<folder>   Destination folder inside the unit (default: layout.documentsFolder)

Files whose names start with a dash go after "--".
Without files, prompts for paths until "q" is entered.
If any file name already exists in the destination you are asked once
whether to overwrite; answering no copies nothing.
`);
}
