/**
 * Console front end for the interactive parts of document transfer.
 *
 * The core only takes a list of paths and a confirmation callback; these
 * functions supply both from the terminal.
 */

import { statSync } from 'node:fs';
import * as p from '@clack/prompts';
import pc from 'picocolors';

/** Entered to finish gathering */
export const FINISH_SENTINEL = 'q';

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Prompt for document paths until the user enters `q`.
 * Paths that are not existing files are rejected and asked again.
 *
 * @returns The paths in entry order, or null if the prompt was cancelled
 */
export async function gatherDocuments(): Promise<string[] | null> {
  p.log.message(`Enter document paths one at a time. Enter ${pc.cyan(FINISH_SENTINEL)} to finish.`);
  const paths: string[] = [];

  for (;;) {
    const value = await p.text({
      message: 'Document path:',
      placeholder: `${FINISH_SENTINEL} to finish`,
      validate: (input) => {
        const trimmed = input.trim();
        if (!trimmed) return `Enter a path, or ${FINISH_SENTINEL} to finish`;
        if (trimmed.toLowerCase() === FINISH_SENTINEL) return undefined;
        if (!isFile(trimmed)) return 'Invalid file path. Please try again.';
        return undefined;
      },
    });

    if (p.isCancel(value)) {
      p.cancel('Document transfer cancelled');
      return null;
    }

    const trimmed = value.trim();
    if (trimmed.toLowerCase() === FINISH_SENTINEL) break;
    paths.push(trimmed);
  }

  return paths;
}

/**
 * Ask once whether a batch may overwrite the listed files.
 */
export async function confirmOverwrite(collisions: string[]): Promise<boolean> {
  p.log.warn(`These files already exist in the destination:\n${collisions.map((name) => `  ${name}`).join('\n')}`);
  const answer = await p.confirm({
    message: 'Overwrite them and copy the whole batch?',
    initialValue: false,
  });
  return !p.isCancel(answer) && answer;
}
