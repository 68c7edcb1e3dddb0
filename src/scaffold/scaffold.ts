import { mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { DirectoryExistsError, isErrnoException } from '../errors.js';

/**
 * Outcome of a scaffold: the directory it worked in and the child folders
 * it created, in creation order.
 */
export interface ScaffoldResult {
  root: string;
  created: string[];
}

/**
 * Create a directory that must not exist yet.
 *
 * @throws {DirectoryExistsError} if anything already exists at the path
 */
async function createExclusive(path: string): Promise<void> {
  try {
    await mkdir(path);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') {
      throw new DirectoryExistsError(path);
    }
    throw err;
  }
}

/**
 * Create `root` and then each named child under it, in order.
 *
 * Missing parents of `root` are created. `root` itself must not exist: an
 * existing root aborts the whole scaffold before any child is made, rather
 * than merging into it. A failure on a child leaves the earlier children in
 * place; nothing is rolled back.
 */
export async function scaffold(root: string, names: readonly string[]): Promise<ScaffoldResult> {
  await mkdir(dirname(root), { recursive: true });
  await createExclusive(root);
  const created = await scaffoldInto(root, names);
  return { root, created };
}

/**
 * Create each named child under `parent`, which is created if missing.
 * Children must not exist yet.
 *
 * @returns Names of the created children, in order
 */
export async function scaffoldInto(parent: string, names: readonly string[]): Promise<string[]> {
  await mkdir(parent, { recursive: true });
  const created: string[] = [];
  for (const name of names) {
    await createExclusive(join(parent, name));
    created.push(name);
  }
  return created;
}
