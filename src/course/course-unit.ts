/**
 * Course unit: one offering of a taught module in a given year and term.
 *
 * A unit starts out rooted at the base directory it was constructed with.
 * Structuring creates `<base>/{code} {term} {year}` with the organizational
 * folders and narrows `root` to it; that reassignment happens once per
 * instance. A later process re-attaches to an existing tree with `resume()`.
 *
 * Every guarded step reads and writes the setup log in the unit directory.
 */

import { copyFile, stat } from 'node:fs/promises';
import { basename, join, relative } from 'node:path';
import { AlreadyCompletedError, PreconditionError, isErrnoException } from '../errors.js';
import { DEFAULT_LAYOUT } from '../config/schema.js';
import type { CourseLayout } from '../config/schema.js';
import { scaffold, scaffoldInto } from '../scaffold/scaffold.js';
import type { ScaffoldResult } from '../scaffold/scaffold.js';
import { DEFAULT_TEACHING_WEEKS, teachingFolderNames } from '../scaffold/teaching.js';
import type { SetupGuard } from '../setup-log/setup-guard.js';
import type { SetupLogEntry } from '../setup-log/setup-log.js';
import { OPERATIONS, parseCourseUnitInfo } from '../types/course.js';
import type { AssessmentInfo, CourseUnitInfo, OverwritePolicy, Structurable } from '../types/course.js';
import { assertFolderName, assertInside } from '../validation/path-safety.js';
import { Assessment } from './assessment.js';

export interface CourseUnitOptions {
  /** Directory the unit tree is created in */
  baseDir: string;
  guard: SetupGuard;
  layout?: CourseLayout;
  overwritePolicy?: OverwritePolicy;
}

export interface TeachingStructureOptions {
  weeks?: number;
  topics?: readonly string[];
}

/**
 * Asked once per batch with the names that would be overwritten.
 * Resolving to false cancels the whole batch.
 */
export type ConfirmOverwrite = (collisions: string[]) => Promise<boolean>;

export interface CopyDocumentsOptions {
  /** Destination folder relative to the unit root (default: layout.documentsFolder) */
  into?: string;
  /** Without a callback, collisions that need confirmation decline the batch */
  confirm?: ConfirmOverwrite;
}

export interface CopyDocumentsResult {
  destination: string;
  /** File names copied, in input order */
  copied: string[];
  /** File names that already existed in the destination */
  collisions: string[];
  declined: boolean;
}

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

export class CourseUnit implements Structurable {
  readonly info: CourseUnitInfo;
  readonly baseDir: string;
  private readonly guard: SetupGuard;
  private readonly layout: CourseLayout;
  private readonly overwritePolicy: OverwritePolicy;
  private currentRoot: string;
  private structured = false;

  constructor(info: CourseUnitInfo, options: CourseUnitOptions) {
    this.info = parseCourseUnitInfo(info);
    this.baseDir = options.baseDir;
    this.guard = options.guard;
    this.layout = options.layout ?? DEFAULT_LAYOUT;
    this.overwritePolicy = options.overwritePolicy ?? 'always-confirm';
    this.currentRoot = options.baseDir;
    assertFolderName(this.directoryName, 'unit directory name');
  }

  get code(): string {
    return this.info.code;
  }

  get root(): string {
    return this.currentRoot;
  }

  get isStructured(): boolean {
    return this.structured;
  }

  /** `{code} {term} {year}` */
  get directoryName(): string {
    return `${this.info.code} ${this.info.term} ${this.info.year}`;
  }

  /** Where the unit tree lives, structured or not */
  get unitDir(): string {
    return join(this.baseDir, this.directoryName);
  }

  describe(): string {
    const { name, code, year, term, owner } = this.info;
    return `CourseUnit(${name}, ${code}, ${year}, ${term}, ${owner})`;
  }

  toString(): string {
    return this.describe();
  }

  private bindRoot(): void {
    this.currentRoot = this.unitDir;
    this.structured = true;
  }

  private requireStructured(operation: string): void {
    if (!this.structured) {
      throw new PreconditionError(
        `Course unit ${this.code} must be structured (or resumed) before '${operation}'`,
      );
    }
  }

  /**
   * Create the unit directory and its organizational folders.
   *
   * @throws {AlreadyCompletedError} if the unit was structured before
   * @throws {DirectoryExistsError} if the unit directory exists without a log entry
   */
  async structure(): Promise<ScaffoldResult> {
    if (this.structured) {
      throw new AlreadyCompletedError(OPERATIONS.structure, this.currentRoot);
    }

    const target = this.unitDir;
    await this.guard.ensureNotRun(target, OPERATIONS.structure);

    const result = await scaffold(target, this.layout.unitFolders);
    await this.guard.record(target, OPERATIONS.structure, result.created);
    this.bindRoot();
    return result;
  }

  /**
   * Attach to a unit tree structured by an earlier run.
   *
   * @throws {PreconditionError} if the unit directory has no `structure` entry
   */
  async resume(): Promise<void> {
    if (this.structured) return;

    if (!(await this.guard.hasRun(this.unitDir, OPERATIONS.structure))) {
      throw new PreconditionError(
        `Course unit ${this.code} has not been structured under ${this.baseDir}`,
      );
    }
    this.bindRoot();
  }

  /**
   * Create one folder per teaching week inside the teaching folder.
   *
   * Week count and topics are checked before anything touches the disk.
   */
  async teachingStructure(options: TeachingStructureOptions = {}): Promise<ScaffoldResult> {
    const names = teachingFolderNames(options.weeks ?? DEFAULT_TEACHING_WEEKS, options.topics ?? []);
    this.requireStructured(OPERATIONS.teachingStructure);
    await this.guard.ensureNotRun(this.root, OPERATIONS.teachingStructure);

    const materialDir = join(this.root, this.layout.teachingFolder);
    const created = await scaffoldInto(materialDir, names);
    await this.guard.record(this.root, OPERATIONS.teachingStructure, created);
    return { root: materialDir, created };
  }

  /**
   * Copy documents into a folder of the unit.
   *
   * All sources are checked before the first copy, and a batch in which
   * two sources share a file name is rejected. When names collide with
   * files already in the destination, `confirm` is asked once for the whole
   * batch; declining copies nothing and leaves the log untouched. Under the
   * `confirm-after-first-run` policy a first run overwrites without asking.
   */
  async copyDocuments(
    documents: string | readonly string[],
    options: CopyDocumentsOptions = {},
  ): Promise<CopyDocumentsResult> {
    this.requireStructured(OPERATIONS.copyDocuments);

    const sources = typeof documents === 'string' ? [documents] : [...documents];
    const destination = join(this.root, options.into ?? this.layout.documentsFolder);
    assertInside(destination, this.root);

    const destinationStat = await statOrNull(destination);
    if (!destinationStat?.isDirectory()) {
      throw new PreconditionError(`Destination folder does not exist: ${destination}`);
    }

    for (const source of sources) {
      const sourceStat = await statOrNull(source);
      if (!sourceStat?.isFile()) {
        throw new PreconditionError(`Not a file: ${source}`);
      }
    }

    const names = new Set<string>();
    for (const source of sources) {
      const name = basename(source);
      if (names.has(name)) {
        throw new PreconditionError(`More than one document is named "${name}"; copy them in separate batches`);
      }
      names.add(name);
    }

    const collisions: string[] = [];
    for (const source of sources) {
      const name = basename(source);
      if ((await statOrNull(join(destination, name))) !== null) {
        collisions.push(name);
      }
    }

    if (collisions.length > 0 && (await this.needsOverwriteConfirmation())) {
      const approved = options.confirm ? await options.confirm(collisions) : false;
      if (!approved) {
        return { destination, copied: [], collisions, declined: true };
      }
    }

    const copied: string[] = [];
    for (const source of sources) {
      const name = basename(source);
      await copyFile(source, join(destination, name));
      copied.push(name);
    }

    if (copied.length > 0) {
      const folder = relative(this.root, destination);
      await this.guard.record(
        this.root,
        OPERATIONS.copyDocuments,
        copied.map((name) => (folder ? join(folder, name) : name)),
      );
    }

    return { destination, copied, collisions, declined: false };
  }

  private async needsOverwriteConfirmation(): Promise<boolean> {
    if (this.overwritePolicy === 'always-confirm') return true;
    return this.guard.hasRun(this.root, OPERATIONS.copyDocuments);
  }

  /**
   * Build an assessment that belongs to this unit.
   */
  assessment(fields: Omit<AssessmentInfo, 'unitCode'>): Assessment {
    this.requireStructured('assessment');
    return new Assessment(
      { ...fields, unitCode: this.code },
      { unitRoot: this.root, guard: this.guard, layout: this.layout },
    );
  }

  async history(): Promise<SetupLogEntry[]> {
    return this.guard.history(this.unitDir);
  }
}
