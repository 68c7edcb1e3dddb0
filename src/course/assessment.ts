/**
 * Assessment: a graded deliverable of a course unit.
 *
 * Refers to its unit by code and by the unit's root directory; it holds no
 * live reference to the CourseUnit object. Structuring creates
 * `<unit root>/Assessment/<name> (<kind>)` and narrows `root` to it.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { AlreadyCompletedError, PreconditionError } from '../errors.js';
import { DEFAULT_LAYOUT } from '../config/schema.js';
import type { CourseLayout } from '../config/schema.js';
import { scaffold } from '../scaffold/scaffold.js';
import type { ScaffoldResult } from '../scaffold/scaffold.js';
import type { SetupGuard } from '../setup-log/setup-guard.js';
import type { SetupLogEntry } from '../setup-log/setup-log.js';
import { OPERATIONS, parseAssessmentInfo } from '../types/course.js';
import type { AssessmentInfo, Structurable } from '../types/course.js';
import { assertFolderName } from '../validation/path-safety.js';

export interface AssessmentOptions {
  /** Root directory of the owning, already structured unit */
  unitRoot: string;
  guard: SetupGuard;
  layout?: CourseLayout;
}

export class Assessment implements Structurable {
  readonly info: AssessmentInfo;
  readonly unitRoot: string;
  private readonly guard: SetupGuard;
  private readonly layout: CourseLayout;
  private currentRoot: string;
  private structured = false;

  constructor(info: AssessmentInfo, options: AssessmentOptions) {
    this.info = parseAssessmentInfo(info);
    this.unitRoot = options.unitRoot;
    this.guard = options.guard;
    this.layout = options.layout ?? DEFAULT_LAYOUT;
    this.currentRoot = options.unitRoot;

    // Unit directories are named "{code} {term} {year}"
    if (!basename(this.unitRoot).startsWith(`${this.info.unitCode} `)) {
      throw new PreconditionError(
        `Assessment '${this.info.name}' belongs to unit ${this.info.unitCode}, ` +
          `but ${this.unitRoot} is not that unit's directory`,
      );
    }
    assertFolderName(this.directoryName, 'assessment directory name');
  }

  get unitCode(): string {
    return this.info.unitCode;
  }

  get root(): string {
    return this.currentRoot;
  }

  get isStructured(): boolean {
    return this.structured;
  }

  /** `<name> (<kind>)` */
  get directoryName(): string {
    return `${this.info.name} (${this.info.kind})`;
  }

  get assessmentDir(): string {
    return join(this.unitRoot, this.layout.assessmentFolder, this.directoryName);
  }

  get rosterPath(): string {
    return join(this.assessmentDir, this.layout.rosterFile);
  }

  describe(): string {
    const { name, kind, dueDate, weight, unitCode } = this.info;
    return `Assessment(${name}, ${kind}, due ${dueDate}, ${weight}%, unit ${unitCode})`;
  }

  toString(): string {
    return this.describe();
  }

  private bindRoot(): void {
    this.currentRoot = this.assessmentDir;
    this.structured = true;
  }

  private requireStructured(operation: string): void {
    if (!this.structured) {
      throw new PreconditionError(
        `Assessment '${this.info.name}' must be structured (or resumed) before '${operation}'`,
      );
    }
  }

  /**
   * Create the assessment directory and its folders under the unit.
   *
   * @throws {PreconditionError} if the owning unit has not been structured
   * @throws {AlreadyCompletedError} if the assessment was structured before
   * @throws {DirectoryExistsError} if the directory exists without a log entry
   */
  async structure(): Promise<ScaffoldResult> {
    if (this.structured) {
      throw new AlreadyCompletedError(OPERATIONS.structure, this.currentRoot);
    }

    if (!(await this.guard.hasRun(this.unitRoot, OPERATIONS.structure))) {
      throw new PreconditionError(
        `Course unit ${this.unitCode} must be structured before its assessments`,
      );
    }

    const target = this.assessmentDir;
    await this.guard.ensureNotRun(target, OPERATIONS.structure);

    const result = await scaffold(target, this.layout.assessmentFolders);
    await this.guard.record(target, OPERATIONS.structure, result.created);
    this.bindRoot();
    return result;
  }

  /**
   * @throws {PreconditionError} if the assessment directory has no `structure` entry
   */
  async resume(): Promise<void> {
    if (this.structured) return;

    if (!(await this.guard.hasRun(this.assessmentDir, OPERATIONS.structure))) {
      throw new PreconditionError(
        `Assessment '${this.info.name}' of unit ${this.unitCode} has not been structured`,
      );
    }
    this.bindRoot();
  }

  /**
   * Write the grader roster, one name per line, in the given order.
   * Duplicates and an empty roster are accepted.
   *
   * @returns Path of the roster file
   */
  async graderList(graders: readonly string[]): Promise<string> {
    this.requireStructured(OPERATIONS.gradersList);
    for (const grader of graders) {
      if (/[\r\n]/.test(grader)) {
        throw new PreconditionError(`Grader name contains a line break: ${JSON.stringify(grader)}`);
      }
    }
    await this.guard.ensureNotRun(this.root, OPERATIONS.gradersList);

    const path = this.rosterPath;
    await writeFile(path, graders.map((grader) => `${grader}\n`).join(''), 'utf-8');
    await this.guard.record(this.root, OPERATIONS.gradersList, [`${graders.length} graders`]);
    return path;
  }

  /**
   * Read the roster back in file order.
   */
  async readGraders(): Promise<string[]> {
    const content = await readFile(this.rosterPath, 'utf-8');
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
  }

  async history(): Promise<SetupLogEntry[]> {
    return this.guard.history(this.assessmentDir);
  }
}
