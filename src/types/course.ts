import { z } from 'zod';
import { PreconditionError } from '../errors.js';
import type { ScaffoldResult } from '../scaffold/scaffold.js';

/**
 * Teaching terms a course unit can run in.
 * - AUT: autumn semester
 * - SPR: spring semester
 * - SUM: summer school
 */
export const TERMS = ['AUT', 'SPR', 'SUM'] as const;

export const TermSchema = z.enum(TERMS);

export type Term = z.infer<typeof TermSchema>;

/**
 * How document transfer treats names that already exist in the destination.
 * - always-confirm: ask before overwriting on any collision
 * - confirm-after-first-run: overwrite silently until `copy-documents` has
 *   been recorded once, then ask
 */
export const OVERWRITE_POLICIES = ['always-confirm', 'confirm-after-first-run'] as const;

export type OverwritePolicy = (typeof OVERWRITE_POLICIES)[number];

/** Names of the operations the setup log records. */
export const OPERATIONS = {
  structure: 'structure',
  teachingStructure: 'teaching-structure',
  copyDocuments: 'copy-documents',
  gradersList: 'graders-list',
} as const;

export type OperationName = (typeof OPERATIONS)[keyof typeof OPERATIONS];

export const CourseUnitInfoSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  code: z.string().trim().min(1, 'code is required'),
  /** Academic year as written on the timetable, e.g. "2024-25" */
  year: z.string().trim().min(1, 'year is required'),
  term: TermSchema,
  owner: z.string().trim().min(1, 'owner is required'),
});

export type CourseUnitInfo = z.infer<typeof CourseUnitInfoSchema>;

export const AssessmentInfoSchema = z.object({
  /** Code of the course unit this assessment belongs to */
  unitCode: z.string().trim().min(1, 'unitCode is required'),
  kind: z.string().trim().min(1, 'kind is required'),
  name: z.string().trim().min(1, 'name is required'),
  dueDate: z.string().date('dueDate must be a YYYY-MM-DD date'),
  /** Percentage of the unit grade */
  weight: z.number().min(0).max(100),
  year: z.string().trim().min(1, 'year is required'),
});

export type AssessmentInfo = z.infer<typeof AssessmentInfoSchema>;

/**
 * Capability shared by course units and assessments: an entity that owns a
 * directory tree it can create once and later re-attach to.
 */
export interface Structurable {
  /** Current root; narrows to the entity's own directory once structured */
  readonly root: string;
  readonly isStructured: boolean;
  structure(): Promise<ScaffoldResult>;
  resume(): Promise<void>;
  describe(): string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate course unit metadata.
 *
 * @throws {PreconditionError} listing every failing field
 */
export function parseCourseUnitInfo(raw: unknown): CourseUnitInfo {
  const result = CourseUnitInfoSchema.safeParse(raw);
  if (!result.success) {
    throw new PreconditionError(`Invalid course unit: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate assessment metadata.
 *
 * @throws {PreconditionError} listing every failing field
 */
export function parseAssessmentInfo(raw: unknown): AssessmentInfo {
  const result = AssessmentInfoSchema.safeParse(raw);
  if (!result.success) {
    throw new PreconditionError(`Invalid assessment: ${formatIssues(result.error)}`);
  }
  return result.data;
}
