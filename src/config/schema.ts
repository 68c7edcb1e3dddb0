/**
 * Zod schema for the coursekit configuration file.
 *
 * Only `root` is required. Every other field has a `.default()` so a
 * minimal `{ "root": "..." }` parses into a fully populated config.
 *
 * Cross-record checks run in a `superRefine`: unit codes are unique, every
 * assessment names a declared unit, assessment names are unique per unit
 * and a unit's assessment weights add up to at most 100.
 *
 * @module config/schema
 */

import { z } from 'zod';
import {
  AssessmentInfoSchema,
  CourseUnitInfoSchema,
  OVERWRITE_POLICIES,
} from '../types/course.js';
import { DEFAULT_LOG_FILE } from '../setup-log/setup-log.js';
import { DEFAULT_TEACHING_WEEKS } from '../scaffold/teaching.js';
import { validateFolderName } from '../validation/path-safety.js';

const FolderNameSchema = z.string().superRefine((value, ctx) => {
  const result = validateFolderName(value);
  if (!result.valid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error ?? 'Invalid folder name' });
  }
});

// ============================================================================
// Layout
// ============================================================================

/**
 * Folder names used when scaffolding. The teaching and documents folders
 * must be among the unit folders so later steps find them.
 */
export const LayoutSchema = z
  .object({
    unitFolders: z
      .array(FolderNameSchema)
      .min(1)
      .default(['Teaching Material', 'Assessment', 'Module Documents']),
    teachingFolder: FolderNameSchema.default('Teaching Material'),
    documentsFolder: FolderNameSchema.default('Module Documents'),
    assessmentFolder: FolderNameSchema.default('Assessment'),
    assessmentFolders: z.array(FolderNameSchema).default(['Assessment Documents and Templates']),
    rosterFile: FolderNameSchema.default('Graders List.txt'),
  })
  .superRefine((layout, ctx) => {
    for (const key of ['teachingFolder', 'documentsFolder'] as const) {
      if (!layout.unitFolders.includes(layout[key])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `"${layout[key]}" must be one of unitFolders`,
        });
      }
    }
  });

export type CourseLayout = z.infer<typeof LayoutSchema>;

export const DEFAULT_LAYOUT: CourseLayout = LayoutSchema.parse({});

// ============================================================================
// Composite config
// ============================================================================

export const CourseKitConfigSchema = z
  .object({
    /** Base directory the unit trees are created in */
    root: z.string().min(1, 'root is required'),
    logFile: FolderNameSchema.default(DEFAULT_LOG_FILE),
    layout: LayoutSchema.default({}),
    teaching: z
      .object({
        weeks: z.number().int().min(1).default(DEFAULT_TEACHING_WEEKS),
      })
      .default({}),
    documents: z
      .object({
        overwrite: z.enum(OVERWRITE_POLICIES).default('always-confirm'),
      })
      .default({}),
    units: z.array(CourseUnitInfoSchema).default([]),
    assessments: z.array(AssessmentInfoSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const codes = new Set<string>();
    config.units.forEach((unit, index) => {
      if (codes.has(unit.code)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['units', index, 'code'],
          message: `Duplicate unit code "${unit.code}"`,
        });
      }
      codes.add(unit.code);
    });

    const names = new Set<string>();
    const weights = new Map<string, number>();
    config.assessments.forEach((assessment, index) => {
      if (!codes.has(assessment.unitCode)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['assessments', index, 'unitCode'],
          message: `Unknown unit "${assessment.unitCode}"`,
        });
        return;
      }

      const key = `${assessment.unitCode}\0${assessment.name}`;
      if (names.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['assessments', index, 'name'],
          message: `Duplicate assessment "${assessment.name}" for unit ${assessment.unitCode}`,
        });
      }
      names.add(key);

      const total = (weights.get(assessment.unitCode) ?? 0) + assessment.weight;
      weights.set(assessment.unitCode, total);
      // Tolerance for fractional weights such as 33.3 + 33.3 + 33.4
      if (total > 100 + 1e-9) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['assessments', index, 'weight'],
          message: `Assessment weights for unit ${assessment.unitCode} exceed 100% (${total}%)`,
        });
      }
    });
  });

export type CourseKitConfig = z.infer<typeof CourseKitConfigSchema>;
