/**
 * Course entities barrel exports.
 *
 * - CourseUnit and Assessment, both Structurable
 * - CourseWorkspace to build them from a loaded config
 */

export { CourseUnit } from './course-unit.js';
export type {
  CourseUnitOptions,
  TeachingStructureOptions,
  ConfirmOverwrite,
  CopyDocumentsOptions,
  CopyDocumentsResult,
} from './course-unit.js';

export { Assessment } from './assessment.js';
export type { AssessmentOptions } from './assessment.js';

export { CourseWorkspace } from './workspace.js';
export type { CourseWorkspaceOptions } from './workspace.js';
