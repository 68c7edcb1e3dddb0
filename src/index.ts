// Errors
export {
  CourseKitError,
  AlreadyCompletedError,
  DirectoryExistsError,
  PreconditionError,
  ConfigError,
} from './errors.js';
export type { CourseKitErrorCode } from './errors.js';

// Types
export {
  TERMS,
  OVERWRITE_POLICIES,
  OPERATIONS,
  TermSchema,
  CourseUnitInfoSchema,
  AssessmentInfoSchema,
  parseCourseUnitInfo,
  parseAssessmentInfo,
} from './types/course.js';
export type {
  Term,
  OverwritePolicy,
  OperationName,
  CourseUnitInfo,
  AssessmentInfo,
  Structurable,
} from './types/course.js';

// Setup log and guard
export { SetupLog, SetupGuard, formatEntry, parseEntry, DEFAULT_LOG_FILE } from './setup-log/index.js';
export type { SetupLogEntry, SetupGuardOptions, Clock } from './setup-log/index.js';

// Scaffolding
export { scaffold, scaffoldInto, teachingFolderNames, DEFAULT_TEACHING_WEEKS } from './scaffold/index.js';
export type { ScaffoldResult } from './scaffold/index.js';

// Course entities
export { CourseUnit, Assessment, CourseWorkspace } from './course/index.js';
export type {
  CourseUnitOptions,
  TeachingStructureOptions,
  ConfirmOverwrite,
  CopyDocumentsOptions,
  CopyDocumentsResult,
  AssessmentOptions,
  CourseWorkspaceOptions,
} from './course/index.js';

// Config
export {
  CourseKitConfigSchema,
  LayoutSchema,
  DEFAULT_LAYOUT,
  readConfig,
  validateConfig,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';
export type { CourseKitConfig, CourseLayout } from './config/index.js';
