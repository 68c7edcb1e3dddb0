export { scaffold, scaffoldInto } from './scaffold.js';
export type { ScaffoldResult } from './scaffold.js';
export { teachingFolderNames, DEFAULT_TEACHING_WEEKS } from './teaching.js';
