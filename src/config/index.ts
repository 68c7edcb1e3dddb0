export { CourseKitConfigSchema, LayoutSchema, DEFAULT_LAYOUT } from './schema.js';
export type { CourseKitConfig, CourseLayout } from './schema.js';
export { readConfig, validateConfig, DEFAULT_CONFIG_PATH } from './reader.js';
