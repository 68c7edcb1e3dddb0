import { readConfig } from '../config/reader.js';
import { CourseWorkspace } from '../course/workspace.js';
import { configPathFrom } from './args.js';

/**
 * Load the config named by --config (or the default) and build a workspace.
 */
export async function loadWorkspace(args: string[]): Promise<CourseWorkspace> {
  const config = await readConfig(configPathFrom(args));
  return new CourseWorkspace(config);
}
