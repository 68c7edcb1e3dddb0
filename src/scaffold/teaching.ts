import { PreconditionError } from '../errors.js';
import { assertFolderName } from '../validation/path-safety.js';

/** Teaching weeks in a standard semester */
export const DEFAULT_TEACHING_WEEKS = 13;

/**
 * Folder names for the weekly teaching material.
 *
 * Produces `Week 1` .. `Week {weeks}`, or `Week {i} - {topic}` when a topic
 * list is supplied. An empty topic list means no topics.
 *
 * @throws {PreconditionError} if `weeks` is not a positive whole number, if
 *   the topic count differs from `weeks`, or if a topic is not usable in a
 *   folder name
 *
 * @example
 * teachingFolderNames(2, ['Introduction', 'Sets'])
 * // => ['Week 1 - Introduction', 'Week 2 - Sets']
 */
export function teachingFolderNames(
  weeks: number = DEFAULT_TEACHING_WEEKS,
  topics: readonly string[] = [],
): string[] {
  if (!Number.isInteger(weeks) || weeks <= 0) {
    throw new PreconditionError(`The number of weeks must be a whole number greater than 0 (got ${weeks})`);
  }

  if (topics.length > 0 && topics.length !== weeks) {
    throw new PreconditionError(
      `The number of topics (${topics.length}) must equal the number of weeks (${weeks})`,
    );
  }

  const names: string[] = [];
  for (let week = 1; week <= weeks; week++) {
    if (topics.length > 0) {
      const topic = topics[week - 1].trim();
      assertFolderName(topic, `topic for week ${week}`);
      names.push(`Week ${week} - ${topic}`);
    } else {
      names.push(`Week ${week}`);
    }
  }
  return names;
}
