/**
 * Entry point from a loaded config to the course entities.
 *
 * One SetupGuard is shared by every unit and assessment the workspace
 * hands out.
 */

import { PreconditionError } from '../errors.js';
import type { CourseKitConfig } from '../config/schema.js';
import { SetupGuard } from '../setup-log/setup-guard.js';
import type { Clock } from '../setup-log/setup-guard.js';
import type { AssessmentInfo, CourseUnitInfo } from '../types/course.js';
import { CourseUnit } from './course-unit.js';
import type { Assessment } from './assessment.js';

export interface CourseWorkspaceOptions {
  clock?: Clock;
}

export class CourseWorkspace {
  readonly config: CourseKitConfig;
  readonly guard: SetupGuard;

  constructor(config: CourseKitConfig, options: CourseWorkspaceOptions = {}) {
    this.config = config;
    this.guard = new SetupGuard({ logFile: config.logFile, clock: options.clock });
  }

  unitInfo(code: string): CourseUnitInfo {
    const info = this.config.units.find((unit) => unit.code === code);
    if (!info) {
      const known = this.config.units.map((unit) => unit.code).join(', ') || '(none)';
      throw new PreconditionError(`Unknown course unit "${code}". Configured units: ${known}`);
    }
    return info;
  }

  assessmentInfo(unitCode: string, name: string): AssessmentInfo {
    const info = this.config.assessments.find(
      (assessment) => assessment.unitCode === unitCode && assessment.name === name,
    );
    if (!info) {
      throw new PreconditionError(`Unknown assessment "${name}" for unit ${unitCode}`);
    }
    return info;
  }

  /** A fresh, unstructured unit rooted at the configured base directory */
  unit(code: string): CourseUnit {
    return new CourseUnit(this.unitInfo(code), {
      baseDir: this.config.root,
      guard: this.guard,
      layout: this.config.layout,
      overwritePolicy: this.config.documents.overwrite,
    });
  }

  /** A unit attached to its existing tree */
  async openUnit(code: string): Promise<CourseUnit> {
    const unit = this.unit(code);
    await unit.resume();
    return unit;
  }

  /** An assessment of an existing unit; not yet structured */
  async assessment(unitCode: string, name: string): Promise<Assessment> {
    const info = this.assessmentInfo(unitCode, name);
    const unit = await this.openUnit(unitCode);
    return unit.assessment(info);
  }

  /** An assessment attached to its existing tree */
  async openAssessment(unitCode: string, name: string): Promise<Assessment> {
    const assessment = await this.assessment(unitCode, name);
    await assessment.resume();
    return assessment;
  }
}
