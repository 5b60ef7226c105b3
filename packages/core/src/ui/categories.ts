/**
 * @fileoverview Artifact categories and toolchain resolution
 */

import { ConfigError } from '../errors/index.js';
import { LogErrorCodes } from '../logging/error-codes.js';
import { mungeForm } from './munge.js';
import type { ArtifactCategory, TargetPlatform } from './types.js';

/** PyQt major version used for each target */
export const PYQT_VERSIONS: Readonly<Record<TargetPlatform, string>> = {
  anki21: '5',
  anki20: '4',
};

export const TARGET_PLATFORMS: readonly TargetPlatform[] = ['anki21', 'anki20'];

export const DEFAULT_TARGET: TargetPlatform = 'anki21';

const FORMS: ArtifactCategory = {
  id: 'forms',
  pattern: '*.ui',
  tool: 'pyuic',
  postBuild: (filePath: string, logger) => {
    mungeForm(filePath, logger);
  },
  suffix: '',
};

const RESOURCES: ArtifactCategory = {
  id: 'resources',
  pattern: '*.qrc',
  tool: 'pyrcc',
  postBuild: null,
  suffix: '_rc',
};

/** Categories in build order */
export const ARTIFACT_CATEGORIES: readonly ArtifactCategory[] = [FORMS, RESOURCES];

export function isTargetPlatform(value: string): value is TargetPlatform {
  return Object.hasOwn(PYQT_VERSIONS, value);
}

/**
 * Validate a target name.
 *
 * @throws ConfigError for targets without a toolchain mapping
 */
export function parseTarget(target: string): TargetPlatform {
  if (!isTargetPlatform(target)) {
    throw new ConfigError(
      `Unknown build target '${target}'. Supported targets: ${TARGET_PLATFORMS.join(', ')}`,
      {
        code: LogErrorCodes.CONFIG_UNKNOWN_TARGET,
        context: { target },
      }
    );
  }
  return target;
}

/**
 * Name of the compiler executable for a category and target,
 * e.g. `pyuic5` for forms on anki21.
 *
 * @throws ConfigError for targets without a toolchain mapping
 */
export function resolveToolName(category: ArtifactCategory, target: string): string {
  return `${category.tool}${PYQT_VERSIONS[parseTarget(target)]}`;
}
