/**
 * @fileoverview UI build type definitions
 */

import type { IBuilderLogger } from '../logging/types.js';

// =============================================================================
// Targets
// =============================================================================

/**
 * Build target. Selects the major version of the PyQt toolchain.
 */
export type TargetPlatform = 'anki21' | 'anki20';

// =============================================================================
// Artifact Categories
// =============================================================================

export type CategoryId = 'forms' | 'resources';

/**
 * Hook applied to each freshly compiled output file
 */
export type PostBuildStep = (filePath: string, logger: IBuilderLogger) => void;

export interface ArtifactCategory {
  readonly id: CategoryId;
  /** Glob matched against file names in the input directory */
  readonly pattern: string;
  /** Compiler base name; the target's version number is appended */
  readonly tool: string;
  readonly postBuild: PostBuildStep | null;
  /** Appended to the input stem to form the module name */
  readonly suffix: string;
}

// =============================================================================
// Build Context
// =============================================================================

/**
 * Values interpolated into generated file headers
 */
export interface FormatContext {
  readonly displayName: string;
  readonly author: string;
  readonly contact: string;
  /** Copyright year or range, e.g. "2024" or "2016-2019" */
  readonly years: string;
  readonly title: string;
  readonly version: string;
}

export interface CategoryPaths {
  /** Directory holding the sources to compile */
  readonly input: string;
  /** Base output directory; the target name is appended per build */
  readonly output: string;
}

// =============================================================================
// Results
// =============================================================================

export type SkipReason = 'missing-input-dir' | 'missing-tool' | 'no-inputs';

export type CategoryCheck =
  | { status: 'ready'; tool: string; inputFiles: string[] }
  | { status: 'skipped'; reason: SkipReason };

export type CategoryResult =
  | { category: CategoryId; status: 'built'; outputDir: string; modules: string[] }
  | { category: CategoryId; status: 'skipped'; reason: SkipReason };

export interface BuildSummary {
  target: TargetPlatform;
  results: CategoryResult[];
}
