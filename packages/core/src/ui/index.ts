/**
 * @fileoverview UI build exports
 */

export { UIBuilder, type UIBuilderOptions } from './builder.js';

export {
  ARTIFACT_CATEGORIES,
  DEFAULT_TARGET,
  PYQT_VERSIONS,
  TARGET_PLATFORMS,
  isTargetPlatform,
  parseTarget,
  resolveToolName,
} from './categories.js';

export { checkCategory, type CheckCategoryOptions, type ExecutableLocator } from './discovery.js';
export { resetOutputDir } from './output-dir.js';
export {
  OUTPUT_EXTENSION,
  buildCompileCommand,
  compileAll,
  moduleNameFor,
  type CompileOptions,
} from './compile.js';
export { mungeForm, stripResourceImports } from './munge.js';
export { buildFormatContext, formatYears } from './format.js';
export {
  INIT_FILE,
  renderAllList,
  renderHeader,
  renderImports,
  renderInitFile,
  writeInitFile,
} from './init-file.js';

export type {
  ArtifactCategory,
  BuildSummary,
  CategoryCheck,
  CategoryId,
  CategoryPaths,
  CategoryResult,
  FormatContext,
  PostBuildStep,
  SkipReason,
  TargetPlatform,
} from './types.js';
