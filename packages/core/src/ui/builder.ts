/**
 * @fileoverview UI Builder
 *
 * Compiles Qt Designer forms (`designer/*.ui`) and Qt resource collections
 * (`resources/*.qrc`) into Python modules under
 * `src/<module_name>/gui/{forms,resources}/<target>/`, each directory
 * topped with a generated `__init__.py`.
 *
 * @example
 * ```typescript
 * const builder = new UIBuilder({ config: loadAddonConfig(), root: PATH_ROOT });
 * builder.build('anki21');
 * ```
 */

import * as path from 'path';
import { PATH_DIST } from '../constants.js';
import { createLogger } from '../logging/logger.js';
import type { IBuilderLogger } from '../logging/types.js';
import type { AddonConfig } from '../settings/types.js';
import { relpath } from '../utils/paths.js';
import type { ShellInvoker } from '../utils/shell.js';
import { ARTIFACT_CATEGORIES, DEFAULT_TARGET, parseTarget } from './categories.js';
import { compileAll } from './compile.js';
import { checkCategory, type ExecutableLocator } from './discovery.js';
import { buildFormatContext } from './format.js';
import { writeInitFile } from './init-file.js';
import { resetOutputDir } from './output-dir.js';
import type {
  ArtifactCategory,
  BuildSummary,
  CategoryId,
  CategoryPaths,
  CategoryResult,
  FormatContext,
  TargetPlatform,
} from './types.js';

export interface UIBuilderOptions {
  config: AddonConfig;
  /** Tree containing designer/, resources/ and src/ (default: PATH_DIST) */
  root?: string;
  logger?: IBuilderLogger;
  /** Clock used for the copyright range */
  now?: Date;
  shell?: ShellInvoker;
  which?: ExecutableLocator;
}

export class UIBuilder {
  readonly root: string;
  readonly paths: Readonly<Record<CategoryId, CategoryPaths>>;
  readonly formatContext: FormatContext;
  private readonly logger: IBuilderLogger;
  private readonly shell?: ShellInvoker;
  private readonly which?: ExecutableLocator;

  constructor(options: UIBuilderOptions) {
    this.root = path.resolve(options.root ?? PATH_DIST);
    this.logger = options.logger ?? createLogger('ui');
    this.shell = options.shell;
    this.which = options.which;

    const guiPath = path.join(this.root, 'src', options.config.module_name, 'gui');
    this.paths = {
      forms: {
        input: path.join(this.root, 'designer'),
        output: path.join(guiPath, 'forms'),
      },
      resources: {
        input: path.join(this.root, 'resources'),
        output: path.join(guiPath, 'resources'),
      },
    };
    this.formatContext = buildFormatContext(options.config, options.now);
  }

  /**
   * Build forms, then resources, for a target.
   * Categories that cannot be built are skipped with a warning; any other
   * failure aborts the whole build.
   */
  build(target: string = DEFAULT_TARGET): BuildSummary {
    const platform = parseTarget(target);
    const targetLogger = this.logger.child({ target: platform });

    targetLogger.info(`Starting UI build tasks for target '${target}'...`);
    const endTimer = targetLogger.startTimer('UI build');

    const results: CategoryResult[] = [];
    for (const category of ARTIFACT_CATEGORIES) {
      results.push(this.buildCategory(category, platform, targetLogger));
    }

    endTimer();
    targetLogger.info('Done with all UI build tasks.');

    return { target: platform, results };
  }

  private buildCategory(
    category: ArtifactCategory,
    target: TargetPlatform,
    parent: IBuilderLogger
  ): CategoryResult {
    const logger = parent.child({ category: category.id });
    const paths = this.paths[category.id];

    const check = checkCategory(category, paths.input, target, { logger, which: this.which });
    if (check.status === 'skipped') {
      return { category: category.id, status: 'skipped', reason: check.reason };
    }

    const outputDir = path.join(paths.output, target);
    logger.info(
      `Building files in '${relpath(paths.input)}' to '${relpath(outputDir)}' with '${check.tool}'`
    );

    resetOutputDir(outputDir, logger);
    const modules = compileAll(category, check.inputFiles, outputDir, check.tool, {
      logger,
      shell: this.shell,
    });
    writeInitFile(modules, outputDir, this.formatContext, logger);

    logger.debug({ modules: modules.length }, `Done with ${category.id}.`);
    return { category: category.id, status: 'built', outputDir, modules };
  }
}
