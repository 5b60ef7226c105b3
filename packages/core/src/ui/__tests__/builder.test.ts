/**
 * @fileoverview Tests for the UI build orchestrator
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { UIBuilder } from '../builder.js';
import { renderInitFile } from '../init-file.js';
import { buildFormatContext } from '../format.js';
import { PATH_DIST } from '../../constants.js';
import { ConfigError, ShellError } from '../../errors/index.js';
import type { ShellInvoker } from '../../utils/shell.js';
import type { ExecutableLocator } from '../discovery.js';
import {
  TEST_CONFIG,
  createMockLogger,
  createTempDir,
  removeTempDir,
  writeFiles,
  type MockLogger,
} from '../../__fixtures__/index.js';

const NOW = new Date(2019, 0, 15);

/**
 * Shell stand-in that writes a stub module to the path following `-o`
 */
function fakeCompiler() {
  return vi.fn<ShellInvoker>((command) => {
    const parts = command.split(' ');
    const output = parts[parts.indexOf('-o') + 1];
    if (output === undefined) throw new Error(`no output in '${command}'`);
    fs.writeFileSync(path.resolve(output), `# ${parts[0]}\nimport icons_rc\n`, 'utf-8');
    return '';
  });
}

const installed = (name: string) => `/usr/bin/${name}`;

describe('UIBuilder', () => {
  let root: string;
  let logger: MockLogger;
  let formsOut: string;
  let resourcesOut: string;

  beforeEach(() => {
    root = createTempDir();
    logger = createMockLogger();
    formsOut = path.join(root, 'src', 'sample_addon', 'gui', 'forms');
    resourcesOut = path.join(root, 'src', 'sample_addon', 'gui', 'resources');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  function createBuilder(shell: ShellInvoker = fakeCompiler(), which: ExecutableLocator = installed): UIBuilder {
    return new UIBuilder({ config: TEST_CONFIG, root, logger, now: NOW, shell, which });
  }

  describe('constructor', () => {
    it('derives input and output paths from the root and module name', () => {
      const builder = createBuilder();

      expect(builder.paths).toEqual({
        forms: { input: path.join(root, 'designer'), output: formsOut },
        resources: { input: path.join(root, 'resources'), output: resourcesOut },
      });
    });

    it('defaults to the distribution tree', () => {
      const builder = new UIBuilder({ config: TEST_CONFIG, logger });

      expect(builder.root).toBe(PATH_DIST);
    });

    it('computes the format context once', () => {
      expect(createBuilder().formatContext.years).toBe('2016-2019');
    });
  });

  describe('build', () => {
    it('compiles forms and resources into target directories', () => {
      writeFiles(root, {
        'designer/main.ui': '<ui/>',
        'designer/about.ui': '<ui/>',
        'resources/icons.qrc': '<RCC/>',
      });

      const summary = createBuilder().build('anki21');

      expect(summary).toEqual({
        target: 'anki21',
        results: [
          { category: 'forms', status: 'built', outputDir: path.join(formsOut, 'anki21'), modules: ['about', 'main'] },
          { category: 'resources', status: 'built', outputDir: path.join(resourcesOut, 'anki21'), modules: ['icons_rc'] },
        ],
      });
      expect(fs.readdirSync(path.join(formsOut, 'anki21')).sort()).toEqual(['__init__.py', 'about.py', 'main.py']);
      expect(fs.readdirSync(path.join(resourcesOut, 'anki21')).sort()).toEqual(['__init__.py', 'icons_rc.py']);
    });

    it('writes aggregators listing modules in discovery order', () => {
      writeFiles(root, { 'designer/main.ui': '<ui/>', 'designer/about.ui': '<ui/>' });

      createBuilder().build('anki21');

      const init = fs.readFileSync(path.join(formsOut, 'anki21', '__init__.py'), 'utf-8');
      expect(init).toBe(renderInitFile(['about', 'main'], buildFormatContext(TEST_CONFIG, NOW)));
      expect(init).toContain('__all__ = [\n    "about",\n    "main"\n]');
      expect(init).toContain('from . import about\nfrom . import main\n');
    });

    it('munges forms but not resources', () => {
      writeFiles(root, { 'designer/main.ui': '<ui/>', 'resources/icons.qrc': '<RCC/>' });

      createBuilder().build('anki21');

      expect(fs.readFileSync(path.join(formsOut, 'anki21', 'main.py'), 'utf-8')).toBe('# pyuic5\n');
      expect(fs.readFileSync(path.join(resourcesOut, 'anki21', 'icons_rc.py'), 'utf-8')).toBe(
        '# pyrcc5\nimport icons_rc\n'
      );
    });

    it('uses the PyQt4 toolchain and directory for anki20', () => {
      writeFiles(root, { 'designer/main.ui': '<ui/>' });
      const shell = fakeCompiler();

      createBuilder(shell).build('anki20');

      expect(shell.mock.calls[0]?.[0]).toMatch(/^pyuic4 /);
      expect(fs.existsSync(path.join(formsOut, 'anki20', 'main.py'))).toBe(true);
    });

    it('replaces stale output of a category that builds', () => {
      writeFiles(root, {
        'designer/main.ui': '<ui/>',
        'src/sample_addon/gui/forms/anki21/removed.py': 'stale',
      });

      createBuilder().build('anki21');

      expect(fs.readdirSync(path.join(formsOut, 'anki21')).sort()).toEqual(['__init__.py', 'main.py']);
    });

    it('skips categories whose tool is missing and keeps their old output', () => {
      writeFiles(root, {
        'designer/main.ui': '<ui/>',
        'src/sample_addon/gui/forms/anki21/old.py': 'previous build',
      });
      const shell = fakeCompiler();

      const summary = createBuilder(shell, () => null).build('anki21');

      expect(summary.results).toEqual([
        { category: 'forms', status: 'skipped', reason: 'missing-tool' },
        { category: 'resources', status: 'skipped', reason: 'missing-input-dir' },
      ]);
      expect(shell).not.toHaveBeenCalled();
      expect(fs.readdirSync(path.join(formsOut, 'anki21'))).toEqual(['old.py']);
      expect(fs.readFileSync(path.join(formsOut, 'anki21', 'old.py'), 'utf-8')).toBe('previous build');
    });

    it('skips a category without an input directory and builds the other', () => {
      writeFiles(root, { 'resources/icons.qrc': '<RCC/>' });

      const summary = createBuilder().build('anki21');

      expect(summary.results).toEqual([
        { category: 'forms', status: 'skipped', reason: 'missing-input-dir' },
        { category: 'resources', status: 'built', outputDir: path.join(resourcesOut, 'anki21'), modules: ['icons_rc'] },
      ]);
      expect(fs.existsSync(formsOut)).toBe(false);
    });

    it('is idempotent for unchanged inputs', () => {
      writeFiles(root, { 'designer/main.ui': '<ui/>', 'designer/prefs.ui': '<ui/>' });
      const builder = createBuilder();
      const initPath = path.join(formsOut, 'anki21', '__init__.py');

      builder.build('anki21');
      const first = fs.readFileSync(initPath, 'utf-8');
      builder.build('anki21');

      expect(fs.readFileSync(initPath, 'utf-8')).toBe(first);
    });

    it('rejects unknown targets before touching anything', () => {
      writeFiles(root, { 'designer/main.ui': '<ui/>' });
      const shell = fakeCompiler();

      expect(() => createBuilder(shell).build('anki22')).toThrow(ConfigError);
      expect(shell).not.toHaveBeenCalled();
      expect(logger.info).not.toHaveBeenCalled();
      expect(fs.existsSync(path.join(root, 'src'))).toBe(false);
    });

    it('aborts the whole build when a compiler fails', () => {
      writeFiles(root, { 'designer/main.ui': '<ui/>', 'resources/icons.qrc': '<RCC/>' });
      const shell = vi.fn<ShellInvoker>((command) => {
        throw new ShellError('failed', { command, exitCode: 1 });
      });

      expect(() => createBuilder(shell).build('anki21')).toThrow(ShellError);
      expect(shell).toHaveBeenCalledTimes(1);
      expect(fs.existsSync(path.join(formsOut, 'anki21', '__init__.py'))).toBe(false);
      expect(fs.existsSync(resourcesOut)).toBe(false);
    });

    it('logs the start and end of a pass', () => {
      createBuilder().build('anki21');

      expect(logger.info).toHaveBeenCalledWith("Starting UI build tasks for target 'anki21'...");
      expect(logger.info).toHaveBeenLastCalledWith('Done with all UI build tasks.');
    });

    it('defaults to the anki21 target', () => {
      expect(createBuilder().build().target).toBe('anki21');
    });
  });
});
