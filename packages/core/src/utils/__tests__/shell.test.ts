/**
 * @fileoverview Tests for shell invocation and executable lookup
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { callShell, quoteShellArg, which } from '../shell.js';
import { ShellError } from '../../errors/index.js';
import { LogErrorCodes } from '../../logging/error-codes.js';
import {
  createMockLogger,
  createTempDir,
  removeTempDir,
  writeFiles,
  writeStubTool,
} from '../../__fixtures__/index.js';

describe('shell helpers', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe('callShell', () => {
    it('returns stdout of a successful command', () => {
      expect(callShell('echo hello')).toBe('hello\n');
    });

    it('logs command output at debug level', () => {
      const logger = createMockLogger();

      callShell('echo hello', { logger });

      expect(logger.debug).toHaveBeenCalledWith({ command: 'echo hello', output: 'hello' }, 'Command output');
    });

    it('throws ShellError with exit status and stderr on failure', () => {
      const command = 'echo broken >&2; exit 3';

      try {
        callShell(command);
        expect.fail('expected ShellError');
      } catch (error) {
        expect(error).toBeInstanceOf(ShellError);
        if (error instanceof ShellError) {
          expect(error.exitCode).toBe(3);
          expect(error.stderr).toBe('broken');
          expect(error.code).toBe(LogErrorCodes.TOOL_EXIT);
          expect(error.message).toBe(`Command '${command}' exited with status 3: broken`);
        }
      }
    });
  });

  describe('quoteShellArg', () => {
    it('leaves plain paths unchanged', () => {
      expect(quoteShellArg('../designer/main_window-2.ui')).toBe('../designer/main_window-2.ui');
    });

    it('single-quotes arguments with spaces or shell characters', () => {
      expect(quoteShellArg('main window.ui', 'linux')).toBe("'main window.ui'");
      expect(quoteShellArg('$(touch x);.ui', 'linux')).toBe("'$(touch x);.ui'");
      expect(quoteShellArg('', 'linux')).toBe("''");
    });

    it('escapes embedded single quotes', () => {
      expect(quoteShellArg("it's.ui", 'linux')).toBe("'it'\\''s.ui'");
    });

    it('double-quotes on Windows', () => {
      expect(quoteShellArg('main window.ui', 'win32')).toBe('"main window.ui"');
      expect(quoteShellArg('say "hi".ui', 'win32')).toBe('"say ""hi"".ui"');
    });

    it('passes the argument through the shell verbatim', () => {
      const arg = "a  b; echo 'x' $HOME";

      expect(callShell(`printf '%s' ${quoteShellArg(arg)}`)).toBe(arg);
    });
  });

  describe('which', () => {
    it('finds executables on the search path', () => {
      const toolPath = writeStubTool(path.join(dir, 'bin'), 'pyuic5', 'exit 0');

      expect(which('pyuic5', path.join(dir, 'bin'))).toBe(toolPath);
    });

    it('searches directories in order', () => {
      const first = writeStubTool(path.join(dir, 'a'), 'pyrcc5', 'exit 0');
      writeStubTool(path.join(dir, 'b'), 'pyrcc5', 'exit 0');

      expect(which('pyrcc5', `${path.join(dir, 'a')}:${path.join(dir, 'b')}`)).toBe(first);
    });

    it('ignores files without the executable bit', () => {
      writeFiles(dir, { 'bin/pyuic4': 'not a program' });

      expect(which('pyuic4', path.join(dir, 'bin'))).toBeNull();
    });

    it('returns null when nothing matches or the path is empty', () => {
      expect(which('pyuic5', path.join(dir, 'missing'))).toBeNull();
      expect(which('pyuic5', '')).toBeNull();
    });
  });
});
