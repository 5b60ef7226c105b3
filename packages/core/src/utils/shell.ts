/**
 * @fileoverview Shell helpers
 *
 * Blocking process invocation and executable lookup. Builds are strictly
 * sequential, so everything here is synchronous.
 */

import { execSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { ShellError } from '../errors/index.js';
import type { IBuilderLogger } from '../logging/types.js';

export interface CallShellOptions {
  logger?: IBuilderLogger;
}

/**
 * Signature of the shell invoker, so callers can substitute a fake
 */
export type ShellInvoker = (command: string, options?: CallShellOptions) => string;

const SHELL_SAFE = /^[A-Za-z0-9_\-.,\/:@%+=]+$/;

/**
 * Quote one argument for the command line given to `callShell`.
 * Arguments made only of safe characters are returned unchanged.
 */
export function quoteShellArg(arg: string, platform: NodeJS.Platform = process.platform): string {
  if (SHELL_SAFE.test(arg)) {
    return arg;
  }
  if (platform === 'win32') {
    return `"${arg.replace(/"/g, '""')}"`;
  }
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Run a command through the system shell and wait for it to exit.
 *
 * @returns Captured stdout
 * @throws ShellError if the command cannot be started or exits non-zero
 */
export function callShell(command: string, options: CallShellOptions = {}): string {
  options.logger?.trace({ command }, 'Running shell command');

  let stdout: string;
  try {
    stdout = execSync(command, {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const exitCode = readExitStatus(cause);
    const stderr = readStderr(cause);
    const reason = exitCode === null ? 'could not be run' : `exited with status ${exitCode}`;
    throw new ShellError(`Command '${command}' ${reason}${stderr ? `: ${stderr}` : ''}`, {
      command,
      exitCode,
      stderr,
      cause,
    });
  }

  const output = stdout.trim();
  if (output) {
    options.logger?.debug({ command, output }, 'Command output');
  }
  return stdout;
}

function readExitStatus(error: Error): number | null {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

function readStderr(error: Error): string {
  if (!('stderr' in error)) {
    return '';
  }
  const value = error.stderr;
  if (typeof value === 'string') {
    return value.trim();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8').trim();
  }
  return '';
}

/**
 * Locate an executable on the search path.
 *
 * @param searchPath - Defaults to the PATH environment variable
 * @returns Absolute path of the first match, or null
 */
export function which(
  name: string,
  searchPath: string | undefined = process.env.PATH,
  platform: NodeJS.Platform = process.platform
): string | null {
  if (!searchPath) {
    return null;
  }

  const extensions = platform === 'win32'
    ? ['', ...(process.env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
    : [''];
  const delimiter = platform === 'win32' ? ';' : ':';

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      if (isExecutableFile(candidate, platform)) {
        return path.resolve(candidate);
      }
    }
  }
  return null;
}

function isExecutableFile(filePath: string, platform: NodeJS.Platform): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return false;
    }
    if (platform !== 'win32') {
      fs.accessSync(filePath, fs.constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}
