/**
 * @fileoverview Temporary add-on project trees for tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AddonConfig } from '../settings/types.js';

export const TEST_CONFIG: AddonConfig = {
  display_name: 'Sample Add-on',
  module_name: 'sample_addon',
  author: 'Test Author',
  contact: 'author@example.com',
  copyright_start: 2016,
};

export function createTempDir(prefix = 'addon-builder-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files relative to `root`, creating parent directories
 */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
  }
}

/**
 * Install an executable shell script named `name` in `binDir`.
 * `body` runs with the compiler arguments; `$out` holds the value of `-o`.
 */
export function writeStubTool(binDir: string, name: string, body: string): string {
  fs.mkdirSync(binDir, { recursive: true });
  const toolPath = path.join(binDir, name);
  const script = [
    '#!/bin/sh',
    'out=""',
    'while [ "$#" -gt 0 ]; do',
    '  if [ "$1" = "-o" ]; then',
    '    out="$2"',
    '    shift',
    '  fi',
    '  shift',
    'done',
    body,
    '',
  ].join('\n');
  fs.writeFileSync(toolPath, script, 'utf-8');
  fs.chmodSync(toolPath, 0o755);
  return toolPath;
}
