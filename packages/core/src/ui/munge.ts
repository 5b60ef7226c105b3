/**
 * @fileoverview Form munging
 *
 * pyuic output imports the resource module referenced by the form
 * (`import icons_rc`). Resources are initialized manually by the add-on,
 * so those imports are stripped from every compiled form.
 */

import * as fs from 'fs';
import { FileSystemError } from '../errors/index.js';
import type { IBuilderLogger } from '../logging/types.js';
import { relpath } from '../utils/paths.js';

const RESOURCE_IMPORT = /^import .+?_rc(\n)?$/gm;

/**
 * Remove resource imports from the text of a compiled form
 */
export function stripResourceImports(source: string): string {
  return source.replace(RESOURCE_IMPORT, '');
}

/**
 * Munge a compiled form in place.
 *
 * @returns Whether the file was modified
 */
export function mungeForm(filePath: string, logger?: IBuilderLogger): boolean {
  logger?.debug(`Munging ${relpath(filePath)}...`);

  let form: string;
  try {
    form = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to read compiled form ${filePath}`, {
      path: filePath,
      operation: 'read',
      cause: error,
    });
  }

  const munged = stripResourceImports(form);
  if (munged === form) {
    return false;
  }

  try {
    fs.writeFileSync(filePath, munged, 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to write munged form ${filePath}`, {
      path: filePath,
      operation: 'write',
      cause: error,
    });
  }
  return true;
}
