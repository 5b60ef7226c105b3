/**
 * @fileoverview Program identity and default locations
 */

import * as path from 'path';

/** Human-readable program name stamped into generated files */
export const BUILDER_TITLE = 'Add-on Builder';

export const BUILDER_VERSION = '1.0.0';

/** Executable name used in help and error output */
export const BUILDER_COMMAND = 'addon-builder';

/** Project root: the directory the builder is invoked from */
export const PATH_ROOT = process.cwd();

/** Distribution tree assembled for packaging */
export const PATH_DIST = path.join(PATH_ROOT, 'build', 'dist');
