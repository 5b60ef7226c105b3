/**
 * @fileoverview Add-on configuration schema
 *
 * Shape of the project's addon.json. Only the keys the builder reads are
 * validated; other packaging metadata is passed through untouched.
 */

import { z } from 'zod';

const PYTHON_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const AddonConfigSchema = z
  .object({
    /** Name shown to users, e.g. in generated file headers */
    display_name: z.string().min(1),
    /** Python package name under src/ */
    module_name: z.string().regex(PYTHON_IDENTIFIER, 'must be a valid Python identifier'),
    author: z.string().min(1),
    contact: z.string().min(1),
    /** First year of the copyright range; null or absent means unset */
    copyright_start: z.number().int().min(1900).max(9999).nullish(),
    repo_name: z.string().optional(),
    homepage: z.string().optional(),
  })
  .passthrough();

export type AddonConfig = z.infer<typeof AddonConfigSchema>;
