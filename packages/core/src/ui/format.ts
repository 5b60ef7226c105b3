/**
 * @fileoverview Format context for generated file headers
 */

import { BUILDER_TITLE, BUILDER_VERSION } from '../constants.js';
import type { AddonConfig } from '../settings/types.js';
import type { FormatContext } from './types.js';

/**
 * Copyright span: "start-now" when a different start year is configured,
 * otherwise the current year alone.
 */
export function formatYears(startYear: number | null | undefined, currentYear: number): string {
  if (startYear && startYear !== currentYear) {
    return `${startYear}-${currentYear}`;
  }
  return `${currentYear}`;
}

export function buildFormatContext(config: AddonConfig, now: Date = new Date()): FormatContext {
  return Object.freeze({
    displayName: config.display_name,
    author: config.author,
    contact: config.contact,
    years: formatYears(config.copyright_start, now.getFullYear()),
    title: BUILDER_TITLE,
    version: BUILDER_VERSION,
  });
}
