/**
 * @fileoverview Tests for relative path formatting
 */

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { relpath } from '../paths.js';

describe('relpath', () => {
  it('expresses paths relative to the given base', () => {
    const base = path.resolve('/project');

    expect(relpath(path.join(base, 'designer', 'main.ui'), base)).toBe(path.join('designer', 'main.ui'));
  });

  it('walks up for paths outside the base', () => {
    const base = path.resolve('/project/build');

    expect(relpath(path.resolve('/project/designer'), base)).toBe(path.join('..', 'designer'));
  });

  it('returns a dot for the base itself', () => {
    expect(relpath(process.cwd())).toBe('.');
  });
});
