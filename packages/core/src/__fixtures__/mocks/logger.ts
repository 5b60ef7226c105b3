/**
 * @fileoverview Mock logger factory
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * checkCategory(category, dir, 'anki21', { logger });
 * expect(logger.warn).toHaveBeenCalledOnce();
 * ```
 */

import { vi } from 'vitest';
import type { IBuilderLogger } from '../../logging/types.js';

export function createMockLogger() {
  const logger = {
    trace: vi.fn<IBuilderLogger['trace']>(),
    debug: vi.fn<IBuilderLogger['debug']>(),
    info: vi.fn<IBuilderLogger['info']>(),
    warn: vi.fn<IBuilderLogger['warn']>(),
    error: vi.fn<IBuilderLogger['error']>(),
    fatal: vi.fn<IBuilderLogger['fatal']>(),
    child: vi.fn<IBuilderLogger['child']>(),
    startTimer: vi.fn<IBuilderLogger['startTimer']>(() => () => undefined),
  };
  // Children share the parent's spies so assertions see every call
  logger.child.mockReturnValue(logger);
  return logger;
}

export type MockLogger = ReturnType<typeof createMockLogger>;
