import { vi } from 'vitest';
import type { Logger } from '../observability/index.js';

/**
 * Logger whose methods are spies.
 */
export function recordingLogger() {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  } satisfies Logger;
}
