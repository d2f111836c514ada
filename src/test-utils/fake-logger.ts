import { vi } from 'vitest';
import type { ContextLogger } from '../utils/logger';

export function createFakeLogger(): ContextLogger {
  const fake: ContextLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => fake),
  };
  return fake;
}
