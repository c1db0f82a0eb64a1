import { vi, type Mock } from 'vitest';
import type { Logger } from '../../src/infra/logger/logger.js';

type LogFn = (context: string, message: string) => void;

export type MockLogger = { [K in keyof Logger]: Mock<LogFn> };

// Mock logger that records calls
export function createMockLogger(): MockLogger {
  return {
    info: vi.fn<LogFn>(),
    debug: vi.fn<LogFn>(),
    warn: vi.fn<LogFn>(),
    error: vi.fn<LogFn>(),
  };
}

/** Messages logged at one level, without the context tag. */
export function messages(fn: Mock<LogFn>): string[] {
  return fn.mock.calls.map((call) => call[1]);
}
