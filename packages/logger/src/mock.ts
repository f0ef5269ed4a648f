/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = Logger['info'];

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => Logger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@lumen/logger/mock';
 *
 * const logger = createMockLogger();
 * runFile('script.lum', { logger, ... });
 *
 * expect(logger.debug).toHaveBeenCalledWith('scan_completed', {
 *   tokens: 4,
 *   diagnostics: 0,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    child: vi.fn<(metadata: Record<string, unknown>) => Logger>(),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
  };

  // Make child() return a new mock logger that also has spy functions
  mockLogger.child.mockImplementation(() => createMockLogger());

  return mockLogger;
}
