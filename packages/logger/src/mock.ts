import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

/**
 * Logger whose methods are Vitest spies typed after the Logger interface.
 * `children` holds the mocks returned by child(), in call order.
 */
export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> } & {
  children: MockLogger[];
};

/**
 * @example
 * ```typescript
 * import { createMockLogger } from '@ddl-pda/logger/mock';
 *
 * const logger = createMockLogger();
 * recognize('ALTER TABLE t DROP COLUMN c', { logger });
 *
 * expect(logger.info).toHaveBeenCalledWith('statement_accepted', { terminals: 4, steps: 6 });
 * ```
 */
export function createMockLogger(): MockLogger {
  const children: MockLogger[] = [];

  return {
    children,
    child: vi.fn<Logger['child']>(() => {
      const child = createMockLogger();
      children.push(child);
      return child;
    }),
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    fatal: vi.fn<Logger['fatal']>(),
    flush: vi.fn<Logger['flush']>(async () => {}),
  };
}
