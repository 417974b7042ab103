import type { Logger } from '@docvault/shared';

export function mockLogger() {
  const warn = vi.fn();
  const logger: Logger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    child: () => logger,
  };
  return { logger, warn };
}
