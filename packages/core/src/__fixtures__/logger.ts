import type { Logger } from '@docvault/shared';

export function mockLogger() {
  const log = vi.fn();
  const warn = vi.fn();
  const logger: Logger = {
    log,
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    child: () => logger,
  };
  return { logger, log, warn };
}
