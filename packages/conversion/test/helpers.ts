import type { ServiceLogger } from '@fxconvert/observability';
import { vi } from 'vitest';

export function fakeLogger() {
  const debug = vi.fn();
  const info = vi.fn();
  const warn = vi.fn();
  const error = vi.fn();
  const logger: ServiceLogger = { debug, info, warn, error, child: () => logger };
  return { logger, debug, info, warn, error };
}
