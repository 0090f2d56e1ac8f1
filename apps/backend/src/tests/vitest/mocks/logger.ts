/**
 * ILogger stand-in for Vitest.
 *
 * Every level is a spy. child() returns the same instance, so entries logged
 * through a module-scoped child are visible on the logger the test created.
 */

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { ILogger } from '@portfolio/types';

export interface MockLogger extends ILogger {
    error: Mock;
    warn: Mock;
    info: Mock;
    debug: Mock;
    child: Mock;
}

export function createMockLogger(): MockLogger {
    const logger: MockLogger = {
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn(),
        child: vi.fn((): ILogger => logger)
    };
    return logger;
}
