/**
 * Test utilities for logger mocking
 */

import { vi } from 'vitest';
import type { Logger } from './types.js';

/**
 * Creates a mock logger whose methods are all vi.fn() spies.
 */
export function createMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: vi.fn(),
        silly: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        trackException: vi.fn(),
        createChild: vi.fn(() => mockLogger),
        destroy: vi.fn(async () => {}),
    };
    return mockLogger;
}

/**
 * Creates a silent logger with no-op functions.
 */
export function createSilentMockLogger(): Logger {
    const mockLogger: Logger = {
        debug: () => {},
        silly: () => {},
        info: () => {},
        warn: () => {},
        error: () => {},
        trackException: () => {},
        createChild: () => mockLogger,
        destroy: async () => {},
    };
    return mockLogger;
}
