/**
 * Vitest setup file for Gateway tests.
 *
 * Runs before each test file: environment, mock cleanup and custom matchers.
 */
import { vi, afterAll, afterEach, expect } from 'vitest';

// ============================================================================
// Environment Setup
// ============================================================================

vi.stubEnv('NODE_ENV', 'test');
vi.stubEnv('LOG_LEVEL', 'error');

// ============================================================================
// Test Lifecycle Hooks
// ============================================================================

afterAll(() => {
  vi.restoreAllMocks();
});

afterEach(() => {
  vi.clearAllMocks();
});

// ============================================================================
// Custom Matchers
// ============================================================================

expect.extend({
  /**
   * Check if a value is a valid UUID v4
   */
  toBeUUID(received: string) {
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
    const pass = uuidRegex.test(received);
    return {
      pass,
      message: () =>
        pass
          ? `expected ${received} not to be a valid UUID`
          : `expected ${received} to be a valid UUID`,
    };
  },

  /**
   * Check if a value is a valid ISO date string
   */
  toBeISODateString(received: string) {
    const date = new Date(received);
    const pass = !isNaN(date.getTime()) && received.includes('T');
    return {
      pass,
      message: () =>
        pass
          ? `expected ${received} not to be a valid ISO date string`
          : `expected ${received} to be a valid ISO date string`,
    };
  },
});

// ============================================================================
// Type Declarations for Custom Matchers
// ============================================================================

declare module 'vitest' {
  interface Assertion<T = any> {
    toBeUUID(): T;
    toBeISODateString(): T;
  }
  interface AsymmetricMatchersContaining {
    toBeUUID(): unknown;
    toBeISODateString(): unknown;
  }
}
