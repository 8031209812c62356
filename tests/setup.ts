/**
 * Test Setup Configuration
 *
 * Global setup for all Honeytrap tests
 */

import { beforeAll, afterEach, vi } from 'vitest';

beforeAll(() => {
  process.env.NODE_ENV = 'test';
  process.env.HONEYTRAP_LOG_LEVEL = 'silent';
});

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
});
