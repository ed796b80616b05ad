/**
 * Root test setup file
 *
 * Runs before every test file.
 */

import { vi } from 'vitest';

process.env.NODE_ENV = 'test';

// Sweep and CLI code print through console; keep test output readable
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
