/**
 * Vitest Global Setup
 * This file runs before all tests
 */

import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.restoreAllMocks();
});
