import { afterEach, beforeEach, vi } from 'vitest';
import { globalErrorReporter } from '../src/utils/error-reporter.js';

beforeEach(() => {
  globalErrorReporter.clear();
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});
