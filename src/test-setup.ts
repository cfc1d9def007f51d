import { afterEach, beforeEach, vi } from 'vitest';

// Keep pino quiet in tests that build a real logger from config.
beforeEach(() => {
  vi.stubEnv('LOG_LEVEL', 'silent');
});

// Clear mock history and env stubs so builders and fake requesters never
// leak state between tests.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
});
