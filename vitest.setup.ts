/**
 * Vitest Setup File
 *
 * Global test setup and mocks.
 */

import { vi } from 'vitest';

// Placeholder environment for tests
process.env.OPENAI_API_KEY = 'test-openai-key';
process.env.RERANK_BASE_URL = 'http://localhost:8080';
process.env.LOG_LEVEL = 'silent';

// Mock console.warn and console.log to keep test output clean
// Comment these out when debugging tests
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'log').mockImplementation(() => {});
