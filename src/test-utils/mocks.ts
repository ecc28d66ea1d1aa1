import { vi, type Mock } from 'vitest';
import type { TokenEstimator } from '../tokens/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Estimator that charges a flat cost per line, so expected chunk sizes
 * can be worked out by counting lines. Empty text costs 0.
 */
export function lineEstimator(perLine = 100): TokenEstimator {
  return (text: string) => (text === '' ? 0 : text.split('\n').length * perLine);
}

export interface MockLogger extends Logger {
  warn: Mock<(message: string) => void>;
  debug: Mock<(message: string) => void>;
}

export function createMockLogger(): MockLogger {
  return {
    warn: vi.fn<(message: string) => void>(),
    debug: vi.fn<(message: string) => void>(),
  };
}
