import { LoggerPort } from '@/domain/ports/logger';

export function createMockLogger(): jest.Mocked<LoggerPort> {
  return {
    log: jest.fn(),
    logVerbose: jest.fn(),
    logPerformance: jest.fn(),
    logError: jest.fn(),
  };
}
