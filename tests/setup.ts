/**
 * Jest Test Setup
 * Global configuration for all tests
 */

// This export makes it a module, allowing global augmentation
export {};

process.env.NODE_ENV = 'test';
process.env.DB_PASSWORD = 'test-password';
process.env.LOG_LEVEL = 'error';

// Extend Jest matchers
expect.extend({
  toBeWithinRange(received: number, floor: number, ceiling: number) {
    const pass = received >= floor && received <= ceiling;
    return {
      message: () => pass
        ? `expected ${received} not to be within range ${floor} - ${ceiling}`
        : `expected ${received} to be within range ${floor} - ${ceiling}`,
      pass,
    };
  },
});

// Extend Jest types
declare global {
  namespace jest {
    interface Matchers<R> {
      toBeWithinRange(floor: number, ceiling: number): R;
    }
  }
}

jest.setTimeout(30000);

// Silence sandbox generation logs
beforeAll(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterAll(() => {
  jest.restoreAllMocks();
});
