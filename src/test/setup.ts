// Test setup file

process.env.NODE_ENV = 'test';

// Mock winston logger; every child logger is the same object so tests can assert on it
jest.mock('../utils/logger', () => {
  const childLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  };
  return {
    logger: {
      info: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
      child: jest.fn(() => childLogger)
    },
    configureLogger: jest.fn()
  };
});
