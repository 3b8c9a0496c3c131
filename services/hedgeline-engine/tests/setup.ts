// Property suites and the real-timer deadline tests need more than the default
jest.setTimeout(30000);
