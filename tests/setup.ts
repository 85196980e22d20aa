/**
 * Jest Setup File
 * Runs AFTER test framework is installed
 */

jest.setTimeout(10000);

afterEach(() => {
  jest.clearAllMocks();
});
