/**
 * Test setup file for pdfdex
 * Configures the test environment and provides common utilities
 */

import { afterEach, jest } from "@jest/globals";

// Keep debug output and file logging off unless a test opts in
process.env.PDFDEX_DEBUG = "false";
process.env.PDFDEX_LOG_TO_FILE = "false";
process.env.NODE_ENV = "test";

// Clean up after tests
afterEach(() => {
  jest.restoreAllMocks();
});
