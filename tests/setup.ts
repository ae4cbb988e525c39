/**
 * Test setup file for pagevault
 * Configures the test environment
 */

import os from "node:os";
import path from "node:path";
import { jest, afterEach } from "@jest/globals";

process.env.PAGEVAULT_DEBUG = "false";
delete process.env.PAGEVAULT_LOG_LEVEL;
process.env.NODE_ENV = "test";
// Never read the developer's own ~/.pagevault/config.yaml
process.env.PAGEVAULT_CONFIG_DIR = path.join(os.tmpdir(), `pagevault-test-config-${process.pid}`);
delete process.env.OPENAI_API_KEY;
delete process.env.OPENAI_BASE_URL;

// Clean up after tests
afterEach(() => {
  jest.clearAllMocks();
});
