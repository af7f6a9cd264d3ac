/**
 * Test Setup
 *
 * Runs before all tests. Keeps component logging out of the test output.
 */

process.env.LOG_LEVEL = 'error';
delete process.env.LOG_FORMAT;
