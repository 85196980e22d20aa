/**
 * Jest Environment Setup
 * Runs BEFORE the test framework is installed, and before any module reads
 * the environment through src/server/config.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
