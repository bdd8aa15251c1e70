/**
 * Vitest Setup File
 * Global test configuration
 */

// Keep loggers quiet and out of pretty-print mode during tests
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
