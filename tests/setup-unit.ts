/**
 * Global test setup: quiet logging before any module reads LOG_LEVEL
 */

process.env.LOG_LEVEL = 'silent';
process.env.NODE_ENV = 'test';
