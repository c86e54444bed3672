/**
 * Jest setup file - runs before all tests
 */

process.env['NODE_ENV'] = 'test';
