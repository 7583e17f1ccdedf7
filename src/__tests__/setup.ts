/**
 * Jest setup file - runs before all tests
 */

// Set test environment variables
process.env['NODE_ENV'] = 'test';
process.env['DOCS_GATEWAY_LOG_LEVEL'] = 'error'; // Reduce noise in test output
