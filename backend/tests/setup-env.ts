// Vitest global environment setup: ensure required secrets exist for test runs.
process.env.NODE_ENV = 'test';

if (!process.env.API_KEY) process.env.API_KEY = 'test-api-key';
if (!process.env.JWT_SECRET) process.env.JWT_SECRET = 'test-jwt-secret';

// Keep test output quiet unless a test overrides it.
if (!process.env.LOG_LEVEL) process.env.LOG_LEVEL = 'error';
