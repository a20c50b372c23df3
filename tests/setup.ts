// Global test setup — runs before all test files.
// Sets NODE_ENV to test so env validation picks it up; every container
// opens its own in-memory database.
process.env.NODE_ENV = 'test';
process.env.DATABASE_URL = ':memory:';
process.env.LOG_LEVEL = 'silent';
