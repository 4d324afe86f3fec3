// Global test setup - runs before all tests
// Every test gets an in-memory database and silent logs unless it opts in

process.env.DATABASE_URL = ':memory:';
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
