/**
 * Jest test setup file
 * Runs before each test file
 */

// Keep tests away from real credentials and buckets
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.S3_BUCKET;
delete process.env.ANTHROPIC_API_KEY;
delete process.env.FIRECRAWL_API_KEY;
delete process.env.META_API_ACCESS_TOKEN;
