// Keep test output quiet; individual tests inspect behavior, not log lines.
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL ?? 'silent';
process.env.LOG_PRETTY = 'false';
delete process.env.LOG_FILE;
