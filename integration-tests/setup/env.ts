// Keep test output free of structured log lines
process.env.LOG_LEVEL = 'silent';
