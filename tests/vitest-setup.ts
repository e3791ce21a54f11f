// Vitest setup file
// Keeps test output quiet and deterministic; tests that assert log lines opt back in

process.env.UMBRELLA_LOG_LEVEL = process.env.UMBRELLA_TEST_LOG_LEVEL || 'error';
process.env.UMBRELLA_LOG_TIMESTAMPS = 'false';
