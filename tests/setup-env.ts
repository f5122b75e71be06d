// Vitest global environment setup
process.env.NODE_ENV = 'test';

// Keep tests from picking up a developer's exporter settings
delete process.env.METRICS_HOST;
delete process.env.METRICS_PORT;
