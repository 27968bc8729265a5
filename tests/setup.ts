// Keep the host's USAGE_STATS_* overrides from leaking into tests
for (const key of ['USAGE_STATS_DB_PATH', 'USAGE_STATS_LOG_PATH', 'USAGE_STATS_LOG_ENABLED']) {
    delete process.env[key];
}
