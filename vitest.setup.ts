// Keep developer .env values out of config tests.
process.env.NODE_ENV = "test";
for (const name of [
  "GOOGLE_MAPS_API_KEY",
  "GOOGLE_MAPS_BASE_URL",
  "DEFAULT_TIME_ZONE",
  "LOG_LEVEL",
  "FETCH_MAX_ROUNDS",
  "FETCH_FIRST_ROUND_WORKERS",
  "FETCH_RETRY_WORKERS",
  "FETCH_ATTEMPTS_PER_TASK",
  "FETCH_RETRY_BASE_DELAY_MS",
  "ALLOWED_ORIGINS",
  "RATE_LIMIT_MAX",
  "ETA_MAX_SAMPLES",
  "APP_VERSION"
]) {
  delete process.env[name];
}
