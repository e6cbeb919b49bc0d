// Keep tests hermetic: never pick up a developer .env with real credentials.
process.env.STORY_IMAGES_ENV_FILE = '.env.test-none';

// Silence noisy console output during tests unless explicitly opted in.
if (process.env.QUIET_TEST_LOGS !== '0') {
  const noop = () => {};
  // eslint-disable-next-line no-console
  console.debug = noop;
  // eslint-disable-next-line no-console
  console.info = noop;
  // eslint-disable-next-line no-console
  console.warn = noop;
}
