import { afterEach } from 'vitest';

process.env.LOG_LEVEL = 'error';
process.env.TELEGRAM_TOKEN = '';
process.env.TELEGRAM_CHAT_ID = '';
process.env.ENABLE_PERSISTENCE = 'false';

afterEach(async () => {
  const { resetMetrics } = await import('../src/telemetry/metrics');
  resetMetrics();
});
