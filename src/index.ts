import { CONFIG } from './config';
import { CommandPoller } from './alerts/commandPoller';
import { GridNotifier } from './alerts/notifier';
import { Telegram } from './alerts/telegram';
import { runMigrations } from './db/migrations';
import { closePool, getPool } from './db/pool';
import { CycleHistoryRepository } from './db/cycleHistoryRepo';
import { EngineSettingsRepository } from './db/engineSettingsRepo';
import { getExchange } from './exchanges/ccxtClient';
import { PaperTradingVenue } from './exchanges/paperVenue';
import { QuoteFeed } from './services/marketData/quoteFeed';
import { CycleController, buildEngineSettings } from './strategies/gridCycle';
import type { StrategyRunContext } from './strategies/types';
import { startMetricsServer } from './telemetry/metrics';
import { logger, setLogContext, setLogIngestionWebhook, setLogLevel } from './utils/logger';
import { formatError } from './utils/formatError';

async function main() {
  const settings = buildEngineSettings(CONFIG);
  const context: StrategyRunContext = {
    accountId: settings.accountId,
    symbol: settings.symbol,
    runMode: 'paper',
  };
  setLogLevel(CONFIG.LOG_LEVEL);
  setLogContext({ ...context });
  if (CONFIG.LOG_INGEST_WEBHOOK) {
    setLogIngestionWebhook(CONFIG.LOG_INGEST_WEBHOOK);
  }
  logger.info('engine_starting', { event: 'engine_starting', exchange: CONFIG.EXCHANGE.ID });

  const venue = new PaperTradingVenue({
    startBalance: CONFIG.PAPER.START_BALANCE,
    contractSize: CONFIG.PAPER.CONTRACT_SIZE,
    marginRate: CONFIG.PAPER.MARGIN_RATE,
  });
  const feed = new QuoteFeed(
    getExchange({
      exchangeId: CONFIG.EXCHANGE.ID,
      apiKey: CONFIG.EXCHANGE.API_KEY,
      apiSecret: CONFIG.EXCHANGE.API_SECRET,
      passphrase: CONFIG.EXCHANGE.PASSPHRASE || null,
    }),
    venue,
    { symbol: settings.symbol, marketSymbol: CONFIG.EXCHANGE.MARKET_SYMBOL, intervalMs: CONFIG.EXCHANGE.QUOTE_POLL_MS }
  );
  await feed.pollOnce();
  feed.start();

  let history: CycleHistoryRepository | undefined;
  let settingsStore: EngineSettingsRepository | undefined;
  if (CONFIG.ENABLE_PERSISTENCE) {
    const pool = getPool();
    await runMigrations(pool);
    history = new CycleHistoryRepository(pool);
    settingsStore = new EngineSettingsRepository(pool);
  }

  const controller = new CycleController({
    venue,
    settings,
    events: new GridNotifier(),
    history,
    settingsStore,
  });

  const poller = new CommandPoller(Telegram, controller.commands, {
    chatId: CONFIG.TELEGRAM_CHAT_ID,
    intervalMs: CONFIG.LOOP.COMMAND_POLL_MS,
    parseOptions: () => ({
      now: new Date(),
      timezoneOffsetMinutes: controller.guardConfig.timezoneOffsetMinutes,
      tradingHaltRange: CONFIG.GUARD.TRADING_HALT,
    }),
  });
  if (Telegram.isConfigured()) {
    poller.start();
  } else {
    // without a chat there is no other way to start the loop
    controller.enqueue({ type: 'start' });
  }

  startMetricsServer(CONFIG.METRICS_PORT);

  const shutdown = (signal: string) => {
    logger.info('engine_stopping', { event: 'engine_stopping', signal });
    controller.stop();
    poller.stop();
    feed.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await controller.run();
  if (CONFIG.ENABLE_PERSISTENCE) await closePool();
  process.exit(0);
}

main().catch((error) => {
  logger.error('engine_fatal', { event: 'engine_fatal', error: formatError(error) });
  process.exit(1);
});
