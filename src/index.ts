#!/usr/bin/env node
import { parseArgs } from 'util';
import { loadConfig, parseConfig, type BotConfig } from './config/BotConfig';
import { env } from './config/env';
import { BacktestEngine, formatBacktestReport } from './backtest/BacktestEngine';
import { fetchHistory, loadHistoryFromDir } from './backtest/history';
import type { ExecutionProvider } from './engine/ExecutionProvider';
import { MarketDataEngine } from './engine/MarketDataEngine';
import { Scheduler } from './engine/Scheduler';
import { TradingEngine } from './engine/TradingEngine';
import { LiveExecutor } from './engine/executors/LiveExecutor';
import { PaperExecutor } from './engine/executors/PaperExecutor';
import { DeltaApiClient } from './client/DeltaApiClient';
import { DeltaAdapter } from './engine/exchanges/DeltaAdapter';
import { JsonFileStateStore } from './persistence/StateStore';
import { ConfigError, StateStoreError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';

const MODES = ['paper', 'live', 'backtest'] as const;
type Mode = (typeof MODES)[number];

const isMode = (value: string): value is Mode => MODES.some((m) => m === value);

interface CliOptions {
  configPath: string;
  mode: Mode | undefined;
}

const parseCli = (argv: string[]): CliOptions => {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      mode: { type: 'string', short: 'm' },
      backtest: { type: 'boolean', default: false },
    },
    strict: true,
  });

  let mode: Mode | undefined;
  if (values.mode !== undefined) {
    if (!isMode(values.mode)) {
      throw new ConfigError(`--mode must be one of ${MODES.join(', ')}, got "${values.mode}"`);
    }
    mode = values.mode;
  }
  if (values.backtest) mode = 'backtest';

  return { configPath: values.config ?? env.CONFIG_PATH, mode };
};

const runBacktest = async (config: BotConfig): Promise<void> => {
  const history = config.backtest.candlesDir
    ? await loadHistoryFromDir(config.backtest.candlesDir, config.symbols)
    : await fetchHistory(new MarketDataEngine(), config.symbols, config.timeframe, config.backtest.days);

  const result = await new BacktestEngine({ config, history }).run();
  process.stdout.write(formatBacktestReport(result, config.startingBalance) + '\n');
};

const runLoop = async (config: BotConfig): Promise<void> => {
  const client = new DeltaApiClient();
  if (config.mode === 'live' && !client.hasCredentials()) {
    throw new ConfigError('Live mode needs DELTA_API_KEY and DELTA_API_SECRET');
  }
  const market = new MarketDataEngine(new DeltaAdapter(client));
  const provider: ExecutionProvider = config.mode === 'live' ? new LiveExecutor(market) : new PaperExecutor(market);
  const store = new JsonFileStateStore(env.STATE_FILE ?? config.stateFile);
  const engine = await TradingEngine.create({ config, provider, store });

  const controller = new AbortController();
  const stop = (sig: NodeJS.Signals) => {
    logger.info({ signal: sig }, 'Shutdown requested, finishing current symbol');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await new Scheduler(engine, {
    timeframe: config.timeframe,
    settleBufferMs: config.schedule.settleBufferSeconds * 1000,
  }).run(controller.signal);
};

const main = async (): Promise<void> => {
  const cli = parseCli(process.argv.slice(2));
  const loaded = loadConfig(cli.configPath);
  const config: BotConfig = cli.mode ? parseConfig({ ...loaded, mode: cli.mode }) : loaded;

  logger.info({ mode: config.mode, symbols: config.symbols, timeframe: config.timeframe }, 'Starting FVG swing bot');

  if (config.mode === 'backtest') {
    await runBacktest(config);
  } else {
    await runLoop(config);
  }
};

main()
  .then(() => {
    logger.info('Bot stopped');
    process.exit(0);
  })
  .catch((error: unknown) => {
    const kind = error instanceof StateStoreError || error instanceof ConfigError ? 'Startup failed' : 'Fatal error';
    logger.fatal({ error: errorMessage(error) }, kind);
    process.exit(1);
  });
