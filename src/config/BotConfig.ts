import fs from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../utils/errors';

const timeframeSchema = z.enum(['1m', '5m', '15m', '1h', '4h', '1d']);

const macdSchema = z
  .object({
    fast: z.number().int().positive().default(12),
    slow: z.number().int().positive().default(26),
    signal: z.number().int().positive().default(9),
  })
  .refine((m) => m.fast < m.slow, { message: 'macd.fast must be smaller than macd.slow' });

const trailingSchema = z.object({
  enabled: z.boolean().default(false),
  activationR: z.number().positive().default(2), // favourable move, in multiples of initial risk
  distanceR: z.number().positive().default(1),
});

const riskSchema = z.object({
  riskPerTrade: z.number().positive().max(0.05).default(0.01), // fraction of balance
  dailyLossLimitPct: z.number().positive().max(1).default(0.05),
  maxOpenPositions: z.number().int().positive().default(5),
  rewardRiskRatio: z.number().positive().default(2),
  stopBufferPct: z.number().min(0).max(0.05).default(0.001),
  maxLeverage: z.number().positive().default(2),
  // Used when the exchange reports no metadata for a symbol.
  defaultSizeStep: z.number().positive().default(0.001),
  defaultMinOrderSize: z.number().positive().default(0.001),
  trailing: trailingSchema.default({}),
});

const strategySchema = z.object({
  maxGapAgeBars: z.number().int().positive().default(20),
  retainRetiredGaps: z.number().int().min(0).default(10),
  requireRecentCrossover: z.boolean().default(false),
  crossoverLookback: z.number().int().positive().default(6),
});

export const botConfigSchema = z.object({
  mode: z.enum(['paper', 'live', 'backtest']).default('paper'),
  symbols: z.array(z.string().min(1)).min(1),
  timeframe: timeframeSchema.default('4h'),
  candleLimit: z.number().int().min(10).default(200),
  startingBalance: z.number().positive().default(10000),
  stateFile: z.string().default('state.json'),
  closedHistoryLimit: z.number().int().min(0).default(200),
  macd: macdSchema.default({}),
  strategy: strategySchema.default({}),
  risk: riskSchema.default({}),
  schedule: z
    .object({
      settleBufferSeconds: z.number().int().min(0).default(30),
    })
    .default({}),
  backtest: z
    .object({
      days: z.number().int().positive().default(90),
      candlesDir: z.string().optional(),
    })
    .default({}),
})
  // Exits in live mode are the exchange's brackets, which the bot never amends.
  .refine((c) => !(c.mode === 'live' && c.risk.trailing.enabled), {
    message: 'risk.trailing cannot be enabled in live mode',
    path: ['risk', 'trailing', 'enabled'],
  });

export type BotConfig = z.infer<typeof botConfigSchema>;

export const parseConfig = (raw: unknown): BotConfig => {
  const parsed = botConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError(`Invalid bot config: ${issues.join('; ')}`);
  }
  return parsed.data;
};

export const loadConfig = (filePath: string): BotConfig => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfig(raw);
};
