#!/usr/bin/env node
// ============================================================
// CLI: Commander-based front end for the trading daemon client
// Commands: status, account, portfolio, orders, candles, ticks
// ============================================================

import { Command, InvalidArgumentError } from 'commander';
import { pathToFileURL } from 'node:url';
import { loadConfig } from './shared/config.js';
import { parseTimestamp } from './shared/formats.js';
import type { Result } from './shared/result.js';
import { TradingClient } from './features/trading/trading-client.js';
import { HistoricalClient } from './features/historical/historical-client.js';

const program = new Command();

program
  .name('linedesk')
  .description('Query the trading daemon, or its in-memory simulation, and print JSON result envelopes')
  .version('0.1.0');

interface TradingOptions {
  simulate: boolean;
}

interface OrdersOptions extends TradingOptions {
  symbol?: string;
  pending: boolean;
}

interface CandlesOptions {
  days: number;
  period: number;
  from?: Date;
  to?: Date;
  afterHours: boolean;
}

interface TicksOptions {
  days: number;
  from?: Date;
  to?: Date;
}

// --- Argument parsers ---

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function dateTime(value: string): Date {
  const parsed = parseTimestamp(/^\d{4}-\d{2}-\d{2}$/.test(value) ? `${value} 00:00:00` : value);
  if (!parsed) {
    throw new InvalidArgumentError('Expected YYYY-MM-DD or "YYYY-MM-DD HH:MM:SS" (UTC).');
  }
  return parsed;
}

// --- Runners ---

function print(result: Result<unknown>): void {
  console.log(JSON.stringify(result, null, 2));
  if (!result.success) {
    process.exitCode = 1;
  }
}

async function withTrading<T>(
  options: TradingOptions,
  query: (client: TradingClient) => Promise<Result<T>>,
): Promise<Result<T>> {
  const config = loadConfig();
  const client = new TradingClient({ config, mode: options.simulate ? 'simulation' : config.mode });
  const connected = await client.connect();
  if (!connected.success) {
    return connected;
  }
  try {
    return await query(client);
  } finally {
    await client.disconnect();
  }
}

async function withHistorical<T>(query: (client: HistoricalClient) => Promise<Result<T>>): Promise<Result<T>> {
  const client = new HistoricalClient({ config: loadConfig() });
  const connected = await client.connect();
  if (!connected.success) {
    return connected;
  }
  try {
    return await query(client);
  } finally {
    await client.disconnect();
  }
}

function rangeOf(options: { from?: Date; to?: Date }): { from: Date; to: Date } | null {
  if (options.from === undefined && options.to === undefined) {
    return null;
  }
  if (options.from === undefined || options.to === undefined) {
    throw new InvalidArgumentError('--from and --to must be given together.');
  }
  return { from: options.from, to: options.to };
}

// --- Trading commands ---

program
  .command('status')
  .description('Show the daemon status and connection metrics')
  .option('--simulate', 'Answer from the simulation engine instead of the daemon', false)
  .action(async (options: TradingOptions) => {
    print(await withTrading(options, (client) => client.getStatus()));
  });

program
  .command('account')
  .description('Show account liquidity, gain and equity')
  .option('--simulate', 'Answer from the simulation engine instead of the daemon', false)
  .action(async (options: TradingOptions) => {
    print(await withTrading(options, (client) => client.getAccountInfo()));
  });

program
  .command('portfolio')
  .description('List portfolio positions')
  .option('--simulate', 'Answer from the simulation engine instead of the daemon', false)
  .action(async (options: TradingOptions) => {
    print(await withTrading(options, (client) => client.getPortfolio()));
  });

program
  .command('orders')
  .description('List orders')
  .option('--simulate', 'Answer from the simulation engine instead of the daemon', false)
  .option('-s, --symbol <symbol>', 'Only orders for this symbol')
  .option('--pending', 'Only orders still open', false)
  .action(async (options: OrdersOptions) => {
    print(await withTrading(options, (client) => (
      options.pending ? client.getPendingOrders() : client.getOrders({ symbol: options.symbol })
    )));
  });

// --- Historical commands ---

program
  .command('candles <symbol>')
  .description('Fetch candles for the last N days, or for a date range')
  .option('-d, --days <n>', 'Days of history', positiveInt, 1)
  .option('-p, --period <seconds>', 'Candle width in seconds', positiveInt, 86_400)
  .option('--from <date>', 'Range start (UTC)', dateTime)
  .option('--to <date>', 'Range end (UTC)', dateTime)
  .option('--after-hours', 'Include after-hours volume (ranges only)', false)
  .action(async (symbol: string, options: CandlesOptions) => {
    const range = rangeOf(options);
    print(await withHistorical((client) => (
      range
        ? client.getCandlesRange(symbol, range.from, range.to, {
          periodSeconds: options.period,
          afterHours: options.afterHours,
        })
        : client.getIntradayCandles(symbol, options.days, options.period)
    )));
  });

program
  .command('ticks <symbol>')
  .description('Fetch tick-by-tick trades for the last N days, or for a date range')
  .option('-d, --days <n>', 'Days of history', positiveInt, 1)
  .option('--from <date>', 'Range start (UTC)', dateTime)
  .option('--to <date>', 'Range end (UTC)', dateTime)
  .action(async (symbol: string, options: TicksOptions) => {
    const range = rangeOf(options);
    print(await withHistorical((client) => (
      range ? client.getTicksRange(symbol, range.from, range.to) : client.getTicks(symbol, options.days)
    )));
  });

export { program };

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  program.parseAsync().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
