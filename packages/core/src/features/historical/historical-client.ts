import { encode } from '../codec/codec.js';
import type { Command } from '../codec/commands.js';
import { describeErrorCode, isEmptyResultCode } from '../codec/error-codes.js';
import { isKind, type RecordKind, type WireRecord } from '../codec/schema.js';
import { DaemonConnection, type ConnectionMetrics, type ConnectionState } from '../connection/daemon-connection.js';
import { ResponseRouter, type Reply, type RequestSpec } from '../routing/response-router.js';
import { loadConfig, type ClientConfig } from '../../shared/config.js';
import { ConnectionError, NotConnectedError, ParseError, RemoteError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { toResult, type Result } from '../../shared/result.js';
import { candleSeries, tickSeries, type CandleSeries, type TickSeries } from './series.js';
import type { CandleRangeOptions } from './types.js';

const logger = createLogger('HistoricalClient');

export const DAILY_PERIOD_SECONDS = 86_400;
export const DEFAULT_INTRADAY_PERIOD_SECONDS = 60;

export interface HistoricalClientOptions {
  /** Defaults to `loadConfig()`. */
  config?: ClientConfig;
}

function bySymbol(symbol: string): (record: WireRecord) => boolean {
  return (record) => 'symbol' in record.fields && record.fields.symbol === symbol;
}

/**
 * Candle and tick retrieval over the daemon's historical port. Data replies
 * arrive framed by `BEGIN DATA` / `END DATA`; an empty range is answered
 * with error 1031 and comes back as an empty series.
 */
export class HistoricalClient {
  private readonly connection: DaemonConnection;
  private readonly router: ResponseRouter;

  constructor(options: HistoricalClientOptions = {}) {
    const config = options.config ?? loadConfig();

    this.connection = new DaemonConnection({
      name: 'historical',
      host: config.host,
      port: config.historicalPort,
      connectTimeoutMs: config.connectTimeoutMs,
      connectAttempts: config.connectAttempts,
    });
    this.router = new ResponseRouter({
      name: 'historical',
      requestTimeoutMs: config.historicalTimeoutMs,
      listSettleMs: config.listSettleMs,
    });

    this.connection.on('record', (record: WireRecord) => this.router.dispatch(record));
    this.connection.on('disconnected', () => {
      this.router.cancelAll(new ConnectionError('The historical connection closed while awaiting a reply'));
    });
  }

  get state(): ConnectionState {
    return this.connection.state;
  }

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  metrics(): ConnectionMetrics {
    return this.connection.metrics();
  }

  connect(): Promise<Result<null>> {
    return toResult(async () => {
      await this.connection.connect();
      return null;
    });
  }

  disconnect(): Promise<Result<null>> {
    return toResult(async () => {
      await this.connection.disconnect();
      return null;
    });
  }

  /** One candle per session for the last `days` days. */
  getDailyCandles(symbol: string, days: number): Promise<Result<CandleSeries>> {
    return this.getCandles(symbol, days, DAILY_PERIOD_SECONDS);
  }

  getIntradayCandles(
    symbol: string,
    days: number,
    periodSeconds = DEFAULT_INTRADAY_PERIOD_SECONDS,
  ): Promise<Result<CandleSeries>> {
    return this.getCandles(symbol, days, periodSeconds);
  }

  getTicks(symbol: string, days: number): Promise<Result<TickSeries>> {
    return toResult(async () => {
      const records = await this.fetchData({ kind: 'query-ticks', symbol, days }, symbol, 'TBT');
      return tickSeries(symbol, records);
    });
  }

  /**
   * Candles between two instants. The after-hours volume setting is sticky on
   * the daemon, so it is set explicitly before every range request.
   */
  getCandlesRange(
    symbol: string,
    from: Date,
    to: Date,
    options: CandleRangeOptions = {},
  ): Promise<Result<CandleSeries>> {
    return toResult(async () => {
      const command: Command = {
        kind: 'query-candles-range',
        symbol,
        from,
        to,
        periodSeconds: options.periodSeconds ?? DAILY_PERIOD_SECONDS,
      };
      // Validate the range before touching the after-hours setting
      encode(command);
      await this.applyAfterHours(options.afterHours ?? false);
      const records = await this.fetchData(command, symbol, 'CANDLE');
      return candleSeries(symbol, records);
    });
  }

  getTicksRange(symbol: string, from: Date, to: Date): Promise<Result<TickSeries>> {
    return toResult(async () => {
      const records = await this.fetchData({ kind: 'query-ticks-range', symbol, from, to }, symbol, 'TBT');
      return tickSeries(symbol, records);
    });
  }

  /** Returns the setting the daemon reports after the change. */
  setAfterHours(enabled: boolean): Promise<Result<boolean>> {
    return toResult(() => this.applyAfterHours(enabled));
  }

  private getCandles(symbol: string, days: number, periodSeconds: number): Promise<Result<CandleSeries>> {
    return toResult(async () => {
      const records = await this.fetchData({ kind: 'query-candles', symbol, days, periodSeconds }, symbol, 'CANDLE');
      return candleSeries(symbol, records);
    });
  }

  private async applyAfterHours(enabled: boolean): Promise<boolean> {
    const reply = await this.exchange({ kind: 'set-after-hours', enabled }, {
      channel: 'afterHours',
      mode: 'single',
      accepts: new Set<RecordKind>(['VOLUMEAFTERHOURS']),
    });
    if (reply.error) {
      const { code } = reply.error.fields;
      throw new RemoteError(code, `${describeErrorCode(code)} (code ${code})`);
    }
    const [record] = reply.records;
    if (!record || !isKind(record, 'VOLUMEAFTERHOURS')) {
      throw new ParseError('Unexpected reply to set-after-hours', record?.raw ?? '');
    }
    return record.fields.setting === 'ON';
  }

  private async fetchData<K extends 'CANDLE' | 'TBT'>(
    command: Command,
    symbol: string,
    kind: K,
  ): Promise<WireRecord<K>[]> {
    const startedAt = Date.now();
    const reply = await this.exchange(command, {
      channel: 'data',
      mode: 'framed',
      accepts: new Set<RecordKind>([kind]),
      match: bySymbol(symbol),
    });

    if (reply.error) {
      const { code } = reply.error.fields;
      if (isEmptyResultCode(code)) {
        logger.debug({ symbol, command: command.kind }, 'No historical data');
        return [];
      }
      throw new RemoteError(code, `${describeErrorCode(code)} (code ${code})`);
    }

    const records = reply.records.filter((record): record is WireRecord<K> => isKind(record, kind));
    logger.debug({
      symbol,
      command: command.kind,
      count: records.length,
      elapsed_ms: Date.now() - startedAt,
    }, 'Historical data received');
    return records;
  }

  private async exchange(command: Command, spec: RequestSpec): Promise<Reply> {
    const line = encode(command);
    if (!this.connection.isConnected) {
      throw new NotConnectedError(`The historical connection is ${this.connection.state}`);
    }
    return this.router.request(spec, () => this.connection.send(line));
  }
}

/**
 * Run `fn` with a connected historical client and disconnect on every exit
 * path. Throws ConnectionError when the session cannot be opened.
 */
export async function withHistoricalSession<T>(
  options: HistoricalClientOptions,
  fn: (client: HistoricalClient) => Promise<T>,
): Promise<T> {
  const client = new HistoricalClient(options);
  const connected = await client.connect();
  if (!connected.success) {
    await client.disconnect();
    throw new ConnectionError(connected.error);
  }
  try {
    return await fn(client);
  } finally {
    await client.disconnect();
  }
}
