import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Silence pino logger
vi.mock('pino', () => {
  const noop = () => {};
  const logger: Record<string, unknown> = {
    info: noop,
    warn: noop,
    error: noop,
    debug: noop,
    trace: noop,
    child: () => logger,
  };
  return { default: () => logger };
});

import { HistoricalClient, withHistoricalSession } from '../historical-client.js';
import { loadConfig, type ClientConfig } from '../../../shared/config.js';
import { ConnectionError } from '../../../shared/errors.js';
import { startFakeDaemon, unusedPort, type FakeDaemon, type Responder } from '../../../__tests__/fixtures/fake-daemon.js';

function historicalConfig(port: number): ClientConfig {
  return loadConfig({
    DAEMON_HOST: '127.0.0.1',
    HISTORICAL_PORT: String(port),
    CONNECT_TIMEOUT_MS: '1000',
    HISTORICAL_TIMEOUT_MS: '500',
  });
}

const CANDLES = [
  'BEGIN DATA',
  'CANDLE;INTC;2024-03-01 09:00:00;50;51;49.5;50.5;1200',
  'CANDLE;INTC;2024-03-01 10:00:00;50.5;52;50.25;51.75;800',
  'END DATA',
];

const frame = (...lines: string[]) => ['BEGIN DATA', ...lines, 'END DATA'];

describe('HistoricalClient', () => {
  let daemon: FakeDaemon;
  let client: HistoricalClient;

  async function connectWith(responder: Responder): Promise<void> {
    daemon.respond(responder);
    const connected = await client.connect();
    if (!connected.success) throw new Error(connected.error);
  }

  beforeEach(async () => {
    daemon = await startFakeDaemon();
    client = new HistoricalClient({ config: historicalConfig(daemon.port) });
  });

  afterEach(async () => {
    await client.disconnect();
    await daemon.close();
  });

  it('requests daily candles with a one-day period', async () => {
    await connectWith(() => CANDLES);

    const result = await client.getDailyCandles('INTC', 5);

    expect(daemon.received).toEqual(['CANDLE INTC,5,86400']);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.symbol).toBe('INTC');
    expect(result.data.length).toBe(2);
  });

  it('maps candles to fixed-shape entries', async () => {
    await connectWith(() => CANDLES);

    const result = await client.getIntradayCandles('INTC', 1, 3600);
    if (!result.success) throw new Error(result.error);

    expect(daemon.received).toEqual(['CANDLE INTC,1,3600']);
    const [first, second] = result.data.toArray();
    expect(first.timestamp.toISOString()).toBe('2024-03-01T09:00:00.000Z');
    expect(first.open.toFixed()).toBe('50');
    expect(first.low.toFixed()).toBe('49.5');
    expect(first.volume).toBe(1200);
    expect(second.close.toFixed()).toBe('51.75');
  });

  it('defaults intraday candles to one minute', async () => {
    await connectWith(() => frame());

    await client.getIntradayCandles('INTC', 2);

    expect(daemon.received).toEqual(['CANDLE INTC,2,60']);
  });

  it('yields the same entries on every iteration', async () => {
    await connectWith(() => CANDLES);

    const result = await client.getDailyCandles('INTC', 5);
    if (!result.success) throw new Error(result.error);

    const closes = (): string[] => [...result.data].map((candle) => candle.close.toFixed());
    expect(closes()).toEqual(['50.5', '51.75']);
    expect(closes()).toEqual(['50.5', '51.75']);
  });

  it('returns an empty series when there is no data', async () => {
    await connectWith(() => ['ERR;;1031']);

    const result = await client.getDailyCandles('INTC', 5);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.isEmpty).toBe(true);
    expect(result.data.toArray()).toEqual([]);
  });

  it('fails on other daemon errors', async () => {
    await connectWith(() => ['ERR;;1030']);

    expect(await client.getTicks('NOPE', 1)).toEqual({
      success: false,
      error: 'Unknown symbol (code 1030)',
      errorCategory: 'remote',
    });
  });

  it('reads ticks', async () => {
    await connectWith(() => frame(
      'TBT;INTC;2024-03-01 09:00:01;50.1;100',
      'TBT;INTC;2024-03-01 09:00:02;50.15;25',
    ));

    const result = await client.getTicks('INTC', 1);
    if (!result.success) throw new Error(result.error);

    expect(daemon.received).toEqual(['TBT INTC,1']);
    expect(result.data.toArray().map((tick) => [tick.price.toFixed(), tick.size])).toEqual([
      ['50.1', 100],
      ['50.15', 25],
    ]);
  });

  it('ignores records for other symbols inside the frame', async () => {
    await connectWith(() => frame(
      'TBT;INTC;2024-03-01 09:00:01;50.1;100',
      'TBT;AAPL;2024-03-01 09:00:01;180;5',
    ));

    const result = await client.getTicks('INTC', 1);

    expect(result.success && result.data.length).toBe(1);
  });

  it('sets the after-hours volume before a candle range', async () => {
    await connectWith((line) => {
      if (line.startsWith('VOLUMEAFTERHOURS')) return [`VOLUMEAFTERHOURS;${line.split(' ')[1]}`];
      return CANDLES;
    });

    const result = await client.getCandlesRange(
      'INTC',
      new Date(Date.UTC(2024, 2, 1)),
      new Date(Date.UTC(2024, 2, 2)),
      { periodSeconds: 3600, afterHours: true },
    );

    expect(daemon.received).toEqual([
      'VOLUMEAFTERHOURS ON',
      'CANDLERANGE INTC,2024-03-01 00:00:00,2024-03-02 00:00:00,3600',
    ]);
    expect(result.success && result.data.length).toBe(2);
  });

  it('turns after-hours volume off by default', async () => {
    await connectWith((line) => (line.startsWith('VOLUMEAFTERHOURS') ? ['VOLUMEAFTERHOURS;OFF'] : frame()));

    await client.getCandlesRange('INTC', new Date(Date.UTC(2024, 2, 1)), new Date(Date.UTC(2024, 2, 2)));

    expect(daemon.received).toEqual([
      'VOLUMEAFTERHOURS OFF',
      'CANDLERANGE INTC,2024-03-01 00:00:00,2024-03-02 00:00:00,86400',
    ]);
  });

  it('rejects an inverted range before sending anything', async () => {
    await connectWith(() => undefined);

    const result = await client.getCandlesRange('INTC', new Date(Date.UTC(2024, 2, 2)), new Date(Date.UTC(2024, 2, 1)));

    expect(result.success).toBe(false);
    expect(result.success === false && result.errorCategory).toBe('validation');
    expect(daemon.received).toEqual([]);
  });

  it('requests tick ranges', async () => {
    await connectWith(() => frame('TBT;INTC;2024-03-01 09:30:00;50;10'));

    const result = await client.getTicksRange(
      'INTC',
      new Date(Date.UTC(2024, 2, 1, 9)),
      new Date(Date.UTC(2024, 2, 1, 10)),
    );

    expect(daemon.received).toEqual(['TBTRANGE INTC,2024-03-01 09:00:00,2024-03-01 10:00:00']);
    expect(result.success && result.data.toArray()[0].timestamp.toISOString()).toBe('2024-03-01T09:30:00.000Z');
  });

  it('reports the after-hours setting', async () => {
    await connectWith(() => ['VOLUMEAFTERHOURS;ON']);
    expect(await client.setAfterHours(true)).toEqual({ success: true, data: true });
  });

  it('fails with a timeout when the frame never ends', async () => {
    await connectWith(() => ['BEGIN DATA', 'CANDLE;INTC;2024-03-01 09:00:00;50;51;49.5;50.5;1200']);

    const result = await client.getDailyCandles('INTC', 1);

    expect(result.success).toBe(false);
    expect(result.success === false && result.errorCategory).toBe('transport');
  });

  it('fails without a session', async () => {
    const result = await client.getDailyCandles('INTC', 1);
    expect(result).toEqual({
      success: false,
      error: 'The historical connection is DISCONNECTED',
      errorCategory: 'transport',
    });
  });
});

describe('withHistoricalSession', () => {
  it('disconnects after the callback', async () => {
    const daemon = await startFakeDaemon(() => CANDLES);
    const seen: HistoricalClient[] = [];

    const count = await withHistoricalSession({ config: historicalConfig(daemon.port) }, async (client) => {
      seen.push(client);
      const result = await client.getDailyCandles('INTC', 5);
      return result.success ? result.data.length : -1;
    });

    expect(count).toBe(2);
    expect(seen[0].state).toBe('DISCONNECTED');
    await daemon.close();
  });

  it('throws ConnectionError when the daemon is unreachable', async () => {
    const port = await unusedPort();
    await expect(withHistoricalSession({ config: historicalConfig(port) }, async () => 'never'))
      .rejects.toBeInstanceOf(ConnectionError);
  });
});
