import type { WireRecord } from '../codec/schema.js';
import type { Candle, Tick } from './types.js';

/**
 * A finite, restartable sequence of entries over the records of one reply.
 * Entries are built on iteration; every iteration starts from the first record.
 */
export class Series<R, T> implements Iterable<T> {
  readonly symbol: string;
  private readonly records: readonly R[];
  private readonly toEntry: (record: R) => T;

  constructor(symbol: string, records: readonly R[], toEntry: (record: R) => T) {
    this.symbol = symbol;
    this.records = records;
    this.toEntry = toEntry;
  }

  get length(): number {
    return this.records.length;
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const record of this.records) {
      yield this.toEntry(record);
    }
  }

  toArray(): T[] {
    return [...this];
  }

  toJSON(): { symbol: string; entries: T[] } {
    return { symbol: this.symbol, entries: this.toArray() };
  }
}

export type CandleSeries = Series<WireRecord<'CANDLE'>, Candle>;
export type TickSeries = Series<WireRecord<'TBT'>, Tick>;

function toCandle(record: WireRecord<'CANDLE'>): Candle {
  const { timestamp, open, high, low, close, volume } = record.fields;
  return { timestamp, open, high, low, close, volume };
}

function toTick(record: WireRecord<'TBT'>): Tick {
  const { timestamp, price, size } = record.fields;
  return { timestamp, price, size };
}

export function candleSeries(symbol: string, records: readonly WireRecord<'CANDLE'>[]): CandleSeries {
  return new Series(symbol, records, toCandle);
}

export function tickSeries(symbol: string, records: readonly WireRecord<'TBT'>[]): TickSeries {
  return new Series(symbol, records, toTick);
}
