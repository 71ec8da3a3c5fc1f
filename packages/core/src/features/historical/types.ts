import type { Decimal } from 'decimal.js';

export interface Candle {
  timestamp: Date;
  open: Decimal;
  high: Decimal;
  low: Decimal;
  close: Decimal;
  volume: number;
}

export interface Tick {
  timestamp: Date;
  price: Decimal;
  size: number;
}

export interface CandleRangeOptions {
  /** Candle width in seconds. Defaults to one day. */
  periodSeconds?: number;
  /** Include volume traded outside market hours. Defaults to false. */
  afterHours?: boolean;
}
