// ============================================================
// Record schema table: every message-kind tag the daemon sends,
// with its ordered, typed field list. This table is the single
// place to extend when the daemon vocabulary grows.
// ============================================================

import { z } from 'zod';
import { Decimal } from 'decimal.js';
import {
  CLOCK_PATTERN,
  DECIMAL_PATTERN,
  INT_PATTERN,
  parseTimestamp,
} from '../../shared/formats.js';

// --- Field types ---

const text = z.string();

const int = z.string().regex(INT_PATTERN, 'expected an integer').transform(Number);

const decimal = z.string()
  .regex(DECIMAL_PATTERN, 'expected a decimal')
  .transform((value) => new Decimal(value));

const clock = z.string().regex(CLOCK_PATTERN, 'expected HH:MM:SS');

const timestamp = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected YYYY-MM-DD HH:MM:SS' });
    return z.NEVER;
  }
  return parsed;
});

export const wireSide = z.enum(['BUY', 'SELL']);
export const wireOrderType = z.enum(['MARKET', 'LIMIT', 'STOP', 'TRAILING', 'ICEBERG']);
export const wireOrderStatus = z.enum(['SENT', 'PARTIAL', 'EXECUTED', 'CANCELLED', 'REJECTED']);

export type WireSide = z.infer<typeof wireSide>;
export type WireOrderType = z.infer<typeof wireOrderType>;
export type WireOrderStatus = z.infer<typeof wireOrderStatus>;

// --- Trading vocabulary ---

const tradingSchemas = {
  DARWIN_STATUS: z.object({
    connectionStatus: text,
    applicationStatus: text,
    release: text.default(''),
  }),
  INFOACCOUNT: z.object({
    time: clock,
    accountCode: text,
    liquidity: decimal,
    gain: decimal,
    openProfitLoss: decimal,
    equity: decimal,
    tradingMode: text.default(''),
  }),
  AVAILABILITY: z.object({
    time: clock,
    stocksAvailability: decimal,
    stocksAvailabilityMargin: decimal,
    derivativesAvailability: decimal,
    derivativesAvailabilityMargin: decimal,
    totalLiquidity: decimal,
  }),
  STOCK: z.object({
    symbol: text,
    time: clock,
    quantityPortfolio: int,
    quantityPlatform: int,
    quantityInTrading: int,
    averagePrice: decimal,
    gain: decimal,
    lastPrice: decimal.default('0'),
  }),
  ORDER: z.object({
    symbol: text,
    time: clock,
    orderId: text,
    side: wireSide,
    orderType: wireOrderType,
    quantity: int,
    price: decimal,
    status: wireOrderStatus,
    filledQuantity: int.default('0'),
    averagePrice: decimal.default('0'),
  }),
  TRADOK: z.object({
    symbol: text,
    orderId: text,
    status: wireOrderStatus,
    side: wireSide,
    quantity: int,
    price: decimal,
    filledQuantity: int,
    remainingQuantity: int,
    averagePrice: decimal.default('0'),
    reference: text.default(''),
    command: text.default(''),
  }),
  TRADERR: z.object({
    symbol: text,
    orderId: text,
    errorCode: int,
    side: wireSide,
    quantity: int,
    price: decimal,
    message: text.default(''),
  }),
  TRADCONFIRM: z.object({
    symbol: text,
    orderId: text,
    side: wireSide,
    quantity: int,
    price: decimal,
    message: text.default(''),
  }),
  TRADEXEC: z.object({
    symbol: text,
    orderId: text,
    side: wireSide,
    quantity: int,
    price: decimal,
    filledQuantity: int,
    averagePrice: decimal,
    time: clock,
  }),
  ERR: z.object({
    reference: text,
    code: int,
  }),
};

// --- Historical vocabulary ---

const historicalSchemas = {
  BEGIN: z.object({ section: text }),
  END: z.object({ section: text }),
  CANDLE: z.object({
    symbol: text,
    timestamp,
    open: decimal,
    high: decimal,
    low: decimal,
    close: decimal,
    volume: int,
  }),
  TBT: z.object({
    symbol: text,
    timestamp,
    price: decimal,
    size: int,
  }),
  VOLUMEAFTERHOURS: z.object({
    setting: z.enum(['ON', 'OFF']),
  }),
};

export const recordSchemas = { ...tradingSchemas, ...historicalSchemas };

export type RecordSchemas = typeof recordSchemas;
export type RecordKind = keyof RecordSchemas;
export type RecordFields<K extends RecordKind> = z.output<RecordSchemas[K]>;

/** A decoded, immutable wire line. `raw` is the line as received (or as it would be sent). */
export type WireRecord<K extends RecordKind = RecordKind> = {
  [P in K]: {
    readonly kind: P;
    readonly fields: Readonly<RecordFields<P>>;
    readonly raw: string;
  };
}[K];

export function isRecordKind(tag: string): tag is RecordKind {
  return Object.prototype.hasOwnProperty.call(recordSchemas, tag);
}

export const TRADING_KINDS: ReadonlySet<RecordKind> = new Set(Object.keys(tradingSchemas).filter(isRecordKind));

export const HISTORICAL_KINDS: ReadonlySet<RecordKind> = new Set<RecordKind>([
  'ERR',
  ...Object.keys(historicalSchemas).filter(isRecordKind),
]);

/** Kinds the daemon pushes for order lifecycle changes, solicited or not. */
export const ORDER_EVENT_KINDS: ReadonlySet<RecordKind> = new Set<RecordKind>(['TRADOK', 'TRADERR', 'TRADEXEC']);

export function isKind<K extends RecordKind>(record: WireRecord, kind: K): record is WireRecord<K> {
  return record.kind === kind;
}

export interface FieldLayout {
  name: string;
  optional: boolean;
}

function layoutOf(schema: z.AnyZodObject): FieldLayout[] {
  return Object.entries(schema.shape).map(([name, type]) => ({
    name,
    optional: type instanceof z.ZodDefault,
  }));
}

const layouts = new Map<string, FieldLayout[]>(
  Object.entries(recordSchemas).map(([kind, schema]) => [kind, layoutOf(schema)]),
);

/** Field order for a kind, as it appears on the wire after the tag. */
export function fieldLayout(kind: RecordKind): FieldLayout[] {
  return layouts.get(kind) ?? [];
}
