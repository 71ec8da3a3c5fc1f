// Records to facade payloads. Both backends answer with records,
// so these are the only place payload shapes are built.

import { Decimal } from 'decimal.js';
import type { OrderSide } from '../codec/commands.js';
import { describeErrorCode } from '../codec/error-codes.js';
import type { WireRecord } from '../codec/schema.js';
import { fromWireOrderType, fromWireSide, fromWireStatus } from '../codec/wire-terms.js';
import type {
  AccountInfo,
  Availability,
  Fill,
  OrderInfo,
  OrderResult,
  PortfolioPosition,
} from './types.js';

export type OrderReply = WireRecord<'TRADOK' | 'TRADERR' | 'TRADCONFIRM' | 'ERR'>;

/** What the caller sent, for replies that do not echo it. */
export interface OrderContext {
  reference: string;
  symbol?: string;
  side?: OrderSide;
  quantity?: number;
  price?: Decimal;
}

const ZERO = new Decimal(0);

export function toOrderResult(reply: OrderReply, context: OrderContext): OrderResult {
  switch (reply.kind) {
    case 'TRADOK': {
      const fields = reply.fields;
      return {
        orderId: fields.orderId,
        reference: fields.reference || context.reference,
        accepted: fields.status !== 'REJECTED',
        status: fromWireStatus(fields.status),
        symbol: fields.symbol,
        side: fromWireSide(fields.side),
        quantity: fields.quantity,
        price: fields.price,
        filledQuantity: fields.filledQuantity,
        remainingQuantity: fields.remainingQuantity,
        averagePrice: fields.averagePrice,
        errorCode: null,
        message: null,
      };
    }
    case 'TRADERR': {
      const fields = reply.fields;
      return {
        orderId: fields.orderId,
        reference: context.reference,
        accepted: false,
        status: 'rejected',
        symbol: fields.symbol,
        side: fromWireSide(fields.side),
        quantity: fields.quantity,
        price: fields.price,
        filledQuantity: 0,
        remainingQuantity: 0,
        averagePrice: ZERO,
        errorCode: fields.errorCode,
        message: fields.message || describeErrorCode(fields.errorCode),
      };
    }
    case 'TRADCONFIRM': {
      const fields = reply.fields;
      return {
        orderId: fields.orderId,
        reference: context.reference,
        accepted: true,
        status: 'awaiting-confirmation',
        symbol: fields.symbol,
        side: fromWireSide(fields.side),
        quantity: fields.quantity,
        price: fields.price,
        filledQuantity: 0,
        remainingQuantity: fields.quantity,
        averagePrice: ZERO,
        errorCode: null,
        message: fields.message || null,
      };
    }
    case 'ERR':
      return {
        orderId: context.reference,
        reference: context.reference,
        accepted: false,
        status: 'rejected',
        symbol: context.symbol ?? '',
        side: context.side ?? null,
        quantity: context.quantity ?? 0,
        price: context.price ?? ZERO,
        filledQuantity: 0,
        remainingQuantity: 0,
        averagePrice: ZERO,
        errorCode: reply.fields.code,
        message: describeErrorCode(reply.fields.code),
      };
  }
}

export function toFill(record: WireRecord<'TRADEXEC'>): Fill {
  const fields = record.fields;
  return {
    orderId: fields.orderId,
    symbol: fields.symbol,
    side: fromWireSide(fields.side),
    quantity: fields.quantity,
    price: fields.price,
    filledQuantity: fields.filledQuantity,
    averagePrice: fields.averagePrice,
    time: fields.time,
  };
}

export function toAccountInfo(record: WireRecord<'INFOACCOUNT'>): AccountInfo {
  return { ...record.fields };
}

export function toAvailability(record: WireRecord<'AVAILABILITY'>): Availability {
  return { ...record.fields };
}

export function toPosition(record: WireRecord<'STOCK'>): PortfolioPosition {
  const fields = record.fields;
  return {
    symbol: fields.symbol,
    quantity: fields.quantityPortfolio,
    quantityPlatform: fields.quantityPlatform,
    quantityInTrading: fields.quantityInTrading,
    averagePrice: fields.averagePrice,
    gain: fields.gain,
    lastPrice: fields.lastPrice,
  };
}

export function toOrderInfo(record: WireRecord<'ORDER'>): OrderInfo {
  const fields = record.fields;
  return {
    orderId: fields.orderId,
    symbol: fields.symbol,
    time: fields.time,
    side: fromWireSide(fields.side),
    orderType: fromWireOrderType(fields.orderType),
    quantity: fields.quantity,
    price: fields.price,
    status: fromWireStatus(fields.status),
    filledQuantity: fields.filledQuantity,
    averagePrice: fields.averagePrice,
  };
}
