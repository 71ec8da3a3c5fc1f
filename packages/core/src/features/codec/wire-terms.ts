// Client vocabulary (lower-case, hyphenated) against the daemon's wire terms.

import type { OrderKind, OrderSide } from './commands.js';
import type { WireOrderStatus, WireOrderType, WireSide } from './schema.js';

export type OrderStatus = 'pending' | 'partially-filled' | 'filled' | 'cancelled' | 'rejected';

export const WIRE_STATUS: Record<OrderStatus, WireOrderStatus> = {
  pending: 'SENT',
  'partially-filled': 'PARTIAL',
  filled: 'EXECUTED',
  cancelled: 'CANCELLED',
  rejected: 'REJECTED',
};

const STATUS_FROM_WIRE: Record<WireOrderStatus, OrderStatus> = {
  SENT: 'pending',
  PARTIAL: 'partially-filled',
  EXECUTED: 'filled',
  CANCELLED: 'cancelled',
  REJECTED: 'rejected',
};

export const WIRE_ORDER_TYPE: Record<OrderKind, WireOrderType> = {
  market: 'MARKET',
  limit: 'LIMIT',
  stop: 'STOP',
  'trailing-stop': 'TRAILING',
  iceberg: 'ICEBERG',
};

const ORDER_TYPE_FROM_WIRE: Record<WireOrderType, OrderKind> = {
  MARKET: 'market',
  LIMIT: 'limit',
  STOP: 'stop',
  TRAILING: 'trailing-stop',
  ICEBERG: 'iceberg',
};

export function toWireSide(side: OrderSide): WireSide {
  return side === 'buy' ? 'BUY' : 'SELL';
}

export function fromWireSide(side: WireSide): OrderSide {
  return side === 'BUY' ? 'buy' : 'sell';
}

export function fromWireStatus(status: WireOrderStatus): OrderStatus {
  return STATUS_FROM_WIRE[status];
}

export function fromWireOrderType(orderType: WireOrderType): OrderKind {
  return ORDER_TYPE_FROM_WIRE[orderType];
}

export function isOpenStatus(status: OrderStatus): boolean {
  return status === 'pending' || status === 'partially-filled';
}
