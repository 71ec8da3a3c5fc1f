import type { Decimal } from 'decimal.js';
import type { OrderKind, OrderSide } from '../codec/commands.js';
import type { OrderStatus } from '../codec/wire-terms.js';
import type { ConnectionMetrics } from '../connection/daemon-connection.js';
import type { DecimalInput } from '../../shared/formats.js';
import type { TradingMode } from '../../shared/config.js';

export type { OrderStatus } from '../codec/wire-terms.js';

/**
 * Outcome of an order command. A rejection by the daemon is still a
 * successful call: `accepted` is false and `errorCode` says why.
 */
export interface OrderResult {
  orderId: string;
  /** The caller's id for the order. */
  reference: string;
  accepted: boolean;
  status: OrderStatus | 'awaiting-confirmation';
  symbol: string;
  side: OrderSide | null;
  quantity: number;
  price: Decimal;
  filledQuantity: number;
  remainingQuantity: number;
  averagePrice: Decimal;
  errorCode: number | null;
  message: string | null;
}

export interface Fill {
  orderId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  price: Decimal;
  filledQuantity: number;
  averagePrice: Decimal;
  time: string;
}

export interface ExecutionOutcome {
  order: OrderResult;
  fill: Fill;
}

export interface AccountInfo {
  time: string;
  accountCode: string;
  liquidity: Decimal;
  gain: Decimal;
  openProfitLoss: Decimal;
  equity: Decimal;
  tradingMode: string;
}

export interface Availability {
  time: string;
  stocksAvailability: Decimal;
  stocksAvailabilityMargin: Decimal;
  derivativesAvailability: Decimal;
  derivativesAvailabilityMargin: Decimal;
  totalLiquidity: Decimal;
}

export interface PortfolioPosition {
  symbol: string;
  quantity: number;
  quantityPlatform: number;
  quantityInTrading: number;
  averagePrice: Decimal;
  gain: Decimal;
  lastPrice: Decimal;
}

export interface OrderInfo {
  orderId: string;
  symbol: string;
  time: string;
  side: OrderSide;
  orderType: OrderKind;
  quantity: number;
  price: Decimal;
  status: OrderStatus;
  filledQuantity: number;
  averagePrice: Decimal;
}

export interface DaemonStatus {
  connectionStatus: string;
  applicationStatus: string;
  release: string;
  connected: boolean;
  simulation: boolean;
  mode: TradingMode;
  connection: ConnectionMetrics | null;
}

interface OrderRequestBase {
  symbol: string;
  side: OrderSide;
  quantity: number;
  /** Generated when omitted. */
  orderId?: string;
}

export type OrderRequest =
  | (OrderRequestBase & { orderType: 'market' })
  | (OrderRequestBase & { orderType: 'limit' | 'stop'; price: DecimalInput })
  | (OrderRequestBase & { orderType: 'trailing-stop'; price: DecimalInput; trailAmount: DecimalInput })
  | (OrderRequestBase & { orderType: 'iceberg'; price: DecimalInput; visibleQuantity: number });
