import type { Decimal } from 'decimal.js';
import type { PlaceOrderCommand } from '../codec/commands.js';
import type { WireRecord } from '../codec/schema.js';
import type { ConnectionMetrics, ConnectionState } from '../connection/daemon-connection.js';
import type { RecordListener, Unsubscribe } from '../routing/response-router.js';
import type { TradingMode } from '../../shared/config.js';
import type { OrderReply } from './mappers.js';

/** Heartbeat health transitions of the session. */
export type HealthEvent = 'degraded' | 'restored';

/**
 * The capability set behind TradingClient. One implementation talks to the
 * daemon, the other to the in-process simulation engine; both answer with
 * the same records so the client never branches on mode.
 */
export interface TradingBackend {
  readonly mode: TradingMode;
  readonly state: ConnectionState;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** Order lifecycle records (TRADOK, TRADERR, TRADEXEC) and other unsolicited pushes. */
  onRecord(listener: RecordListener): Unsubscribe;
  onHealth(listener: (event: HealthEvent) => void): Unsubscribe;

  placeOrder(command: PlaceOrderCommand): Promise<OrderReply>;
  cancelOrder(orderId: string): Promise<OrderReply>;
  cancelAllOrders(symbol: string): Promise<OrderReply[]>;
  modifyOrder(orderId: string, price: Decimal, triggerPrice?: Decimal): Promise<OrderReply>;
  confirmOrder(orderId: string): Promise<OrderReply>;

  getStatus(): Promise<WireRecord<'DARWIN_STATUS'>>;
  getAccountInfo(): Promise<WireRecord<'INFOACCOUNT'>>;
  getAvailability(): Promise<WireRecord<'AVAILABILITY'>>;
  getPortfolio(): Promise<WireRecord<'STOCK'>[]>;
  getPosition(symbol: string): Promise<WireRecord<'STOCK'> | null>;
  getOrders(symbol?: string): Promise<WireRecord<'ORDER'>[]>;
  getPendingOrders(): Promise<WireRecord<'ORDER'>[]>;

  metrics(): ConnectionMetrics | null;
}
