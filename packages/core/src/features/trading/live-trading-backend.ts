import type { Decimal } from 'decimal.js';
import { encode } from '../codec/codec.js';
import type { Command, PlaceOrderCommand } from '../codec/commands.js';
import { describeErrorCode, isEmptyResultCode } from '../codec/error-codes.js';
import { isKind, type RecordKind, type WireRecord } from '../codec/schema.js';
import { DaemonConnection, type ConnectionMetrics, type ConnectionState } from '../connection/daemon-connection.js';
import { ResponseRouter, type RecordListener, type RequestSpec, type Unsubscribe, type Reply } from '../routing/response-router.js';
import type { ClientConfig } from '../../shared/config.js';
import { ConnectionError, NotConnectedError, ParseError, RemoteError } from '../../shared/errors.js';
import type { OrderReply } from './mappers.js';
import type { HealthEvent, TradingBackend } from './trading-backend.js';

const ORDER_REPLY_KINDS: ReadonlySet<RecordKind> = new Set<RecordKind>(['TRADOK', 'TRADERR', 'TRADCONFIRM']);

function isOrderReply(record: WireRecord): record is OrderReply {
  return ORDER_REPLY_KINDS.has(record.kind) || record.kind === 'ERR';
}

/** Whether a record names the order by daemon id or by the caller's reference. */
function refersTo(record: WireRecord, orderId: string): boolean {
  const fields = record.fields;
  if ('orderId' in fields && fields.orderId === orderId) {
    return true;
  }
  return 'reference' in fields && fields.reference === orderId;
}

function remoteError(error: WireRecord<'ERR'>): RemoteError {
  const { code } = error.fields;
  return new RemoteError(code, `${describeErrorCode(code)} (code ${code})`);
}

function orderSpec(orderId: string): RequestSpec {
  return {
    channel: 'order',
    mode: 'single',
    accepts: ORDER_REPLY_KINDS,
    match: (record) => refersTo(record, orderId),
    reference: orderId,
  };
}

/**
 * Trading backend over the daemon's trading port: a DaemonConnection feeding
 * a ResponseRouter.
 */
export class LiveTradingBackend implements TradingBackend {
  readonly mode = 'live';
  private readonly connection: DaemonConnection;
  private readonly router: ResponseRouter;

  constructor(config: ClientConfig) {
    this.connection = new DaemonConnection({
      name: 'trading',
      host: config.host,
      port: config.tradingPort,
      connectTimeoutMs: config.connectTimeoutMs,
      connectAttempts: config.connectAttempts,
      heartbeat: config.heartbeatIntervalMs > 0
        ? { intervalMs: config.heartbeatIntervalMs, timeoutMs: config.heartbeatTimeoutMs }
        : undefined,
    });
    this.router = new ResponseRouter({
      name: 'trading',
      requestTimeoutMs: config.requestTimeoutMs,
      listSettleMs: config.listSettleMs,
    });

    this.connection.on('record', (record: WireRecord) => this.router.dispatch(record));
    this.connection.on('disconnected', () => {
      this.router.cancelAll(new ConnectionError('The trading connection closed while awaiting a reply'));
    });
  }

  get state(): ConnectionState {
    return this.connection.state;
  }

  connect(): Promise<void> {
    return this.connection.connect();
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  onRecord(listener: RecordListener): Unsubscribe {
    return this.router.subscribeAll(listener);
  }

  onHealth(listener: (event: HealthEvent) => void): Unsubscribe {
    const degraded = (): void => listener('degraded');
    const restored = (): void => listener('restored');
    this.connection.on('degraded', degraded);
    this.connection.on('restored', restored);
    return () => {
      this.connection.off('degraded', degraded);
      this.connection.off('restored', restored);
    };
  }

  metrics(): ConnectionMetrics {
    return this.connection.metrics();
  }

  // --- Orders ---

  placeOrder(command: PlaceOrderCommand): Promise<OrderReply> {
    return this.orderCommand(command, orderSpec(command.orderId));
  }

  cancelOrder(orderId: string): Promise<OrderReply> {
    return this.orderCommand({ kind: 'cancel-order', orderId }, orderSpec(orderId));
  }

  async cancelAllOrders(symbol: string): Promise<OrderReply[]> {
    // The daemon sends one line per withdrawn order and nothing when none were open
    const reply = await this.exchange({ kind: 'cancel-all', symbol }, {
      channel: 'order',
      mode: 'list',
      accepts: ORDER_REPLY_KINDS,
      match: (record) => 'symbol' in record.fields && record.fields.symbol === symbol,
      resolveOnTimeout: true,
    });
    if (reply.error) {
      return [reply.error];
    }
    return reply.records.filter(isOrderReply);
  }

  modifyOrder(orderId: string, price: Decimal, triggerPrice?: Decimal): Promise<OrderReply> {
    const command: Command = triggerPrice
      ? { kind: 'modify-order', orderId, price, triggerPrice }
      : { kind: 'modify-order', orderId, price };
    return this.orderCommand(command, orderSpec(orderId));
  }

  confirmOrder(orderId: string): Promise<OrderReply> {
    return this.orderCommand({ kind: 'confirm-order', orderId }, orderSpec(orderId));
  }

  // --- Queries ---

  getStatus(): Promise<WireRecord<'DARWIN_STATUS'>> {
    return this.single({ kind: 'query-status' }, 'status', 'DARWIN_STATUS');
  }

  getAccountInfo(): Promise<WireRecord<'INFOACCOUNT'>> {
    return this.single({ kind: 'query-account' }, 'account', 'INFOACCOUNT');
  }

  getAvailability(): Promise<WireRecord<'AVAILABILITY'>> {
    return this.single({ kind: 'query-availability' }, 'availability', 'AVAILABILITY');
  }

  getPortfolio(): Promise<WireRecord<'STOCK'>[]> {
    return this.list({ kind: 'query-portfolio' }, {
      channel: 'portfolio',
      mode: 'list',
      accepts: new Set(['STOCK']),
    }, 'STOCK');
  }

  async getPosition(symbol: string): Promise<WireRecord<'STOCK'> | null> {
    const [position] = await this.list({ kind: 'query-position', symbol }, {
      channel: 'portfolio',
      mode: 'single',
      accepts: new Set(['STOCK']),
      match: (record) => isKind(record, 'STOCK') && record.fields.symbol === symbol,
    }, 'STOCK');
    return position ?? null;
  }

  getOrders(symbol?: string): Promise<WireRecord<'ORDER'>[]> {
    const command: Command = symbol ? { kind: 'query-orders', symbol } : { kind: 'query-orders' };
    return this.list(command, {
      channel: 'orders',
      mode: 'list',
      accepts: new Set(['ORDER']),
      match: (record) => symbol === undefined || (isKind(record, 'ORDER') && record.fields.symbol === symbol),
    }, 'ORDER');
  }

  getPendingOrders(): Promise<WireRecord<'ORDER'>[]> {
    return this.list({ kind: 'query-pending-orders' }, {
      channel: 'orders',
      mode: 'list',
      accepts: new Set(['ORDER']),
    }, 'ORDER');
  }

  // --- Exchange helpers ---

  private async exchange(command: Command, spec: RequestSpec): Promise<Reply> {
    // Validation happens here, before anything is queued or written
    const line = encode(command);
    if (!this.connection.isConnected) {
      throw new NotConnectedError(`The trading connection is ${this.connection.state}`);
    }
    return this.router.request(spec, () => this.connection.send(line));
  }

  private async orderCommand(command: Command, spec: RequestSpec): Promise<OrderReply> {
    const reply = await this.exchange(command, spec);
    if (reply.error) {
      return reply.error;
    }
    const [record] = reply.records;
    if (!record || !isOrderReply(record)) {
      throw new ParseError(`Unexpected reply to ${command.kind}`, record?.raw ?? '');
    }
    return record;
  }

  private async single<K extends RecordKind>(
    command: Command,
    channel: RequestSpec['channel'],
    kind: K,
  ): Promise<WireRecord<K>> {
    const reply = await this.exchange(command, { channel, mode: 'single', accepts: new Set([kind]) });
    if (reply.error) {
      throw remoteError(reply.error);
    }
    const [record] = reply.records;
    if (!record || !isKind(record, kind)) {
      throw new ParseError(`Unexpected reply to ${command.kind}`, record?.raw ?? '');
    }
    return record;
  }

  private async list<K extends RecordKind>(command: Command, spec: RequestSpec, kind: K): Promise<WireRecord<K>[]> {
    const reply = await this.exchange(command, spec);
    if (reply.error) {
      if (isEmptyResultCode(reply.error.fields.code)) {
        return [];
      }
      throw remoteError(reply.error);
    }
    return reply.records.filter((record): record is WireRecord<K> => isKind(record, kind));
  }
}
