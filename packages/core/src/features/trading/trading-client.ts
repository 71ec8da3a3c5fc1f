import { EventEmitter } from 'events';
import type { Decimal } from 'decimal.js';
import type { OrderSide, PlaceOrderCommand } from '../codec/commands.js';
import { isKind, type WireRecord } from '../codec/schema.js';
import type { ConnectionState } from '../connection/daemon-connection.js';
import { loadConfig, type ClientConfig, type TradingMode } from '../../shared/config.js';
import { ConnectionError, SimulationOnlyError, ValidationError, describeError } from '../../shared/errors.js';
import { toDecimal, type DecimalInput } from '../../shared/formats.js';
import { createLogger } from '../../shared/logger.js';
import { toResult, type Result } from '../../shared/result.js';
import { LiveTradingBackend } from './live-trading-backend.js';
import {
  toAccountInfo,
  toAvailability,
  toFill,
  toOrderInfo,
  toOrderResult,
  toPosition,
  type OrderContext,
} from './mappers.js';
import { SimulatedTradingBackend } from './simulated-trading-backend.js';
import type { HealthEvent, TradingBackend } from './trading-backend.js';
import type {
  AccountInfo,
  Availability,
  DaemonStatus,
  ExecutionOutcome,
  OrderInfo,
  OrderRequest,
  OrderResult,
  PortfolioPosition,
} from './types.js';

const logger = createLogger('TradingClient');

export interface TradingClientOptions {
  /** Defaults to `loadConfig()`. */
  config?: ClientConfig;
  /** Overrides `config.mode`. */
  mode?: TradingMode;
  /** Replaces the backend the mode would select. */
  backend?: TradingBackend;
}

function decimalArgument(name: string, value: DecimalInput, context = 'Invalid order parameters'): Decimal {
  try {
    return toDecimal(value);
  } catch {
    throw new ValidationError(context, [`${name}: ${String(value)} is not a decimal`]);
  }
}

function createBackend(config: ClientConfig, mode: TradingMode): TradingBackend {
  return mode === 'simulation' ? new SimulatedTradingBackend(config) : new LiveTradingBackend(config);
}

/**
 * Order, account and portfolio operations against the daemon, or against
 * the simulation engine in simulation mode. Every operation resolves to a
 * Result envelope and never throws.
 *
 * Emits:
 * - `order` (OrderResult): order status changes, solicited or not
 * - `fill` (Fill): executions
 * - `record` (WireRecord): every record that reached fan-out
 * - `degraded` / `restored` (ConnectionState): heartbeat lapsed or resumed
 */
export class TradingClient extends EventEmitter {
  readonly mode: TradingMode;
  private readonly config: ClientConfig;
  private readonly backend: TradingBackend;
  private sequence = 0;

  constructor(options: TradingClientOptions = {}) {
    super();
    this.config = options.config ?? loadConfig();
    this.backend = options.backend ?? createBackend(this.config, options.mode ?? this.config.mode);
    this.mode = this.backend.mode;
    this.backend.onRecord((record) => this.handleRecord(record));
    this.backend.onHealth((event) => this.handleHealth(event));
  }

  get state(): ConnectionState {
    return this.backend.state;
  }

  get isConnected(): boolean {
    return this.state === 'CONNECTED' || this.state === 'DEGRADED';
  }

  // --- Session ---

  connect(): Promise<Result<{ mode: TradingMode }>> {
    return toResult(async () => {
      await this.backend.connect();
      return { mode: this.mode };
    });
  }

  /** Always safe, including when never connected. */
  disconnect(): Promise<Result<null>> {
    return toResult(async () => {
      await this.backend.disconnect();
      return null;
    });
  }

  // --- Orders ---

  placeOrder(request: OrderRequest): Promise<Result<OrderResult>> {
    return toResult(async () => {
      const command = this.toCommand(request);
      let reply = await this.backend.placeOrder(command);

      if (isKind(reply, 'TRADCONFIRM') && this.config.autoConfirmOrders) {
        logger.info({ order_id: reply.fields.orderId }, 'Order needs confirmation, confirming');
        reply = await this.backend.confirmOrder(reply.fields.orderId);
      }

      const result = toOrderResult(reply, this.contextOf(command));
      logger.info({
        order_id: result.orderId,
        reference: result.reference,
        symbol: command.symbol,
        side: command.side,
        order_type: command.orderType,
        quantity: command.quantity,
        status: result.status,
        error_code: result.errorCode,
      }, result.accepted ? 'Order placed' : 'Order rejected');
      return result;
    });
  }

  placeMarketOrder(symbol: string, side: OrderSide, quantity: number): Promise<Result<OrderResult>> {
    return this.placeOrder({ symbol, side, quantity, orderType: 'market' });
  }

  placeLimitOrder(symbol: string, side: OrderSide, quantity: number, price: DecimalInput): Promise<Result<OrderResult>> {
    return this.placeOrder({ symbol, side, quantity, orderType: 'limit', price });
  }

  placeStopOrder(symbol: string, side: OrderSide, quantity: number, stopPrice: DecimalInput): Promise<Result<OrderResult>> {
    return this.placeOrder({ symbol, side, quantity, orderType: 'stop', price: stopPrice });
  }

  placeTrailingStopOrder(
    symbol: string,
    side: OrderSide,
    quantity: number,
    price: DecimalInput,
    trailAmount: DecimalInput,
  ): Promise<Result<OrderResult>> {
    return this.placeOrder({ symbol, side, quantity, orderType: 'trailing-stop', price, trailAmount });
  }

  placeIcebergOrder(
    symbol: string,
    side: OrderSide,
    quantity: number,
    price: DecimalInput,
    visibleQuantity: number,
  ): Promise<Result<OrderResult>> {
    return this.placeOrder({ symbol, side, quantity, orderType: 'iceberg', price, visibleQuantity });
  }

  cancelOrder(orderId: string): Promise<Result<OrderResult>> {
    return toResult(async () => {
      const reply = await this.backend.cancelOrder(orderId);
      const result = toOrderResult(reply, { reference: orderId });
      logger.info({ order_id: orderId, status: result.status }, 'Cancel requested');
      return result;
    });
  }

  cancelAllOrders(symbol: string): Promise<Result<OrderResult[]>> {
    return toResult(async () => {
      const replies = await this.backend.cancelAllOrders(symbol);
      logger.info({ symbol, count: replies.length }, 'Cancel-all requested');
      return replies.map((reply) => toOrderResult(reply, { reference: '', symbol }));
    });
  }

  modifyOrder(orderId: string, price: DecimalInput, triggerPrice?: DecimalInput): Promise<Result<OrderResult>> {
    return toResult(async () => {
      const reply = await this.backend.modifyOrder(
        orderId,
        decimalArgument('price', price),
        triggerPrice !== undefined ? decimalArgument('triggerPrice', triggerPrice) : undefined,
      );
      return toOrderResult(reply, { reference: orderId });
    });
  }

  confirmOrder(orderId: string): Promise<Result<OrderResult>> {
    return toResult(async () => toOrderResult(await this.backend.confirmOrder(orderId), { reference: orderId }));
  }

  // --- Queries ---

  getStatus(): Promise<Result<DaemonStatus>> {
    return toResult(async () => {
      const record = await this.backend.getStatus();
      return {
        ...record.fields,
        connected: this.isConnected,
        simulation: this.mode === 'simulation',
        mode: this.mode,
        connection: this.backend.metrics(),
      };
    });
  }

  getAccountInfo(): Promise<Result<AccountInfo>> {
    return toResult(async () => toAccountInfo(await this.backend.getAccountInfo()));
  }

  getAvailability(): Promise<Result<Availability>> {
    return toResult(async () => toAvailability(await this.backend.getAvailability()));
  }

  getPortfolio(): Promise<Result<PortfolioPosition[]>> {
    return toResult(async () => (await this.backend.getPortfolio()).map(toPosition));
  }

  getPosition(symbol: string): Promise<Result<PortfolioPosition | null>> {
    return toResult(async () => {
      const record = await this.backend.getPosition(symbol);
      return record ? toPosition(record) : null;
    });
  }

  getOrders(options: { symbol?: string } = {}): Promise<Result<OrderInfo[]>> {
    return toResult(async () => (await this.backend.getOrders(options.symbol)).map(toOrderInfo));
  }

  getPendingOrders(): Promise<Result<OrderInfo[]>> {
    return toResult(async () => (await this.backend.getPendingOrders()).map(toOrderInfo));
  }

  // --- Simulation scaffolding ---

  simulateOrderExecution(
    orderId: string,
    executedPrice?: DecimalInput,
    executedQuantity?: number,
  ): Promise<Result<ExecutionOutcome>> {
    return toResult(async () => {
      const backend = this.simulation('simulateOrderExecution');
      const price = executedPrice !== undefined ? decimalArgument('executedPrice', executedPrice) : undefined;
      const { status, fill } = await backend.simulateOrderExecution(orderId, price, executedQuantity);
      return {
        order: toOrderResult(status, { reference: orderId }),
        fill: toFill(fill),
      };
    });
  }

  addSimulatedPosition(
    symbol: string,
    quantity: number,
    averageCost: DecimalInput,
    lastPrice?: DecimalInput,
  ): Promise<Result<null>> {
    return toResult(async () => {
      const { engine } = this.simulation('addSimulatedPosition');
      engine.addSimulatedPosition(
        symbol,
        quantity,
        decimalArgument('averageCost', averageCost, 'Invalid simulated position'),
        lastPrice !== undefined ? decimalArgument('lastPrice', lastPrice, 'Invalid simulated position') : undefined,
      );
      return null;
    });
  }

  removeSimulatedPosition(symbol: string): Promise<Result<boolean>> {
    return toResult(async () => this.simulation('removeSimulatedPosition').engine.removeSimulatedPosition(symbol));
  }

  updateSimulatedAccount(update: { liquidity?: DecimalInput; accountCode?: string }): Promise<Result<null>> {
    return toResult(async () => {
      const { engine } = this.simulation('updateSimulatedAccount');
      engine.updateSimulatedAccount({
        accountCode: update.accountCode,
        liquidity: update.liquidity !== undefined
          ? decimalArgument('liquidity', update.liquidity, 'Invalid simulated account')
          : undefined,
      });
      return null;
    });
  }

  resetSimulation(): Promise<Result<null>> {
    return toResult(async () => {
      this.simulation('resetSimulation').engine.reset();
      return null;
    });
  }

  // --- Internals ---

  private simulation(operation: string): SimulatedTradingBackend {
    if (!(this.backend instanceof SimulatedTradingBackend)) {
      throw new SimulationOnlyError(operation);
    }
    return this.backend;
  }

  private nextOrderId(): string {
    this.sequence++;
    return `ORD${Date.now()}${this.sequence}`;
  }

  private toCommand(request: OrderRequest): PlaceOrderCommand {
    const base = {
      kind: 'place-order' as const,
      orderId: request.orderId ?? this.nextOrderId(),
      symbol: request.symbol,
      side: request.side,
      quantity: request.quantity,
    };

    switch (request.orderType) {
      case 'market':
        return { ...base, orderType: 'market' };
      case 'limit':
      case 'stop':
        return { ...base, orderType: request.orderType, price: decimalArgument('price', request.price) };
      case 'trailing-stop':
        return {
          ...base,
          orderType: 'trailing-stop',
          price: decimalArgument('price', request.price),
          trailAmount: decimalArgument('trailAmount', request.trailAmount),
        };
      case 'iceberg':
        return {
          ...base,
          orderType: 'iceberg',
          price: decimalArgument('price', request.price),
          visibleQuantity: request.visibleQuantity,
        };
    }
  }

  private contextOf(command: PlaceOrderCommand): OrderContext {
    return {
      reference: command.orderId,
      symbol: command.symbol,
      side: command.side,
      quantity: command.quantity,
      price: command.orderType === 'market' ? undefined : command.price,
    };
  }

  private handleHealth(event: HealthEvent): void {
    try {
      this.emit(event, this.backend.state);
    } catch (err) {
      logger.error({ event, err: describeError(err) }, 'Health listener failed');
    }
  }

  private handleRecord(record: WireRecord): void {
    this.emit('record', record);
    if (isKind(record, 'TRADOK') || isKind(record, 'TRADERR')) {
      this.emit('order', toOrderResult(record, { reference: record.fields.orderId }));
    } else if (isKind(record, 'TRADEXEC')) {
      this.emit('fill', toFill(record));
    }
  }
}

/**
 * Run `fn` with a connected client and disconnect on every exit path.
 * Throws ConnectionError when the session cannot be opened.
 */
export async function withTradingSession<T>(
  options: TradingClientOptions,
  fn: (client: TradingClient) => Promise<T>,
): Promise<T> {
  const client = new TradingClient(options);
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
