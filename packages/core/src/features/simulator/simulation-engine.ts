// ============================================================
// Simulation Engine: in-process stand-in for the daemon.
// Accepts the same commands, keeps a virtual order table and
// position ledger, and answers with the records a live daemon
// would send.
// ============================================================

import { EventEmitter } from 'events';
import { Decimal } from 'decimal.js';
import { buildRecord, encode } from '../codec/codec.js';
import { validateCommand, type OrderKind, type OrderSide, type PlaceOrderCommand } from '../codec/commands.js';
import type { WireRecord } from '../codec/schema.js';
import {
  WIRE_ORDER_TYPE,
  WIRE_STATUS,
  isOpenStatus,
  toWireSide,
  type OrderStatus,
} from '../codec/wire-terms.js';
import { InvalidStateError, OrderNotFoundError, ValidationError } from '../../shared/errors.js';
import { formatClock, toDecimal, type DecimalInput } from '../../shared/formats.js';
import { createLogger } from '../../shared/logger.js';
import { PositionLedger, type Position } from './position-ledger.js';

const logger = createLogger('SimulationEngine');

export interface SimulatedOrder {
  /** Assigned by the engine at acceptance. */
  orderId: string;
  /** The caller's own id for the order. */
  reference: string;
  symbol: string;
  side: OrderSide;
  orderType: OrderKind;
  quantity: number;
  price: Decimal | null;
  triggerPrice: Decimal | null;
  status: OrderStatus;
  filledQuantity: number;
  averagePrice: Decimal;
  createdAt: Date;
  updatedAt: Date;
}

export interface SimulationAccount {
  accountCode: string;
  liquidity: Decimal;
}

export interface SimulationEngineOptions {
  accountCode: string;
  initialLiquidity: DecimalInput;
}

export interface ExecutionResult {
  order: SimulatedOrder;
  status: WireRecord<'TRADOK'>;
  fill: WireRecord<'TRADEXEC'>;
}

const ZERO = new Decimal(0);

function isOpen(order: SimulatedOrder): boolean {
  return isOpenStatus(order.status);
}

function priceOf(command: PlaceOrderCommand): Decimal | null {
  return command.orderType === 'market' ? null : command.price;
}

/**
 * Every mutating method runs to completion synchronously, so calls are
 * serialized by the event loop and cannot interleave mid-update.
 *
 * Emits `record` (WireRecord) for every order event, in emission order.
 */
export class SimulationEngine extends EventEmitter {
  private readonly options: SimulationEngineOptions;
  private readonly ledger = new PositionLedger();
  private orders: Map<string, SimulatedOrder> = new Map();
  private references: Map<string, SimulatedOrder> = new Map();
  private notional: Map<string, Decimal> = new Map();
  private nextOrderId = 1;
  private account: SimulationAccount;

  constructor(options: SimulationEngineOptions) {
    super();
    this.options = options;
    this.account = { accountCode: options.accountCode, liquidity: toDecimal(options.initialLiquidity) };
    logger.warn('SIMULATION MODE ACTIVE - no real orders will be sent');
  }

  // --- Order lifecycle ---

  placeOrder(command: PlaceOrderCommand): WireRecord<'TRADOK'> {
    validateCommand(command);
    if (this.orders.has(command.orderId) || this.references.has(command.orderId)) {
      throw new ValidationError('Invalid place-order command', [`orderId: ${command.orderId} is already in use`]);
    }

    const now = new Date();
    const order: SimulatedOrder = {
      orderId: this.assignOrderId(),
      reference: command.orderId,
      symbol: command.symbol,
      side: command.side,
      orderType: command.orderType,
      quantity: command.quantity,
      price: priceOf(command),
      triggerPrice: null,
      status: 'pending',
      filledQuantity: 0,
      averagePrice: ZERO,
      createdAt: now,
      updatedAt: now,
    };
    this.orders.set(order.orderId, order);
    this.references.set(order.reference, order);
    this.notional.set(order.orderId, ZERO);

    logger.info({
      order_id: order.orderId,
      reference: order.reference,
      symbol: order.symbol,
      side: order.side,
      order_type: order.orderType,
      quantity: order.quantity,
      price: order.price?.toFixed(),
    }, 'Simulated order accepted');

    return this.emitStatus(order, encode(command));
  }

  /**
   * Fill some or all of an open order. Quantity defaults to the unfilled
   * remainder, price to the order's own price.
   */
  simulateOrderExecution(orderId: string, executedPrice?: DecimalInput, executedQuantity?: number): ExecutionResult {
    const order = this.findOrder(orderId);
    if (!isOpen(order)) {
      throw new InvalidStateError(`Cannot execute order ${order.orderId}: it is ${order.status}`);
    }

    const remaining = order.quantity - order.filledQuantity;
    const quantity = executedQuantity ?? remaining;
    if (!Number.isInteger(quantity) || quantity <= 0 || quantity > remaining) {
      throw new ValidationError('Invalid execution', [`executedQuantity must be an integer between 1 and ${remaining}`]);
    }

    const price = executedPrice !== undefined ? toDecimal(executedPrice) : order.price;
    if (!price) {
      throw new ValidationError('Invalid execution', ['executedPrice is required for market orders']);
    }
    if (!price.isFinite() || price.lte(0)) {
      throw new ValidationError('Invalid execution', ['executedPrice must be a positive decimal']);
    }

    const notional = (this.notional.get(order.orderId) ?? ZERO).plus(price.times(quantity));
    this.notional.set(order.orderId, notional);
    order.filledQuantity += quantity;
    order.averagePrice = notional.dividedBy(order.filledQuantity);
    order.status = order.filledQuantity === order.quantity ? 'filled' : 'partially-filled';
    order.updatedAt = new Date();

    const cash = price.times(quantity);
    this.account.liquidity = order.side === 'buy' ? this.account.liquidity.minus(cash) : this.account.liquidity.plus(cash);
    const { position, realized } = this.ledger.applyFill(order.symbol, order.side, quantity, price);

    logger.info({
      order_id: order.orderId,
      symbol: order.symbol,
      quantity,
      price: price.toFixed(),
      status: order.status,
      position: position?.quantity ?? 0,
      realized: realized.toFixed(),
    }, 'Simulated execution');

    const status = this.emitStatus(order);
    const fill = buildRecord('TRADEXEC', {
      symbol: order.symbol,
      orderId: order.orderId,
      side: toWireSide(order.side),
      quantity,
      price,
      filledQuantity: order.filledQuantity,
      averagePrice: order.averagePrice,
      time: formatClock(order.updatedAt),
    });
    this.emit('record', fill);

    return { order: { ...order }, status, fill };
  }

  cancelOrder(orderId: string): WireRecord<'TRADOK'> {
    const order = this.findOrder(orderId);
    if (!isOpen(order)) {
      throw new InvalidStateError(`Cannot cancel order ${order.orderId}: it is ${order.status}`);
    }

    // The filled part stands; only the remainder is withdrawn
    order.status = 'cancelled';
    order.updatedAt = new Date();
    logger.info({ order_id: order.orderId, filled: order.filledQuantity }, 'Simulated order cancelled');
    return this.emitStatus(order, `REVORD ${order.reference}`);
  }

  cancelAllOrders(symbol: string): WireRecord<'TRADOK'>[] {
    const open = [...this.orders.values()].filter((order) => order.symbol === symbol && isOpen(order));
    return open.map((order) => this.cancelOrder(order.orderId));
  }

  modifyOrder(orderId: string, price: DecimalInput, triggerPrice?: DecimalInput): WireRecord<'TRADOK'> {
    const order = this.findOrder(orderId);
    if (!isOpen(order)) {
      throw new InvalidStateError(`Cannot modify order ${order.orderId}: it is ${order.status}`);
    }
    if (order.orderType === 'market') {
      throw new InvalidStateError(`Cannot modify order ${order.orderId}: market orders carry no price`);
    }

    const nextPrice = toDecimal(price);
    if (!nextPrice.isFinite() || nextPrice.lte(0)) {
      throw new ValidationError('Invalid modify-order command', ['price: must be a positive decimal']);
    }
    order.price = nextPrice;
    order.triggerPrice = triggerPrice !== undefined ? toDecimal(triggerPrice) : order.triggerPrice;
    order.updatedAt = new Date();
    logger.info({ order_id: order.orderId, price: nextPrice.toFixed() }, 'Simulated order modified');
    return this.emitStatus(order);
  }

  /** Orders never wait for confirmation here; echoes the current state. */
  confirmOrder(orderId: string): WireRecord<'TRADOK'> {
    const order = this.findOrder(orderId);
    return this.statusRecord(order, `CONFORD ${order.reference}`);
  }

  // --- Queries ---

  getStatus(): WireRecord<'DARWIN_STATUS'> {
    return buildRecord('DARWIN_STATUS', {
      connectionStatus: 'CONN_OK',
      applicationStatus: 'TRUE',
      release: 'SIMULATION',
    });
  }

  getAccountInfo(): WireRecord<'INFOACCOUNT'> {
    const positions = this.ledger.list();
    const marketValue = positions.reduce((sum, position) => sum.plus(this.ledger.marketValue(position)), ZERO);
    const unrealized = positions.reduce((sum, position) => sum.plus(this.ledger.unrealized(position)), ZERO);

    return buildRecord('INFOACCOUNT', {
      time: formatClock(new Date()),
      accountCode: this.account.accountCode,
      liquidity: this.account.liquidity,
      gain: this.ledger.realized,
      openProfitLoss: unrealized,
      equity: this.account.liquidity.plus(marketValue),
      tradingMode: 'SIM',
    });
  }

  getAvailability(): WireRecord<'AVAILABILITY'> {
    const { liquidity } = this.account;
    return buildRecord('AVAILABILITY', {
      time: formatClock(new Date()),
      stocksAvailability: liquidity,
      stocksAvailabilityMargin: liquidity,
      derivativesAvailability: ZERO,
      derivativesAvailabilityMargin: ZERO,
      totalLiquidity: liquidity,
    });
  }

  getPortfolio(): WireRecord<'STOCK'>[] {
    return this.ledger.list().map((position) => this.stockRecord(position));
  }

  getPosition(symbol: string): WireRecord<'STOCK'> | null {
    const position = this.ledger.get(symbol);
    return position ? this.stockRecord(position) : null;
  }

  getOrders(symbol?: string): WireRecord<'ORDER'>[] {
    return [...this.orders.values()]
      .filter((order) => symbol === undefined || order.symbol === symbol)
      .map((order) => this.orderRecord(order));
  }

  getPendingOrders(): WireRecord<'ORDER'>[] {
    return [...this.orders.values()].filter(isOpen).map((order) => this.orderRecord(order));
  }

  /** Snapshot of one order, by engine id or caller reference. */
  getOrder(orderId: string): SimulatedOrder {
    return { ...this.findOrder(orderId) };
  }

  // --- Scaffolding ---

  addSimulatedPosition(symbol: string, quantity: number, averageCost: DecimalInput, lastPrice?: DecimalInput): void {
    const cost = toDecimal(averageCost);
    const existing = this.ledger.get(symbol);
    if (existing && Math.sign(existing.quantity) === Math.sign(quantity)) {
      const total = existing.quantity + quantity;
      this.ledger.set({
        symbol,
        quantity: total,
        averageCost: existing.averageCost.times(existing.quantity).plus(cost.times(quantity)).dividedBy(total),
        lastPrice: lastPrice !== undefined ? toDecimal(lastPrice) : existing.lastPrice,
      });
    } else {
      this.ledger.set({
        symbol,
        quantity,
        averageCost: cost,
        lastPrice: lastPrice !== undefined ? toDecimal(lastPrice) : cost,
      });
    }
    logger.info({ symbol, quantity }, 'Simulated position added');
  }

  removeSimulatedPosition(symbol: string): boolean {
    const removed = this.ledger.remove(symbol);
    if (removed) {
      logger.info({ symbol }, 'Simulated position removed');
    }
    return removed;
  }

  updateSimulatedAccount(update: { liquidity?: DecimalInput; accountCode?: string }): void {
    if (update.liquidity !== undefined) {
      this.account.liquidity = toDecimal(update.liquidity);
    }
    if (update.accountCode !== undefined) {
      this.account.accountCode = update.accountCode;
    }
    logger.info({ liquidity: this.account.liquidity.toFixed(), accountCode: this.account.accountCode }, 'Simulated account updated');
  }

  /** Drop all orders and positions and restore the initial account. */
  reset(): void {
    this.orders.clear();
    this.references.clear();
    this.notional.clear();
    this.ledger.clear();
    this.nextOrderId = 1;
    this.account = { accountCode: this.options.accountCode, liquidity: toDecimal(this.options.initialLiquidity) };
    logger.info('Simulation state reset');
  }

  // --- Internals ---

  // Engine ids skip anything already taken as a caller reference, so an id
  // names at most one order whichever map it is found in.
  private assignOrderId(): string {
    let orderId = String(this.nextOrderId++);
    while (this.references.has(orderId)) {
      orderId = String(this.nextOrderId++);
    }
    return orderId;
  }

  private findOrder(orderId: string): SimulatedOrder {
    const order = this.orders.get(orderId) ?? this.references.get(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    return order;
  }

  private statusRecord(order: SimulatedOrder, command = ''): WireRecord<'TRADOK'> {
    return buildRecord('TRADOK', {
      symbol: order.symbol,
      orderId: order.orderId,
      status: WIRE_STATUS[order.status],
      side: toWireSide(order.side),
      quantity: order.quantity,
      price: order.price ?? ZERO,
      filledQuantity: order.filledQuantity,
      remainingQuantity: order.quantity - order.filledQuantity,
      averagePrice: order.averagePrice,
      reference: order.reference,
      command,
    });
  }

  private emitStatus(order: SimulatedOrder, command = ''): WireRecord<'TRADOK'> {
    const record = this.statusRecord(order, command);
    this.emit('record', record);
    return record;
  }

  private stockRecord(position: Position): WireRecord<'STOCK'> {
    const inTrading = [...this.orders.values()]
      .filter((order) => order.symbol === position.symbol && isOpen(order))
      .reduce((sum, order) => sum + order.quantity - order.filledQuantity, 0);

    return buildRecord('STOCK', {
      symbol: position.symbol,
      time: formatClock(new Date()),
      quantityPortfolio: position.quantity,
      quantityPlatform: position.quantity,
      quantityInTrading: inTrading,
      averagePrice: position.averageCost,
      gain: this.ledger.unrealized(position),
      lastPrice: position.lastPrice,
    });
  }

  private orderRecord(order: SimulatedOrder): WireRecord<'ORDER'> {
    return buildRecord('ORDER', {
      symbol: order.symbol,
      time: formatClock(order.createdAt),
      orderId: order.orderId,
      side: toWireSide(order.side),
      orderType: WIRE_ORDER_TYPE[order.orderType],
      quantity: order.quantity,
      price: order.price ?? ZERO,
      status: WIRE_STATUS[order.status],
      filledQuantity: order.filledQuantity,
      averagePrice: order.averagePrice,
    });
  }
}
