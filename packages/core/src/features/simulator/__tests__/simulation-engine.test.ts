import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Decimal } from 'decimal.js';

vi.mock('pino', () => {
  const noop = () => {};
  const logger: Record<string, unknown> = {
    info: noop, warn: noop, error: noop, debug: noop, trace: noop,
    child: () => logger,
  };
  return { default: () => logger };
});

import { SimulationEngine } from '../simulation-engine.js';
import type { PlaceOrderCommand } from '../../codec/commands.js';
import type { WireRecord } from '../../codec/schema.js';
import { InvalidStateError, OrderNotFoundError, ValidationError } from '../../../shared/errors.js';

function limitBuy(overrides?: Partial<{ orderId: string; symbol: string; quantity: number; price: string }>): PlaceOrderCommand {
  return {
    kind: 'place-order',
    orderId: overrides?.orderId ?? 'ORD1',
    symbol: overrides?.symbol ?? 'INTC',
    side: 'buy',
    orderType: 'limit',
    quantity: overrides?.quantity ?? 100,
    price: new Decimal(overrides?.price ?? '50.25'),
  };
}

function marketOrder(side: 'buy' | 'sell', quantity: number, orderId: string, symbol = 'INTC'): PlaceOrderCommand {
  return { kind: 'place-order', orderId, symbol, side, orderType: 'market', quantity };
}

let engine: SimulationEngine;

beforeEach(() => {
  engine = new SimulationEngine({ accountCode: 'SIM1234', initialLiquidity: '10000' });
});

// ============================================================
// Placement
// ============================================================

describe('placeOrder', () => {
  it('creates a pending order and answers with an accepted record', () => {
    const record = engine.placeOrder(limitBuy());

    expect(record.kind).toBe('TRADOK');
    expect(record.fields).toMatchObject({
      symbol: 'INTC',
      orderId: '1',
      status: 'SENT',
      side: 'BUY',
      quantity: 100,
      filledQuantity: 0,
      remainingQuantity: 100,
      reference: 'ORD1',
      command: 'ACQAZ ORD1,INTC,100,50.25',
    });
    expect(record.fields.price.toFixed(2)).toBe('50.25');

    const order = engine.getOrder('1');
    expect(order.status).toBe('pending');
    expect(order.quantity).toBe(100);
    expect(order.price?.toFixed(2)).toBe('50.25');
  });

  it('assigns sequential order ids', () => {
    engine.placeOrder(limitBuy({ orderId: 'A' }));
    const second = engine.placeOrder(limitBuy({ orderId: 'B' }));

    expect(second.fields.orderId).toBe('2');
  });

  it('rejects a caller id that is already in use', () => {
    engine.placeOrder(limitBuy({ orderId: 'A' }));

    expect(() => engine.placeOrder(limitBuy({ orderId: 'A', symbol: 'ENI' }))).toThrow(
      'Invalid place-order command: orderId: A is already in use',
    );
    expect(() => engine.placeOrder(limitBuy({ orderId: '1' }))).toThrow(ValidationError);
    expect(engine.getOrders()).toHaveLength(1);
  });

  it('never hands out an engine id that a caller already took', () => {
    engine.placeOrder(limitBuy({ orderId: '2' }));
    const second = engine.placeOrder(limitBuy({ orderId: 'B' }));

    expect(second.fields.orderId).toBe('3');

    engine.cancelOrder('2');
    expect(engine.getOrder('1').status).toBe('cancelled');
    expect(engine.getOrder('B').status).toBe('pending');
  });

  it('rejects invalid parameters before touching state', () => {
    expect(() => engine.placeOrder(limitBuy({ quantity: 0 }))).toThrow(ValidationError);
    expect(engine.getOrders()).toEqual([]);
  });
});

// ============================================================
// Execution
// ============================================================

describe('simulateOrderExecution', () => {
  it('fills the whole order and updates position and liquidity', () => {
    engine.placeOrder(limitBuy());

    const { order } = engine.simulateOrderExecution('1', '50.00');

    expect(order.status).toBe('filled');
    expect(order.filledQuantity).toBe(100);
    expect(order.averagePrice.toFixed(2)).toBe('50.00');

    const position = engine.getPosition('INTC');
    expect(position?.fields.quantityPortfolio).toBe(100);
    expect(position?.fields.averagePrice.toFixed(2)).toBe('50.00');

    expect(engine.getAccountInfo().fields.liquidity.toFixed(2)).toBe('5000.00');
  });

  it('fills part of the order and leaves the rest cancellable', () => {
    engine.placeOrder(limitBuy());

    const { order, status } = engine.simulateOrderExecution('1', '50.10', 40);

    expect(order.status).toBe('partially-filled');
    expect(order.filledQuantity).toBe(40);
    expect(order.averagePrice.toFixed(2)).toBe('50.10');
    expect(status.fields.remainingQuantity).toBe(60);

    const cancelled = engine.cancelOrder('1');
    expect(cancelled.fields.status).toBe('CANCELLED');
    expect(cancelled.fields.filledQuantity).toBe(40);
    expect(engine.getOrder('1').filledQuantity).toBe(40);
    expect(engine.getPosition('INTC')?.fields.quantityPortfolio).toBe(40);
  });

  it('defaults the price to the order price', () => {
    engine.placeOrder(limitBuy());

    const { order } = engine.simulateOrderExecution('1');

    expect(order.averagePrice.toFixed(2)).toBe('50.25');
  });

  it('requires a price for market orders', () => {
    engine.placeOrder(marketOrder('buy', 10, 'M1'));

    expect(() => engine.simulateOrderExecution('1')).toThrow(/executedPrice is required/);
    expect(engine.getOrder('1').filledQuantity).toBe(0);
  });

  it('finds orders by the caller reference as well', () => {
    engine.placeOrder(limitBuy({ orderId: 'MY-REF' }));

    const { order } = engine.simulateOrderExecution('MY-REF', 50);

    expect(order.orderId).toBe('1');
    expect(order.status).toBe('filled');
  });

  it('averages several fills by quantity', () => {
    engine.placeOrder(limitBuy({ price: '53' }));

    engine.simulateOrderExecution('1', '50', 30);
    engine.simulateOrderExecution('1', '51', 50);
    const { order, fill } = engine.simulateOrderExecution('1', '52.5', 20);

    // (30 * 50 + 50 * 51 + 20 * 52.5) / 100
    expect(order.averagePrice.toFixed(2)).toBe('51.00');
    expect(order.status).toBe('filled');
    expect(fill.fields.filledQuantity).toBe(100);
    expect(fill.fields.quantity).toBe(20);
  });

  it('keeps non-terminating averages exact to fixed-point precision', () => {
    engine.placeOrder(limitBuy({ quantity: 3, price: '2' }));

    engine.simulateOrderExecution('1', '1', 1);
    const { order } = engine.simulateOrderExecution('1', '2', 2);

    expect(order.averagePrice.toDecimalPlaces(6).toString()).toBe('1.666667');
  });

  it('never fills beyond the requested quantity', () => {
    engine.placeOrder(limitBuy());

    expect(() => engine.simulateOrderExecution('1', 50, 101)).toThrow(ValidationError);
    engine.simulateOrderExecution('1', 50, 60);
    expect(() => engine.simulateOrderExecution('1', 50, 41)).toThrow(ValidationError);
    expect(engine.getOrder('1').filledQuantity).toBe(60);
  });

  it('rejects executing a filled order', () => {
    engine.placeOrder(limitBuy());
    engine.simulateOrderExecution('1');

    expect(() => engine.simulateOrderExecution('1')).toThrow(InvalidStateError);
  });

  it('fails with OrderNotFoundError for unknown ids', () => {
    expect(() => engine.simulateOrderExecution('404', 10)).toThrow(OrderNotFoundError);
  });

  it('emits the status record before the fill record', () => {
    const events: WireRecord[] = [];
    engine.on('record', (record: WireRecord) => events.push(record));

    engine.placeOrder(limitBuy());
    engine.simulateOrderExecution('1', 50);

    expect(events.map((event) => event.kind)).toEqual(['TRADOK', 'TRADOK', 'TRADEXEC']);
    expect(events[1]?.raw).toContain(';EXECUTED;');
  });
});

// ============================================================
// Cancellation and modification
// ============================================================

describe('cancelOrder', () => {
  it('refuses to cancel a filled order and leaves it untouched', () => {
    engine.placeOrder(limitBuy());
    engine.simulateOrderExecution('1', 50);

    expect(() => engine.cancelOrder('1')).toThrow(InvalidStateError);
    expect(engine.getOrder('1').status).toBe('filled');
  });

  it('refuses to cancel twice', () => {
    engine.placeOrder(limitBuy());
    engine.cancelOrder('1');

    expect(() => engine.cancelOrder('1')).toThrow(InvalidStateError);
  });

  it('fails with OrderNotFoundError for unknown ids', () => {
    expect(() => engine.cancelOrder('nope')).toThrow(OrderNotFoundError);
  });

  it('cancels every open order for one symbol', () => {
    engine.placeOrder(limitBuy({ orderId: 'A' }));
    engine.placeOrder(limitBuy({ orderId: 'B' }));
    engine.placeOrder(limitBuy({ orderId: 'C', symbol: 'ENI' }));
    engine.simulateOrderExecution('B', 50);

    const cancelled = engine.cancelAllOrders('INTC');

    expect(cancelled.map((record) => record.fields.reference)).toEqual(['A']);
    expect(engine.getPendingOrders().map((record) => record.fields.symbol)).toEqual(['ENI']);
  });
});

describe('modifyOrder', () => {
  it('changes the price of an open order', () => {
    engine.placeOrder(limitBuy());

    const record = engine.modifyOrder('1', '49.5');

    expect(record.fields.price.toString()).toBe('49.5');
    expect(engine.getOrder('1').price?.toString()).toBe('49.5');
  });

  it('refuses market orders and closed orders', () => {
    engine.placeOrder(marketOrder('buy', 5, 'M1'));
    engine.placeOrder(limitBuy({ orderId: 'L1' }));
    engine.cancelOrder('L1');

    expect(() => engine.modifyOrder('M1', 10)).toThrow(InvalidStateError);
    expect(() => engine.modifyOrder('L1', 10)).toThrow(InvalidStateError);
  });
});

// ============================================================
// Positions and account
// ============================================================

describe('ledger effects', () => {
  it('realizes the closed part and reopens the remainder when a fill flips the position', () => {
    engine.placeOrder(marketOrder('buy', 100, 'B1'));
    engine.simulateOrderExecution('B1', 50);
    engine.placeOrder(marketOrder('sell', 150, 'S1'));
    engine.simulateOrderExecution('S1', 55);

    const position = engine.getPosition('INTC');
    expect(position?.fields.quantityPortfolio).toBe(-50);
    expect(position?.fields.averagePrice.toString()).toBe('55');

    const account = engine.getAccountInfo().fields;
    // 10000 - 100 * 50 + 150 * 55
    expect(account.liquidity.toString()).toBe('13250');
    expect(account.gain.toString()).toBe('500');
  });

  it('keeps the cost basis when a fill only reduces the position', () => {
    engine.placeOrder(marketOrder('buy', 100, 'B1'));
    engine.simulateOrderExecution('B1', 50);
    engine.placeOrder(marketOrder('sell', 40, 'S1'));
    engine.simulateOrderExecution('S1', 52);

    const position = engine.getPosition('INTC');
    expect(position?.fields.quantityPortfolio).toBe(60);
    expect(position?.fields.averagePrice.toString()).toBe('50');
    expect(engine.getAccountInfo().fields.gain.toString()).toBe('80');
  });

  it('drops the position when it closes flat', () => {
    engine.placeOrder(marketOrder('buy', 10, 'B1'));
    engine.simulateOrderExecution('B1', 50);
    engine.placeOrder(marketOrder('sell', 10, 'S1'));
    engine.simulateOrderExecution('S1', 50);

    expect(engine.getPosition('INTC')).toBeNull();
    expect(engine.getPortfolio()).toEqual([]);
  });

  it('values equity as liquidity plus positions at their last price', () => {
    engine.placeOrder(limitBuy());
    engine.simulateOrderExecution('1', 50, 40);
    engine.placeOrder(marketOrder('buy', 10, 'B2'));
    engine.simulateOrderExecution('B2', 55);

    const account = engine.getAccountInfo().fields;
    // liquidity 10000 - 2000 - 550 = 7450, position 50 @ last 55 = 2750
    expect(account.liquidity.toString()).toBe('7450');
    expect(account.equity.toString()).toBe('10200');
    expect(account.accountCode).toBe('SIM1234');
    expect(account.tradingMode).toBe('SIM');
  });

  it('counts unfilled open quantity as in trading', () => {
    engine.placeOrder(limitBuy());
    engine.simulateOrderExecution('1', 50, 40);

    expect(engine.getPosition('INTC')?.fields.quantityInTrading).toBe(60);
  });
});

describe('queries', () => {
  it('lists orders with wire statuses, optionally by symbol', () => {
    engine.placeOrder(limitBuy({ orderId: 'A' }));
    engine.placeOrder(limitBuy({ orderId: 'B', symbol: 'ENI' }));
    engine.cancelOrder('B');

    expect(engine.getOrders().map((record) => record.fields.status)).toEqual(['SENT', 'CANCELLED']);
    expect(engine.getOrders('ENI').map((record) => record.fields.orderId)).toEqual(['2']);
    expect(engine.getPendingOrders().map((record) => record.fields.orderType)).toEqual(['LIMIT']);
  });

  it('always reports a healthy connection', () => {
    expect(engine.getStatus().fields).toEqual({
      connectionStatus: 'CONN_OK',
      applicationStatus: 'TRUE',
      release: 'SIMULATION',
    });
  });

  it('reports availability from liquidity', () => {
    const fields = engine.getAvailability().fields;

    expect(fields.stocksAvailability.toString()).toBe('10000');
    expect(fields.totalLiquidity.toString()).toBe('10000');
  });
});

// ============================================================
// Scaffolding helpers
// ============================================================

describe('scaffolding', () => {
  it('adds, merges and removes simulated positions', () => {
    engine.addSimulatedPosition('ENI', 10, '12');
    engine.addSimulatedPosition('ENI', 10, '14');

    const position = engine.getPosition('ENI');
    expect(position?.fields.quantityPortfolio).toBe(20);
    expect(position?.fields.averagePrice.toString()).toBe('13');

    expect(engine.removeSimulatedPosition('ENI')).toBe(true);
    expect(engine.removeSimulatedPosition('ENI')).toBe(false);
  });

  it('updates the account', () => {
    engine.updateSimulatedAccount({ liquidity: '2500.5', accountCode: 'SIM9' });

    const account = engine.getAccountInfo().fields;
    expect(account.liquidity.toString()).toBe('2500.5');
    expect(account.accountCode).toBe('SIM9');
  });

  it('resets to the initial state', () => {
    engine.placeOrder(limitBuy());
    engine.simulateOrderExecution('1', 50);

    engine.reset();

    expect(engine.getOrders()).toEqual([]);
    expect(engine.getPortfolio()).toEqual([]);
    expect(engine.getAccountInfo().fields.liquidity.toString()).toBe('10000');
    expect(engine.placeOrder(limitBuy()).fields.orderId).toBe('1');
  });
});
