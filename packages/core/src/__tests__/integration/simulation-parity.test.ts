import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock logger
// ---------------------------------------------------------------------------

vi.mock('../../shared/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  }),
  describeEndpoint: (host: string, port: number) => `${host}:${port}`,
}));

import { decodeCommand } from '../../features/codec/codec.js';
import { SimulationEngine } from '../../features/simulator/simulation-engine.js';
import { TradingClient } from '../../features/trading/trading-client.js';
import { loadConfig } from '../../shared/config.js';
import { startFakeDaemon, type FakeDaemon, type Responder } from '../fixtures/fake-daemon.js';

/** A daemon whose answers come from a simulation engine, line for line. */
function engineResponder(engine: SimulationEngine): Responder {
  return (line) => {
    const command = decodeCommand(line);
    switch (command.kind) {
      case 'place-order':
        return [engine.placeOrder(command).raw];
      case 'cancel-order':
        return [engine.cancelOrder(command.orderId).raw];
      case 'query-account':
        return [engine.getAccountInfo().raw];
      case 'query-orders': {
        const orders = engine.getOrders(command.symbol);
        return orders.length > 0 ? orders.map((order) => order.raw) : ['ERR;;1019'];
      }
      case 'query-portfolio': {
        const positions = engine.getPortfolio();
        return positions.length > 0 ? positions.map((position) => position.raw) : ['ERR;;1018'];
      }
      default:
        return ['ERR;;1002'];
    }
  };
}

/** One scripted session; returns what a strategy would observe. */
async function script(client: TradingClient) {
  const placed = await client.placeOrder({ orderId: 'P1', symbol: 'INTC', side: 'buy', quantity: 100, orderType: 'limit', price: '50.25' });
  const second = await client.placeMarketOrder('ENI', 'sell', 10);
  const orders = await client.getOrders({ symbol: 'INTC' });
  const cancelled = await client.cancelOrder('1');
  const portfolio = await client.getPortfolio();
  const account = await client.getAccountInfo();

  return {
    placed: placed.success && [placed.data.orderId, placed.data.reference, placed.data.status, placed.data.price.toFixed()],
    second: second.success && [second.data.orderId, second.data.side, second.data.quantity],
    orders: orders.success && orders.data.map((order) => [order.orderId, order.orderType, order.status]),
    cancelled: cancelled.success && [cancelled.data.status, cancelled.data.remainingQuantity],
    portfolio: portfolio.success && portfolio.data,
    account: account.success && [account.data.accountCode, account.data.liquidity.toFixed(), account.data.tradingMode],
  };
}

describe('Simulation parity', () => {
  let daemon: FakeDaemon;

  beforeEach(async () => {
    const engine = new SimulationEngine({ accountCode: 'SIM-TEST', initialLiquidity: '10000' });
    daemon = await startFakeDaemon(engineResponder(engine));
  });

  afterEach(async () => {
    await daemon.close();
  });

  it('observes the same results in simulation and against the daemon', async () => {
    const env = {
      TRADING_PORT: String(daemon.port),
      HEARTBEAT_INTERVAL_MS: '0',
      LIST_SETTLE_MS: '30',
      SIM_ACCOUNT_CODE: 'SIM-TEST',
      SIM_INITIAL_LIQUIDITY: '10000',
    };
    const live = new TradingClient({ config: loadConfig({ ...env, TRADING_MODE: 'live' }) });
    const simulated = new TradingClient({ config: loadConfig({ ...env, TRADING_MODE: 'simulation' }) });
    await live.connect();
    await simulated.connect();

    try {
      const observedLive = await script(live);
      const observedSimulated = await script(simulated);

      expect(observedLive).toEqual({
        placed: ['1', 'P1', 'pending', '50.25'],
        second: ['2', 'sell', 10],
        orders: [['1', 'limit', 'pending']],
        cancelled: ['cancelled', 100],
        portfolio: [],
        account: ['SIM-TEST', '10000', 'SIM'],
      });
      expect(observedSimulated).toEqual(observedLive);
    } finally {
      await live.disconnect();
      await simulated.disconnect();
    }
  });
});
