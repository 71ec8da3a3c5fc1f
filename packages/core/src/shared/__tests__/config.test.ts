import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config.js';

// ============================================================
// Config validation (Zod schema)
// ============================================================

describe('Config validation (Zod schema)', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      host: '127.0.0.1',
      tradingPort: 10002,
      historicalPort: 10003,
      mode: 'live',
      connectTimeoutMs: 3000,
      connectAttempts: 1,
      requestTimeoutMs: 5000,
      historicalTimeoutMs: 30000,
      listSettleMs: 150,
      heartbeatIntervalMs: 10000,
      heartbeatTimeoutMs: 30000,
      autoConfirmOrders: true,
      simulation: {
        accountCode: 'SIM1234',
        initialLiquidity: '10000',
      },
      logLevel: 'info',
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ TRADING_PORT: '12002', REQUEST_TIMEOUT_MS: '250', CONNECT_ATTEMPTS: '3' });
    expect(config.tradingPort).toBe(12002);
    expect(config.requestTimeoutMs).toBe(250);
    expect(config.connectAttempts).toBe(3);
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ DAEMON_HOST: '', HISTORICAL_PORT: '' });
    expect(config.host).toBe('127.0.0.1');
    expect(config.historicalPort).toBe(10003);
  });

  it('selects simulation mode', () => {
    const config = loadConfig({ TRADING_MODE: 'simulation', SIM_ACCOUNT_CODE: 'SIM-TEST', SIM_INITIAL_LIQUIDITY: '2500.50' });
    expect(config.mode).toBe('simulation');
    expect(config.simulation).toEqual({ accountCode: 'SIM-TEST', initialLiquidity: '2500.50' });
  });

  it('parses AUTO_CONFIRM_ORDERS as a boolean', () => {
    expect(loadConfig({ AUTO_CONFIRM_ORDERS: 'false' }).autoConfirmOrders).toBe(false);
    expect(loadConfig({ AUTO_CONFIRM_ORDERS: 'true' }).autoConfirmOrders).toBe(true);
  });

  it('allows disabling the heartbeat with zero', () => {
    expect(loadConfig({ HEARTBEAT_INTERVAL_MS: '0' }).heartbeatIntervalMs).toBe(0);
  });

  it('rejects an unknown trading mode', () => {
    expect(() => loadConfig({ TRADING_MODE: 'paper' })).toThrow(ZodError);
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ TRADING_PORT: '70000' })).toThrow(ZodError);
  });

  it('rejects a malformed initial liquidity', () => {
    expect(() => loadConfig({ SIM_INITIAL_LIQUIDITY: '10k' })).toThrow(ZodError);
  });

  it('requires at least one connection attempt', () => {
    expect(() => loadConfig({ CONNECT_ATTEMPTS: '0' })).toThrow(ZodError);
  });

  it('LOG_LEVEL accepts valid values', () => {
    for (const level of ['trace', 'debug', 'info', 'warn', 'error', 'fatal']) {
      expect(loadConfig({ LOG_LEVEL: level }).logLevel).toBe(level);
    }
  });
});
