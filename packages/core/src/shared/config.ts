import { z } from 'zod';
import * as dotenv from 'dotenv';

const flag = (fallback: boolean) => z.preprocess(
  (val) => (val === undefined || val === '' ? undefined : val === 'true' || val === true),
  z.boolean().default(fallback),
);

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const configSchema = z.object({
  DAEMON_HOST: z.string().min(1).default('127.0.0.1'),
  TRADING_PORT: z.coerce.number().int().min(1).max(65535).default(10002),
  HISTORICAL_PORT: z.coerce.number().int().min(1).max(65535).default(10003),
  TRADING_MODE: z.enum(['live', 'simulation']).default('live'),
  CONNECT_TIMEOUT_MS: millis(3000),
  CONNECT_ATTEMPTS: z.coerce.number().int().min(1).default(1),
  REQUEST_TIMEOUT_MS: millis(5000),
  HISTORICAL_TIMEOUT_MS: millis(30000),
  LIST_SETTLE_MS: millis(150),
  HEARTBEAT_INTERVAL_MS: millis(10000),
  HEARTBEAT_TIMEOUT_MS: millis(30000),
  AUTO_CONFIRM_ORDERS: flag(true),
  SIM_ACCOUNT_CODE: z.string().min(1).default('SIM1234'),
  SIM_INITIAL_LIQUIDITY: z.string().regex(/^\d+(\.\d+)?$/, 'SIM_INITIAL_LIQUIDITY must be a plain decimal').default('10000'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type TradingMode = 'live' | 'simulation';

export interface ConnectionSettings {
  host: string;
  port: number;
  connectTimeoutMs: number;
  connectAttempts: number;
}

export interface ClientConfig {
  host: string;
  tradingPort: number;
  historicalPort: number;
  mode: TradingMode;
  connectTimeoutMs: number;
  connectAttempts: number;
  requestTimeoutMs: number;
  historicalTimeoutMs: number;
  listSettleMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  autoConfirmOrders: boolean;
  simulation: {
    accountCode: string;
    initialLiquidity: string;
  };
  logLevel: string;
}

// Variables left empty in a .env file count as unset
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadConfig(envOverrides?: Record<string, string | undefined>): ClientConfig {
  if (!envOverrides) {
    dotenv.config();
  }
  const env = dropEmpty(envOverrides ?? process.env);
  const raw = configSchema.parse(env);

  return {
    host: raw.DAEMON_HOST,
    tradingPort: raw.TRADING_PORT,
    historicalPort: raw.HISTORICAL_PORT,
    mode: raw.TRADING_MODE,
    connectTimeoutMs: raw.CONNECT_TIMEOUT_MS,
    connectAttempts: raw.CONNECT_ATTEMPTS,
    requestTimeoutMs: raw.REQUEST_TIMEOUT_MS,
    historicalTimeoutMs: raw.HISTORICAL_TIMEOUT_MS,
    listSettleMs: raw.LIST_SETTLE_MS,
    heartbeatIntervalMs: raw.HEARTBEAT_INTERVAL_MS,
    heartbeatTimeoutMs: raw.HEARTBEAT_TIMEOUT_MS,
    autoConfirmOrders: raw.AUTO_CONFIRM_ORDERS,
    simulation: {
      accountCode: raw.SIM_ACCOUNT_CODE,
      initialLiquidity: raw.SIM_INITIAL_LIQUIDITY,
    },
    logLevel: raw.LOG_LEVEL,
  };
}
