// Shared
export { loadConfig, type ClientConfig, type ConnectionSettings, type TradingMode } from './shared/config.js';
export { createLogger, describeEndpoint, type Logger } from './shared/logger.js';
export * from './shared/errors.js';
export { ok, fail, toResult, type Result, type Failure } from './shared/result.js';
export { toDecimal, formatDecimal, formatTimestamp, parseTimestamp, type DecimalInput } from './shared/formats.js';

// Features: codec
export {
  decode,
  encode,
  decodeCommand,
  buildRecord,
  formatRecord,
  isUnknownRecord,
  UnknownRecordKind,
  FIELD_DELIMITER,
  ARGUMENT_DELIMITER,
} from './features/codec/codec.js';
export {
  validateCommand,
  channelOf,
  orderSides,
  orderKinds,
  type Command,
  type CommandKind,
  type CommandOf,
  type PlaceOrderCommand,
  type OrderSide,
  type OrderKind,
  type RequestChannel,
} from './features/codec/commands.js';
export {
  recordSchemas,
  isKind,
  isRecordKind,
  fieldLayout,
  type RecordKind,
  type RecordFields,
  type WireRecord,
} from './features/codec/schema.js';
export { DAEMON_ERROR_CODES, describeErrorCode, isEmptyResultCode, type DaemonErrorCode } from './features/codec/error-codes.js';

// Features: connection
export {
  DaemonConnection,
  type ConnectionState,
  type ConnectionMetrics,
  type DaemonConnectionOptions,
  type HeartbeatSettings,
  type StateChange,
} from './features/connection/daemon-connection.js';

// Features: routing
export {
  ResponseRouter,
  type CollectMode,
  type RequestSpec,
  type Reply,
  type RecordListener,
  type Unsubscribe,
} from './features/routing/response-router.js';

// Features: simulator
export {
  SimulationEngine,
  type SimulatedOrder,
  type SimulationEngineOptions,
  type ExecutionResult,
} from './features/simulator/simulation-engine.js';
export { PositionLedger, type Position } from './features/simulator/position-ledger.js';

// Features: trading
export { TradingClient, withTradingSession, type TradingClientOptions } from './features/trading/trading-client.js';
export type { TradingBackend, HealthEvent } from './features/trading/trading-backend.js';
export { LiveTradingBackend } from './features/trading/live-trading-backend.js';
export { SimulatedTradingBackend } from './features/trading/simulated-trading-backend.js';
export type * from './features/trading/types.js';

// Features: historical
export {
  HistoricalClient,
  withHistoricalSession,
  DAILY_PERIOD_SECONDS,
  DEFAULT_INTRADAY_PERIOD_SECONDS,
  type HistoricalClientOptions,
} from './features/historical/historical-client.js';
export { Series, candleSeries, tickSeries, type CandleSeries, type TickSeries } from './features/historical/series.js';
export type * from './features/historical/types.js';
