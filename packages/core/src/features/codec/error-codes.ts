import type { RequestChannel } from './commands.js';

export interface DaemonErrorCode {
  message: string;
  /** Channel whose pending request an unreferenced ERR with this code answers. */
  channel?: RequestChannel;
  /** The code signals an empty list rather than a failure. */
  empty?: boolean;
}

export const DAEMON_ERROR_CODES: ReadonlyMap<number, DaemonErrorCode> = new Map<number, DaemonErrorCode>([
  [1000, { message: 'Generic daemon error' }],
  [1001, { message: 'Platform not connected to the exchange' }],
  [1002, { message: 'Unknown command' }],
  [1003, { message: 'Malformed command' }],
  [1010, { message: 'Insufficient liquidity', channel: 'order' }],
  [1011, { message: 'Quantity not allowed', channel: 'order' }],
  [1012, { message: 'Price out of range', channel: 'order' }],
  [1013, { message: 'Market closed', channel: 'order' }],
  [1018, { message: 'Portfolio is empty', channel: 'portfolio', empty: true }],
  [1019, { message: 'No orders', channel: 'orders', empty: true }],
  [1020, { message: 'Order not found', channel: 'order' }],
  [1021, { message: 'Order already closed', channel: 'order' }],
  [1030, { message: 'Unknown symbol' }],
  [1031, { message: 'No historical data for the requested range', channel: 'data', empty: true }],
]);

export function describeErrorCode(code: number): string {
  return DAEMON_ERROR_CODES.get(code)?.message ?? `Daemon error ${code}`;
}

export function isEmptyResultCode(code: number): boolean {
  return DAEMON_ERROR_CODES.get(code)?.empty === true;
}
