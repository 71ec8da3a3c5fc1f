// ============================================================
// Error taxonomy shared by the codec, transport, router,
// simulation engine and client facades
// ============================================================

/** `internal` marks errors the library did not raise itself; they are not retryable. */
export type ErrorCategory = 'transport' | 'protocol' | 'remote' | 'domain' | 'validation' | 'internal';

export class LinedeskError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = new.target.name;
    this.category = category;
  }
}

/** The transport could not be established (refused, unreachable, timed out). */
export class ConnectionError extends LinedeskError {
  constructor(message: string) {
    super('transport', message);
  }
}

/** An operation needed a live session and there was none. */
export class NotConnectedError extends LinedeskError {
  constructor(message = 'Not connected to the daemon') {
    super('transport', message);
  }
}

export class TimeoutError extends LinedeskError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('transport', message);
    this.timeoutMs = timeoutMs;
  }
}

export class ParseError extends LinedeskError {
  readonly line: string;

  constructor(message: string, line: string) {
    super('protocol', message);
    this.line = line;
  }
}

/** The daemon answered a query with an ERR line. */
export class RemoteError extends LinedeskError {
  readonly code: number;

  constructor(code: number, message: string) {
    super('remote', message);
    this.code = code;
  }
}

export class OrderNotFoundError extends LinedeskError {
  readonly orderId: string;

  constructor(orderId: string) {
    super('domain', `Order not found: ${orderId}`);
    this.orderId = orderId;
  }
}

export class InvalidStateError extends LinedeskError {
  constructor(message: string) {
    super('domain', message);
  }
}

export class SimulationOnlyError extends LinedeskError {
  constructor(operation: string) {
    super('domain', `${operation} is only available in simulation mode`);
  }
}

export class ValidationError extends LinedeskError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('validation', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
