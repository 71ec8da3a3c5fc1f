import { EventEmitter } from 'events';
import { Socket, createConnection } from 'net';
import { encode, decode, isUnknownRecord, type UnknownRecordKind } from '../codec/codec.js';
import type { WireRecord } from '../codec/schema.js';
import type { ConnectionSettings } from '../../shared/config.js';
import { ConnectionError, NotConnectedError, ParseError, describeError } from '../../shared/errors.js';
import { createLogger, describeEndpoint } from '../../shared/logger.js';

const logger = createLogger('DaemonConnection');

export type ConnectionState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED' | 'DEGRADED';

export interface HeartbeatSettings {
  intervalMs: number;
  /** Silence longer than this moves the connection to DEGRADED. */
  timeoutMs: number;
}

export interface DaemonConnectionOptions extends ConnectionSettings {
  /** Label used in logs and errors, e.g. "trading" or "historical". */
  name: string;
  /** Omit to disable the status heartbeat. */
  heartbeat?: HeartbeatSettings;
  retryDelayMs?: number;
}

export interface ConnectOverrides {
  attempts?: number;
  timeoutMs?: number;
}

export interface StateChange {
  from: ConnectionState;
  to: ConnectionState;
  at: Date;
  /** Time spent in `from` before the change. */
  durationMs: number;
}

export interface ConnectionMetrics {
  attempts: number;
  successes: number;
  failures: number;
  lastConnectedAt: Date | null;
  lastStatusAt: Date | null;
  uptimePercent: number;
  recentStateChanges: StateChange[];
}

const MAX_STATE_HISTORY = 10;
const DEFAULT_RETRY_DELAY_MS = 500;

function writeLine(socket: Socket, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(`${line}\n`, (err) => (err ? reject(new ConnectionError(err.message)) : resolve()));
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Owns one socket to one daemon endpoint.
 *
 * Events:
 * - `record` (WireRecord): every decoded line, in arrival order
 * - `state` (next, previous): every state transition
 * - `connected`, `disconnected`, `degraded`, `restored`
 * - `malformed` (ParseError), `unknown` (UnknownRecordKind): skipped lines
 */
export class DaemonConnection extends EventEmitter {
  private readonly options: DaemonConnectionOptions;
  private readonly endpoint: string;
  private socket: Socket | null = null;
  private buffer = '';
  private _state: ConnectionState = 'DISCONNECTED';
  private connecting: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private lastStatusMs = 0;

  // Metrics
  private readonly createdAt = Date.now();
  private stateSince = Date.now();
  private connectedMs = 0;
  private attempts = 0;
  private successes = 0;
  private failures = 0;
  private lastConnectedAt: Date | null = null;
  private lastStatusAt: Date | null = null;
  private history: StateChange[] = [];

  constructor(options: DaemonConnectionOptions) {
    super();
    this.options = options;
    this.endpoint = describeEndpoint(options.host, options.port);
  }

  get state(): ConnectionState {
    return this._state;
  }

  get name(): string {
    return this.options.name;
  }

  /** CONNECTED or DEGRADED: writes are attempted and reads continue. */
  get isConnected(): boolean {
    return this._state === 'CONNECTED' || this._state === 'DEGRADED';
  }

  /**
   * Open the socket. Resolves immediately when already connected; concurrent
   * callers share one attempt. Throws ConnectionError once every attempt failed.
   */
  connect(overrides: ConnectOverrides = {}): Promise<void> {
    if (this.isConnected) {
      return Promise.resolve();
    }
    if (!this.connecting) {
      const attempts = overrides.attempts ?? this.options.connectAttempts;
      const timeoutMs = overrides.timeoutMs ?? this.options.connectTimeoutMs;
      this.connecting = this.establish(attempts, timeoutMs).finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /** Write one line. Concurrent sends are flushed one after another. */
  send(line: string): Promise<void> {
    const socket = this.socket;
    if (!this.isConnected || !socket) {
      return Promise.reject(new NotConnectedError(`The ${this.name} connection is ${this._state}`));
    }

    const write = this.writeChain.then(() => writeLine(socket, line));
    this.writeChain = write.then(
      () => undefined,
      (err: unknown) => {
        logger.warn({ connection: this.name, err: describeError(err) }, 'Write failed');
      },
    );
    logger.debug({ connection: this.name, line }, 'Sending line');
    return write;
  }

  /** Close the socket. Safe to call in any state. */
  async disconnect(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch((err: unknown) => {
        logger.debug({ connection: this.name, err: describeError(err) }, 'Pending connect ended before disconnect');
      });
    }

    this.stopHeartbeat();
    const socket = this.socket;
    this.socket = null;
    this.buffer = '';

    if (socket) {
      socket.removeAllListeners();
      socket.destroy();
    }

    if (this._state !== 'DISCONNECTED') {
      logger.info({ connection: this.name, endpoint: this.endpoint }, 'Disconnected');
      this.setState('DISCONNECTED');
      this.emit('disconnected');
    }
  }

  /** Explicit reconnect. The connection never reconnects on its own. */
  async reconnect(overrides: ConnectOverrides = {}): Promise<void> {
    await this.disconnect();
    await this.connect(overrides);
  }

  metrics(): ConnectionMetrics {
    const now = Date.now();
    const elapsed = now - this.createdAt;
    const connected = this.connectedMs + (this.isConnected ? now - this.stateSince : 0);
    return {
      attempts: this.attempts,
      successes: this.successes,
      failures: this.failures,
      lastConnectedAt: this.lastConnectedAt,
      lastStatusAt: this.lastStatusAt,
      uptimePercent: elapsed > 0 ? Math.round((connected / elapsed) * 10000) / 100 : 0,
      recentStateChanges: [...this.history],
    };
  }

  // --- Connection establishment ---

  private async establish(attempts: number, timeoutMs: number): Promise<void> {
    this.setState('CONNECTING');
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        await delay(this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
      }
      this.attempts++;
      try {
        const socket = await this.openSocket(timeoutMs);
        this.successes++;
        this.lastConnectedAt = new Date();
        this.attach(socket);
        logger.info({ connection: this.name, endpoint: this.endpoint, attempt }, 'Connected');
        this.setState('CONNECTED');
        this.startHeartbeat();
        this.emit('connected');
        return;
      } catch (err) {
        this.failures++;
        lastError = err;
        logger.warn(
          { connection: this.name, endpoint: this.endpoint, attempt, attempts, err: describeError(err) },
          'Connection attempt failed',
        );
      }
    }

    this.setState('DISCONNECTED');
    throw new ConnectionError(
      `Cannot connect to the ${this.name} port at ${this.endpoint} after ${attempts} attempt(s): ${describeError(lastError)}`,
    );
  }

  private openSocket(timeoutMs: number): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host: this.options.host, port: this.options.port });

      const timer = setTimeout(() => {
        socket.removeAllListeners();
        socket.destroy();
        reject(new ConnectionError(`Timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeAllListeners();
        resolve(socket);
      });

      socket.once('error', (err: Error) => {
        clearTimeout(timer);
        socket.removeAllListeners();
        socket.destroy();
        reject(new ConnectionError(err.message));
      });
    });
  }

  private attach(socket: Socket): void {
    this.socket = socket;
    this.buffer = '';
    socket.setEncoding('utf8');
    socket.setNoDelay(true);

    socket.on('data', (chunk: string) => this.handleData(chunk));
    socket.on('error', (err: Error) => {
      logger.error({ connection: this.name, err: err.message }, 'Socket error');
    });
    socket.on('close', () => this.handleClose(socket));
  }

  private handleClose(socket: Socket): void {
    if (this.socket !== socket) {
      return;
    }
    logger.warn({ connection: this.name, endpoint: this.endpoint }, 'Connection closed by the daemon');
    this.stopHeartbeat();
    this.socket = null;
    this.buffer = '';
    this.setState('DISCONNECTED');
    this.emit('disconnected');
  }

  // --- Read loop ---

  private handleData(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      this.handleLine(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private handleLine(line: string): void {
    if (line.trim() === '') {
      return;
    }

    let decoded: WireRecord | UnknownRecordKind;
    try {
      decoded = decode(line);
    } catch (err) {
      if (err instanceof ParseError) {
        logger.warn({ connection: this.name, line: err.line, reason: err.message }, 'Skipping malformed line');
        this.emit('malformed', err);
        return;
      }
      throw err;
    }

    if (isUnknownRecord(decoded)) {
      logger.debug({ connection: this.name, tag: decoded.tag }, 'Skipping unknown record kind');
      this.emit('unknown', decoded);
      return;
    }

    if (decoded.kind === 'DARWIN_STATUS') {
      this.noteStatus();
    }
    this.emit('record', decoded);
  }

  // --- Heartbeat ---

  private startHeartbeat(): void {
    this.stopHeartbeat();
    const heartbeat = this.options.heartbeat;
    if (!heartbeat) {
      return;
    }

    this.lastStatusMs = Date.now();
    this.heartbeatTimer = setInterval(() => {
      this.checkHeartbeat(heartbeat);
    }, heartbeat.intervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private checkHeartbeat(heartbeat: HeartbeatSettings): void {
    const silentMs = Date.now() - this.lastStatusMs;
    if (this._state === 'CONNECTED' && silentMs > heartbeat.timeoutMs) {
      logger.warn({ connection: this.name, silent_ms: silentMs }, 'Heartbeat lapsed, connection degraded');
      this.setState('DEGRADED');
      this.emit('degraded');
    }

    this.send(encode({ kind: 'query-status' })).catch((err: unknown) => {
      logger.warn({ connection: this.name, err: describeError(err) }, 'Heartbeat probe not sent');
    });
  }

  private noteStatus(): void {
    this.lastStatusMs = Date.now();
    this.lastStatusAt = new Date(this.lastStatusMs);
    if (this._state === 'DEGRADED') {
      logger.info({ connection: this.name }, 'Heartbeat restored');
      this.setState('CONNECTED');
      this.emit('restored');
    }
  }

  private setState(next: ConnectionState): void {
    const previous = this._state;
    if (previous === next) {
      return;
    }

    const now = Date.now();
    const durationMs = now - this.stateSince;
    if (previous === 'CONNECTED' || previous === 'DEGRADED') {
      this.connectedMs += durationMs;
    }
    this.history.push({ from: previous, to: next, at: new Date(now), durationMs });
    if (this.history.length > MAX_STATE_HISTORY) {
      this.history.shift();
    }

    this._state = next;
    this.stateSince = now;
    logger.debug({ connection: this.name, from: previous, to: next }, 'State change');
    this.emit('state', next, previous);
  }
}
