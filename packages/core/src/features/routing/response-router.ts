// ============================================================
// Response router: correlates replies to requests per channel
// and fans unsolicited records out to subscribers.
//
// The wire protocol carries no correlation ids, so each channel
// has at most one request in flight; later requests queue.
// ============================================================

import type { RequestChannel } from '../codec/commands.js';
import { DAEMON_ERROR_CODES } from '../codec/error-codes.js';
import { ORDER_EVENT_KINDS, isKind, type RecordKind, type WireRecord } from '../codec/schema.js';
import { TimeoutError, describeError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';

const logger = createLogger('ResponseRouter');

/**
 * - `single`: the first accepted record completes the request
 * - `list`: accepted records are collected until the channel has been quiet for the settle window
 * - `framed`: records between `BEGIN` and `END` are collected
 */
export type CollectMode = 'single' | 'list' | 'framed';

export interface RequestSpec {
  channel: RequestChannel;
  mode: CollectMode;
  /** Record kinds that answer this request. */
  accepts: ReadonlySet<RecordKind>;
  /** Narrows accepted records further, e.g. to one order id. */
  match?: (record: WireRecord) => boolean;
  /** Matched against the reference field of `ERR` lines. */
  reference?: string;
  timeoutMs?: number;
  /** Resolve with whatever was collected instead of failing when the deadline passes. */
  resolveOnTimeout?: boolean;
}

export interface Reply {
  records: WireRecord[];
  /** The `ERR` line that ended the request, if any. */
  error: WireRecord<'ERR'> | null;
}

export interface ResponseRouterOptions {
  name: string;
  requestTimeoutMs: number;
  listSettleMs: number;
}

export type RecordListener = (record: WireRecord) => void;
export type Unsubscribe = () => void;

interface Waiter {
  spec: RequestSpec;
  records: WireRecord[];
  framed: boolean;
  settleTimer: NodeJS.Timeout | null;
  deadline: NodeJS.Timeout | null;
  resolve: (reply: Reply) => void;
  reject: (error: Error) => void;
}

const ANY = '*';

export class ResponseRouter {
  private readonly options: ResponseRouterOptions;
  // Insertion order doubles as age: the first entry is the oldest waiter
  private readonly waiters = new Map<RequestChannel, Waiter>();
  private readonly locks = new Map<RequestChannel, Promise<void>>();
  private readonly subscribers = new Map<RecordKind | typeof ANY, Set<RecordListener>>();

  constructor(options: ResponseRouterOptions) {
    this.options = options;
  }

  get pendingChannels(): RequestChannel[] {
    return [...this.waiters.keys()];
  }

  /**
   * Run one request/reply exchange. Waits for the channel to be free,
   * registers the waiter, then calls `send`. Rejects with TimeoutError
   * when no complete reply arrives in time.
   */
  async request(spec: RequestSpec, send: () => Promise<void>): Promise<Reply> {
    const release = await this.acquire(spec.channel);
    try {
      const reply = this.register(spec);
      try {
        await send();
      } catch (err) {
        this.discard(spec.channel);
        throw err;
      }
      return await reply;
    } finally {
      release();
    }
  }

  /** Route one decoded record from the read loop. */
  dispatch(record: WireRecord): void {
    if (isKind(record, 'ERR')) {
      if (!this.routeError(record)) {
        this.fanOut(record);
      }
      return;
    }

    const claimed = this.offer(record);
    if (!claimed || ORDER_EVENT_KINDS.has(record.kind)) {
      this.fanOut(record);
    }
  }

  /** Reject every pending request, e.g. when the connection drops. */
  cancelAll(reason: Error): void {
    if (this.waiters.size > 0) {
      logger.warn({ router: this.options.name, pending: this.waiters.size, reason: reason.message }, 'Cancelling pending requests');
    }
    for (const [channel, waiter] of [...this.waiters]) {
      this.waiters.delete(channel);
      clearTimers(waiter);
      waiter.reject(reason);
    }
  }

  subscribe<K extends RecordKind>(kind: K, listener: (record: WireRecord<K>) => void): Unsubscribe {
    return this.addListener(kind, (record) => {
      if (isKind(record, kind)) {
        listener(record);
      }
    });
  }

  /** Receive every record that reaches fan-out. */
  subscribeAll(listener: RecordListener): Unsubscribe {
    return this.addListener(ANY, listener);
  }

  // --- Channel locking ---

  private async acquire(channel: RequestChannel): Promise<() => void> {
    const previous = this.locks.get(channel) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.locks.set(channel, tail);

    await previous;
    return () => {
      release();
      if (this.locks.get(channel) === tail) {
        this.locks.delete(channel);
      }
    };
  }

  // --- Waiters ---

  private register(spec: RequestSpec): Promise<Reply> {
    return new Promise<Reply>((resolve, reject) => {
      const waiter: Waiter = {
        spec,
        records: [],
        framed: false,
        settleTimer: null,
        deadline: null,
        resolve,
        reject,
      };

      const timeoutMs = spec.timeoutMs ?? this.options.requestTimeoutMs;
      waiter.deadline = setTimeout(() => {
        if (this.waiters.get(spec.channel) !== waiter) {
          return;
        }
        if (spec.resolveOnTimeout) {
          this.complete(spec.channel, waiter, null);
          return;
        }
        this.waiters.delete(spec.channel);
        clearTimers(waiter);
        logger.warn({ router: this.options.name, channel: spec.channel, timeout_ms: timeoutMs }, 'Request timed out');
        reject(new TimeoutError(`No reply on the ${spec.channel} channel within ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);

      this.waiters.set(spec.channel, waiter);
    });
  }

  private discard(channel: RequestChannel): void {
    const waiter = this.waiters.get(channel);
    if (waiter) {
      this.waiters.delete(channel);
      clearTimers(waiter);
    }
  }

  private complete(channel: RequestChannel, waiter: Waiter, error: WireRecord<'ERR'> | null): void {
    if (this.waiters.get(channel) !== waiter) {
      return;
    }
    this.waiters.delete(channel);
    clearTimers(waiter);
    waiter.resolve({ records: waiter.records, error });
  }

  /** Offer a record to waiters, oldest first. Returns whether one claimed it. */
  private offer(record: WireRecord): boolean {
    for (const [channel, waiter] of this.waiters) {
      const { spec } = waiter;

      if (spec.mode === 'framed') {
        if (record.kind === 'BEGIN' && !waiter.framed) {
          waiter.framed = true;
          return true;
        }
        if (record.kind === 'END' && waiter.framed) {
          this.complete(channel, waiter, null);
          return true;
        }
      }

      if (!spec.accepts.has(record.kind) || (spec.match && !spec.match(record))) {
        continue;
      }

      waiter.records.push(record);
      if (spec.mode === 'single') {
        this.complete(channel, waiter, null);
      } else if (spec.mode === 'list') {
        this.scheduleSettle(channel, waiter);
      }
      return true;
    }
    return false;
  }

  private scheduleSettle(channel: RequestChannel, waiter: Waiter): void {
    if (waiter.settleTimer) {
      clearTimeout(waiter.settleTimer);
    }
    waiter.settleTimer = setTimeout(() => {
      this.complete(channel, waiter, null);
    }, this.options.listSettleMs);
  }

  /**
   * An `ERR` line goes to the waiter whose reference it names, else to the
   * channel its code belongs to, else to the oldest waiter.
   */
  private routeError(record: WireRecord<'ERR'>): boolean {
    const { reference, code } = record.fields;

    for (const [channel, waiter] of this.waiters) {
      if (waiter.spec.reference !== undefined && waiter.spec.reference === reference) {
        this.complete(channel, waiter, record);
        return true;
      }
    }

    const codeChannel = DAEMON_ERROR_CODES.get(code)?.channel;
    if (codeChannel) {
      const waiter = this.waiters.get(codeChannel);
      if (waiter) {
        this.complete(codeChannel, waiter, record);
        return true;
      }
    }

    const oldest = this.waiters.entries().next();
    if (!oldest.done) {
      const [channel, waiter] = oldest.value;
      this.complete(channel, waiter, record);
      return true;
    }

    logger.warn({ router: this.options.name, code, reference }, 'Unsolicited error line');
    return false;
  }

  // --- Fan-out ---

  private addListener(key: RecordKind | typeof ANY, listener: RecordListener): Unsubscribe {
    const listeners = this.subscribers.get(key) ?? new Set<RecordListener>();
    this.subscribers.set(key, listeners);
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  private fanOut(record: WireRecord): void {
    const listeners = [
      ...(this.subscribers.get(record.kind) ?? []),
      ...(this.subscribers.get(ANY) ?? []),
    ];
    for (const listener of listeners) {
      try {
        listener(record);
      } catch (err) {
        logger.error({ router: this.options.name, kind: record.kind, err: describeError(err) }, 'Subscriber failed');
      }
    }
  }
}

function clearTimers(waiter: Waiter): void {
  if (waiter.settleTimer) {
    clearTimeout(waiter.settleTimer);
    waiter.settleTimer = null;
  }
  if (waiter.deadline) {
    clearTimeout(waiter.deadline);
    waiter.deadline = null;
  }
}
