// ============================================================
// Wire codec: pure encode/decode between typed values and the
// daemon's line syntax. No I/O, no state.
//
//   responses: TAG;field;field;...
//   commands and framing lines: VERB arg,arg,...
// ============================================================

import { Decimal } from 'decimal.js';
import { ParseError } from '../../shared/errors.js';
import {
  DECIMAL_PATTERN,
  INT_PATTERN,
  formatDecimal,
  formatTimestamp,
  parseTimestamp,
} from '../../shared/formats.js';
import {
  commandSchemas,
  formatIssues,
  safeParseWith,
  validateCommand,
  type Command,
  type OrderKind,
  type OrderSide,
  type PlaceOrderCommand,
} from './commands.js';
import {
  fieldLayout,
  isRecordKind,
  recordSchemas,
  type RecordFields,
  type RecordKind,
  type WireRecord,
} from './schema.js';

export const FIELD_DELIMITER = ';';
export const ARGUMENT_DELIMITER = ',';

/**
 * Outcome for a well-formed line whose tag is not in the schema table.
 * Returned rather than thrown so undocumented daemon messages never break the read loop.
 */
export class UnknownRecordKind {
  readonly tag: string;
  readonly raw: string;

  constructor(tag: string, raw: string) {
    this.tag = tag;
    this.raw = raw;
  }
}

export function isUnknownRecord(value: WireRecord | UnknownRecordKind): value is UnknownRecordKind {
  return value instanceof UnknownRecordKind;
}

interface SplitLine {
  tag: string;
  values: string[];
}

function splitLine(line: string): SplitLine {
  if (line.includes(FIELD_DELIMITER)) {
    const [tag, ...values] = line.split(FIELD_DELIMITER);
    return { tag, values };
  }
  const space = line.indexOf(' ');
  if (space === -1) {
    return { tag: line, values: [] };
  }
  const rest = line.slice(space + 1);
  return { tag: line.slice(0, space), values: rest === '' ? [] : rest.split(ARGUMENT_DELIMITER) };
}

function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$/, '').replace(/\r$/, '');
}

// --- Decoding ---

function decodeAs<K extends RecordKind>(kind: K, values: string[], raw: string): WireRecord<K> {
  const layout = fieldLayout(kind);

  // Trailing empty fields past the schema are padding, not data
  let count = values.length;
  while (count > layout.length && values[count - 1] === '') {
    count--;
  }
  if (count > layout.length) {
    throw new ParseError(`${kind} expects at most ${layout.length} fields, got ${count}`, raw);
  }

  const input: Record<string, string | undefined> = {};
  layout.forEach((field, index) => {
    const value = values[index];
    input[field.name] = value === '' && field.optional ? undefined : value;
  });

  const parsed = safeParseWith(recordSchemas[kind], input);
  if (!parsed.success) {
    throw new ParseError(`Malformed ${kind} record: ${formatIssues(parsed.error).join('; ')}`, raw);
  }

  const fields: Readonly<RecordFields<K>> = Object.freeze(parsed.data);
  return Object.freeze({ kind, fields, raw });
}

/**
 * Decode one response line into a typed record.
 * Throws ParseError when the field count or field types do not match the kind's schema.
 */
export function decode(line: string): WireRecord | UnknownRecordKind {
  const raw = stripLineEnding(line);
  if (raw.trim() === '') {
    throw new ParseError('Empty line', line);
  }

  const { tag, values } = splitLine(raw);
  if (!isRecordKind(tag)) {
    return new UnknownRecordKind(tag, raw);
  }
  return decodeAs(tag, values, raw);
}

// --- Record formatting ---

function formatValue(value: unknown): string {
  if (value instanceof Decimal) {
    return formatDecimal(value);
  }
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  if (value === undefined || value === null) {
    return '';
  }
  // Free text must not break the field structure
  return String(value).replace(/[;\r\n]/g, ' ');
}

/** Render record fields as the line the daemon would send for them. */
export function formatRecord<K extends RecordKind>(kind: K, fields: RecordFields<K>): string {
  const values = new Map(Object.entries(fields));
  const parts = fieldLayout(kind).map((field) => formatValue(values.get(field.name)));
  return [kind, ...parts].join(FIELD_DELIMITER);
}

/**
 * Synthesize a record exactly as decoding its wire line would produce it.
 * Used by the simulation engine so simulated and live records are indistinguishable.
 */
export function buildRecord<K extends RecordKind>(kind: K, fields: RecordFields<K>): WireRecord<K> {
  const raw = formatRecord(kind, fields);
  return decodeAs(kind, splitLine(raw).values, raw);
}

// --- Command encoding ---

const SIDE_PREFIX: Record<OrderSide, string> = { buy: 'ACQ', sell: 'VEN' };

const ORDER_VERB_SUFFIX: Record<OrderKind, string> = {
  market: 'MARKET',
  limit: 'AZ',
  stop: 'STOP',
  'trailing-stop': 'TRAILING',
  iceberg: 'ICEBERG',
};

function placeArguments(order: PlaceOrderCommand): string[] {
  const base = [order.orderId, order.symbol, String(order.quantity)];
  switch (order.orderType) {
    case 'market':
      return base;
    case 'limit':
    case 'stop':
      return [...base, formatDecimal(order.price)];
    case 'trailing-stop':
      return [...base, formatDecimal(order.price), formatDecimal(order.trailAmount)];
    case 'iceberg':
      return [...base, formatDecimal(order.price), String(order.visibleQuantity)];
  }
}

function withArguments(verb: string, args: string[]): string {
  return args.length > 0 ? `${verb} ${args.join(ARGUMENT_DELIMITER)}` : verb;
}

/**
 * Encode a command as one wire line (without the line terminator).
 * Throws ValidationError for malformed parameters.
 */
export function encode(command: Command): string {
  validateCommand(command);

  switch (command.kind) {
    case 'place-order':
      return withArguments(
        `${SIDE_PREFIX[command.side]}${ORDER_VERB_SUFFIX[command.orderType]}`,
        placeArguments(command),
      );
    case 'cancel-order':
      return withArguments('REVORD', [command.orderId]);
    case 'cancel-all':
      return withArguments('REVALL', [command.symbol]);
    case 'modify-order':
      return withArguments('MODORD', [
        command.orderId,
        formatDecimal(command.price),
        ...(command.triggerPrice ? [formatDecimal(command.triggerPrice)] : []),
      ]);
    case 'confirm-order':
      return withArguments('CONFORD', [command.orderId]);
    case 'query-status':
      return 'DARWINSTATUS';
    case 'query-account':
      return 'INFOACCOUNT';
    case 'query-availability':
      return 'INFOAVAILABILITY';
    case 'query-portfolio':
      return 'INFOSTOCKS';
    case 'query-position':
      return withArguments('GETPOSITION', [command.symbol]);
    case 'query-orders':
      return withArguments('ORDERLIST', command.symbol ? [command.symbol] : []);
    case 'query-pending-orders':
      return 'ORDERLISTPENDING';
    case 'query-candles':
      return withArguments('CANDLE', [command.symbol, String(command.days), String(command.periodSeconds)]);
    case 'query-candles-range':
      return withArguments('CANDLERANGE', [
        command.symbol,
        formatTimestamp(command.from),
        formatTimestamp(command.to),
        String(command.periodSeconds),
      ]);
    case 'query-ticks':
      return withArguments('TBT', [command.symbol, String(command.days)]);
    case 'query-ticks-range':
      return withArguments('TBTRANGE', [command.symbol, formatTimestamp(command.from), formatTimestamp(command.to)]);
    case 'set-after-hours':
      return withArguments('VOLUMEAFTERHOURS', [command.enabled ? 'ON' : 'OFF']);
  }
}

// --- Command decoding ---

const PLACE_VERB = /^(ACQ|VEN)(MARKET|AZ|STOP|TRAILING|ICEBERG)$/;

class ArgumentReader {
  constructor(
    private readonly verb: string,
    private readonly args: string[],
    private readonly line: string,
  ) {}

  expectCount(min: number, max = min): void {
    if (this.args.length < min || this.args.length > max) {
      const expected = min === max ? `${min}` : `${min}-${max}`;
      throw new ParseError(`${this.verb} expects ${expected} arguments, got ${this.args.length}`, this.line);
    }
  }

  has(index: number): boolean {
    return index < this.args.length;
  }

  text(index: number): string {
    return this.args[index] ?? '';
  }

  int(index: number): number {
    const value = this.text(index);
    if (!INT_PATTERN.test(value)) {
      throw new ParseError(`${this.verb} argument ${index + 1} is not an integer: "${value}"`, this.line);
    }
    return Number(value);
  }

  decimal(index: number): Decimal {
    const value = this.text(index);
    if (!DECIMAL_PATTERN.test(value)) {
      throw new ParseError(`${this.verb} argument ${index + 1} is not a decimal: "${value}"`, this.line);
    }
    return new Decimal(value);
  }

  timestamp(index: number): Date {
    const value = this.text(index);
    const parsed = parseTimestamp(value);
    if (!parsed) {
      throw new ParseError(`${this.verb} argument ${index + 1} is not a timestamp: "${value}"`, this.line);
    }
    return parsed;
  }
}

function decodePlaceOrder(side: OrderSide, suffix: string, args: ArgumentReader): PlaceOrderCommand {
  const base = { kind: 'place-order' as const, side };
  switch (suffix) {
    case 'MARKET':
      args.expectCount(3);
      return { ...base, orderId: args.text(0), symbol: args.text(1), quantity: args.int(2), orderType: 'market' };
    case 'AZ':
      args.expectCount(4);
      return {
        ...base, orderId: args.text(0), symbol: args.text(1), quantity: args.int(2),
        orderType: 'limit', price: args.decimal(3),
      };
    case 'STOP':
      args.expectCount(4);
      return {
        ...base, orderId: args.text(0), symbol: args.text(1), quantity: args.int(2),
        orderType: 'stop', price: args.decimal(3),
      };
    case 'TRAILING':
      args.expectCount(5);
      return {
        ...base, orderId: args.text(0), symbol: args.text(1), quantity: args.int(2),
        orderType: 'trailing-stop', price: args.decimal(3), trailAmount: args.decimal(4),
      };
    default:
      args.expectCount(5);
      return {
        ...base, orderId: args.text(0), symbol: args.text(1), quantity: args.int(2),
        orderType: 'iceberg', price: args.decimal(3), visibleQuantity: args.int(4),
      };
  }
}

function decodeCommandBody(verb: string, args: ArgumentReader, line: string): Command {
  const place = PLACE_VERB.exec(verb);
  if (place) {
    return decodePlaceOrder(place[1] === 'ACQ' ? 'buy' : 'sell', place[2], args);
  }

  switch (verb) {
    case 'REVORD':
      args.expectCount(1);
      return { kind: 'cancel-order', orderId: args.text(0) };
    case 'REVALL':
      args.expectCount(1);
      return { kind: 'cancel-all', symbol: args.text(0) };
    case 'MODORD':
      args.expectCount(2, 3);
      return {
        kind: 'modify-order',
        orderId: args.text(0),
        price: args.decimal(1),
        ...(args.has(2) ? { triggerPrice: args.decimal(2) } : {}),
      };
    case 'CONFORD':
      args.expectCount(1);
      return { kind: 'confirm-order', orderId: args.text(0) };
    case 'DARWINSTATUS':
      args.expectCount(0);
      return { kind: 'query-status' };
    case 'INFOACCOUNT':
      args.expectCount(0);
      return { kind: 'query-account' };
    case 'INFOAVAILABILITY':
      args.expectCount(0);
      return { kind: 'query-availability' };
    case 'INFOSTOCKS':
      args.expectCount(0);
      return { kind: 'query-portfolio' };
    case 'GETPOSITION':
      args.expectCount(1);
      return { kind: 'query-position', symbol: args.text(0) };
    case 'ORDERLIST':
      args.expectCount(0, 1);
      return args.has(0) ? { kind: 'query-orders', symbol: args.text(0) } : { kind: 'query-orders' };
    case 'ORDERLISTPENDING':
      args.expectCount(0);
      return { kind: 'query-pending-orders' };
    case 'CANDLE':
      args.expectCount(3);
      return { kind: 'query-candles', symbol: args.text(0), days: args.int(1), periodSeconds: args.int(2) };
    case 'CANDLERANGE':
      args.expectCount(4);
      return {
        kind: 'query-candles-range',
        symbol: args.text(0),
        from: args.timestamp(1),
        to: args.timestamp(2),
        periodSeconds: args.int(3),
      };
    case 'TBT':
      args.expectCount(2);
      return { kind: 'query-ticks', symbol: args.text(0), days: args.int(1) };
    case 'TBTRANGE':
      args.expectCount(3);
      return { kind: 'query-ticks-range', symbol: args.text(0), from: args.timestamp(1), to: args.timestamp(2) };
    case 'VOLUMEAFTERHOURS': {
      args.expectCount(1);
      const setting = args.text(0);
      if (setting !== 'ON' && setting !== 'OFF') {
        throw new ParseError(`VOLUMEAFTERHOURS expects ON or OFF, got "${setting}"`, line);
      }
      return { kind: 'set-after-hours', enabled: setting === 'ON' };
    }
    default:
      throw new ParseError(`Unknown command verb: ${verb}`, line);
  }
}

/**
 * Decode an outbound command line back into the command it encodes.
 * Used by in-process daemon stand-ins and for auditing traffic.
 */
export function decodeCommand(line: string): Command {
  const raw = stripLineEnding(line).trim();
  if (raw === '' || raw.includes(FIELD_DELIMITER)) {
    throw new ParseError('Not a command line', line);
  }

  const { tag, values } = splitLine(raw);
  const command = decodeCommandBody(tag, new ArgumentReader(tag, values, raw), raw);

  const checked = safeParseWith(commandSchemas[command.kind], command);
  if (!checked.success) {
    throw new ParseError(`Invalid ${command.kind} arguments: ${formatIssues(checked.error).join('; ')}`, raw);
  }
  return command;
}
