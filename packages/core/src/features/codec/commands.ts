// ============================================================
// Outbound command vocabulary and its validation rules.
// Commands are validated before any I/O happens.
// ============================================================

import { z } from 'zod';
import { Decimal } from 'decimal.js';
import { ValidationError } from '../../shared/errors.js';

// Identifiers travel inside comma-separated argument lists
const token = z.string().min(1).regex(/^[^\s;,]+$/, 'must not contain whitespace, commas or semicolons');

const positiveInt = z.number().int().positive();
const positiveDecimal = z.instanceof(Decimal).refine((value) => value.isFinite() && value.gt(0), 'must be a positive decimal');

export const orderSides = ['buy', 'sell'] as const;
export const orderKinds = ['market', 'limit', 'stop', 'trailing-stop', 'iceberg'] as const;

export type OrderSide = (typeof orderSides)[number];
export type OrderKind = (typeof orderKinds)[number];

const placeBase = {
  kind: z.literal('place-order'),
  orderId: token,
  symbol: token,
  side: z.enum(orderSides),
  quantity: positiveInt,
};

const placeOrderSchema = z.discriminatedUnion('orderType', [
  z.object({ ...placeBase, orderType: z.literal('market') }).strict(),
  z.object({ ...placeBase, orderType: z.literal('limit'), price: positiveDecimal }).strict(),
  z.object({ ...placeBase, orderType: z.literal('stop'), price: positiveDecimal }).strict(),
  z.object({
    ...placeBase,
    orderType: z.literal('trailing-stop'),
    price: positiveDecimal,
    trailAmount: positiveDecimal,
  }).strict(),
  z.object({
    ...placeBase,
    orderType: z.literal('iceberg'),
    price: positiveDecimal,
    visibleQuantity: positiveInt,
  }).strict(),
]).superRefine((order, ctx) => {
  if (order.orderType === 'iceberg' && order.visibleQuantity > order.quantity) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'visibleQuantity must not exceed quantity',
      path: ['visibleQuantity'],
    });
  }
});

const dateRange = {
  from: z.date(),
  to: z.date(),
};

const rangeOrdered = (range: { from: Date; to: Date }) => range.from.getTime() <= range.to.getTime();

export const commandSchemas = {
  'place-order': placeOrderSchema,
  'cancel-order': z.object({ kind: z.literal('cancel-order'), orderId: token }),
  'cancel-all': z.object({ kind: z.literal('cancel-all'), symbol: token }),
  'modify-order': z.object({
    kind: z.literal('modify-order'),
    orderId: token,
    price: positiveDecimal,
    triggerPrice: positiveDecimal.optional(),
  }),
  'confirm-order': z.object({ kind: z.literal('confirm-order'), orderId: token }),
  'query-status': z.object({ kind: z.literal('query-status') }),
  'query-account': z.object({ kind: z.literal('query-account') }),
  'query-availability': z.object({ kind: z.literal('query-availability') }),
  'query-portfolio': z.object({ kind: z.literal('query-portfolio') }),
  'query-position': z.object({ kind: z.literal('query-position'), symbol: token }),
  'query-orders': z.object({ kind: z.literal('query-orders'), symbol: token.optional() }),
  'query-pending-orders': z.object({ kind: z.literal('query-pending-orders') }),
  'query-candles': z.object({
    kind: z.literal('query-candles'),
    symbol: token,
    days: positiveInt,
    periodSeconds: positiveInt,
  }),
  'query-candles-range': z.object({
    kind: z.literal('query-candles-range'),
    symbol: token,
    ...dateRange,
    periodSeconds: positiveInt,
  }).refine(rangeOrdered, { message: 'from must not be after to', path: ['from'] }),
  'query-ticks': z.object({ kind: z.literal('query-ticks'), symbol: token, days: positiveInt }),
  'query-ticks-range': z.object({
    kind: z.literal('query-ticks-range'),
    symbol: token,
    ...dateRange,
  }).refine(rangeOrdered, { message: 'from must not be after to', path: ['from'] }),
  'set-after-hours': z.object({ kind: z.literal('set-after-hours'), enabled: z.boolean() }),
};

type CommandSchemas = typeof commandSchemas;
export type CommandKind = keyof CommandSchemas;
export type CommandOf<K extends CommandKind> = z.output<CommandSchemas[K]>;
export type Command = { [K in CommandKind]: CommandOf<K> }[CommandKind];
export type PlaceOrderCommand = CommandOf<'place-order'>;

export function safeParseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): z.SafeParseReturnType<z.input<S>, z.output<S>> {
  return schema.safeParse(input);
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/**
 * Validate a command against its kind's parameter rules.
 * Throws ValidationError listing every violated rule.
 */
export function validateCommand<C extends Command>(command: C): C {
  const result = safeParseWith(commandSchemas[command.kind], command);
  if (!result.success) {
    throw new ValidationError(`Invalid ${command.kind} command`, formatIssues(result.error));
  }
  return command;
}

// --- Request channels ---

/**
 * Response channel a command is answered on. The protocol carries no
 * correlation ids, so requests are matched to replies per channel.
 */
export type RequestChannel =
  | 'status'
  | 'account'
  | 'availability'
  | 'portfolio'
  | 'orders'
  | 'order'
  | 'afterHours'
  | 'data';

export function channelOf(command: Command): RequestChannel {
  switch (command.kind) {
    case 'place-order':
    case 'cancel-order':
    case 'cancel-all':
    case 'modify-order':
    case 'confirm-order':
      return 'order';
    case 'query-status':
      return 'status';
    case 'query-account':
      return 'account';
    case 'query-availability':
      return 'availability';
    case 'query-portfolio':
    case 'query-position':
      return 'portfolio';
    case 'query-orders':
    case 'query-pending-orders':
      return 'orders';
    case 'set-after-hours':
      return 'afterHours';
    case 'query-candles':
    case 'query-candles-range':
    case 'query-ticks':
    case 'query-ticks-range':
      return 'data';
  }
}
