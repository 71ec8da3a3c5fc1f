// ============================================================
// Position Ledger - Net holdings per symbol in simulation mode
// ============================================================

import { Decimal } from 'decimal.js';
import type { OrderSide } from '../codec/commands.js';

export interface Position {
  symbol: string;
  /** Signed: positive long, negative short. */
  quantity: number;
  averageCost: Decimal;
  lastPrice: Decimal;
}

export interface FillOutcome {
  position: Position | null;
  /** Profit or loss realized by the closing part of the fill. */
  realized: Decimal;
}

const ZERO = new Decimal(0);

/**
 * Tracks positions as the signed sum of fills. A fill that crosses zero
 * realizes the closed part first, then reopens the remainder at the fill price.
 */
export class PositionLedger {
  private positions: Map<string, Position> = new Map();
  private realizedTotal: Decimal = ZERO;

  applyFill(symbol: string, side: OrderSide, quantity: number, price: Decimal): FillOutcome {
    const delta = side === 'buy' ? quantity : -quantity;
    const existing = this.positions.get(symbol);

    if (!existing || existing.quantity === 0 || Math.sign(existing.quantity) === Math.sign(delta)) {
      const held = existing?.quantity ?? 0;
      const heldCost = existing?.averageCost ?? ZERO;
      const next = held + delta;
      const averageCost = heldCost.times(Math.abs(held)).plus(price.times(Math.abs(delta))).dividedBy(Math.abs(next));
      const position: Position = { symbol, quantity: next, averageCost, lastPrice: price };
      this.positions.set(symbol, position);
      return { position: { ...position }, realized: ZERO };
    }

    // Reducing, closing or flipping
    const closing = Math.min(Math.abs(delta), Math.abs(existing.quantity));
    const realized = price.minus(existing.averageCost).times(closing).times(Math.sign(existing.quantity));
    this.realizedTotal = this.realizedTotal.plus(realized);

    const remaining = existing.quantity + delta;
    if (remaining === 0) {
      this.positions.delete(symbol);
      return { position: null, realized };
    }

    const flipped = Math.sign(remaining) !== Math.sign(existing.quantity);
    const position: Position = {
      symbol,
      quantity: remaining,
      averageCost: flipped ? price : existing.averageCost,
      lastPrice: price,
    };
    this.positions.set(symbol, position);
    return { position: { ...position }, realized };
  }

  /**
   * Upsert a position directly, bypassing fills.
   */
  set(position: Position): void {
    if (position.quantity === 0) {
      this.positions.delete(position.symbol);
      return;
    }
    this.positions.set(position.symbol, { ...position });
  }

  get(symbol: string): Position | undefined {
    const position = this.positions.get(symbol);
    return position ? { ...position } : undefined;
  }

  remove(symbol: string): boolean {
    return this.positions.delete(symbol);
  }

  list(): Position[] {
    return Array.from(this.positions.values(), (position) => ({ ...position }));
  }

  get realized(): Decimal {
    return this.realizedTotal;
  }

  /**
   * Unrealized P&L for a position at its last known price.
   */
  unrealized(position: Position): Decimal {
    return position.lastPrice.minus(position.averageCost).times(position.quantity);
  }

  marketValue(position: Position): Decimal {
    return position.lastPrice.times(position.quantity);
  }

  clear(): void {
    this.positions.clear();
    this.realizedTotal = ZERO;
  }
}
