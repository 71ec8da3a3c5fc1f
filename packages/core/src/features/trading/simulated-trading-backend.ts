import type { Decimal } from 'decimal.js';
import type { PlaceOrderCommand } from '../codec/commands.js';
import type { WireRecord } from '../codec/schema.js';
import type { ConnectionState } from '../connection/daemon-connection.js';
import type { RecordListener, Unsubscribe } from '../routing/response-router.js';
import { SimulationEngine, type ExecutionResult } from '../simulator/simulation-engine.js';
import type { ClientConfig } from '../../shared/config.js';
import { NotConnectedError, describeError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { OrderReply } from './mappers.js';
import type { TradingBackend } from './trading-backend.js';

const logger = createLogger('SimulatedTradingBackend');

/**
 * Trading backend answered by the in-process simulation engine. No socket
 * is opened; every new session starts from a freshly reset engine.
 */
export class SimulatedTradingBackend implements TradingBackend {
  readonly mode = 'simulation';
  readonly engine: SimulationEngine;
  private _state: ConnectionState = 'DISCONNECTED';

  constructor(config: ClientConfig) {
    this.engine = new SimulationEngine({
      accountCode: config.simulation.accountCode,
      initialLiquidity: config.simulation.initialLiquidity,
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    if (this._state !== 'CONNECTED') {
      this.engine.reset();
      logger.info('Simulated session started');
      this._state = 'CONNECTED';
    }
  }

  async disconnect(): Promise<void> {
    if (this._state !== 'DISCONNECTED') {
      logger.info('Simulated session ended');
      this._state = 'DISCONNECTED';
    }
  }

  onRecord(listener: RecordListener): Unsubscribe {
    // A failing subscriber must not abort an engine call midway through its events
    const guarded: RecordListener = (record) => {
      try {
        listener(record);
      } catch (err) {
        logger.error({ kind: record.kind, err: describeError(err) }, 'Subscriber failed');
      }
    };
    this.engine.on('record', guarded);
    return () => {
      this.engine.off('record', guarded);
    };
  }

  // The engine has no heartbeat to lapse
  onHealth(): Unsubscribe {
    return () => {};
  }

  metrics(): null {
    return null;
  }

  async placeOrder(command: PlaceOrderCommand): Promise<OrderReply> {
    this.ensureSession();
    return this.engine.placeOrder(command);
  }

  async cancelOrder(orderId: string): Promise<OrderReply> {
    this.ensureSession();
    return this.engine.cancelOrder(orderId);
  }

  async cancelAllOrders(symbol: string): Promise<OrderReply[]> {
    this.ensureSession();
    return this.engine.cancelAllOrders(symbol);
  }

  async modifyOrder(orderId: string, price: Decimal, triggerPrice?: Decimal): Promise<OrderReply> {
    this.ensureSession();
    return this.engine.modifyOrder(orderId, price, triggerPrice);
  }

  async confirmOrder(orderId: string): Promise<OrderReply> {
    this.ensureSession();
    return this.engine.confirmOrder(orderId);
  }

  async simulateOrderExecution(orderId: string, price?: Decimal, quantity?: number): Promise<ExecutionResult> {
    this.ensureSession();
    return this.engine.simulateOrderExecution(orderId, price, quantity);
  }

  async getStatus(): Promise<WireRecord<'DARWIN_STATUS'>> {
    this.ensureSession();
    return this.engine.getStatus();
  }

  async getAccountInfo(): Promise<WireRecord<'INFOACCOUNT'>> {
    this.ensureSession();
    return this.engine.getAccountInfo();
  }

  async getAvailability(): Promise<WireRecord<'AVAILABILITY'>> {
    this.ensureSession();
    return this.engine.getAvailability();
  }

  async getPortfolio(): Promise<WireRecord<'STOCK'>[]> {
    this.ensureSession();
    return this.engine.getPortfolio();
  }

  async getPosition(symbol: string): Promise<WireRecord<'STOCK'> | null> {
    this.ensureSession();
    return this.engine.getPosition(symbol);
  }

  async getOrders(symbol?: string): Promise<WireRecord<'ORDER'>[]> {
    this.ensureSession();
    return this.engine.getOrders(symbol);
  }

  async getPendingOrders(): Promise<WireRecord<'ORDER'>[]> {
    this.ensureSession();
    return this.engine.getPendingOrders();
  }

  private ensureSession(): void {
    if (this._state !== 'CONNECTED') {
      throw new NotConnectedError('The simulated session is not started');
    }
  }
}
