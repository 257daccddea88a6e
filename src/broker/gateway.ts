import { EventEmitter } from "node:events";
import {
  AccountState,
  BrokerConfig,
  GatewaySnapshot,
  InstrumentInfo,
  MarketData,
  Order,
  OrderModifyRequest,
  OrderRequest,
  OrderResponse,
  Position,
  PositionModifyRequest,
  TradeInfo
} from "../types.js";
import {
  ConnectionError,
  InvalidOrderRequestError,
  NotConnectedError,
  PositionNotFoundError,
  VenueRejectionError,
  describeError
} from "../errors.js";
import { ExecutionVenue, VenueEvent } from "../execution/venue.js";
import { TradeLogger } from "../logging/trade_logger.js";
import { OMS, isTerminal } from "../oms/oms.js";
import { Persistence } from "../persistence/persistence.js";
import { InMemoryStore, emptyAccount } from "../storage/store.js";
import { SerialLock } from "../utils/serial_lock.js";
import {
  Broker,
  MarketDataListener,
  OrderListener,
  TradeListener,
  Unsubscribe
} from "./broker.js";

const TAG = "BROKER";

type GatewayEvents = {
  marketData: MarketData;
  trade: TradeInfo;
  order: Order;
};

/**
 * Single owner of order, position and account state. Requests go out to the
 * venue; state only changes when the venue reports back through
 * `handleVenueEvent`, one event at a time.
 */
export class BrokerGateway implements Broker {
  private connected = false;
  private lock = new SerialLock();
  private events = new EventEmitter();

  constructor(
    private venue: ExecutionVenue,
    private store: InMemoryStore,
    private oms: OMS,
    private persistence: Persistence,
    private logger: TradeLogger
  ) {
    this.events.setMaxListeners(0);
  }

  async connect(config: BrokerConfig): Promise<void> {
    if (this.connected) {
      return;
    }
    this.store.account = emptyAccount(config.accountId, this.store.account.currency);
    try {
      await this.venue.connect(config, (event) => this.handleVenueEvent(event));
    } catch (err) {
      throw new ConnectionError(`Failed to connect to ${this.venue.name}: ${describeError(err)}`, {
        cause: err
      });
    }
    this.connected = true;
    this.logger.info(TAG, `Connected to ${this.venue.name} (account ${config.accountId})`);
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    await this.venue.disconnect();
    this.logger.info(TAG, `Disconnected from ${this.venue.name}`);
  }

  isConnected(): boolean {
    return this.connected;
  }

  async subscribeToMarketData(symbol: string, timeframe: string): Promise<boolean> {
    this.requireConnected("subscribeToMarketData");
    const ok = await this.venue.subscribe(symbol, timeframe);
    if (!ok) {
      this.logger.error(symbol, `Market data subscription refused for ${timeframe}`);
    }
    return ok;
  }

  async placeOrder(request: OrderRequest): Promise<OrderResponse> {
    this.requireConnected("placeOrder");
    validateOrderRequest(request);

    const order = await this.lock.run(async () => {
      const created = await this.oms.createOrder(request);
      this.emit("order", created);
      return { ...created };
    });

    try {
      await this.venue.submitOrder(order);
    } catch (err) {
      const reason = describeError(err);
      await this.lock.run(async () => {
        const rejected = await this.oms.transition(order.orderId, "REJECTED", {
          rejectedReason: reason
        });
        if (rejected) {
          this.emit("order", rejected);
        }
      });
      this.logger.error(order.symbol, `Order ${order.orderId} could not be sent`, err);
      throw new VenueRejectionError(order.orderId, reason, { cause: err });
    }

    return {
      orderId: order.orderId,
      status: "PENDING",
      message: `Order sent to ${this.venue.name}`
    };
  }

  async modifyOrder(orderId: string, request: OrderModifyRequest): Promise<boolean> {
    this.requireConnected("modifyOrder");
    const order = await this.getOrder(orderId);
    if (isTerminal(order.status)) {
      return false;
    }
    return this.venue.modifyOrder(order, request);
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    this.requireConnected("cancelOrder");
    const order = await this.getOrder(orderId);
    if (order.status === "CANCELLED") {
      return true;
    }
    // PENDING -> CANCELLED is not a legal move; wait for the venue to accept first.
    if (order.status === "PENDING" || isTerminal(order.status)) {
      return false;
    }
    return this.venue.cancelOrder(order);
  }

  async modifyPosition(symbol: string, request: PositionModifyRequest): Promise<boolean> {
    this.requireConnected("modifyPosition");
    const position = await this.positionFor(symbol);
    return this.venue.modifyPosition(position, request);
  }

  async closePosition(symbol: string): Promise<boolean> {
    this.requireConnected("closePosition");
    const position = await this.positionFor(symbol);
    return this.venue.closePosition(position);
  }

  async getPositions(): Promise<Position[]> {
    this.requireConnected("getPositions");
    return this.lock.run(() => Array.from(this.store.positions.values()).map((p) => ({ ...p })));
  }

  async getAccountInfo(): Promise<AccountState> {
    this.requireConnected("getAccountInfo");
    return this.lock.run(() => ({ ...this.store.account }));
  }

  async getOrder(orderId: string): Promise<Order> {
    this.requireConnected("getOrder");
    return this.lock.run(() => ({ ...this.oms.get(orderId) }));
  }

  async getWorkingOrders(): Promise<Order[]> {
    this.requireConnected("getWorkingOrders");
    return this.lock.run(() => this.store.workingOrders().map((o) => ({ ...o })));
  }

  async snapshot(): Promise<GatewaySnapshot> {
    this.requireConnected("snapshot");
    return this.lock.run(() => this.store.getSnapshot(this.connected));
  }

  getInstrumentInfo(symbol: string): InstrumentInfo {
    this.requireConnected("getInstrumentInfo");
    return this.venue.instrumentInfo(symbol);
  }

  onMarketDataUpdate(listener: MarketDataListener): Unsubscribe {
    return this.subscribe("marketData", listener);
  }

  onTradeExecuted(listener: TradeListener): Unsubscribe {
    return this.subscribe("trade", listener);
  }

  onOrderUpdate(listener: OrderListener): Unsubscribe {
    return this.subscribe("order", listener);
  }

  /** Entry point for venue notifications. Never rejects. */
  handleVenueEvent(event: VenueEvent): Promise<void> {
    return this.lock.run(() => this.apply(event)).catch((err: unknown) => {
      this.logger.error(TAG, `Failed to apply ${event.type} event`, err);
    });
  }

  /** Resolves once all queued events and requests have been processed. */
  idle(): Promise<void> {
    return this.lock.idle();
  }

  private async apply(event: VenueEvent): Promise<void> {
    switch (event.type) {
      case "ACCEPTED":
        await this.moveOrder(event.orderId, "ACCEPTED");
        return;
      case "FILLED":
        await this.applyFill(event.orderId, event.price, event.volume, event.time);
        return;
      case "REJECTED": {
        const order = await this.moveOrder(event.orderId, "REJECTED", { rejectedReason: event.reason });
        if (order) {
          this.logger.error(order.symbol, `Order ${order.orderId} rejected: ${event.reason}`);
        }
        return;
      }
      case "CANCELLED":
        await this.moveOrder(event.orderId, "CANCELLED");
        return;
      case "ORDER_MODIFIED": {
        const current = this.store.orders.get(event.orderId);
        if (!current) {
          this.logger.error(TAG, `Modification for unknown order ${event.orderId}`);
          return;
        }
        const amended = await this.oms.amend(event.orderId, {
          requestedPrice: event.price ?? current.requestedPrice,
          requestedVolume: event.volume ?? current.requestedVolume,
          stopLoss: event.stopLoss ?? current.stopLoss,
          takeProfit: event.takeProfit ?? current.takeProfit
        });
        if (amended) {
          this.emit("order", amended);
        }
        return;
      }
      case "POSITION_MODIFIED": {
        const position = this.store.positions.get(event.symbol);
        if (!position) {
          this.logger.error(event.symbol, "Modification for a position that is not open");
          return;
        }
        await this.updatePosition({
          ...position,
          stopLoss: event.stopLoss ?? position.stopLoss,
          takeProfit: event.takeProfit ?? position.takeProfit
        });
        this.logger.info(
          event.symbol,
          `Position modified SL: ${position.stopLoss ?? "-"} -> ${event.stopLoss ?? position.stopLoss ?? "-"}, TP: ${event.takeProfit ?? position.takeProfit ?? "-"}`
        );
        return;
      }
      case "POSITION_UPDATED": {
        const position = this.store.positions.get(event.symbol);
        if (position) {
          await this.updatePosition(
            { ...position, currentPrice: event.currentPrice, profitLoss: event.profitLoss },
            false
          );
        }
        return;
      }
      case "POSITION_CLOSED":
        await this.applyClose(event.symbol, event.price, event.profitLoss, event.reason, event.time);
        return;
      case "TICK":
        this.emit("marketData", { ...event.data });
        return;
      case "ACCOUNT":
        await this.updateAccountInfo({
          balance: event.balance,
          equity: event.equity,
          marginUsed: event.marginUsed,
          leverage: event.leverage,
          currency: event.currency,
          updatedAt: event.time
        });
        return;
    }
  }

  private async moveOrder(
    orderId: string,
    status: "ACCEPTED" | "REJECTED" | "CANCELLED",
    patch?: { rejectedReason?: string }
  ): Promise<Order | null> {
    const current = this.store.orders.get(orderId);
    if (!current) {
      this.logger.error(TAG, `${status} for unknown order ${orderId}`);
      return null;
    }
    const updated = await this.oms.transition(orderId, status, patch);
    if (!updated) {
      this.logger.error(current.symbol, `Ignored ${current.status} -> ${status} for order ${orderId}`);
      return null;
    }
    this.emit("order", updated);
    return updated;
  }

  private async applyFill(orderId: string, price: number, volume: number, time: string): Promise<void> {
    const current = this.store.orders.get(orderId);
    if (!current) {
      this.logger.error(TAG, `Fill for unknown order ${orderId}`);
      return;
    }
    if (current.status === "PENDING") {
      const accepted = await this.moveOrder(orderId, "ACCEPTED");
      if (!accepted) {
        return;
      }
    }
    const filled = await this.oms.transition(orderId, "FILLED", {
      filledVolume: volume,
      avgFillPrice: price
    });
    if (!filled) {
      this.logger.error(current.symbol, `Ignored fill for order ${orderId} in status ${current.status}`);
      return;
    }
    this.emit("order", filled);

    const open = this.store.positions.get(filled.symbol);
    if (open) {
      this.logger.error(
        filled.symbol,
        `Fill for order ${filled.orderId} replaces open position from order ${open.orderId}`
      );
    }
    await this.updatePosition({
      symbol: filled.symbol,
      direction: filled.direction,
      volume,
      entryPrice: price,
      currentPrice: price,
      profitLoss: 0,
      stopLoss: filled.stopLoss,
      takeProfit: filled.takeProfit,
      orderId: filled.orderId,
      openedAt: time
    });

    const trade: TradeInfo = {
      kind: "OPEN",
      orderId: filled.orderId,
      symbol: filled.symbol,
      orderType: filled.type,
      direction: filled.direction,
      volume,
      price,
      profitLoss: 0,
      stopLoss: filled.stopLoss,
      takeProfit: filled.takeProfit,
      executionTime: time,
      comment: filled.comment
    };
    this.logger.trade(
      filled.symbol,
      filled.direction === "LONG" ? "BUY" : "SELL",
      price,
      volume,
      filled.stopLoss,
      filled.takeProfit
    );
    await this.recordTrade(trade);
    this.emit("trade", trade);
  }

  private async applyClose(
    symbol: string,
    price: number,
    profitLoss: number,
    reason: string,
    time: string
  ): Promise<void> {
    const position = this.store.positions.get(symbol);
    if (!position) {
      this.logger.error(symbol, "Close reported for a position that is not open");
      return;
    }
    await this.removePosition(symbol);

    const entry = this.store.orders.get(position.orderId);
    const trade: TradeInfo = {
      kind: "CLOSE",
      orderId: position.orderId,
      symbol,
      orderType: entry?.type ?? "MARKET",
      direction: position.direction,
      volume: position.volume,
      price,
      profitLoss,
      stopLoss: position.stopLoss,
      takeProfit: position.takeProfit,
      executionTime: time,
      comment: reason
    };
    this.logger.trade(symbol, "CLOSE", price, position.volume);
    this.logger.info(symbol, `Position closed (${reason}), P/L ${profitLoss.toFixed(2)}`);
    await this.recordTrade(trade);
    this.emit("trade", trade);
  }

  private async updatePosition(position: Position, persist = true): Promise<void> {
    this.store.positions.set(position.symbol, position);
    if (persist) {
      await this.safely(position.symbol, "persist position", () =>
        this.persistence.upsertPosition(position)
      );
    }
  }

  private async removePosition(symbol: string): Promise<void> {
    this.store.positions.delete(symbol);
    await this.safely(symbol, "delete position", () => this.persistence.deletePosition(symbol));
  }

  private async updateAccountInfo(
    update: Pick<AccountState, "balance" | "equity" | "marginUsed" | "leverage" | "currency" | "updatedAt">
  ): Promise<void> {
    const previousBalance = this.store.account.balance;
    this.store.account = {
      ...this.store.account,
      ...update,
      freeMargin: update.equity - update.marginUsed,
      profitLoss: update.equity - update.balance
    };
    if (update.balance !== previousBalance) {
      const account = { ...this.store.account };
      await this.safely(TAG, "persist account snapshot", () =>
        this.persistence.insertAccountSnapshot(account)
      );
    }
  }

  private async recordTrade(trade: TradeInfo): Promise<void> {
    await this.safely(trade.symbol, "persist trade", () => this.persistence.insertTrade(trade));
  }

  private async safely(symbol: string, what: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.error(symbol, `Failed to ${what}`, err);
    }
  }

  private async positionFor(symbol: string): Promise<Position> {
    const position = await this.lock.run(() => this.store.positions.get(symbol));
    if (!position) {
      throw new PositionNotFoundError(symbol);
    }
    return { ...position };
  }

  private subscribe<K extends keyof GatewayEvents>(
    name: K,
    listener: (payload: GatewayEvents[K]) => void | Promise<void>
  ): Unsubscribe {
    const wrapped = (payload: GatewayEvents[K]) => {
      try {
        const result = listener(payload);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.logger.error(TAG, `${name} listener failed`, err));
        }
      } catch (err) {
        this.logger.error(TAG, `${name} listener failed`, err);
      }
    };
    this.events.on(name, wrapped);
    return () => {
      this.events.off(name, wrapped);
    };
  }

  private emit<K extends keyof GatewayEvents>(name: K, payload: GatewayEvents[K]): void {
    this.events.emit(name, payload);
  }

  private requireConnected(operation: string): void {
    if (!this.connected) {
      throw new NotConnectedError(operation);
    }
  }
}

function validateOrderRequest(request: OrderRequest): void {
  if (!request.symbol) {
    throw new InvalidOrderRequestError("Order symbol is required");
  }
  if (!Number.isFinite(request.volume) || request.volume <= 0) {
    throw new InvalidOrderRequestError(`Order volume must be positive, got ${request.volume}`);
  }
  if (request.type === "LIMIT" && !(request.price !== undefined && request.price > 0)) {
    throw new InvalidOrderRequestError("Limit order requires a positive price");
  }
  for (const [label, level] of [
    ["stop loss", request.stopLoss],
    ["take profit", request.takeProfit]
  ] as const) {
    if (level !== undefined && !(Number.isFinite(level) && level > 0)) {
      throw new InvalidOrderRequestError(`Order ${label} must be a positive price, got ${level}`);
    }
  }
}
