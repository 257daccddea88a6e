import {
  BrokerConfig,
  Direction,
  InstrumentInfo,
  MarketData,
  Order,
  OrderModifyRequest,
  Position,
  PositionModifyRequest
} from "../types.js";
import { ConnectionError, InvalidInstrumentDataError } from "../errors.js";
import { TradeLogger } from "../logging/trade_logger.js";
import { ExecutionVenue, VenueEvent, VenueEventSink } from "./venue.js";

export interface PaperVenueConfig {
  startingBalance: number;
  leverage: number;
  currency: string;
  instruments: InstrumentInfo[];
  fillDelayMs?: number;
}

interface SimPosition {
  symbol: string;
  direction: Direction;
  volume: number;
  entryPrice: number;
  currentPrice: number;
  stopLoss?: number;
  takeProfit?: number;
  orderId: string;
}

interface WorkingOrder {
  orderId: string;
  symbol: string;
  direction: Direction;
  volume: number;
  price: number;
  stopLoss?: number;
  takeProfit?: number;
}

/**
 * Simulated venue. Market orders fill at the last price, limit orders when a
 * bar trades through the limit, and open positions close when a bar reaches
 * their stop-loss (checked first) or take-profit. Events go out in order,
 * after `fillDelayMs`.
 */
export class PaperVenue implements ExecutionVenue {
  readonly name = "paper";
  private sink: VenueEventSink | null = null;
  private instruments: Map<string, InstrumentInfo>;
  private prices = new Map<string, number>();
  private working = new Map<string, WorkingOrder>();
  private positions = new Map<string, SimPosition>();
  private subscriptions = new Set<string>();
  private balance: number;
  private outbox: Promise<void> = Promise.resolve();

  constructor(
    private cfg: PaperVenueConfig,
    private logger: TradeLogger
  ) {
    this.instruments = new Map(cfg.instruments.map((i) => [i.symbol, i]));
    this.balance = cfg.startingBalance;
  }

  async connect(_config: BrokerConfig, sink: VenueEventSink): Promise<void> {
    this.sink = sink;
    this.publish([this.accountEvent(new Date().toISOString())]);
  }

  async disconnect(): Promise<void> {
    this.sink = null;
  }

  async subscribe(symbol: string, timeframe: string): Promise<boolean> {
    if (!this.instruments.has(symbol)) {
      return false;
    }
    this.subscriptions.add(`${symbol}:${timeframe}`);
    return true;
  }

  instrumentInfo(symbol: string): InstrumentInfo {
    const instrument = this.instruments.get(symbol);
    if (!instrument) {
      throw new InvalidInstrumentDataError(symbol, "unknown symbol");
    }
    return { ...instrument };
  }

  async submitOrder(order: Order): Promise<void> {
    this.requireSession();
    const time = new Date().toISOString();
    const reject = (reason: string) =>
      this.publish([{ type: "REJECTED", orderId: order.orderId, reason, time }]);

    const instrument = this.instruments.get(order.symbol);
    if (!instrument) {
      reject(`Unknown symbol ${order.symbol}`);
      return;
    }
    if (this.positions.has(order.symbol)) {
      reject(`Position already open for ${order.symbol}`);
      return;
    }
    if (this.marginFor(instrument, order.requestedVolume) > this.freeMargin()) {
      reject("Not enough money");
      return;
    }

    const last = this.prices.get(order.symbol);
    if (order.type === "MARKET") {
      if (last === undefined) {
        reject(`No price for ${order.symbol}`);
        return;
      }
      this.open(order.orderId, order, last);
      this.publish([
        { type: "ACCEPTED", orderId: order.orderId, time },
        { type: "FILLED", orderId: order.orderId, price: last, volume: order.requestedVolume, time },
        this.accountEvent(time)
      ]);
      return;
    }

    if (order.requestedPrice === undefined) {
      reject("Limit order requires a price");
      return;
    }
    const working: WorkingOrder = {
      orderId: order.orderId,
      symbol: order.symbol,
      direction: order.direction,
      volume: order.requestedVolume,
      price: order.requestedPrice,
      stopLoss: order.stopLoss,
      takeProfit: order.takeProfit
    };
    const events: VenueEvent[] = [{ type: "ACCEPTED", orderId: order.orderId, time }];
    if (last !== undefined && limitReached(working, last, last)) {
      this.open(working.orderId, order, working.price);
      events.push(
        { type: "FILLED", orderId: working.orderId, price: working.price, volume: working.volume, time },
        this.accountEvent(time)
      );
    } else {
      this.working.set(working.orderId, working);
    }
    this.publish(events);
  }

  async modifyOrder(order: Order, request: OrderModifyRequest): Promise<boolean> {
    this.requireSession();
    const working = this.working.get(order.orderId);
    if (!working) {
      return false;
    }
    if (request.newVolume !== undefined && !(request.newVolume > 0)) {
      return false;
    }
    working.price = request.newPrice ?? working.price;
    working.volume = request.newVolume ?? working.volume;
    working.stopLoss = request.newStopLoss ?? working.stopLoss;
    working.takeProfit = request.newTakeProfit ?? working.takeProfit;
    this.publish([
      {
        type: "ORDER_MODIFIED",
        orderId: working.orderId,
        price: working.price,
        volume: working.volume,
        stopLoss: working.stopLoss,
        takeProfit: working.takeProfit
      }
    ]);
    return true;
  }

  async cancelOrder(order: Order): Promise<boolean> {
    this.requireSession();
    if (!this.working.delete(order.orderId)) {
      return false;
    }
    this.publish([{ type: "CANCELLED", orderId: order.orderId, time: new Date().toISOString() }]);
    return true;
  }

  async modifyPosition(position: Position, request: PositionModifyRequest): Promise<boolean> {
    this.requireSession();
    const sim = this.positions.get(position.symbol);
    if (!sim) {
      return false;
    }
    const stopLoss = request.stopLoss ?? sim.stopLoss;
    const takeProfit = request.takeProfit ?? sim.takeProfit;
    if (!protectiveLevelsValid(sim.direction, sim.currentPrice, stopLoss, takeProfit)) {
      return false;
    }
    sim.stopLoss = stopLoss;
    sim.takeProfit = takeProfit;
    this.publish([{ type: "POSITION_MODIFIED", symbol: sim.symbol, stopLoss, takeProfit }]);
    return true;
  }

  async closePosition(position: Position): Promise<boolean> {
    this.requireSession();
    const sim = this.positions.get(position.symbol);
    if (!sim) {
      return false;
    }
    const time = new Date().toISOString();
    const price = this.prices.get(sim.symbol) ?? sim.currentPrice;
    this.publish([this.close(sim, price, "manual close", time), this.accountEvent(time)]);
    return true;
  }

  /** Feeds a bar (or a tick, with open = high = low = close) into the simulation. */
  pushBar(data: MarketData): void {
    this.prices.set(data.symbol, data.close);
    const time = data.timestamp;
    const events: VenueEvent[] = [];
    if (this.subscriptions.has(`${data.symbol}:${data.timeframe}`)) {
      events.push({ type: "TICK", data: { ...data } });
    }

    for (const working of Array.from(this.working.values())) {
      if (working.symbol !== data.symbol || !limitReached(working, data.low, data.high)) {
        continue;
      }
      this.working.delete(working.orderId);
      if (this.positions.has(working.symbol)) {
        events.push({
          type: "REJECTED",
          orderId: working.orderId,
          reason: `Position already open for ${working.symbol}`,
          time
        });
        continue;
      }
      this.open(working.orderId, working, working.price);
      events.push({
        type: "FILLED",
        orderId: working.orderId,
        price: working.price,
        volume: working.volume,
        time
      });
    }

    const sim = this.positions.get(data.symbol);
    if (sim) {
      const exit = protectiveExit(sim, data);
      if (exit) {
        events.push(this.close(sim, exit.price, exit.reason, time));
      } else {
        sim.currentPrice = data.close;
        events.push({
          type: "POSITION_UPDATED",
          symbol: sim.symbol,
          currentPrice: sim.currentPrice,
          profitLoss: this.profitLoss(sim, sim.currentPrice)
        });
      }
    }

    events.push(this.accountEvent(time));
    this.publish(events);
  }

  pushTick(symbol: string, price: number, timestamp = new Date().toISOString()): void {
    this.pushBar({
      symbol,
      timeframe: "TICK",
      open: price,
      high: price,
      low: price,
      close: price,
      volume: 0,
      timestamp
    });
  }

  /** Resolves once every event published so far has been delivered. */
  drain(): Promise<void> {
    return this.outbox;
  }

  private open(
    orderId: string,
    source: Pick<WorkingOrder, "symbol" | "direction" | "stopLoss" | "takeProfit"> & {
      volume?: number;
      requestedVolume?: number;
    },
    price: number
  ): void {
    this.positions.set(source.symbol, {
      symbol: source.symbol,
      direction: source.direction,
      volume: source.volume ?? source.requestedVolume ?? 0,
      entryPrice: price,
      currentPrice: price,
      stopLoss: source.stopLoss,
      takeProfit: source.takeProfit,
      orderId
    });
  }

  private close(sim: SimPosition, price: number, reason: string, time: string): VenueEvent {
    const profitLoss = this.profitLoss(sim, price);
    this.balance = round2(this.balance + profitLoss);
    this.positions.delete(sim.symbol);
    return { type: "POSITION_CLOSED", symbol: sim.symbol, price, profitLoss, reason, time };
  }

  private profitLoss(sim: SimPosition, price: number): number {
    const instrument = this.instruments.get(sim.symbol);
    if (!instrument || instrument.pointSize <= 0) {
      return 0;
    }
    const sign = sim.direction === "LONG" ? 1 : -1;
    const points = ((price - sim.entryPrice) * sign) / instrument.pointSize;
    return round2(points * instrument.tickValue * sim.volume);
  }

  private marginFor(instrument: InstrumentInfo, volume: number): number {
    return (volume * instrument.marginPerLot) / Math.max(1, this.cfg.leverage);
  }

  private marginUsed(): number {
    let used = 0;
    for (const sim of this.positions.values()) {
      const instrument = this.instruments.get(sim.symbol);
      if (instrument) {
        used += this.marginFor(instrument, sim.volume);
      }
    }
    return used;
  }

  private equity(): number {
    let unrealized = 0;
    for (const sim of this.positions.values()) {
      unrealized += this.profitLoss(sim, sim.currentPrice);
    }
    return round2(this.balance + unrealized);
  }

  private freeMargin(): number {
    return this.equity() - this.marginUsed();
  }

  private accountEvent(time: string): VenueEvent {
    return {
      type: "ACCOUNT",
      balance: this.balance,
      equity: this.equity(),
      marginUsed: round2(this.marginUsed()),
      leverage: this.cfg.leverage,
      currency: this.cfg.currency,
      time
    };
  }

  private publish(events: VenueEvent[]): void {
    const sink = this.sink;
    if (!sink) {
      return;
    }
    const delayMs = this.cfg.fillDelayMs ?? 0;
    this.outbox = this.outbox
      .then(() => sleep(delayMs))
      .then(async () => {
        for (const event of events) {
          await sink(event);
        }
      })
      .catch((err: unknown) => {
        this.logger.error("PAPER", "Event delivery failed", err);
      });
  }

  private requireSession(): void {
    if (!this.sink) {
      throw new ConnectionError("Paper venue session is not open");
    }
  }
}

function limitReached(order: WorkingOrder, low: number, high: number): boolean {
  return order.direction === "LONG" ? low <= order.price : high >= order.price;
}

function protectiveExit(
  sim: SimPosition,
  bar: MarketData
): { price: number; reason: string } | null {
  if (sim.direction === "LONG") {
    if (sim.stopLoss !== undefined && bar.low <= sim.stopLoss) {
      return { price: sim.stopLoss, reason: "stop loss" };
    }
    if (sim.takeProfit !== undefined && bar.high >= sim.takeProfit) {
      return { price: sim.takeProfit, reason: "take profit" };
    }
    return null;
  }
  if (sim.stopLoss !== undefined && bar.high >= sim.stopLoss) {
    return { price: sim.stopLoss, reason: "stop loss" };
  }
  if (sim.takeProfit !== undefined && bar.low <= sim.takeProfit) {
    return { price: sim.takeProfit, reason: "take profit" };
  }
  return null;
}

function protectiveLevelsValid(
  direction: Direction,
  price: number,
  stopLoss?: number,
  takeProfit?: number
): boolean {
  const sign = direction === "LONG" ? 1 : -1;
  if (stopLoss !== undefined && (price - stopLoss) * sign <= 0) {
    return false;
  }
  if (takeProfit !== undefined && (takeProfit - price) * sign <= 0) {
    return false;
  }
  return true;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
