import { InvalidInstrumentDataError } from "../src/errors.js";
import { ExecutionVenue, VenueEvent, VenueEventSink } from "../src/execution/venue.js";
import { TradeLogger, formatTradeMessage } from "../src/logging/trade_logger.js";
import { IndicatorAdapter } from "../src/market_data/indicator_adapter.js";
import { Alerter, AlertSeverity } from "../src/ops/alerter.js";
import {
  AccountState,
  BrokerConfig,
  InstrumentInfo,
  Order,
  OrderModifyRequest,
  Position,
  PositionModifyRequest
} from "../src/types.js";

export const EURUSD: InstrumentInfo = {
  symbol: "EURUSD",
  tickValue: 10,
  marginPerLot: 100000,
  pointSize: 0.0001,
  lotStep: 0.01,
  minVolume: 0.01,
  maxVolume: 100,
  digits: 5
};

export const BROKER_CONFIG: BrokerConfig = { accountId: "test-account", isDemoAccount: true };

export function makeAccount(overrides: Partial<AccountState> = {}): AccountState {
  return {
    accountId: "test-account",
    balance: 10000,
    equity: 10000,
    marginUsed: 0,
    freeMargin: 10000,
    profitLoss: 0,
    leverage: 100,
    currency: "USD",
    updatedAt: "2024-01-02T00:00:00.000Z",
    ...overrides
  };
}

export function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    orderId: "ORD-T1",
    symbol: "EURUSD",
    type: "MARKET",
    direction: "LONG",
    requestedVolume: 0.2,
    status: "PENDING",
    filledVolume: 0,
    createdAt: "2024-01-02T00:00:00.000Z",
    updatedAt: "2024-01-02T00:00:00.000Z",
    ...overrides
  };
}

export class RecordingLogger implements TradeLogger {
  lines: string[] = [];

  info(symbol: string, message: string): void {
    this.lines.push(`INFO|${symbol}|${message}`);
  }

  error(symbol: string, message: string, _err?: unknown): void {
    this.lines.push(`ERROR|${symbol}|${message}`);
  }

  trade(
    symbol: string,
    action: string,
    price: number,
    volume: number,
    stopLoss?: number,
    takeProfit?: number
  ): void {
    this.lines.push(`TRADE|${symbol}|${formatTradeMessage(action, price, volume, stopLoss, takeProfit)}`);
  }

  async flush(): Promise<void> {}

  errors(): string[] {
    return this.lines.filter((l) => l.startsWith("ERROR|"));
  }
}

export class RecordingAlerter implements Alerter {
  alerts: { severity: AlertSeverity; type: string; message: string }[] = [];

  async notify(severity: AlertSeverity, type: string, message: string): Promise<void> {
    this.alerts.push({ severity, type, message });
  }
}

/** Venue whose events are pushed by the test through `emit`. */
export class ScriptedVenue implements ExecutionVenue {
  readonly name = "scripted";
  connectCalls = 0;
  failConnect: Error | null = null;
  failSubmit: Error | null = null;
  submitted: Order[] = [];
  cancelled: string[] = [];
  positionChanges: { symbol: string; request: PositionModifyRequest }[] = [];
  closed: string[] = [];
  venueAnswer = true;
  private sink: VenueEventSink | null = null;
  private instruments = new Map<string, InstrumentInfo>([[EURUSD.symbol, EURUSD]]);

  async connect(_config: BrokerConfig, sink: VenueEventSink): Promise<void> {
    this.connectCalls += 1;
    if (this.failConnect) {
      throw this.failConnect;
    }
    this.sink = sink;
  }

  async disconnect(): Promise<void> {
    this.sink = null;
  }

  async subscribe(symbol: string): Promise<boolean> {
    return this.instruments.has(symbol);
  }

  instrumentInfo(symbol: string): InstrumentInfo {
    const instrument = this.instruments.get(symbol);
    if (!instrument) {
      throw new InvalidInstrumentDataError(symbol, "unknown symbol");
    }
    return { ...instrument };
  }

  async submitOrder(order: Order): Promise<void> {
    if (this.failSubmit) {
      throw this.failSubmit;
    }
    this.submitted.push(order);
  }

  async modifyOrder(_order: Order, _request: OrderModifyRequest): Promise<boolean> {
    return this.venueAnswer;
  }

  async cancelOrder(order: Order): Promise<boolean> {
    this.cancelled.push(order.orderId);
    return this.venueAnswer;
  }

  async modifyPosition(position: Position, request: PositionModifyRequest): Promise<boolean> {
    this.positionChanges.push({ symbol: position.symbol, request });
    return this.venueAnswer;
  }

  async closePosition(position: Position): Promise<boolean> {
    this.closed.push(position.symbol);
    return this.venueAnswer;
  }

  async emit(event: VenueEvent): Promise<void> {
    if (!this.sink) {
      throw new Error("scripted venue is not connected");
    }
    await this.sink(event);
  }
}

/** Indicator values set directly by the test. */
export class StubIndicators implements IndicatorAdapter {
  price: number | null = 1.1;
  ma: number | null = 1.09;
  previousMa: number | null = 1.09;
  previousClose: number | null = 1.085;
  cciValue: number | null = -150;
  atrValues: number[] = [0.002];

  currentPrice(): number | null {
    return this.price;
  }

  close(_symbol: string, _timeframe: string, shift = 0): number | null {
    return shift === 0 ? this.price : this.previousClose;
  }

  movingAverage(_symbol: string, _timeframe: string, _period: number, shift = 0): number | null {
    return shift === 0 ? this.ma : this.previousMa;
  }

  cci(): number | null {
    return this.cciValue;
  }

  atr(): number[] {
    return this.atrValues;
  }
}
