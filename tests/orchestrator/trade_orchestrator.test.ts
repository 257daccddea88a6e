import { describe, expect, it } from "vitest";
import { BrokerGateway } from "../../src/broker/gateway.js";
import { OMS } from "../../src/oms/oms.js";
import { OrchestratorConfig, TradeOrchestrator } from "../../src/orchestrator/trade_orchestrator.js";
import { NoopPersistence } from "../../src/persistence/persistence.js";
import { RiskEngine, RiskLimits } from "../../src/risk/risk_engine.js";
import { InMemoryStore } from "../../src/storage/store.js";
import { BROKER_CONFIG, RecordingAlerter, RecordingLogger, ScriptedVenue, StubIndicators } from "../helpers.js";

const NOON = new Date("2024-01-02T12:00:00Z");
const T0 = NOON.toISOString();

const baseConfig: OrchestratorConfig = {
  timeframe: "H1",
  riskPercent: 1,
  stopLossPips: 50,
  minLot: 0.1,
  maxLot: 1,
  maPeriod: 20,
  cciPeriod: 14,
  atrPeriod: 14,
  signal: { mode: "oscillator", oversoldLevel: -100, overboughtLevel: 100, allowShort: true },
  exit: {
    slMultiplier: 8.5,
    tpMultiplier: 8.0,
    slBufferMult: 0.5,
    tpBufferMult: 0.5,
    maxBufferPips: 50,
    pointSize: 0.0001,
    useHybrid: true,
    atrWeight: 0.5,
    pivotWeight: 0.5
  }
};

const allDay: RiskLimits = { maxDrawdownPercent: 15, tradingStart: "00:00", tradingEnd: "23:59", timeZone: "UTC" };

interface SetupOptions {
  config?: Partial<OrchestratorConfig>;
  limits?: Partial<RiskLimits>;
  account?: { balance?: number; equity?: number; marginUsed?: number; leverage?: number };
  connect?: boolean;
}

async function setup(options: SetupOptions = {}) {
  const venue = new ScriptedVenue();
  const store = new InMemoryStore();
  const persistence = new NoopPersistence();
  const logger = new RecordingLogger();
  const alerter = new RecordingAlerter();
  const indicators = new StubIndicators();
  let seq = 0;
  const oms = new OMS(store, persistence, logger, () => `ORD-${++seq}`);
  const gateway = new BrokerGateway(venue, store, oms, persistence, logger);
  const orchestrator = new TradeOrchestrator(
    gateway,
    indicators,
    new RiskEngine({ ...allDay, ...options.limits }),
    { ...baseConfig, ...options.config },
    logger,
    alerter,
    () => NOON
  );
  orchestrator.attach();

  if (options.connect !== false) {
    await gateway.connect(BROKER_CONFIG);
    await venue.emit({
      type: "ACCOUNT",
      balance: options.account?.balance ?? 10000,
      equity: options.account?.equity ?? 10000,
      marginUsed: options.account?.marginUsed ?? 0,
      leverage: options.account?.leverage ?? 100,
      currency: "USD",
      time: T0
    });
  }
  return { venue, gateway, logger, alerter, indicators, orchestrator };
}

describe("TradeOrchestrator entries", () => {
  it("sends a sized market order with hybrid exits", async () => {
    const { orchestrator, venue, logger } = await setup();
    const outcome = await orchestrator.runCycle("EURUSD");

    expect(outcome).toEqual({
      kind: "submitted",
      symbol: "EURUSD",
      orderId: "ORD-1",
      direction: "LONG",
      lots: 0.2,
      stopLoss: 1.091,
      takeProfit: 1.1085
    });
    expect(venue.submitted).toHaveLength(1);
    expect(venue.submitted[0]).toMatchObject({
      type: "MARKET",
      direction: "LONG",
      requestedVolume: 0.2,
      stopLoss: 1.091,
      takeProfit: 1.1085,
      comment: "oscillator LONG"
    });
    expect(logger.lines).toContain("INFO|EURUSD|Order sent to scripted: LONG 0.20 lots, order ORD-1");
  });

  it("goes short on an overbought reading below the average", async () => {
    const { orchestrator, indicators } = await setup();
    indicators.price = 1.08;
    indicators.cciValue = 150;

    expect(await orchestrator.runCycle("EURUSD")).toMatchObject({
      kind: "submitted",
      direction: "SHORT",
      stopLoss: 1.089,
      takeProfit: 1.0715
    });
  });

  it("keeps one position or working order per symbol", async () => {
    const { orchestrator, venue } = await setup();
    const first = await orchestrator.runCycle("EURUSD");
    expect(first.kind).toBe("submitted");
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "skipped",
      symbol: "EURUSD",
      reason: "Order already working"
    });

    await venue.emit({ type: "FILLED", orderId: "ORD-1", price: 1.1, volume: 0.2, time: T0 });
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "skipped",
      symbol: "EURUSD",
      reason: "Position already open"
    });
    expect(venue.submitted).toHaveLength(1);
  });

  it("does not overlap cycles for the same symbol", async () => {
    const { orchestrator, venue } = await setup();
    const [first, second] = await Promise.all([
      orchestrator.runCycle("EURUSD"),
      orchestrator.runCycle("EURUSD")
    ]);
    expect(first.kind).toBe("submitted");
    expect(second).toEqual({ kind: "skipped", symbol: "EURUSD", reason: "Cycle already running" });
    expect(venue.submitted).toHaveLength(1);
  });
});

describe("TradeOrchestrator gates", () => {
  it("skips while the broker is disconnected", async () => {
    const { orchestrator } = await setup({ connect: false });
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "skipped",
      symbol: "EURUSD",
      reason: "Broker not connected"
    });
  });

  it("skips outside the trading window", async () => {
    const { orchestrator, venue } = await setup({ limits: { tradingStart: "14:00", tradingEnd: "17:00" } });
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "skipped",
      symbol: "EURUSD",
      reason: "Outside trading hours"
    });
    expect(venue.submitted).toEqual([]);
  });

  it("reports missing indicator history", async () => {
    const { orchestrator, indicators } = await setup();
    indicators.atrValues = [];
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "no_signal",
      symbol: "EURUSD",
      reason: "Insufficient indicator history"
    });
  });

  it("waits when no entry condition holds", async () => {
    const { orchestrator, indicators, venue } = await setup();
    indicators.cciValue = -50;
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "no_signal",
      symbol: "EURUSD",
      reason: "No entry condition"
    });
    expect(venue.submitted).toEqual([]);
  });

  it("rejects unusable lot bounds", async () => {
    const { orchestrator, logger } = await setup({ config: { minLot: 2, maxLot: 1 } });
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "sizing_rejected",
      symbol: "EURUSD",
      reason: "Min lot 2 exceeds max lot 1"
    });
    expect(logger.errors()).toEqual(["ERROR|EURUSD|Sizing rejected for EURUSD: Min lot 2 exceeds max lot 1"]);
  });

  it("refuses entries the free margin cannot cover", async () => {
    const { orchestrator, venue, logger } = await setup({ account: { leverage: 1, marginUsed: 5000 } });
    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "insufficient_margin",
      symbol: "EURUSD",
      required: 10000,
      available: 5000
    });
    expect(venue.submitted).toEqual([]);
    expect(logger.errors()).toEqual([
      "ERROR|EURUSD|Margin required 10000.00 exceeds free margin 5000.00 for EURUSD"
    ]);
  });
});

describe("TradeOrchestrator alerts", () => {
  it("raises alerts when the venue refuses an order", async () => {
    const { orchestrator, venue, alerter } = await setup();
    venue.failSubmit = new Error("socket closed");

    expect(await orchestrator.runCycle("EURUSD")).toEqual({
      kind: "submit_failed",
      symbol: "EURUSD",
      error: "Order ORD-1 rejected: socket closed"
    });
    expect(alerter.alerts).toEqual([
      { severity: "warning", type: "order_rejected", message: "Order ORD-1 rejected for EURUSD" },
      { severity: "critical", type: "order_error", message: "Order failed for EURUSD" }
    ]);
  });

  it("reports closed positions", async () => {
    const { orchestrator, venue, alerter } = await setup();
    await orchestrator.runCycle("EURUSD");
    await venue.emit({ type: "FILLED", orderId: "ORD-1", price: 1.1, volume: 0.2, time: T0 });
    await venue.emit({
      type: "POSITION_CLOSED",
      symbol: "EURUSD",
      price: 1.091,
      profitLoss: -180,
      reason: "stop loss",
      time: T0
    });
    expect(alerter.alerts).toEqual([{ severity: "info", type: "position_closed", message: "EURUSD closed: stop loss" }]);
  });
});
