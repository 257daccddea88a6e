import { describe, expect, it } from "vitest";
import { BrokerGateway } from "../../src/broker/gateway.js";
import { MonitorConfig } from "../../src/config/config.js";
import { PositionMonitor } from "../../src/monitor/position_monitor.js";
import { OMS } from "../../src/oms/oms.js";
import { NoopPersistence } from "../../src/persistence/persistence.js";
import { InMemoryStore } from "../../src/storage/store.js";
import { Position } from "../../src/types.js";
import { BROKER_CONFIG, RecordingLogger, ScriptedVenue, StubIndicators } from "../helpers.js";

const T0 = "2024-01-02T10:00:00.000Z";

const allOff: MonitorConfig = {
  useTrailingStop: false,
  trailingStopPips: 20,
  useBreakeven: false,
  breakevenActivationPips: 30,
  breakevenOffsetPips: 5,
  useAtrTrailing: false,
  atrTrailingMultiple: 2
};

function position(overrides: Partial<Position> = {}): Position {
  return {
    symbol: "EURUSD",
    direction: "LONG",
    volume: 0.2,
    entryPrice: 1.1,
    currentPrice: 1.1,
    profitLoss: 0,
    stopLoss: 1.09,
    orderId: "ORD-1",
    openedAt: T0,
    ...overrides
  };
}

async function setup(monitor: Partial<MonitorConfig>) {
  const venue = new ScriptedVenue();
  const store = new InMemoryStore();
  const persistence = new NoopPersistence();
  const logger = new RecordingLogger();
  const indicators = new StubIndicators();
  indicators.price = 1.104;
  let seq = 0;
  const oms = new OMS(store, persistence, logger, () => `ORD-${++seq}`);
  const gateway = new BrokerGateway(venue, store, oms, persistence, logger);
  await gateway.connect(BROKER_CONFIG);
  const positionMonitor = new PositionMonitor(
    gateway,
    indicators,
    { ...allOff, ...monitor, timeframe: "H1", atrPeriod: 14 },
    logger
  );
  return { venue, gateway, logger, indicators, positionMonitor };
}

describe("PositionMonitor.proposeStop", () => {
  it("trails a long position behind the price", async () => {
    const { positionMonitor } = await setup({ useTrailingStop: true });
    expect(positionMonitor.proposeStop(position())).toEqual({
      symbol: "EURUSD",
      from: 1.09,
      to: 1.102,
      rule: "trailing",
      applied: false
    });
  });

  it("moves the stop to breakeven plus offset", async () => {
    const { positionMonitor } = await setup({ useBreakeven: true });
    expect(positionMonitor.proposeStop(position())).toMatchObject({ to: 1.1005, rule: "breakeven" });
  });

  it("takes the most favourable candidate", async () => {
    const { positionMonitor } = await setup({ useTrailingStop: true, useBreakeven: true, useAtrTrailing: true });
    expect(positionMonitor.proposeStop(position())).toMatchObject({ to: 1.102, rule: "trailing" });
  });

  it("trails by a multiple of ATR", async () => {
    const { positionMonitor } = await setup({ useAtrTrailing: true });
    expect(positionMonitor.proposeStop(position())).toMatchObject({ to: 1.1, rule: "atr_trailing" });
  });

  it("never loosens an existing stop", async () => {
    const { positionMonitor } = await setup({ useTrailingStop: true, useBreakeven: true });
    expect(positionMonitor.proposeStop(position({ stopLoss: 1.103 }))).toBeNull();
  });

  it("waits until the trailing distance is in profit", async () => {
    const { positionMonitor, indicators } = await setup({ useTrailingStop: true });
    indicators.price = 1.101;
    expect(positionMonitor.proposeStop(position())).toBeNull();
  });

  it("trails a short position above the price", async () => {
    const { positionMonitor, indicators } = await setup({ useTrailingStop: true });
    indicators.price = 1.096;
    expect(
      positionMonitor.proposeStop(position({ direction: "SHORT", stopLoss: undefined }))
    ).toEqual({ symbol: "EURUSD", from: undefined, to: 1.098, rule: "trailing", applied: false });
  });
});

describe("PositionMonitor.evaluateAndAct", () => {
  it("does nothing with every rule switched off", async () => {
    const { positionMonitor, venue } = await setup({});
    expect(positionMonitor.enabled()).toBe(false);
    expect(await positionMonitor.evaluateAndAct()).toEqual([]);
    expect(venue.positionChanges).toEqual([]);
  });

  it("sends the improved stop to the broker", async () => {
    const { positionMonitor, venue, gateway, logger } = await setup({ useTrailingStop: true });
    const { orderId } = await gateway.placeOrder({
      symbol: "EURUSD",
      type: "MARKET",
      direction: "LONG",
      volume: 0.2,
      stopLoss: 1.09
    });
    await venue.emit({ type: "FILLED", orderId, price: 1.1, volume: 0.2, time: T0 });

    const adjustments = await positionMonitor.evaluateAndAct();

    expect(adjustments).toEqual([{ symbol: "EURUSD", from: 1.09, to: 1.102, rule: "trailing", applied: true }]);
    expect(venue.positionChanges).toEqual([{ symbol: "EURUSD", request: { stopLoss: 1.102 } }]);
    expect(logger.lines).toContain("INFO|EURUSD|Stop moved (trailing) 1.09000 -> 1.10200");
  });

  it("reports a stop the venue refused as not applied", async () => {
    const { positionMonitor, venue, gateway, logger } = await setup({ useTrailingStop: true });
    const { orderId } = await gateway.placeOrder({
      symbol: "EURUSD",
      type: "MARKET",
      direction: "LONG",
      volume: 0.2,
      stopLoss: 1.09
    });
    await venue.emit({ type: "FILLED", orderId, price: 1.1, volume: 0.2, time: T0 });
    venue.venueAnswer = false;

    expect(await positionMonitor.evaluateAndAct()).toMatchObject([{ to: 1.102, applied: false }]);
    expect(logger.lines.some((line) => line.includes("Stop moved"))).toBe(false);
  });
});
