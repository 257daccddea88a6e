import { describe, expect, it } from "vitest";
import { RiskEngine, drawdownPercent } from "../../src/risk/risk_engine.js";
import { GatewaySnapshot, Position } from "../../src/types.js";
import { EURUSD, makeAccount, makeOrder } from "../helpers.js";

const engine = new RiskEngine({
  maxDrawdownPercent: 15,
  tradingStart: "08:00",
  tradingEnd: "20:00",
  timeZone: "UTC"
});
const midday = new Date("2024-01-02T12:00:00Z");

function snapshot(overrides: Partial<GatewaySnapshot> = {}): GatewaySnapshot {
  return { connected: true, account: makeAccount(), positions: [], workingOrders: [], ...overrides };
}

const openPosition: Position = {
  symbol: "EURUSD",
  direction: "LONG",
  volume: 0.2,
  entryPrice: 1.1,
  currentPrice: 1.1,
  profitLoss: 0,
  orderId: "ORD-T1",
  openedAt: "2024-01-02T00:00:00.000Z"
};

describe("RiskEngine.preTradeCheck", () => {
  it("allows an entry on a clean book inside the window", () => {
    expect(engine.preTradeCheck("EURUSD", snapshot(), midday)).toEqual({ ok: true });
  });

  it("blocks a symbol that already has a position or a working order", () => {
    expect(engine.preTradeCheck("EURUSD", snapshot({ positions: [openPosition] }), midday).reason).toBe(
      "Position already open"
    );
    expect(
      engine.preTradeCheck("EURUSD", snapshot({ workingOrders: [makeOrder({ status: "ACCEPTED" })] }), midday)
        .reason
    ).toBe("Order already working");
    expect(engine.preTradeCheck("GBPUSD", snapshot({ positions: [openPosition] }), midday).ok).toBe(true);
  });

  it("blocks outside trading hours", () => {
    const check = engine.preTradeCheck("EURUSD", snapshot(), new Date("2024-01-02T21:00:00Z"));
    expect(check).toEqual({ ok: false, reason: "Outside trading hours" });
  });

  it("blocks at the drawdown limit", () => {
    const account = makeAccount({ balance: 10000, equity: 8500, freeMargin: 8500 });
    expect(engine.preTradeCheck("EURUSD", snapshot({ account }), midday).reason).toBe(
      "Drawdown 15.00% at or above limit 15%"
    );
  });

  it("blocks during a margin call", () => {
    const account = makeAccount({ freeMargin: -1 });
    expect(engine.preTradeCheck("EURUSD", snapshot({ account }), midday).reason).toBe("Margin call");
  });
});

describe("RiskEngine.checkMargin", () => {
  it("compares the required margin with free margin", () => {
    expect(engine.checkMargin(0.2, EURUSD, makeAccount())).toEqual({ ok: true, required: 200, available: 10000 });
    expect(engine.checkMargin(0.2, EURUSD, makeAccount({ freeMargin: 150 }))).toEqual({
      ok: false,
      required: 200,
      available: 150
    });
  });
});

describe("drawdownPercent", () => {
  it("is zero without a positive balance or when equity is above balance", () => {
    expect(drawdownPercent(makeAccount({ balance: 0, equity: -5 }))).toBe(0);
    expect(drawdownPercent(makeAccount({ balance: 100, equity: 120 }))).toBe(0);
    expect(drawdownPercent(makeAccount({ balance: 200, equity: 150 }))).toBe(25);
  });
});
