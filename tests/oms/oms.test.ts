import { describe, expect, it } from "vitest";
import { OrderNotFoundError } from "../../src/errors.js";
import { OMS, canTransition, isTerminal } from "../../src/oms/oms.js";
import { NoopPersistence } from "../../src/persistence/persistence.js";
import { InMemoryStore } from "../../src/storage/store.js";
import { Order } from "../../src/types.js";
import { RecordingLogger } from "../helpers.js";

class FailingPersistence extends NoopPersistence {
  override async upsertOrder(_order: Order): Promise<void> {
    throw new Error("db down");
  }
}

function setup(persistence = new NoopPersistence()) {
  const store = new InMemoryStore();
  const logger = new RecordingLogger();
  let seq = 0;
  const oms = new OMS(store, persistence, logger, () => `ORD-${++seq}`);
  return { store, logger, oms };
}

describe("order transitions", () => {
  it("follows the order lifecycle", () => {
    expect(canTransition("PENDING", "ACCEPTED")).toBe(true);
    expect(canTransition("PENDING", "REJECTED")).toBe(true);
    expect(canTransition("PENDING", "FILLED")).toBe(false);
    expect(canTransition("ACCEPTED", "CANCELLED")).toBe(true);
    expect(canTransition("FILLED", "CANCELLED")).toBe(false);
    expect(isTerminal("FILLED")).toBe(true);
    expect(isTerminal("ACCEPTED")).toBe(false);
  });
});

describe("OMS", () => {
  it("creates PENDING orders with fresh ids", async () => {
    const { oms, store } = setup();
    const a = await oms.createOrder({ symbol: "EURUSD", type: "MARKET", direction: "LONG", volume: 0.2 });
    const b = await oms.createOrder({ symbol: "EURUSD", type: "MARKET", direction: "SHORT", volume: 0.1 });
    expect([a.orderId, b.orderId]).toEqual(["ORD-1", "ORD-2"]);
    expect(a.status).toBe("PENDING");
    expect(a.filledVolume).toBe(0);
    expect(store.workingOrders()).toHaveLength(2);
  });

  it("applies legal transitions and refuses illegal ones", async () => {
    const { oms } = setup();
    const order = await oms.createOrder({ symbol: "EURUSD", type: "MARKET", direction: "LONG", volume: 0.2 });
    await oms.transition(order.orderId, "ACCEPTED");
    const filled = await oms.transition(order.orderId, "FILLED", { filledVolume: 0.2, avgFillPrice: 1.1 });
    expect(filled).toMatchObject({ status: "FILLED", filledVolume: 0.2, avgFillPrice: 1.1 });
    expect(await oms.transition(order.orderId, "CANCELLED")).toBeNull();
    expect(oms.get(order.orderId).status).toBe("FILLED");
  });

  it("amends working orders only", async () => {
    const { oms } = setup();
    const order = await oms.createOrder({ symbol: "EURUSD", type: "LIMIT", direction: "LONG", volume: 0.2, price: 1.09 });
    expect((await oms.amend(order.orderId, { requestedPrice: 1.095 }))?.requestedPrice).toBe(1.095);
    await oms.transition(order.orderId, "REJECTED", { rejectedReason: "test" });
    expect(await oms.amend(order.orderId, { requestedPrice: 1.08 })).toBeNull();
  });

  it("throws for unknown ids", () => {
    const { oms } = setup();
    expect(() => oms.get("ORD-missing")).toThrow(OrderNotFoundError);
  });

  it("keeps the in-memory order when persistence fails", async () => {
    const { oms, logger } = setup(new FailingPersistence());
    const order = await oms.createOrder({ symbol: "EURUSD", type: "MARKET", direction: "LONG", volume: 0.2 });
    expect(oms.get(order.orderId).status).toBe("PENDING");
    expect(logger.errors()).toEqual(["ERROR|EURUSD|Failed to persist order ORD-1"]);
  });
});
