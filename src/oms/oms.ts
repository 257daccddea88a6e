import { randomUUID } from "node:crypto";
import { InMemoryStore } from "../storage/store.js";
import { Order, OrderRequest, OrderStatus } from "../types.js";
import { Persistence } from "../persistence/persistence.js";
import { TradeLogger } from "../logging/trade_logger.js";
import { OrderNotFoundError } from "../errors.js";

const TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  PENDING: ["ACCEPTED", "REJECTED"],
  ACCEPTED: ["FILLED", "CANCELLED", "REJECTED"],
  FILLED: [],
  REJECTED: [],
  CANCELLED: []
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export class OMS {
  constructor(
    private store: InMemoryStore,
    private persistence: Persistence,
    private logger: TradeLogger,
    private newOrderId: () => string = () => `ORD-${randomUUID()}`
  ) {}

  async createOrder(request: OrderRequest): Promise<Order> {
    const now = new Date().toISOString();
    const order: Order = {
      orderId: this.newOrderId(),
      symbol: request.symbol,
      type: request.type,
      direction: request.direction,
      requestedVolume: request.volume,
      requestedPrice: request.price,
      stopLoss: request.stopLoss,
      takeProfit: request.takeProfit,
      status: "PENDING",
      filledVolume: 0,
      comment: request.comment,
      createdAt: now,
      updatedAt: now
    };

    this.store.orders.set(order.orderId, order);
    await this.persist(order);
    return order;
  }

  get(orderId: string): Order {
    const order = this.store.orders.get(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    return order;
  }

  /**
   * Moves an order to `status`. Returns null and leaves the order untouched
   * when the transition is not allowed from its current status.
   */
  async transition(
    orderId: string,
    status: OrderStatus,
    patch?: Partial<Pick<Order, "filledVolume" | "avgFillPrice" | "rejectedReason">>
  ): Promise<Order | null> {
    const order = this.get(orderId);
    if (!canTransition(order.status, status)) {
      return null;
    }
    const updated: Order = {
      ...order,
      ...patch,
      status,
      updatedAt: new Date().toISOString()
    };
    this.store.orders.set(orderId, updated);
    await this.persist(updated);
    return updated;
  }

  async amend(
    orderId: string,
    patch: Partial<Pick<Order, "requestedPrice" | "requestedVolume" | "stopLoss" | "takeProfit">>
  ): Promise<Order | null> {
    const order = this.get(orderId);
    if (isTerminal(order.status)) {
      return null;
    }
    const updated: Order = { ...order, ...patch, updatedAt: new Date().toISOString() };
    this.store.orders.set(orderId, updated);
    await this.persist(updated);
    return updated;
  }

  private async persist(order: Order): Promise<void> {
    try {
      await this.persistence.upsertOrder(order);
    } catch (err) {
      this.logger.error(order.symbol, `Failed to persist order ${order.orderId}`, err);
    }
  }
}
