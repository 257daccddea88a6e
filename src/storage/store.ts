import { AccountState, GatewaySnapshot, Order, Position } from "../types.js";

export const WORKING_STATUSES = new Set(["PENDING", "ACCEPTED"]);

export class InMemoryStore {
  orders: Map<string, Order> = new Map();
  positions: Map<string, Position> = new Map();
  account: AccountState = emptyAccount("");

  workingOrders(): Order[] {
    return Array.from(this.orders.values()).filter((o) => WORKING_STATUSES.has(o.status));
  }

  getSnapshot(connected: boolean): GatewaySnapshot {
    return {
      connected,
      account: { ...this.account },
      positions: Array.from(this.positions.values()).map((p) => ({ ...p })),
      workingOrders: this.workingOrders().map((o) => ({ ...o }))
    };
  }
}

export function emptyAccount(accountId: string, currency = "USD"): AccountState {
  return {
    accountId,
    balance: 0,
    equity: 0,
    marginUsed: 0,
    freeMargin: 0,
    profitLoss: 0,
    leverage: 1,
    currency,
    updatedAt: new Date(0).toISOString()
  };
}
