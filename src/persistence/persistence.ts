import { AccountState, Order, Position, TradeInfo } from "../types.js";

export interface AlertEvent {
  id: number;
  severity: "info" | "warning" | "critical";
  type: string;
  message: string;
  contextJson?: string;
  createdAt: string;
}

export interface Persistence {
  init(): Promise<void>;
  upsertOrder(order: Order): Promise<void>;
  insertTrade(trade: TradeInfo): Promise<void>;
  upsertPosition(position: Position): Promise<void>;
  deletePosition(symbol: string): Promise<void>;
  insertAccountSnapshot(account: AccountState): Promise<void>;
  upsertSystemState(key: string, value: string): Promise<void>;
  loadSystemState(key: string): Promise<string | null>;
  insertAlertEvent(event: Omit<AlertEvent, "id" | "createdAt">): Promise<void>;
  close(): Promise<void>;
}

export class NoopPersistence implements Persistence {
  async init(): Promise<void> {}
  async upsertOrder(_order: Order): Promise<void> {}
  async insertTrade(_trade: TradeInfo): Promise<void> {}
  async upsertPosition(_position: Position): Promise<void> {}
  async deletePosition(_symbol: string): Promise<void> {}
  async insertAccountSnapshot(_account: AccountState): Promise<void> {}
  async upsertSystemState(_key: string, _value: string): Promise<void> {}
  async loadSystemState(_key: string): Promise<string | null> {
    return null;
  }
  async insertAlertEvent(_event: Omit<AlertEvent, "id" | "createdAt">): Promise<void> {}
  async close(): Promise<void> {}
}
