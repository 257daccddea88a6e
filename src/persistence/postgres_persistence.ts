import { Pool } from "pg";
import { AccountState, Order, Position, TradeInfo } from "../types.js";
import { AlertEvent, Persistence } from "./persistence.js";

export const ENGINE_TABLES = [
  "orders",
  "trades",
  "positions",
  "account_snapshots",
  "alert_events",
  "system_state"
] as const;

export class PostgresPersistence implements Persistence {
  private pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS orders (
        order_id TEXT PRIMARY KEY,
        symbol TEXT NOT NULL,
        order_type TEXT NOT NULL,
        direction TEXT NOT NULL,
        requested_volume DOUBLE PRECISION NOT NULL,
        requested_price DOUBLE PRECISION,
        stop_loss DOUBLE PRECISION,
        take_profit DOUBLE PRECISION,
        status TEXT NOT NULL,
        filled_volume DOUBLE PRECISION NOT NULL,
        avg_fill_price DOUBLE PRECISION,
        rejected_reason TEXT,
        comment TEXT,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS trades (
        id BIGSERIAL PRIMARY KEY,
        kind TEXT NOT NULL,
        order_id TEXT NOT NULL,
        symbol TEXT NOT NULL,
        direction TEXT NOT NULL,
        volume DOUBLE PRECISION NOT NULL,
        price DOUBLE PRECISION NOT NULL,
        profit_loss DOUBLE PRECISION NOT NULL,
        stop_loss DOUBLE PRECISION,
        take_profit DOUBLE PRECISION,
        executed_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS positions (
        symbol TEXT PRIMARY KEY,
        direction TEXT NOT NULL,
        volume DOUBLE PRECISION NOT NULL,
        entry_price DOUBLE PRECISION NOT NULL,
        current_price DOUBLE PRECISION NOT NULL,
        profit_loss DOUBLE PRECISION NOT NULL,
        stop_loss DOUBLE PRECISION,
        take_profit DOUBLE PRECISION,
        order_id TEXT NOT NULL,
        opened_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS account_snapshots (
        id BIGSERIAL PRIMARY KEY,
        account_id TEXT NOT NULL,
        balance DOUBLE PRECISION NOT NULL,
        equity DOUBLE PRECISION NOT NULL,
        margin_used DOUBLE PRECISION NOT NULL,
        free_margin DOUBLE PRECISION NOT NULL,
        currency TEXT NOT NULL,
        recorded_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS alert_events (
        id BIGSERIAL PRIMARY KEY,
        severity TEXT NOT NULL,
        type TEXT NOT NULL,
        message TEXT NOT NULL,
        context_json TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE TABLE IF NOT EXISTS system_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
  }

  async upsertOrder(order: Order): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO orders (
        order_id, symbol, order_type, direction, requested_volume, requested_price,
        stop_loss, take_profit, status, filled_volume, avg_fill_price, rejected_reason,
        comment, created_at, updated_at
      )
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15)
      ON CONFLICT (order_id)
      DO UPDATE SET
        requested_volume = EXCLUDED.requested_volume,
        requested_price = EXCLUDED.requested_price,
        stop_loss = EXCLUDED.stop_loss,
        take_profit = EXCLUDED.take_profit,
        status = EXCLUDED.status,
        filled_volume = EXCLUDED.filled_volume,
        avg_fill_price = EXCLUDED.avg_fill_price,
        rejected_reason = EXCLUDED.rejected_reason,
        updated_at = EXCLUDED.updated_at
      `,
      [
        order.orderId,
        order.symbol,
        order.type,
        order.direction,
        order.requestedVolume,
        order.requestedPrice ?? null,
        order.stopLoss ?? null,
        order.takeProfit ?? null,
        order.status,
        order.filledVolume,
        order.avgFillPrice ?? null,
        order.rejectedReason ?? null,
        order.comment ?? null,
        order.createdAt,
        order.updatedAt
      ]
    );
  }

  async insertTrade(trade: TradeInfo): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO trades (
        kind, order_id, symbol, direction, volume, price, profit_loss,
        stop_loss, take_profit, executed_at
      )
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)
      `,
      [
        trade.kind,
        trade.orderId,
        trade.symbol,
        trade.direction,
        trade.volume,
        trade.price,
        trade.profitLoss,
        trade.stopLoss ?? null,
        trade.takeProfit ?? null,
        trade.executionTime
      ]
    );
  }

  async upsertPosition(position: Position): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO positions (
        symbol, direction, volume, entry_price, current_price, profit_loss,
        stop_loss, take_profit, order_id, opened_at, updated_at
      )
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,NOW())
      ON CONFLICT (symbol)
      DO UPDATE SET
        direction = EXCLUDED.direction,
        volume = EXCLUDED.volume,
        entry_price = EXCLUDED.entry_price,
        current_price = EXCLUDED.current_price,
        profit_loss = EXCLUDED.profit_loss,
        stop_loss = EXCLUDED.stop_loss,
        take_profit = EXCLUDED.take_profit,
        order_id = EXCLUDED.order_id,
        opened_at = EXCLUDED.opened_at,
        updated_at = EXCLUDED.updated_at
      `,
      [
        position.symbol,
        position.direction,
        position.volume,
        position.entryPrice,
        position.currentPrice,
        position.profitLoss,
        position.stopLoss ?? null,
        position.takeProfit ?? null,
        position.orderId,
        position.openedAt
      ]
    );
  }

  async deletePosition(symbol: string): Promise<void> {
    await this.pool.query(`DELETE FROM positions WHERE symbol = $1`, [symbol]);
  }

  async insertAccountSnapshot(account: AccountState): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO account_snapshots (
        account_id, balance, equity, margin_used, free_margin, currency, recorded_at
      )
      VALUES ($1,$2,$3,$4,$5,$6,$7)
      `,
      [
        account.accountId,
        account.balance,
        account.equity,
        account.marginUsed,
        account.freeMargin,
        account.currency,
        account.updatedAt
      ]
    );
  }

  async upsertSystemState(key: string, value: string): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO system_state (key, value, updated_at)
      VALUES ($1, $2, NOW())
      ON CONFLICT (key)
      DO UPDATE SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at
      `,
      [key, value]
    );
  }

  async loadSystemState(key: string): Promise<string | null> {
    const { rows } = await this.pool.query<{ value: string }>(
      `SELECT value FROM system_state WHERE key = $1`,
      [key]
    );
    return rows[0]?.value ?? null;
  }

  async insertAlertEvent(event: Omit<AlertEvent, "id" | "createdAt">): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO alert_events (severity, type, message, context_json)
      VALUES ($1, $2, $3, $4)
      `,
      [event.severity, event.type, event.message, event.contextJson ?? null]
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
