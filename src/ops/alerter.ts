import { Persistence } from "../persistence/persistence.js";
import { TradeLogger } from "../logging/trade_logger.js";

export type AlertSeverity = "info" | "warning" | "critical";

export interface Alerter {
  notify(severity: AlertSeverity, type: string, message: string, context?: unknown): Promise<void>;
}

export class NullAlerter implements Alerter {
  async notify(
    _severity: AlertSeverity,
    _type: string,
    _message: string,
    _context?: unknown
  ): Promise<void> {}
}

type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
}>;

/**
 * Sends alerts to a Telegram chat, at most one per identical message within
 * `cooldownMs`. Every alert is recorded through persistence first.
 */
export class TelegramAlerter implements Alerter {
  private lastByType = new Map<string, number>();

  constructor(
    private persistence: Persistence,
    private logger: TradeLogger,
    private botToken: string,
    private chatId: string,
    private cooldownMs: number,
    private send: FetchLike = (url, init) => fetch(url, init),
    private clock: () => number = () => Date.now()
  ) {}

  async notify(severity: AlertSeverity, type: string, message: string, context?: unknown): Promise<void> {
    const now = this.clock();
    const key = `${severity}:${type}:${message}`;
    const last = this.lastByType.get(key);
    if (last !== undefined && now - last < this.cooldownMs) {
      return;
    }
    this.lastByType.set(key, now);

    const contextJson = context ? JSON.stringify(context) : undefined;
    try {
      await this.persistence.insertAlertEvent({ severity, type, message, contextJson });
    } catch (err) {
      this.logger.error("ALERT", `Failed to record ${type} alert`, err);
    }

    const text = [`[${severity.toUpperCase()}] ${type}`, message, contextJson ? `context: ${contextJson}` : ""]
      .filter(Boolean)
      .join("\n");

    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    try {
      const res = await this.send(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: this.chatId, text })
      });
      if (!res.ok) {
        this.logger.error("ALERT", `Telegram responded ${res.status} for ${type} alert`);
      }
    } catch (err) {
      this.logger.error("ALERT", `Failed to deliver ${type} alert`, err);
    }
  }
}

export function buildAlerter(
  persistence: Persistence,
  logger: TradeLogger,
  env: Record<string, string | undefined> = process.env
): Alerter {
  const botToken = env.TELEGRAM_BOT_TOKEN;
  const chatId = env.TELEGRAM_CHAT_ID;
  const cooldownMs = Number(env.ALERT_COOLDOWN_MS ?? "60000");
  if (!botToken || !chatId) {
    return new NullAlerter();
  }
  return new TelegramAlerter(persistence, logger, botToken, chatId, cooldownMs);
}
