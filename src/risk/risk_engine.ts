import { AccountState, GatewaySnapshot, InstrumentInfo, RiskCheckResult } from "../types.js";
import { isWithinTradingWindow } from "../utils/trading_hours.js";
import { requiredMargin } from "./position_sizer.js";

export interface RiskLimits {
  maxDrawdownPercent: number;
  tradingStart: string;
  tradingEnd: string;
  timeZone: string;
}

export interface MarginCheck {
  ok: boolean;
  required: number;
  available: number;
}

export class RiskEngine {
  constructor(private limits: RiskLimits) {}

  /** Account and book conditions that block a new entry on `symbol`. */
  preTradeCheck(symbol: string, snapshot: GatewaySnapshot, now: Date): RiskCheckResult {
    if (snapshot.positions.some((p) => p.symbol === symbol)) {
      return { ok: false, reason: "Position already open" };
    }

    if (snapshot.workingOrders.some((o) => o.symbol === symbol)) {
      return { ok: false, reason: "Order already working" };
    }

    if (
      !isWithinTradingWindow(now, this.limits.tradingStart, this.limits.tradingEnd, this.limits.timeZone)
    ) {
      return { ok: false, reason: "Outside trading hours" };
    }

    const drawdown = drawdownPercent(snapshot.account);
    if (drawdown >= this.limits.maxDrawdownPercent) {
      return {
        ok: false,
        reason: `Drawdown ${drawdown.toFixed(2)}% at or above limit ${this.limits.maxDrawdownPercent}%`
      };
    }

    if (snapshot.account.freeMargin < 0) {
      return { ok: false, reason: "Margin call" };
    }

    return { ok: true };
  }

  checkMargin(lots: number, instrument: InstrumentInfo, account: AccountState): MarginCheck {
    const required = requiredMargin(lots, instrument, account);
    return { ok: required <= account.freeMargin, required, available: account.freeMargin };
  }
}

/** Equity shortfall against balance, in percent. Zero when balance is not positive. */
export function drawdownPercent(account: AccountState): number {
  if (account.balance <= 0) {
    return 0;
  }
  return Math.max(0, ((account.balance - account.equity) / account.balance) * 100);
}
