import { Broker } from "../broker/broker.js";
import { MonitorConfig } from "../config/config.js";
import { TradeLogger } from "../logging/trade_logger.js";
import { IndicatorAdapter } from "../market_data/indicator_adapter.js";
import { Position } from "../types.js";

export interface StopAdjustment {
  symbol: string;
  from?: number;
  to: number;
  rule: "trailing" | "breakeven" | "atr_trailing";
  applied: boolean;
}

interface Candidate {
  stop: number;
  rule: StopAdjustment["rule"];
}

/**
 * Moves stop-losses of open positions in the favourable direction only:
 * pip trailing, breakeven plus offset, and ATR trailing.
 */
export class PositionMonitor {
  constructor(
    private broker: Broker,
    private indicators: IndicatorAdapter,
    private cfg: MonitorConfig & { timeframe: string; atrPeriod: number },
    private logger: TradeLogger
  ) {}

  enabled(): boolean {
    return this.cfg.useTrailingStop || this.cfg.useBreakeven || this.cfg.useAtrTrailing;
  }

  async evaluateAndAct(): Promise<StopAdjustment[]> {
    if (!this.enabled() || !this.broker.isConnected()) {
      return [];
    }
    const adjustments: StopAdjustment[] = [];
    for (const position of await this.broker.getPositions()) {
      const adjustment = this.proposeStop(position);
      if (!adjustment) {
        continue;
      }
      try {
        adjustment.applied = await this.broker.modifyPosition(position.symbol, {
          stopLoss: adjustment.to
        });
      } catch (err) {
        this.logger.error(position.symbol, "Stop adjustment failed", err);
      }
      if (adjustment.applied) {
        this.logger.info(
          position.symbol,
          `Stop moved (${adjustment.rule}) ${adjustment.from?.toFixed(5) ?? "none"} -> ${adjustment.to.toFixed(5)}`
        );
      }
      adjustments.push(adjustment);
    }
    return adjustments;
  }

  /** Best stop improvement for `position`, or null when no rule moves it. */
  proposeStop(position: Position): StopAdjustment | null {
    let instrumentPoint: number;
    let digits: number;
    try {
      const instrument = this.broker.getInstrumentInfo(position.symbol);
      instrumentPoint = instrument.pointSize;
      digits = instrument.digits;
    } catch (err) {
      this.logger.error(position.symbol, "Instrument data unavailable", err);
      return null;
    }
    if (!(instrumentPoint > 0)) {
      return null;
    }

    const sign = position.direction === "LONG" ? 1 : -1;
    const price = this.indicators.currentPrice(position.symbol) ?? position.currentPrice;
    const profitPips = ((price - position.entryPrice) * sign) / instrumentPoint;
    const candidates: Candidate[] = [];

    if (this.cfg.useTrailingStop && profitPips > this.cfg.trailingStopPips) {
      candidates.push({
        stop: price - sign * this.cfg.trailingStopPips * instrumentPoint,
        rule: "trailing"
      });
    }
    if (this.cfg.useBreakeven && profitPips >= this.cfg.breakevenActivationPips) {
      candidates.push({
        stop: position.entryPrice + sign * this.cfg.breakevenOffsetPips * instrumentPoint,
        rule: "breakeven"
      });
    }
    if (this.cfg.useAtrTrailing) {
      const atrValues = this.indicators.atr(position.symbol, this.cfg.timeframe, this.cfg.atrPeriod);
      const atr = atrValues[atrValues.length - 1];
      if (atr !== undefined && atr > 0) {
        candidates.push({ stop: price - sign * this.cfg.atrTrailingMultiple * atr, rule: "atr_trailing" });
      }
    }

    let best: Candidate | null = null;
    for (const candidate of candidates) {
      const stop = Number(candidate.stop.toFixed(digits));
      if ((price - stop) * sign <= 0) {
        continue;
      }
      if (position.stopLoss !== undefined && (stop - position.stopLoss) * sign <= 0) {
        continue;
      }
      if (!best || (stop - best.stop) * sign > 0) {
        best = { stop, rule: candidate.rule };
      }
    }
    if (!best) {
      return null;
    }
    return {
      symbol: position.symbol,
      from: position.stopLoss,
      to: best.stop,
      rule: best.rule,
      applied: false
    };
  }
}
