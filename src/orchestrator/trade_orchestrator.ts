import { Broker, Unsubscribe } from "../broker/broker.js";
import { InsufficientMarginError, SizingRejectedError, describeError } from "../errors.js";
import { TradeLogger } from "../logging/trade_logger.js";
import { IndicatorAdapter } from "../market_data/indicator_adapter.js";
import { Alerter } from "../ops/alerter.js";
import { computeExitLevels } from "../risk/exit_levels.js";
import { sizePosition } from "../risk/position_sizer.js";
import { RiskEngine } from "../risk/risk_engine.js";
import { SignalConfig, evaluateSignal } from "../signal/signal_evaluator.js";
import { Direction, ExitParams, InstrumentInfo, Order, TradeInfo } from "../types.js";

export interface OrchestratorConfig {
  timeframe: string;
  riskPercent: number;
  stopLossPips: number;
  minLot: number;
  maxLot: number;
  maPeriod: number;
  cciPeriod: number;
  atrPeriod: number;
  signal: SignalConfig;
  exit: ExitParams;
}

export type CycleOutcome =
  | { kind: "skipped"; symbol: string; reason: string }
  | { kind: "no_signal"; symbol: string; reason: string }
  | { kind: "sizing_rejected"; symbol: string; reason: string }
  | { kind: "insufficient_margin"; symbol: string; required: number; available: number }
  | { kind: "submit_failed"; symbol: string; error: string }
  | {
      kind: "submitted";
      symbol: string;
      orderId: string;
      direction: Direction;
      lots: number;
      stopLoss: number;
      takeProfit: number;
    };

/**
 * One decision per call: gate, size, price the exits, read the signal, check
 * margin, then send a market order carrying the hybrid stop and target.
 */
export class TradeOrchestrator {
  private running = new Set<string>();

  constructor(
    private broker: Broker,
    private indicators: IndicatorAdapter,
    private risk: RiskEngine,
    private cfg: OrchestratorConfig,
    private logger: TradeLogger,
    private alerter: Alerter,
    private now: () => Date = () => new Date()
  ) {}

  /** Subscribes to fills, closes and order rejections. */
  attach(): Unsubscribe {
    const offTrades = this.broker.onTradeExecuted((trade) => this.onTrade(trade));
    const offOrders = this.broker.onOrderUpdate((order) => this.onOrder(order));
    return () => {
      offTrades();
      offOrders();
    };
  }

  async runCycle(symbol: string): Promise<CycleOutcome> {
    if (this.running.has(symbol)) {
      return { kind: "skipped", symbol, reason: "Cycle already running" };
    }
    this.running.add(symbol);
    try {
      return await this.decide(symbol);
    } finally {
      this.running.delete(symbol);
    }
  }

  private async decide(symbol: string): Promise<CycleOutcome> {
    if (!this.broker.isConnected()) {
      return { kind: "skipped", symbol, reason: "Broker not connected" };
    }

    const snapshot = await this.broker.snapshot();
    const gate = this.risk.preTradeCheck(symbol, snapshot, this.now());
    if (!gate.ok) {
      return { kind: "skipped", symbol, reason: gate.reason ?? "Blocked by risk checks" };
    }

    const { timeframe } = this.cfg;
    const price = this.indicators.currentPrice(symbol);
    const movingAverage = this.indicators.movingAverage(symbol, timeframe, this.cfg.maPeriod);
    const atrValues = this.indicators.atr(symbol, timeframe, this.cfg.atrPeriod);
    const atr = atrValues[atrValues.length - 1];
    if (price === null || movingAverage === null || atr === undefined) {
      return { kind: "no_signal", symbol, reason: "Insufficient indicator history" };
    }

    let instrument: InstrumentInfo;
    try {
      instrument = this.broker.getInstrumentInfo(symbol);
    } catch (err) {
      this.logger.error(symbol, "Instrument data unavailable", err);
      return { kind: "skipped", symbol, reason: describeError(err) };
    }

    const sizing = sizePosition(
      snapshot.account,
      instrument,
      this.cfg.riskPercent,
      this.cfg.stopLossPips,
      this.cfg.minLot,
      this.cfg.maxLot
    );
    if (sizing.invalidInstrumentData) {
      this.logger.error(symbol, `Invalid tick value ${instrument.tickValue}, pip value floored`);
    }
    if (sizing.lots <= 0) {
      const err = new SizingRejectedError(symbol, sizing.rejectionReason ?? "zero size");
      this.logger.error(symbol, err.message);
      return { kind: "sizing_rejected", symbol, reason: sizing.rejectionReason ?? "zero size" };
    }

    const candidate: Direction = price >= movingAverage ? "LONG" : "SHORT";
    const levels = computeExitLevels(price, atr, this.exitParams(instrument), candidate);

    const intent = evaluateSignal(
      {
        price,
        movingAverage,
        cci: this.indicators.cci(symbol, timeframe, this.cfg.cciPeriod),
        previousPrice: this.indicators.close(symbol, timeframe, 1),
        previousMovingAverage: this.indicators.movingAverage(symbol, timeframe, this.cfg.maPeriod, 1)
      },
      this.cfg.signal
    );
    if (intent === "NONE") {
      return { kind: "no_signal", symbol, reason: "No entry condition" };
    }

    const margin = this.risk.checkMargin(sizing.lots, instrument, snapshot.account);
    if (!margin.ok) {
      const err = new InsufficientMarginError(symbol, margin.required, margin.available);
      this.logger.error(symbol, err.message);
      return {
        kind: "insufficient_margin",
        symbol,
        required: margin.required,
        available: margin.available
      };
    }

    const stopLoss = roundPrice(levels.hybridStop, instrument.digits);
    const takeProfit = roundPrice(levels.hybridTarget, instrument.digits);
    try {
      const response = await this.broker.placeOrder({
        symbol,
        type: "MARKET",
        direction: intent,
        volume: sizing.lots,
        stopLoss,
        takeProfit,
        comment: `${this.cfg.signal.mode} ${intent}`
      });
      this.logger.info(
        symbol,
        `${response.message}: ${intent} ${sizing.lots.toFixed(2)} lots${sizing.capped ? " (capped)" : ""}, order ${response.orderId}`
      );
      return {
        kind: "submitted",
        symbol,
        orderId: response.orderId,
        direction: intent,
        lots: sizing.lots,
        stopLoss,
        takeProfit
      };
    } catch (err) {
      this.logger.error(symbol, "Order submission failed", err);
      await this.alert("critical", "order_error", `Order failed for ${symbol}`, {
        error: describeError(err)
      });
      return { kind: "submit_failed", symbol, error: describeError(err) };
    }
  }

  private exitParams(instrument: InstrumentInfo): ExitParams {
    return {
      ...this.cfg.exit,
      pointSize: instrument.pointSize > 0 ? instrument.pointSize : this.cfg.exit.pointSize
    };
  }

  private async onTrade(trade: TradeInfo): Promise<void> {
    if (trade.kind === "CLOSE") {
      await this.alert("info", "position_closed", `${trade.symbol} closed: ${trade.comment ?? "closed"}`, {
        price: trade.price,
        profitLoss: trade.profitLoss
      });
    }
  }

  private async onOrder(order: Order): Promise<void> {
    if (order.status === "REJECTED") {
      await this.alert("warning", "order_rejected", `Order ${order.orderId} rejected for ${order.symbol}`, {
        reason: order.rejectedReason
      });
    }
  }

  private async alert(
    severity: "info" | "warning" | "critical",
    type: string,
    message: string,
    context?: unknown
  ): Promise<void> {
    try {
      await this.alerter.notify(severity, type, message, context);
    } catch (err) {
      this.logger.error("ALERT", `Failed to send ${type} alert`, err);
    }
  }
}

function roundPrice(value: number, digits: number): number {
  return Number.isInteger(digits) && digits >= 0 ? Number(value.toFixed(digits)) : value;
}
