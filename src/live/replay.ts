import { PaperVenue } from "../execution/paper_venue.js";
import { CycleOutcome } from "../orchestrator/trade_orchestrator.js";
import { PassResult, Runtime, runTradingPass } from "../pipeline.js";
import { MarketData, TradeInfo } from "../types.js";

export interface ReplaySummary {
  bars: number;
  submitted: number;
  trades: TradeInfo[];
  outcomes: CycleOutcome[];
  balance: number;
  equity: number;
}

/** Mutable clock the runtime reads, advanced to each bar's time during a replay. */
export class ReplayClock {
  private current = new Date(0);

  now = (): Date => new Date(this.current.getTime());

  set(timestamp: string): void {
    this.current = new Date(timestamp);
  }
}

/**
 * Feeds bars through the paper venue one at a time and runs a trading pass
 * after each, once the venue's events have been applied.
 */
export async function replayBars(
  runtime: Runtime,
  venue: PaperVenue,
  bars: MarketData[],
  clock: ReplayClock
): Promise<ReplaySummary> {
  const trades: TradeInfo[] = [];
  const outcomes: CycleOutcome[] = [];
  const off = runtime.gateway.onTradeExecuted((trade) => {
    trades.push(trade);
  });

  try {
    for (const bar of bars) {
      clock.set(bar.timestamp);
      venue.pushBar(bar);
      await settle(runtime, venue);
      const pass: PassResult = await runTradingPass(runtime);
      outcomes.push(...pass.outcomes);
      await settle(runtime, venue);
    }
  } finally {
    off();
  }

  const account = await runtime.gateway.getAccountInfo();
  return {
    bars: bars.length,
    submitted: outcomes.filter((o) => o.kind === "submitted").length,
    trades,
    outcomes,
    balance: account.balance,
    equity: account.equity
  };
}

async function settle(runtime: Runtime, venue: PaperVenue): Promise<void> {
  await venue.drain();
  await runtime.gateway.idle();
}
