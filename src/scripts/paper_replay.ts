import dotenv from "dotenv";
import { readFile } from "node:fs/promises";
import { loadEngineConfig, loadInstruments } from "../config/config.js";
import { describeError } from "../errors.js";
import { PaperVenue } from "../execution/paper_venue.js";
import { ReplayClock, replayBars } from "../live/replay.js";
import { buildTradeLogger } from "../logging/trade_logger.js";
import { parseBarsCsv } from "../market_data/csv_bars.js";
import { createRuntime, shutdownRuntime, startRuntime } from "../pipeline.js";

dotenv.config();

async function main() {
  const file = process.argv[2] ?? process.env.REPLAY_FILE;
  if (!file) {
    console.error("REPLAY_FAIL: pass a bars CSV path or set REPLAY_FILE");
    process.exitCode = 1;
    return;
  }

  const config = loadEngineConfig();
  const { bars, errors } = parseBarsCsv(await readFile(file, "utf-8"), config.timeframe);
  for (const error of errors) {
    console.warn("REPLAY_SKIP_ROW", error);
  }

  const logger = buildTradeLogger({ logDir: config.logDir, echo: config.logEcho });
  const venue = new PaperVenue(
    {
      startingBalance: config.paper.startingBalance,
      leverage: config.paper.leverage,
      currency: config.paper.currency,
      instruments: loadInstruments(config.paper.instrumentsFile),
      fillDelayMs: 0
    },
    logger
  );
  const clock = new ReplayClock();
  const runtime = await createRuntime(config, { logger, venue, now: clock.now });

  try {
    await startRuntime(runtime);
    const summary = await replayBars(runtime, venue, bars, clock);
    const closed = summary.trades.filter((t) => t.kind === "CLOSE");
    const realized = closed.reduce((sum, t) => sum + t.profitLoss, 0);
    console.log(`REPLAY_OK bars=${summary.bars} orders=${summary.submitted} closed=${closed.length}`);
    console.log(
      `balance=${summary.balance.toFixed(2)} equity=${summary.equity.toFixed(2)} realized=${realized.toFixed(2)}`
    );
  } catch (err) {
    console.error(`REPLAY_FAIL: ${describeError(err)}`);
    process.exitCode = 1;
  } finally {
    await shutdownRuntime(runtime);
  }
}

await main();
