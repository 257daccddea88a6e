import dotenv from "dotenv";
import { readFile } from "node:fs/promises";
import { loadEngineConfig, loadInstruments } from "../config/config.js";
import { PaperVenue } from "../execution/paper_venue.js";
import { LiveLoop } from "../live/live_loop.js";
import { buildTradeLogger } from "../logging/trade_logger.js";
import { parseBarsCsv } from "../market_data/csv_bars.js";
import { createRuntime, runTradingPass, shutdownRuntime, startRuntime } from "../pipeline.js";
import { isWithinTradingWindow } from "../utils/trading_hours.js";

dotenv.config();

// Paper session fed by a bars CSV that another process appends to.
async function main() {
  const barsFile = process.env.BARS_FILE;
  if (!barsFile) {
    console.error("LIVE_FAIL: BARS_FILE is not set");
    process.exitCode = 1;
    return;
  }

  const config = loadEngineConfig();
  const logger = buildTradeLogger({ logDir: config.logDir, echo: config.logEcho });
  const venue = new PaperVenue(
    {
      startingBalance: config.paper.startingBalance,
      leverage: config.paper.leverage,
      currency: config.paper.currency,
      instruments: loadInstruments(config.paper.instrumentsFile),
      fillDelayMs: config.paper.fillDelayMs
    },
    logger
  );
  const runtime = await createRuntime(config, { logger, venue });
  await startRuntime(runtime);

  let consumedLines = 0;
  const pass = async () => {
    const lines = (await readFile(barsFile, "utf-8")).split(/\r?\n/);
    const fresh = lines.slice(consumedLines, lines.length - 1);
    consumedLines += fresh.length;
    const { bars, errors } = parseBarsCsv(fresh.join("\n"), config.timeframe, consumedLines - fresh.length + 1);
    for (const error of errors) {
      logger.error("LIVE", `Skipped bar row, ${error}`);
    }
    for (const bar of bars) {
      venue.pushBar(bar);
    }
    await venue.drain();
    await runtime.gateway.idle();
    await runTradingPass(runtime);
  };

  const loop = new LiveLoop(pass, config.liveIntervalMs, logger, () =>
    isWithinTradingWindow(new Date(), config.tradingStart, config.tradingEnd, config.timeZone)
  );

  const stop = async () => {
    await loop.stop();
    await shutdownRuntime(runtime);
  };
  process.once("SIGINT", () => {
    stop().catch((err: unknown) => {
      console.error("LIVE_STOP_FAIL", err);
      process.exitCode = 1;
    });
  });

  console.log("LIVE_LOOP_START");
  console.log(`interval_ms=${config.liveIntervalMs} symbols=${config.symbols.join(",")}`);
  loop.start();
}

await main();
