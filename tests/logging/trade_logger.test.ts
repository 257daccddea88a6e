import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  ConsoleTradeLogger,
  FileTradeLogger,
  buildTradeLogger,
  formatLogLine,
  formatTradeMessage
} from "../../src/logging/trade_logger.js";

const AT = new Date(2024, 0, 5, 9, 3, 7, 45);

describe("line formatting", () => {
  it("prefixes a local timestamp, level and symbol", () => {
    expect(formatLogLine(AT, "INFO", "EURUSD", "hello")).toBe("2024.01.05 09:03:07.045 | INFO | EURUSD | hello");
  });

  it("omits unset protective levels from trade lines", () => {
    expect(formatTradeMessage("SELL", 1.2345, 0.5, 1.24)).toBe("TRADE [SELL] Price: 1.23450, Volume: 0.50, SL: 1.24000");
    expect(formatTradeMessage("CLOSE", 1.1, 0.2, 0, 0)).toBe("TRADE [CLOSE] Price: 1.10000, Volume: 0.20");
  });
});

describe("FileTradeLogger", () => {
  it("appends lines to a daily file in order", async () => {
    const dir = path.join(mkdtempSync(path.join(tmpdir(), "engine-logs-")), "nested");
    const logger = new FileTradeLogger(dir, false, () => AT);

    logger.info("EURUSD", "hello");
    logger.error("EURUSD", "failed", "boom");
    logger.trade("EURUSD", "BUY", 1.1, 0.2, 1.091, 1.1085);
    await logger.flush();

    const file = logger.filePath(AT);
    expect(path.basename(file)).toBe("engine_2024-01-05.log");
    expect(readFileSync(file, "utf-8")).toBe(
      [
        "2024.01.05 09:03:07.045 | INFO | EURUSD | hello",
        "2024.01.05 09:03:07.045 | ERROR | EURUSD | failed",
        "2024.01.05 09:03:07.045 | ERROR | EURUSD | Exception: boom",
        "2024.01.05 09:03:07.045 | TRADE | EURUSD | TRADE [BUY] Price: 1.10000, Volume: 0.20, SL: 1.09100, TP: 1.10850",
        ""
      ].join("\n")
    );
  });
});

describe("buildTradeLogger", () => {
  it("logs to the console unless a directory is set", () => {
    expect(buildTradeLogger({})).toBeInstanceOf(ConsoleTradeLogger);
    expect(buildTradeLogger({ logDir: path.join(tmpdir(), "engine-logs"), echo: false })).toBeInstanceOf(FileTradeLogger);
  });
});
