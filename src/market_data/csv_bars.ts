import { MarketData } from "../types.js";

const COLUMNS = ["timestamp", "symbol", "open", "high", "low", "close", "volume"] as const;

export interface ParsedBars {
  bars: MarketData[];
  errors: string[];
}

/**
 * Parses `timestamp,symbol,open,high,low,close,volume` rows. A header row is
 * skipped. Rows that do not parse are reported with their 1-based line number.
 */
export function parseBarsCsv(raw: string, timeframe: string, firstLine = 1): ParsedBars {
  const bars: MarketData[] = [];
  const errors: string[] = [];
  const lines = raw.split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNo = firstLine + index;
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      return;
    }
    const cells = trimmed.split(",").map((c) => c.trim());
    if (cells[0]?.toLowerCase() === COLUMNS[0]) {
      return;
    }
    if (cells.length < COLUMNS.length) {
      errors.push(`line ${lineNo}: expected ${COLUMNS.length} columns, got ${cells.length}`);
      return;
    }
    const [timestamp, symbol, ...rest] = cells;
    const [open, high, low, close, volume] = rest.map(Number);
    const time = new Date(timestamp);
    if (
      !symbol ||
      Number.isNaN(time.getTime()) ||
      ![open, high, low, close, volume].every((v) => Number.isFinite(v))
    ) {
      errors.push(`line ${lineNo}: invalid values`);
      return;
    }
    if (high < low || close > high || close < low) {
      errors.push(`line ${lineNo}: close outside high/low range`);
      return;
    }
    bars.push({
      symbol: symbol.toUpperCase(),
      timeframe,
      open,
      high,
      low,
      close,
      volume,
      timestamp: time.toISOString()
    });
  });

  return { bars, errors };
}
