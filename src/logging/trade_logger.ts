import path from "node:path";
import { appendFile, mkdir } from "node:fs/promises";
import { describeError } from "../errors.js";

export type LogLevel = "INFO" | "ERROR" | "TRADE";

export interface TradeLogger {
  info(symbol: string, message: string): void;
  error(symbol: string, message: string, err?: unknown): void;
  trade(
    symbol: string,
    action: string,
    price: number,
    volume: number,
    stopLoss?: number,
    takeProfit?: number
  ): void;
  /** Resolves once every line written so far is stored. */
  flush(): Promise<void>;
}

abstract class LineLogger implements TradeLogger {
  constructor(protected now: () => Date = () => new Date()) {}

  protected abstract write(level: LogLevel, line: string): void;

  flush(): Promise<void> {
    return Promise.resolve();
  }

  info(symbol: string, message: string): void {
    this.emit("INFO", symbol, message);
  }

  error(symbol: string, message: string, err?: unknown): void {
    this.emit("ERROR", symbol, message);
    if (err !== undefined) {
      this.emit("ERROR", symbol, `Exception: ${describeError(err)}`);
      if (err instanceof Error && err.stack) {
        this.emit("ERROR", symbol, `Stack Trace: ${err.stack}`);
      }
    }
  }

  trade(
    symbol: string,
    action: string,
    price: number,
    volume: number,
    stopLoss?: number,
    takeProfit?: number
  ): void {
    this.emit("TRADE", symbol, formatTradeMessage(action, price, volume, stopLoss, takeProfit));
  }

  private emit(level: LogLevel, symbol: string, message: string): void {
    this.write(level, formatLogLine(this.now(), level, symbol, message));
  }
}

export class ConsoleTradeLogger extends LineLogger {
  protected write(level: LogLevel, line: string): void {
    if (level === "ERROR") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Appends to `<dir>/engine_<yyyy-MM-dd>.log`. Writes are chained so lines keep
 * their order; a failed write falls back to the console and the chain
 * continues.
 */
export class FileTradeLogger extends LineLogger {
  private chain: Promise<void> = Promise.resolve();
  private ready: Promise<void> | null = null;

  constructor(
    private dir: string,
    private echo = false,
    now?: () => Date
  ) {
    super(now);
  }

  filePath(date: Date): string {
    return path.join(this.dir, `engine_${formatDate(date)}.log`);
  }

  override flush(): Promise<void> {
    return this.chain;
  }

  protected write(level: LogLevel, line: string): void {
    if (this.echo) {
      if (level === "ERROR") {
        console.error(line);
      } else {
        console.log(line);
      }
    }
    const file = this.filePath(this.now());
    this.chain = this.chain
      .then(() => this.ensureDir())
      .then(() => appendFile(file, `${line}\n`, "utf-8"))
      .catch((err: unknown) => {
        this.ready = null;
        console.error(`Failed to write to log file: ${line} (${describeError(err)})`);
      });
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }
}

export function buildTradeLogger(cfg: {
  logDir?: string;
  echo?: boolean;
}): TradeLogger {
  if (cfg.logDir) {
    return new FileTradeLogger(cfg.logDir, cfg.echo ?? true);
  }
  return new ConsoleTradeLogger();
}

export function formatLogLine(
  at: Date,
  level: LogLevel,
  symbol: string,
  message: string
): string {
  return `${formatTimestamp(at)} | ${level} | ${symbol} | ${message}`;
}

export function formatTradeMessage(
  action: string,
  price: number,
  volume: number,
  stopLoss?: number,
  takeProfit?: number
): string {
  let message = `TRADE [${action}] Price: ${price.toFixed(5)}, Volume: ${volume.toFixed(2)}`;
  if (stopLoss !== undefined && stopLoss > 0) message += `, SL: ${stopLoss.toFixed(5)}`;
  if (takeProfit !== undefined && takeProfit > 0) message += `, TP: ${takeProfit.toFixed(5)}`;
  return message;
}

function formatTimestamp(d: Date): string {
  const time = [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => pad(n, 2)).join(":");
  return `${formatDate(d).replace(/-/g, ".")} ${time}.${pad(d.getMilliseconds(), 3)}`;
}

function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1, 2)}-${pad(d.getDate(), 2)}`;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}
