import path from "node:path";
import { readFileSync } from "node:fs";
import { ConfigError } from "../errors.js";
import { SignalConfig, SignalMode } from "../signal/signal_evaluator.js";
import { MaMethod } from "../market_data/indicator_adapter.js";
import { validateExitParams } from "../risk/exit_levels.js";
import { parseClock } from "../utils/trading_hours.js";
import { ExitParams, InstrumentInfo } from "../types.js";

export interface MonitorConfig {
  useTrailingStop: boolean;
  trailingStopPips: number;
  useBreakeven: boolean;
  breakevenActivationPips: number;
  breakevenOffsetPips: number;
  useAtrTrailing: boolean;
  atrTrailingMultiple: number;
}

export interface PaperConfig {
  startingBalance: number;
  leverage: number;
  currency: string;
  fillDelayMs: number;
  instrumentsFile: string;
}

export interface EngineConfig {
  accountId: string;
  isDemoAccount: boolean;
  symbols: string[];
  timeframe: string;

  riskPercent: number;
  stopLossPips: number;
  minLot: number;
  maxLot: number;
  maxDrawdownPercent: number;

  tradingStart: string;
  tradingEnd: string;
  timeZone: string;

  maPeriod: number;
  maMethod: MaMethod;
  cciPeriod: number;
  atrPeriod: number;
  maxBars: number;

  signal: SignalConfig;
  exit: ExitParams;
  monitor: MonitorConfig;
  paper: PaperConfig;

  liveIntervalMs: number;
  logDir?: string;
  logEcho: boolean;
  databaseUrl?: string;
  requireDb: boolean;
  haltTrading: boolean;
}

type Env = Record<string, string | undefined>;

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const config: EngineConfig = {
    accountId: env.ACCOUNT_ID ?? "paper-001",
    isDemoAccount: env.DEMO_ACCOUNT !== "0",
    symbols: (env.SYMBOLS ?? "EURUSD")
      .split(",")
      .map((s) => s.trim().toUpperCase())
      .filter(Boolean),
    timeframe: env.TIMEFRAME ?? "H1",

    riskPercent: Number(env.RISK_PERCENT ?? "1"),
    stopLossPips: Number(env.STOP_LOSS_PIPS ?? "50"),
    minLot: Number(env.MIN_LOT ?? "0.10"),
    maxLot: Number(env.MAX_LOT ?? "1.00"),
    maxDrawdownPercent: Number(env.MAX_DRAWDOWN_PERCENT ?? "15"),

    tradingStart: env.TRADING_START ?? "00:00",
    tradingEnd: env.TRADING_END ?? "23:59",
    timeZone: env.TRADING_TIMEZONE ?? "UTC",

    maPeriod: Number(env.MA_PERIOD ?? "20"),
    maMethod: env.MA_METHOD === "EMA" ? "EMA" : "SMA",
    cciPeriod: Number(env.CCI_PERIOD ?? "14"),
    atrPeriod: Number(env.ATR_PERIOD ?? "14"),
    maxBars: Number(env.MAX_BARS ?? "500"),

    signal: {
      mode: parseSignalMode(env.SIGNAL_MODE),
      oversoldLevel: Number(env.CCI_OVERSOLD ?? "-100"),
      overboughtLevel: Number(env.CCI_OVERBOUGHT ?? "100"),
      allowShort: env.ALLOW_SHORT !== "0"
    },
    exit: {
      slMultiplier: Number(env.SL_ATR_MULTIPLIER ?? "8.5"),
      tpMultiplier: Number(env.TP_ATR_MULTIPLIER ?? "8.0"),
      slBufferMult: Number(env.SL_BUFFER_MULTIPLIER ?? "0.5"),
      tpBufferMult: Number(env.TP_BUFFER_MULTIPLIER ?? "0.5"),
      maxBufferPips: Number(env.MAX_BUFFER_PIPS ?? "50"),
      pointSize: Number(env.POINT_SIZE ?? "0.0001"),
      useHybrid: env.USE_HYBRID_EXITS !== "0",
      atrWeight: Number(env.ATR_WEIGHT ?? "0.5"),
      pivotWeight: Number(env.PIVOT_WEIGHT ?? "0.5")
    },
    monitor: {
      useTrailingStop: env.USE_TRAILING_STOP === "1",
      trailingStopPips: Number(env.TRAILING_STOP_PIPS ?? "20"),
      useBreakeven: env.USE_BREAKEVEN === "1",
      breakevenActivationPips: Number(env.BREAKEVEN_ACTIVATION_PIPS ?? "30"),
      breakevenOffsetPips: Number(env.BREAKEVEN_OFFSET_PIPS ?? "5"),
      useAtrTrailing: env.USE_ATR_TRAILING === "1",
      atrTrailingMultiple: Number(env.ATR_TRAILING_MULTIPLE ?? "2")
    },
    paper: {
      startingBalance: Number(env.PAPER_STARTING_BALANCE ?? "10000"),
      leverage: Number(env.PAPER_LEVERAGE ?? "100"),
      currency: env.ACCOUNT_CURRENCY ?? "USD",
      fillDelayMs: Number(env.PAPER_FILL_DELAY_MS ?? "0"),
      instrumentsFile: env.INSTRUMENTS_FILE ?? "config/instruments.json"
    },

    liveIntervalMs: Number(env.LIVE_INTERVAL_MS ?? "60000"),
    logDir: env.LOG_DIR || undefined,
    logEcho: env.LOG_ECHO === "1",
    databaseUrl: env.DATABASE_URL || undefined,
    requireDb: env.REQUIRE_DB === "1",
    haltTrading: env.HALT_TRADING === "1"
  };

  validateEngineConfig(config);
  return config;
}

/** Throws a ConfigError listing every out-of-range setting. */
export function validateEngineConfig(config: EngineConfig): void {
  const issues: string[] = [];
  const positiveInt = (name: string, value: number) => {
    if (!Number.isInteger(value) || value <= 0) issues.push(`${name} must be a positive integer`);
  };

  if (config.symbols.length === 0) issues.push("SYMBOLS must list at least one symbol");
  if (!(config.riskPercent > 0 && config.riskPercent <= 10)) {
    issues.push("RISK_PERCENT must be within (0, 10]");
  }
  if (!(config.maxDrawdownPercent > 0 && config.maxDrawdownPercent <= 100)) {
    issues.push("MAX_DRAWDOWN_PERCENT must be within (0, 100]");
  }
  if (!(config.stopLossPips > 0)) issues.push("STOP_LOSS_PIPS must be > 0");
  if (!(config.minLot > 0)) issues.push("MIN_LOT must be > 0");
  if (!(config.maxLot > 0)) issues.push("MAX_LOT must be > 0");
  if (config.minLot > config.maxLot) issues.push("MIN_LOT must not exceed MAX_LOT");
  if (parseClock(config.tradingStart) === null) issues.push("TRADING_START must be HH:MM");
  if (parseClock(config.tradingEnd) === null) issues.push("TRADING_END must be HH:MM");
  if (!isTimeZone(config.timeZone)) issues.push(`TRADING_TIMEZONE ${config.timeZone} is not a known time zone`);

  positiveInt("MA_PERIOD", config.maPeriod);
  positiveInt("CCI_PERIOD", config.cciPeriod);
  positiveInt("ATR_PERIOD", config.atrPeriod);
  positiveInt("MAX_BARS", config.maxBars);
  if (config.maxBars <= Math.max(config.maPeriod, config.cciPeriod, config.atrPeriod)) {
    issues.push("MAX_BARS must exceed every indicator period");
  }

  if (!(config.signal.oversoldLevel < config.signal.overboughtLevel)) {
    issues.push("CCI_OVERSOLD must be below CCI_OVERBOUGHT");
  }
  issues.push(...validateExitParams(config.exit));

  const m = config.monitor;
  if (m.useTrailingStop && !(m.trailingStopPips > 0)) issues.push("TRAILING_STOP_PIPS must be > 0");
  if (m.useBreakeven && !(m.breakevenActivationPips > 0)) {
    issues.push("BREAKEVEN_ACTIVATION_PIPS must be > 0");
  }
  if (m.useBreakeven && !(m.breakevenOffsetPips >= 0 && m.breakevenOffsetPips < m.breakevenActivationPips)) {
    issues.push("BREAKEVEN_OFFSET_PIPS must be >= 0 and below the activation distance");
  }
  if (m.useAtrTrailing && !(m.atrTrailingMultiple > 0)) issues.push("ATR_TRAILING_MULTIPLE must be > 0");

  if (!(config.paper.startingBalance > 0)) issues.push("PAPER_STARTING_BALANCE must be > 0");
  if (!(config.paper.leverage >= 1)) issues.push("PAPER_LEVERAGE must be >= 1");
  if (!(config.paper.fillDelayMs >= 0)) issues.push("PAPER_FILL_DELAY_MS must be >= 0");
  positiveInt("LIVE_INTERVAL_MS", config.liveIntervalMs);

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
}

/** Reads instrument reference data from a JSON array. */
export function loadInstruments(file: string): InstrumentInfo[] {
  const resolved = path.resolve(process.cwd(), file);
  const raw: unknown = JSON.parse(readFileSync(resolved, "utf-8"));
  if (!Array.isArray(raw)) {
    throw new ConfigError([`${file} must contain a JSON array of instruments`]);
  }
  const issues: string[] = [];
  const instruments: InstrumentInfo[] = [];
  raw.forEach((entry: unknown, index) => {
    const parsed = parseInstrument(entry);
    if (parsed) {
      instruments.push(parsed);
    } else {
      issues.push(`${file}[${index}] is not a valid instrument`);
    }
  });
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return instruments;
}

function parseInstrument(entry: unknown): InstrumentInfo | null {
  if (typeof entry !== "object" || entry === null) {
    return null;
  }
  const field = (key: string): unknown => (key in entry ? Reflect.get(entry, key) : undefined);
  const symbol = field("symbol");
  if (typeof symbol !== "string" || symbol.length === 0) {
    return null;
  }
  const numbers = ["tickValue", "marginPerLot", "pointSize", "lotStep", "minVolume", "maxVolume", "digits"].map(
    (key) => field(key)
  );
  const [tickValue, marginPerLot, pointSize, lotStep, minVolume, maxVolume, digits] = numbers;
  if (
    typeof tickValue !== "number" ||
    typeof marginPerLot !== "number" ||
    typeof pointSize !== "number" ||
    typeof lotStep !== "number" ||
    typeof minVolume !== "number" ||
    typeof maxVolume !== "number" ||
    typeof digits !== "number"
  ) {
    return null;
  }
  return { symbol, tickValue, marginPerLot, pointSize, lotStep, minVolume, maxVolume, digits };
}

function parseSignalMode(value: string | undefined): SignalMode {
  return value === "crossover" ? "crossover" : "oscillator";
}

function isTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return true;
  } catch {
    return false;
  }
}
