import { SignalIntent } from "../types.js";

export type SignalMode = "oscillator" | "crossover";

export interface SignalConfig {
  mode: SignalMode;
  oversoldLevel: number; // e.g. -100 for CCI
  overboughtLevel: number; // e.g. 100 for CCI
  allowShort: boolean;
}

export interface SignalInput {
  price: number;
  movingAverage: number;
  cci?: number | null;
  previousPrice?: number | null;
  previousMovingAverage?: number | null;
}

export function evaluateSignal(input: SignalInput, cfg: SignalConfig): SignalIntent {
  if (!isNum(input.price) || !isNum(input.movingAverage)) {
    return "NONE";
  }

  if (cfg.mode === "crossover") {
    const { previousPrice, previousMovingAverage } = input;
    if (!isNum(previousPrice) || !isNum(previousMovingAverage)) {
      return "NONE";
    }
    const crossedUp =
      previousPrice <= previousMovingAverage && input.price > input.movingAverage;
    return crossedUp ? "LONG" : "NONE";
  }

  const cci = input.cci;
  if (!isNum(cci)) {
    return "NONE";
  }
  if (cci < cfg.oversoldLevel && input.price > input.movingAverage) {
    return "LONG";
  }
  if (cfg.allowShort && cci > cfg.overboughtLevel && input.price < input.movingAverage) {
    return "SHORT";
  }
  return "NONE";
}

function isNum(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
