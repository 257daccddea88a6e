import { MarketData } from "../types.js";
import { atrSeries, cci, ema, Hlc, sma } from "../utils/indicators.js";

export type MaMethod = "SMA" | "EMA";

/**
 * Per-cycle indicator snapshot source. Values are `null` (or an empty ATR
 * series) while there is not enough history to compute them.
 */
export interface IndicatorAdapter {
  currentPrice(symbol: string): number | null;
  /** Close of the bar `shift` bars back (0 = latest). */
  close(symbol: string, timeframe: string, shift?: number): number | null;
  movingAverage(symbol: string, timeframe: string, period: number, shift?: number): number | null;
  cci(symbol: string, timeframe: string, period: number): number | null;
  atr(symbol: string, timeframe: string, period: number): number[];
}

interface Bar extends Hlc {
  timestamp: string;
}

export class BarSeriesIndicatorAdapter implements IndicatorAdapter {
  private bars = new Map<string, Bar[]>();
  private lastPrice = new Map<string, number>();

  constructor(
    private maxBars = 500,
    private maMethod: MaMethod = "SMA"
  ) {}

  pushBar(data: MarketData): void {
    const key = seriesKey(data.symbol, data.timeframe);
    const series = this.bars.get(key) ?? [];
    const bar: Bar = {
      high: data.high,
      low: data.low,
      close: data.close,
      timestamp: data.timestamp
    };
    const last = series[series.length - 1];
    if (last && last.timestamp === data.timestamp) {
      series[series.length - 1] = bar;
    } else {
      series.push(bar);
    }
    if (series.length > this.maxBars) {
      series.splice(0, series.length - this.maxBars);
    }
    this.bars.set(key, series);
    this.lastPrice.set(data.symbol, data.close);
  }

  setPrice(symbol: string, price: number): void {
    this.lastPrice.set(symbol, price);
  }

  barCount(symbol: string, timeframe: string): number {
    return this.bars.get(seriesKey(symbol, timeframe))?.length ?? 0;
  }

  currentPrice(symbol: string): number | null {
    return this.lastPrice.get(symbol) ?? null;
  }

  close(symbol: string, timeframe: string, shift = 0): number | null {
    const series = this.bars.get(seriesKey(symbol, timeframe)) ?? [];
    if (shift < 0) {
      return null;
    }
    return series[series.length - 1 - shift]?.close ?? null;
  }

  movingAverage(symbol: string, timeframe: string, period: number, shift = 0): number | null {
    const series = this.bars.get(seriesKey(symbol, timeframe)) ?? [];
    const closes = series.slice(0, series.length - shift).map((b) => b.close);
    if (shift < 0 || closes.length < period) {
      return null;
    }
    return this.maMethod === "EMA" ? ema(closes, period) : sma(closes.slice(-period));
  }

  cci(symbol: string, timeframe: string, period: number): number | null {
    const series = this.bars.get(seriesKey(symbol, timeframe)) ?? [];
    if (series.length < period) {
      return null;
    }
    return cci(series, period);
  }

  atr(symbol: string, timeframe: string, period: number): number[] {
    const series = this.bars.get(seriesKey(symbol, timeframe)) ?? [];
    if (series.length < period + 1) {
      return [];
    }
    return atrSeries(series, period);
  }
}

function seriesKey(symbol: string, timeframe: string): string {
  return `${symbol}:${timeframe}`;
}
