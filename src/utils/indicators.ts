export interface Hlc {
  high: number;
  low: number;
  close: number;
}

export function sma(values: number[]): number {
  if (values.length === 0) {
    throw new Error("SMA requires at least one value");
  }
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

export function ema(values: number[], period: number): number {
  if (values.length < period) {
    throw new Error(`Not enough values for EMA(${period})`);
  }
  const alpha = 2 / (period + 1);
  let current = sma(values.slice(0, period));
  for (let i = period; i < values.length; i += 1) {
    current = values[i] * alpha + current * (1 - alpha);
  }
  return current;
}

// Wilder-smoothed ATR per bar. The first `period` bars have no value and are
// left out, so result[k] belongs to bar k + period.
export function atrSeries(bars: Hlc[], period: number): number[] {
  if (bars.length < period + 1) {
    throw new Error(`Not enough values for ATR(${period})`);
  }

  const trueRanges: number[] = [];
  for (let i = 1; i < bars.length; i += 1) {
    const tr1 = bars[i].high - bars[i].low;
    const tr2 = Math.abs(bars[i].high - bars[i - 1].close);
    const tr3 = Math.abs(bars[i].low - bars[i - 1].close);
    trueRanges.push(Math.max(tr1, tr2, tr3));
  }

  let atrValue = sma(trueRanges.slice(0, period));
  const out = [atrValue];
  for (let i = period; i < trueRanges.length; i += 1) {
    atrValue = (atrValue * (period - 1) + trueRanges[i]) / period;
    out.push(atrValue);
  }
  return out;
}

/** Commodity Channel Index of the last bar, on typical price. */
export function cci(bars: Hlc[], period: number): number {
  if (bars.length < period) {
    throw new Error(`Not enough values for CCI(${period})`);
  }
  const typical = bars.slice(-period).map((b) => (b.high + b.low + b.close) / 3);
  const mean = sma(typical);
  const meanDeviation = sma(typical.map((tp) => Math.abs(tp - mean)));
  if (meanDeviation === 0) {
    return 0;
  }
  return (typical[typical.length - 1] - mean) / (0.015 * meanDeviation);
}
