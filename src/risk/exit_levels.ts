import { Direction, ExitLevels, ExitParams } from "../types.js";

export interface ExitSeries {
  atrStop: number[];
  atrTarget: number[];
  hybridStop: number[];
  hybridTarget: number[];
}

export interface ExitSeriesResult {
  series: ExitSeries;
  calculated: number;
}

/**
 * Stop-loss and take-profit prices for a position entered at `currentPrice`.
 *
 * ATR levels sit `atr * multiplier` away from price. The pivot levels sit a
 * capped buffer away, and the hybrid level is their weighted average. The
 * weights are normalized by their sum, so they need not add up to 1.
 */
export function computeExitLevels(
  currentPrice: number,
  atr: number,
  params: ExitParams,
  direction: Direction = "LONG"
): ExitLevels {
  const vol = Number.isFinite(atr) && atr > 0 ? atr : 0;
  const sign = direction === "LONG" ? 1 : -1;
  const maxBuffer = params.maxBufferPips * params.pointSize;

  const bufferStop = Math.min(vol * params.slBufferMult, maxBuffer);
  const bufferTarget = Math.min(vol * params.tpBufferMult, maxBuffer);

  const atrStop = currentPrice - sign * vol * params.slMultiplier;
  const atrTarget = currentPrice + sign * vol * params.tpMultiplier;

  const weightSum = params.atrWeight + params.pivotWeight;
  if (!params.useHybrid || !(weightSum > 0)) {
    return {
      atrStop,
      atrTarget,
      hybridStop: atrStop,
      hybridTarget: atrTarget,
      bufferStop,
      bufferTarget
    };
  }

  const pivotStop = currentPrice - sign * bufferStop;
  const pivotTarget = currentPrice + sign * bufferTarget;
  return {
    atrStop,
    atrTarget,
    hybridStop: (atrStop * params.atrWeight + pivotStop * params.pivotWeight) / weightSum,
    hybridTarget: (atrTarget * params.atrWeight + pivotTarget * params.pivotWeight) / weightSum,
    bufferStop,
    bufferTarget
  };
}

/**
 * Per-bar levels over a close/ATR series. Bars before `prevCalculated - 1`
 * are taken from `previous` unchanged; the last already-calculated bar is
 * recomputed because its values may have moved since.
 */
export function computeExitSeries(
  closes: number[],
  atrSeries: number[],
  params: ExitParams,
  direction: Direction,
  prevCalculated = 0,
  previous?: ExitSeries
): ExitSeriesResult {
  const total = Math.min(closes.length, atrSeries.length);
  const start = previous && prevCalculated > 0 ? Math.min(prevCalculated - 1, total) : 0;

  const series: ExitSeries = {
    atrStop: (previous?.atrStop ?? []).slice(0, start),
    atrTarget: (previous?.atrTarget ?? []).slice(0, start),
    hybridStop: (previous?.hybridStop ?? []).slice(0, start),
    hybridTarget: (previous?.hybridTarget ?? []).slice(0, start)
  };

  for (let i = start; i < total; i += 1) {
    const levels = computeExitLevels(closes[i], atrSeries[i], params, direction);
    series.atrStop.push(levels.atrStop);
    series.atrTarget.push(levels.atrTarget);
    series.hybridStop.push(levels.hybridStop);
    series.hybridTarget.push(levels.hybridTarget);
  }

  return { series, calculated: total };
}

export function validateExitParams(params: ExitParams): string[] {
  const issues: string[] = [];
  if (!(params.slMultiplier > 0)) issues.push("slMultiplier must be > 0");
  if (!(params.tpMultiplier > 0)) issues.push("tpMultiplier must be > 0");
  if (!(params.slBufferMult >= 0)) issues.push("slBufferMult must be >= 0");
  if (!(params.tpBufferMult >= 0)) issues.push("tpBufferMult must be >= 0");
  if (!(params.maxBufferPips > 0)) issues.push("maxBufferPips must be > 0");
  if (!(params.pointSize > 0)) issues.push("pointSize must be > 0");
  if (params.useHybrid) {
    if (!(params.atrWeight >= 0 && params.atrWeight <= 1)) {
      issues.push("atrWeight must be within [0, 1]");
    }
    if (!(params.pivotWeight >= 0 && params.pivotWeight <= 1)) {
      issues.push("pivotWeight must be within [0, 1]");
    }
    if (!(params.atrWeight + params.pivotWeight > 0)) {
      issues.push("atrWeight + pivotWeight must be > 0 when hybrid exits are enabled");
    }
  }
  return issues;
}
