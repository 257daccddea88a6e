import { AccountState, InstrumentInfo, SizingResult } from "../types.js";

// Substituted when tick value times stop distance is not positive.
export const PIP_VALUE_FLOOR = 0.0001;
const DEFAULT_LOT_STEP = 0.01;

export function sizePosition(
  account: AccountState,
  instrument: InstrumentInfo,
  riskPercent: number,
  stopLossDistancePips: number,
  minLot: number,
  maxLot: number
): SizingResult {
  const riskAmount = account.balance * (riskPercent / 100);
  let pipValue = instrument.tickValue * stopLossDistancePips;
  const invalidInstrumentData = !(Number.isFinite(pipValue) && pipValue > 0);
  if (invalidInstrumentData) {
    pipValue = PIP_VALUE_FLOOR;
  }

  const marginRate = instrument.marginPerLot / account.leverage;
  const marginCap =
    Number.isFinite(marginRate) && marginRate > 0
      ? Math.max(0, account.freeMargin) / marginRate
      : Number.POSITIVE_INFINITY;

  const [lowLot, highLot] = volumeBounds(instrument, minLot, maxLot);
  const rejectionReason =
    checkSizeable(account, riskPercent, minLot, maxLot) ?? checkOverlap(instrument, lowLot, highLot);
  if (rejectionReason) {
    return {
      lots: 0,
      capped: false,
      riskAmount,
      pipValue,
      marginCap,
      invalidInstrumentData,
      rejectionReason
    };
  }

  const rawSize = riskAmount / pipValue;
  const bounded = Math.min(rawSize, marginCap);
  const clamped = clamp(bounded, lowLot, highLot);
  const lots = clamp(roundToStep(clamped, instrument.lotStep), lowLot, highLot);

  return {
    lots,
    capped: marginCap < rawSize || clamped !== bounded,
    riskAmount,
    pipValue,
    marginCap,
    invalidInstrumentData
  };
}

export function requiredMargin(
  lots: number,
  instrument: InstrumentInfo,
  account: AccountState
): number {
  if (account.leverage <= 0) {
    return lots * instrument.marginPerLot;
  }
  return (lots * instrument.marginPerLot) / account.leverage;
}

export function roundToStep(value: number, step: number): number {
  const lotStep = Number.isFinite(step) && step > 0 ? step : DEFAULT_LOT_STEP;
  const decimals = stepDecimals(lotStep);
  return Number((Math.round(value / lotStep) * lotStep).toFixed(decimals));
}

function checkSizeable(
  account: AccountState,
  riskPercent: number,
  minLot: number,
  maxLot: number
): string | undefined {
  if (!Number.isFinite(minLot) || !Number.isFinite(maxLot) || minLot <= 0) {
    return "Lot bounds must be positive numbers";
  }
  if (minLot > maxLot) {
    return `Min lot ${minLot} exceeds max lot ${maxLot}`;
  }
  if (!Number.isFinite(riskPercent) || riskPercent <= 0) {
    return "Risk percent must be positive";
  }
  if (!Number.isFinite(account.balance) || account.balance <= 0) {
    return "Account balance must be positive";
  }
  return undefined;
}

// Configured lot range narrowed to the instrument's own volume limits.
function volumeBounds(instrument: InstrumentInfo, minLot: number, maxLot: number): [number, number] {
  const low = Number.isFinite(instrument.minVolume) && instrument.minVolume > 0
    ? Math.max(minLot, instrument.minVolume)
    : minLot;
  const high = Number.isFinite(instrument.maxVolume) && instrument.maxVolume > 0
    ? Math.min(maxLot, instrument.maxVolume)
    : maxLot;
  return [low, high];
}

function checkOverlap(instrument: InstrumentInfo, low: number, high: number): string | undefined {
  if (low > high) {
    return `Lot range does not overlap ${instrument.symbol} volume limits ${instrument.minVolume}-${instrument.maxVolume}`;
  }
  return undefined;
}

function stepDecimals(step: number): number {
  const text = String(step);
  const exp = text.match(/e-(\d+)$/);
  if (exp) {
    return Number(exp[1]);
  }
  const dot = text.indexOf(".");
  return dot === -1 ? 0 : text.length - dot - 1;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
