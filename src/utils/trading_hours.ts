const HHMM = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function parseClock(value: string): number | null {
  const match = HHMM.exec(value.trim());
  if (!match) {
    return null;
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

/** Minutes since midnight of `now` in the given IANA time zone. */
export function minutesOfDay(now: Date, timeZone = "UTC"): number {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  }).formatToParts(now);
  const hour = Number(parts.find((p) => p.type === "hour")?.value ?? "0");
  const minute = Number(parts.find((p) => p.type === "minute")?.value ?? "0");
  return hour * 60 + minute;
}

/**
 * True when `now` falls inside [start, end], both `HH:MM`. A window whose end
 * is before its start spans midnight.
 */
export function isWithinTradingWindow(
  now: Date,
  start: string,
  end: string,
  timeZone = "UTC"
): boolean {
  const from = parseClock(start);
  const to = parseClock(end);
  if (from === null || to === null) {
    return false;
  }
  const current = minutesOfDay(now, timeZone);
  if (from <= to) {
    return current >= from && current <= to;
  }
  return current >= from || current <= to;
}
