import { InvalidDurationError } from "../errors/catalog.js";

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3_600;
const SECONDS_PER_DAY = 86_400;

/** Unit suffix -> length in seconds. Month and year are averaged (30.44 and 365.25 days). */
const UNIT_SECONDS = new Map<string, number>(Object.entries({
  nsec: 1e-9, ns: 1e-9,
  usec: 1e-6, us: 1e-6,
  msec: 1e-3, ms: 1e-3,
  seconds: 1, second: 1, secs: 1, sec: 1, s: 1,
  minutes: SECONDS_PER_MINUTE, minute: SECONDS_PER_MINUTE, mins: SECONDS_PER_MINUTE,
  min: SECONDS_PER_MINUTE, m: SECONDS_PER_MINUTE,
  hours: SECONDS_PER_HOUR, hour: SECONDS_PER_HOUR, hrs: SECONDS_PER_HOUR,
  hr: SECONDS_PER_HOUR, h: SECONDS_PER_HOUR,
  days: SECONDS_PER_DAY, day: SECONDS_PER_DAY, d: SECONDS_PER_DAY,
  weeks: 7 * SECONDS_PER_DAY, week: 7 * SECONDS_PER_DAY, w: 7 * SECONDS_PER_DAY,
  months: 2_630_016, month: 2_630_016, M: 2_630_016,
  years: 31_557_600, year: 31_557_600, y: 31_557_600,
}));

const COMPONENT = /(\d+)\s*([a-zA-Z]+)/y;

/**
 * Parse a human duration such as `90s`, `1min`, `2h 30m` or `3days`
 * into seconds. Components add up; each needs a unit.
 */
export function parseDuration(input: string): number {
  const text = input.trim();
  if (text === "") {
    throw new InvalidDurationError({ input, reason: "empty duration" });
  }

  let seconds = 0;
  let position = 0;
  while (position < text.length) {
    COMPONENT.lastIndex = position;
    const match = COMPONENT.exec(text);
    if (!match) {
      throw new InvalidDurationError({
        input,
        reason: `expected <number><unit> at position ${position}`,
      });
    }

    const [, amount, unit] = match;
    // Case matters: `m` is minutes, `M` is months.
    const unitSeconds = UNIT_SECONDS.get(unit);
    if (unitSeconds === undefined) {
      throw new InvalidDurationError({ input, reason: `unknown time unit '${unit}'` });
    }

    seconds += Number(amount) * unitSeconds;
    position = COMPONENT.lastIndex;
    while (position < text.length && text[position] === " ") position++;
  }

  if (!Number.isFinite(seconds)) {
    throw new InvalidDurationError({ input, reason: "duration too large" });
  }
  return seconds;
}

/**
 * Epoch second separating "newer" from "older" entries: `now - duration`.
 * Fails when the window reaches before the epoch.
 */
export function cutoffFor(input: string, nowSeconds: number): number {
  const cutoff = Math.floor(nowSeconds - parseDuration(input));
  if (cutoff < 0) {
    throw new InvalidDurationError({ input, reason: "time window reaches before the epoch" });
  }
  return cutoff;
}
