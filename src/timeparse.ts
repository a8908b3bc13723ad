import { ParseError } from './errors.js';

const UNIT_SECONDS: Record<string, number> = {
  s: 1, sec: 1, secs: 1, second: 1, seconds: 1,
  m: 60, min: 60, mins: 60, minute: 60, minutes: 60,
  h: 3600, hr: 3600, hrs: 3600, hour: 3600, hours: 3600,
  d: 86_400, day: 86_400, days: 86_400,
  w: 604_800, wk: 604_800, week: 604_800, weeks: 604_800,
};

const KEYWORD = /^(for|in|until|at)\s+/i;
const DURATION_PART = /\s*(\d+(?:\.\d+)?|an?)\s*([a-z]+)\s*(?:,\s*|and\s+)?/iy;
const CLOCK_TIME = /^(\d{1,2}):(\d{2})$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

export const TIME_PARSE_FAILURE = "I don't understand when you want me to do that";

/** "10m", "2 hours", "1h30m", "a day, 3 hours and 5 minutes" → seconds. */
function parseDuration(text: string): number | undefined {
  let pos = 0;
  let total = 0;
  while (pos < text.length) {
    DURATION_PART.lastIndex = pos;
    const match = DURATION_PART.exec(text);
    if (!match || match[0].length === 0) return undefined;
    const amountText = match[1] ?? '';
    const unit = UNIT_SECONDS[(match[2] ?? '').toLowerCase()];
    if (unit === undefined) return undefined;
    const amount = /^an?$/i.test(amountText) ? 1 : Number(amountText);
    total += amount * unit;
    pos = DURATION_PART.lastIndex;
  }
  return pos > 0 ? total : undefined;
}

/** Next occurrence of a local wall-clock time. */
function secondsUntilClockTime(hours: number, minutes: number, now: number): number | undefined {
  if (hours > 23 || minutes > 59) return undefined;
  const target = new Date(now);
  target.setHours(hours, minutes, 0, 0);
  if (target.getTime() <= now) target.setDate(target.getDate() + 1);
  return (target.getTime() - now) / 1000;
}

/**
 * Parse a human time expression into seconds from `now` (ms since epoch),
 * never less than 1. Accepts an optional leading for/in/until/at, plain
 * seconds, unit durations, HH:MM, and ISO date-times.
 */
export function parseTime(text: string, now: number = Date.now()): number {
  const trimmed = text.trim();
  const rest = trimmed.replace(KEYWORD, '');

  let seconds: number | undefined;
  if (/^\d+(?:\.\d+)?$/.test(rest)) {
    seconds = Number(rest);
  } else {
    seconds = parseDuration(rest);
  }

  if (seconds === undefined) {
    const clock = CLOCK_TIME.exec(rest);
    if (clock) {
      seconds = secondsUntilClockTime(Number(clock[1]), Number(clock[2]), now);
    } else if (ISO_DATE.test(rest)) {
      const at = Date.parse(rest);
      if (!Number.isNaN(at)) seconds = (at - now) / 1000;
    }
  }

  if (seconds === undefined || !Number.isFinite(seconds)) {
    throw new ParseError(TIME_PARSE_FAILURE);
  }
  return Math.max(1, seconds);
}

/** Whether the expression names a moment to act at ("in 5m", "at 14:00") rather than how long to keep something. */
export function isDeferral(text: string): boolean {
  const keyword = KEYWORD.exec(text.trim())?.[1]?.toLowerCase();
  return keyword === 'in' || keyword === 'at';
}
