/**
 * Usage-limit reset parsing
 *
 * Rate-limited agents carry the provider's message, e.g.
 * "You've hit your limit · resets 3pm (America/Chicago)". The message names an
 * hour and a zone but no date: the reset is that hour today in the zone, or
 * tomorrow when the hour has already passed.
 */

export const LIMIT_RESET_BUFFER_MINUTES = 5;
export const LONG_WAIT_THRESHOLD_HOURS = 5;

const RESET_TIME_PATTERN = /resets\s+(\d{1,2}(?:am|pm))\s+\(([^)]+)\)/i;

export interface ParsedReset {
  resetTime: Date;
  timeZone: string;
}

export interface WaitPlan {
  /** Latest reset time across the paused agents */
  resetTime: Date;
  /** Reset time plus the buffer */
  targetTime: Date;
  waitSeconds: number;
  timeZone: string;
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  });
  const values: Record<string, number> = {};
  for (const part of formatter.formatToParts(date)) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }
  return {
    year: values.year ?? 0,
    month: values.month ?? 1,
    day: values.day ?? 1,
    hour: values.hour ?? 0,
    minute: values.minute ?? 0,
    second: values.second ?? 0,
  };
}

/** Milliseconds the zone's wall clock is ahead of UTC at the given instant */
function zoneOffsetMs(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(date.getTime() / 1000) * 1000;
}

/** Instant at which the zone's wall clock reads the given date and hour */
function zonedTimeToInstant(year: number, month: number, day: number, hour: number, timeZone: string): Date {
  const guess = Date.UTC(year, month - 1, day, hour);
  const first = guess - zoneOffsetMs(new Date(guess), timeZone);
  // The offset may differ across a DST change between guess and result
  const second = guess - zoneOffsetMs(new Date(first), timeZone);
  return new Date(second);
}

function parseHour(text: string): number | null {
  const lower = text.toLowerCase();
  const hour12 = Number(lower.slice(0, -2));
  if (!Number.isInteger(hour12)) {
    return null;
  }
  let hour: number;
  if (lower.endsWith('am')) {
    hour = hour12 === 12 ? 0 : hour12;
  } else {
    hour = hour12 === 12 ? 12 : hour12 + 12;
  }
  return hour >= 0 && hour <= 23 ? hour : null;
}

/**
 * Extract the reset instant from a limit message, or null when it has none
 */
export function parseLimitResetTime(message: string, now: Date): ParsedReset | null {
  const match = RESET_TIME_PATTERN.exec(message);
  if (!match) {
    return null;
  }
  const [, hourText, timeZone] = match;
  if (!isValidTimeZone(timeZone)) {
    return null;
  }
  const hour = parseHour(hourText);
  if (hour === null) {
    return null;
  }

  const today = zonedParts(now, timeZone);
  let resetTime = zonedTimeToInstant(today.year, today.month, today.day, hour, timeZone);
  if (resetTime.getTime() <= now.getTime()) {
    resetTime = zonedTimeToInstant(today.year, today.month, today.day + 1, hour, timeZone);
  }
  return { resetTime, timeZone };
}

/**
 * Seconds from now until the reset plus buffer, never negative
 */
export function calculateWaitSeconds(
  resetTime: Date,
  now: Date,
  bufferMinutes: number = LIMIT_RESET_BUFFER_MINUTES
): number {
  const target = resetTime.getTime() + bufferMinutes * 60_000;
  return Math.max(0, (target - now.getTime()) / 1000);
}

/**
 * Plan a wait for every paused agent's reset, or null if any message has no
 * parseable reset time
 */
export function planLimitWait(errorMessages: string[], now: Date): WaitPlan | null {
  if (errorMessages.length === 0) {
    return null;
  }
  let latest: ParsedReset | null = null;
  for (const message of errorMessages) {
    const parsed = parseLimitResetTime(message, now);
    if (!parsed) {
      return null;
    }
    if (!latest || parsed.resetTime.getTime() > latest.resetTime.getTime()) {
      latest = parsed;
    }
  }
  if (!latest) {
    return null;
  }
  return {
    resetTime: latest.resetTime,
    targetTime: new Date(latest.resetTime.getTime() + LIMIT_RESET_BUFFER_MINUTES * 60_000),
    waitSeconds: calculateWaitSeconds(latest.resetTime, now),
    timeZone: latest.timeZone,
  };
}

/**
 * Human-readable duration: "42 minutes" or "2h 5m"
 */
export function formatWaitDuration(waitSeconds: number): string {
  const totalMinutes = Math.floor(waitSeconds / 60);
  if (totalMinutes >= 60) {
    return `${Math.floor(totalMinutes / 60)}h ${totalMinutes % 60}m`;
  }
  return `${totalMinutes} minutes`;
}

/**
 * e.g. "Waiting for usage limit reset at 3:05pm America/Chicago (42 minutes)..."
 */
export function formatWaitMessage(targetTime: Date, waitSeconds: number, timeZone: string): string {
  const parts = zonedParts(targetTime, timeZone);
  const suffix = parts.hour < 12 ? 'am' : 'pm';
  const hour12 = parts.hour % 12 === 0 ? 12 : parts.hour % 12;
  const clock = `${hour12}:${String(parts.minute).padStart(2, '0')}${suffix}`;
  return `Waiting for usage limit reset at ${clock} ${timeZone} (${formatWaitDuration(waitSeconds)})...`;
}
