/**
 * Tests for usage-limit reset parsing
 */

import { describe, it, expect } from 'vitest';
import {
  calculateWaitSeconds,
  formatWaitDuration,
  formatWaitMessage,
  parseLimitResetTime,
  planLimitWait,
} from './limit-wait';

// Noon in Chicago (CST, UTC-6)
const NOW = new Date('2026-01-15T18:00:00.000Z');

describe('parseLimitResetTime', () => {
  it('should parse an afternoon reset later today', () => {
    const parsed = parseLimitResetTime("You've hit your limit · resets 3pm (America/Chicago)", NOW);
    expect(parsed).toEqual({
      resetTime: new Date('2026-01-15T21:00:00.000Z'),
      timeZone: 'America/Chicago',
    });
  });

  it('should roll a past hour to tomorrow', () => {
    const parsed = parseLimitResetTime('resets 11am (America/Chicago)', NOW);
    expect(parsed?.resetTime).toEqual(new Date('2026-01-16T17:00:00.000Z'));
  });

  it('should treat 12am as midnight', () => {
    const parsed = parseLimitResetTime('resets 12am (America/Chicago)', NOW);
    expect(parsed?.resetTime).toEqual(new Date('2026-01-16T06:00:00.000Z'));
  });

  it('should treat 12pm as noon and roll it over when it is exactly now', () => {
    const parsed = parseLimitResetTime('resets 12pm (America/Chicago)', NOW);
    expect(parsed?.resetTime).toEqual(new Date('2026-01-16T18:00:00.000Z'));
  });

  it('should match case-insensitively', () => {
    const parsed = parseLimitResetTime('RESETS 3PM (UTC)', NOW);
    expect(parsed).toEqual({ resetTime: new Date('2026-01-16T15:00:00.000Z'), timeZone: 'UTC' });
  });

  it('should reject an unknown zone', () => {
    expect(parseLimitResetTime('resets 3pm (Mars/Olympus)', NOW)).toBeNull();
  });

  it('should reject messages without a reset time', () => {
    expect(parseLimitResetTime('Claude command failed with return code 1', NOW)).toBeNull();
  });
});

describe('planLimitWait', () => {
  it('should wait for the latest reset across agents', () => {
    const plan = planLimitWait(
      ['resets 3pm (America/Chicago)', 'resets 5pm (America/Chicago)'],
      NOW
    );
    expect(plan).toEqual({
      resetTime: new Date('2026-01-15T23:00:00.000Z'),
      targetTime: new Date('2026-01-15T23:05:00.000Z'),
      waitSeconds: 18300,
      timeZone: 'America/Chicago',
    });
  });

  it('should give up when any message is unparsable', () => {
    expect(planLimitWait(['resets 3pm (America/Chicago)', 'timeout'], NOW)).toBeNull();
  });

  it('should give up with no messages', () => {
    expect(planLimitWait([], NOW)).toBeNull();
  });
});

describe('calculateWaitSeconds', () => {
  it('should add the buffer', () => {
    expect(calculateWaitSeconds(new Date('2026-01-15T19:00:00.000Z'), NOW)).toBe(3900);
  });

  it('should never be negative', () => {
    expect(calculateWaitSeconds(new Date('2026-01-15T17:00:00.000Z'), NOW)).toBe(0);
  });
});

describe('formatWaitMessage', () => {
  it('should show minutes under an hour', () => {
    expect(formatWaitMessage(new Date('2026-01-15T21:05:00.000Z'), 2520, 'America/Chicago')).toBe(
      'Waiting for usage limit reset at 3:05pm America/Chicago (42 minutes)...'
    );
  });

  it('should show hours and minutes from an hour up', () => {
    expect(formatWaitMessage(new Date('2026-01-15T21:05:00.000Z'), 11100, 'America/Chicago')).toBe(
      'Waiting for usage limit reset at 3:05pm America/Chicago (3h 5m)...'
    );
  });

  it('should format a morning time', () => {
    expect(formatWaitMessage(new Date('2026-01-16T06:05:00.000Z'), 60, 'America/Chicago')).toBe(
      'Waiting for usage limit reset at 12:05am America/Chicago (1 minutes)...'
    );
  });
});

describe('formatWaitDuration', () => {
  it('should floor partial minutes', () => {
    expect(formatWaitDuration(119)).toBe('1 minutes');
    expect(formatWaitDuration(3600)).toBe('1h 0m');
  });
});
