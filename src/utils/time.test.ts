import { describe, it, expect } from 'vitest';
import {
  FixedClock,
  addDays,
  eachDay,
  getDayKey,
  getLocalHour,
  isDayKey,
  isValidTimeZone,
  isWeekend,
  monthRange,
  secondsBetween,
  startOfWeek,
} from './time';

describe('day keys', () => {
  it('uses the calendar day of the given time zone', () => {
    const instant = '2026-03-02T23:30:00.000Z';
    expect(getDayKey(instant)).toBe('2026-03-02');
    expect(getDayKey(instant, 'America/New_York')).toBe('2026-03-02');
    expect(getDayKey(instant, 'Asia/Tokyo')).toBe('2026-03-03');
  });

  it('reads the local hour on a 24-hour clock', () => {
    expect(getLocalHour('2026-03-02T23:30:00.000Z', 'Asia/Tokyo')).toBe(8);
    expect(getLocalHour('2026-03-02T00:15:00.000Z')).toBe(0);
  });

  it('validates day keys and time zones', () => {
    expect(isDayKey('2026-02-28')).toBe(true);
    expect(isDayKey('2026-02-30')).toBe(false);
    expect(isDayKey('2026-3-1')).toBe(false);
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus')).toBe(false);
  });
});

describe('calendar arithmetic', () => {
  it('adds days across month and leap boundaries', () => {
    expect(addDays('2026-02-28', 1)).toBe('2026-03-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('lists days inclusively', () => {
    expect(eachDay('2026-02-27', '2026-03-01')).toEqual(['2026-02-27', '2026-02-28', '2026-03-01']);
    expect(eachDay('2026-03-02', '2026-03-01')).toEqual([]);
  });

  it('starts weeks on Monday', () => {
    expect(startOfWeek('2026-03-08')).toBe('2026-03-02');
    expect(startOfWeek('2026-03-02')).toBe('2026-03-02');
    expect(isWeekend('2026-03-07')).toBe(true);
    expect(isWeekend('2026-03-06')).toBe(false);
  });

  it('bounds a month', () => {
    expect(monthRange(2024, 2)).toEqual({ start: '2024-02-01', end: '2024-02-29' });
    expect(monthRange(2026, 12)).toEqual({ start: '2026-12-01', end: '2026-12-31' });
  });

  it('counts whole seconds and never goes negative', () => {
    expect(secondsBetween('2026-03-02T09:00:00.000Z', '2026-03-02T09:00:01.900Z')).toBe(1);
    expect(secondsBetween('2026-03-02T09:00:05.000Z', '2026-03-02T09:00:00.000Z')).toBe(0);
  });
});

describe('FixedClock', () => {
  it('only moves when advanced', () => {
    const clock = new FixedClock('2026-03-02T09:00:00.000Z');
    clock.advanceMinutes(20);
    clock.advanceSeconds(5);
    expect(clock.now().toISOString()).toBe('2026-03-02T09:20:05.000Z');
    clock.set('2026-01-01T00:00:00.000Z');
    expect(clock.now().toISOString()).toBe('2026-01-01T00:00:00.000Z');
  });
});
