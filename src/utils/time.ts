import { DayKey } from '../models/common.model';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Clock for tests and replays; only moves when told to. */
export class FixedClock implements Clock {
  private current: Date;

  constructor(start: Date | string) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(to: Date | string): void {
    this.current = new Date(to);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  advanceSeconds(seconds: number): void {
    this.advance(seconds * 1000);
  }

  advanceMinutes(minutes: number): void {
    this.advance(minutes * 60_000);
  }
}

const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isDayKey(value: string): value is DayKey {
  if (!DAY_KEY_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Calendar day of an instant in the given IANA time zone.
 */
export function getDayKey(date: Date | string, timeZone = 'UTC'): DayKey {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return formatter.format(new Date(date));
}

/** Hour of day (0-23) of an instant in the given time zone. */
export function getLocalHour(date: Date | string, timeZone = 'UTC'): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: 'numeric',
    hourCycle: 'h23',
  });
  return Number(formatter.format(new Date(date)));
}

function toUtcMidnight(day: DayKey): Date {
  return new Date(`${day}T00:00:00Z`);
}

export function addDays(day: DayKey, days: number): DayKey {
  const date = toUtcMidnight(day);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/** Inclusive list of days from start to end; empty when end precedes start. */
export function eachDay(start: DayKey, end: DayKey): DayKey[] {
  const days: DayKey[] = [];
  for (let day = start; day <= end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/** 0 = Sunday ... 6 = Saturday */
export function dayOfWeek(day: DayKey): number {
  return toUtcMidnight(day).getUTCDay();
}

export function isWeekend(day: DayKey): boolean {
  const weekday = dayOfWeek(day);
  return weekday === 0 || weekday === 6;
}

/** Monday of the week containing the day. */
export function startOfWeek(day: DayKey): DayKey {
  const offset = (dayOfWeek(day) + 6) % 7;
  return addDays(day, -offset);
}

export function monthRange(year: number, month: number): { start: DayKey; end: DayKey } {
  const start = new Date(Date.UTC(year, month - 1, 1));
  const end = new Date(Date.UTC(year, month, 0));
  return {
    start: start.toISOString().slice(0, 10),
    end: end.toISOString().slice(0, 10),
  };
}

export function secondsBetween(from: Date | string, to: Date | string): number {
  return Math.max(0, Math.floor((new Date(to).getTime() - new Date(from).getTime()) / 1000));
}
