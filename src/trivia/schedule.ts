/**
 * trivia/schedule.ts
 * Parsing of the stored HH:MM schedule and conversion to a UTC time of day.
 */
import { ValidationError } from '../utils/errors.js';

export interface TimeOfDay {
    hour: number;
    minute: number;
}

const SCHEDULE_PATTERN = /^([01][0-9]|2[0-3]):([0-5][0-9])$/;
const MINUTES_PER_DAY = 24 * 60;
const MAX_OFFSET_HOURS = 14;

export const INVALID_SCHEDULE_MESSAGE = 'Please enter a correct time. 00:00 to 23:59';

export function isValidSchedule(value: string): boolean {
    return SCHEDULE_PATTERN.test(value);
}

export function parseSchedule(value: string): TimeOfDay {
    const match = SCHEDULE_PATTERN.exec(value);
    if (!match) {
        throw new ValidationError(INVALID_SCHEDULE_MESSAGE);
    }
    return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function assertUtcOffset(hours: number): void {
    if (!Number.isFinite(hours) || Math.abs(hours) > MAX_OFFSET_HOURS) {
        throw new ValidationError(`UTC offset must be between -${MAX_OFFSET_HOURS} and ${MAX_OFFSET_HOURS} hours, got ${hours}`);
    }
}

/**
 * Convert a local `HH:MM` schedule at a fixed UTC offset into the UTC time of day.
 * Only the time of day is kept, so "01:00" at UTC+8 becomes 17:00 (of the previous day).
 */
export function normalizeSchedule(schedule: string, utcOffsetHours: number): TimeOfDay {
    const { hour, minute } = parseSchedule(schedule);
    const offsetMinutes = Math.round(utcOffsetHours * 60);
    const local = hour * 60 + minute;
    const utc = (((local - offsetMinutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
    return { hour: Math.floor(utc / 60), minute: utc % 60 };
}

export function timeOfDayUtc(date: Date): TimeOfDay {
    return { hour: date.getUTCHours(), minute: date.getUTCMinutes() };
}

/** Negative when `a` is earlier than `b`, zero when equal. */
export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
    return (a.hour * 60 + a.minute) - (b.hour * 60 + b.minute);
}

/** UTC calendar date as YYYY-MM-DD. */
export function utcDateKey(date: Date): string {
    return date.toISOString().split('T')[0];
}

export function formatTimeOfDay(time: TimeOfDay): string {
    return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

export function formatUtcOffset(hours: number): string {
    const sign = hours < 0 ? '-' : '+';
    const totalMinutes = Math.round(Math.abs(hours) * 60);
    const wholeHours = Math.floor(totalMinutes / 60);
    const minutes = totalMinutes % 60;
    return minutes === 0
        ? `UTC${sign}${wholeHours}`
        : `UTC${sign}${wholeHours}:${String(minutes).padStart(2, '0')}`;
}
