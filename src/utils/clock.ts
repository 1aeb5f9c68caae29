import { ConfigurationError } from "./errors";

type TimeUnit = "d" | "h" | "m" | "s" | "ms";

const TO_MS: Record<TimeUnit, number> = {
    d: 86400000,
    h: 3600000,
    m: 60000,
    s: 1000,
    ms: 1
};

export const DAY_MS = TO_MS.d;

export function convertTime(value: number, from: TimeUnit, to: TimeUnit): number {
    const inMs = value * TO_MS[from];
    return inMs / TO_MS[to];
}

export function timeToTimestamp(hours: number, minutes: number, seconds: number, ms: number = 0): number {
    return hours * 3600000 + minutes * 60000 + seconds * 1000 + ms;
}

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

/**
 * Parses "HH:MM" or "HH:MM:SS" into an offset from midnight, in ms.
 */
export function parseTimeOfDay(value: string): number {
    const match = TIME_OF_DAY.exec(value);
    if (!match) {
        throw new ConfigurationError(`Invalid time of day "${value}" (expected HH:MM)`, { value });
    }
    return timeToTimestamp(Number(match[1]), Number(match[2]), Number(match[3] ?? "0"));
}

export function isTimeOfDay(value: string): boolean {
    return TIME_OF_DAY.test(value);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses "YYYY-MM-DD" into the UTC midnight of that date.
 */
export function parseIsoDate(value: string): number {
    const match = ISO_DATE.exec(value);
    if (!match) {
        throw new ConfigurationError(`Invalid date "${value}" (expected YYYY-MM-DD)`, { value });
    }
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const timestamp = Date.UTC(year, month - 1, day);
    const check = new Date(timestamp);
    if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
        throw new ConfigurationError(`Invalid date "${value}"`, { value });
    }
    return timestamp;
}

export function startOfUtcDay(timestamp: number): number {
    const d = new Date(timestamp);
    return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

export function todayUtc(): number {
    return startOfUtcDay(Date.now());
}

function pad2(value: number): string {
    return value.toString().padStart(2, "0");
}

export function formatUtcDayKey(timestamp: number): string {
    const d = new Date(timestamp);
    return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

// "YYYY-MM-DD HH:MM:SS", sem milissegundos
export function formatDateTime(timestamp: number): string {
    const d = new Date(timestamp);
    return `${formatUtcDayKey(timestamp)} ${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}:${pad2(d.getUTCSeconds())}`;
}

// "yyMMdd"
export function formatCompactDate(timestamp: number): string {
    const d = new Date(timestamp);
    return `${pad2(d.getUTCFullYear() % 100)}${pad2(d.getUTCMonth() + 1)}${pad2(d.getUTCDate())}`;
}

export function getUtcHour(timestamp: number): number {
    return new Date(timestamp).getUTCHours();
}
