/**
 * Wall clock pinned to a fixed UTC offset
 */

export interface Clock {
    /** Calendar date in the local zone, YYYY-MM-DD */
    today(): string;
    /** ISO-8601 timestamp carrying the local offset, e.g. 2024-05-01T09:30:00.000+08:00 */
    timestamp(): string;
}

export function formatOffset(offsetMinutes: number): string {
    const sign = offsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(offsetMinutes);
    const hours = String(Math.floor(abs / 60)).padStart(2, '0');
    const minutes = String(abs % 60).padStart(2, '0');
    return `${sign}${hours}:${minutes}`;
}

export function createClock(offsetMinutes: number, now: () => Date = () => new Date()): Clock {
    const shifted = () => new Date(now().getTime() + offsetMinutes * 60_000);

    return {
        today: () => shifted().toISOString().slice(0, 10),
        timestamp: () => shifted().toISOString().replace('Z', formatOffset(offsetMinutes)),
    };
}
