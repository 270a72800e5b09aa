export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export const hoursToMs = (hours: number): number => hours * HOUR_MS;

export const daysToMs = (days: number): number => days * DAY_MS;
