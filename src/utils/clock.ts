export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export const addMinutes = (date: Date, minutes: number): Date =>
  new Date(date.getTime() + minutes * MINUTE_MS);

export const addDays = (date: Date, days: number): Date => new Date(date.getTime() + days * DAY_MS);

// Calendar day key in UTC, e.g. "2026-03-14".
export const toDayKey = (date: Date): string => date.toISOString().slice(0, 10);

export const shiftDayKey = (dayKey: string, days: number): string =>
  toDayKey(addDays(new Date(`${dayKey}T00:00:00.000Z`), days));
