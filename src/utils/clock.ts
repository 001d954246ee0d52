export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const HOUR_MS = 60 * 60 * 1000;

export const addHours = (date: Date, hours: number): Date => new Date(date.getTime() + hours * HOUR_MS);
