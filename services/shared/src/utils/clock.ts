// Time source for reservation expiry. Services take a Clock so callers and
// tests can pin "now" instead of reading the wall clock.

export interface Clock {
     now(): Date;
}

export const systemClock: Clock = {
     now: () => new Date(),
};

export function fixedClock(at: Date): Clock {
     return { now: () => new Date(at.getTime()) };
}

export function addMinutes(date: Date, minutes: number): Date {
     return new Date(date.getTime() + minutes * 60_000);
}
