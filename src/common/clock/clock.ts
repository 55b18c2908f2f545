export const CLOCK = Symbol('CLOCK');

// Wall-clock source for "today" and cache expiry. Tests pin it.
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
