/**
 * Wall-clock source used for scheduling and timestamping samples.
 * Injected under the CLOCK token so tests can pin "now".
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = "CLOCK";

export const systemClock: Clock = {
  now: () => new Date(),
};
