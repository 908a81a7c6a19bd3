/**
 * Source of "now" for the timer engine and report presets
 */
export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date(),
};
