/**
 * Source of the current instant, injected so expiry and trend windows can be simulated
 */
export interface ClockPort {
    now(): Date;
}
