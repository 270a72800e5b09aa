import { add, type Duration } from 'date-fns';

import { type ClockPort } from '../clock.port.js';

/**
 * Clock the tests move by hand
 */
export class TestClock implements ClockPort {
    private current: Date;

    constructor(start: Date) {
        this.current = start;
    }

    public advance(duration: Duration): void {
        this.current = add(this.current, duration);
    }

    public now(): Date {
        return this.current;
    }

    public set(date: Date): void {
        this.current = date;
    }
}
