import { type ClockPort } from '../../../application/ports/outbound/time/clock.port.js';

export class SystemClock implements ClockPort {
    public now(): Date {
        return new Date();
    }
}
