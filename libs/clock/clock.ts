/**
 * Ledger time source. Timestamps are whole seconds since the Unix epoch.
 */
export interface Clock {
    now(): number;
}

export class SystemClock implements Clock {
    now(): number {
        return Math.floor(Date.now() / 1000);
    }
}

/**
 * Deterministic clock for tests and replays.
 */
export class ManualClock implements Clock {
    constructor(private current: number = 0) { }

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        this.current = timestamp;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}
