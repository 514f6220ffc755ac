import { IntervalHistogram, monitorEventLoopDelay } from 'perf_hooks';

export type DelayHistogram = Pick<IntervalHistogram, 'percentile' | 'reset' | 'enable' | 'disable'>;

export interface EventLoopMonitorOptions {
    resolution?: number;
    // p99 covers at most this much recent history
    windowMs?: number;
    histogram?: DelayHistogram;
    now?: () => number;
}

export class EventLoopMonitor {
    private monitor: DelayHistogram;
    private readonly windowMs: number;
    private readonly now: () => number;
    private windowStart: number;

    constructor(options: EventLoopMonitorOptions = {}) {
        this.monitor = options.histogram ?? monitorEventLoopDelay({ resolution: options.resolution ?? 10 });
        this.windowMs = options.windowMs ?? 10_000;
        this.now = options.now ?? Date.now;
        this.windowStart = this.now();
        this.monitor.enable();
    }

    // p99 delay in ms; the histogram starts over once the window has elapsed
    get lag(): number {
        const lag = this.monitor.percentile(99) / 1_000_000;
        const now = this.now();
        if (now - this.windowStart >= this.windowMs) {
            this.monitor.reset();
            this.windowStart = now;
        }
        return lag;
    }

    disable(): void {
        this.monitor.disable();
    }
}

// Turns submissions away while the event loop is saturated. Queue length is
// bounded separately by the worker pool.
export class BackpressureMonitor {
    constructor(
        private readonly maxEventLoopLag: number,
        private readonly lag: () => number,
    ) { }

    check(): string | null {
        const lag = this.lag();
        if (lag > this.maxEventLoopLag) {
            return `event loop lag ${lag.toFixed(1)}ms exceeds ${this.maxEventLoopLag}ms`;
        }
        return null;
    }
}
