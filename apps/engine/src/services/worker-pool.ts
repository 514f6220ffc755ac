import { QueueFullError, ShuttingDownError } from '../errors/task.errors';

const TAG = '[pool]';

export interface WorkerPoolConfig {
    size: number;
    maxQueueSize: number;
}

interface Job {
    id: string;
    run: () => Promise<unknown>;
}

/**
 * Bounded set of execution slots with a FIFO overflow queue. Jobs run on the
 * event loop; `size` caps how many are in flight at once.
 */
export class WorkerPool {
    private readonly queue: Job[] = [];
    private readonly active = new Set<string>();
    private idleWaiters: Array<() => void> = [];
    private closed = false;

    constructor(private readonly config: WorkerPoolConfig) {
        console.log(`${TAG} ${config.size} slots, maxQueue=${config.maxQueueSize}`);
    }

    submit(id: string, run: () => Promise<unknown>): void {
        if (this.closed) {
            throw new ShuttingDownError();
        }
        if (this.active.size >= this.config.size && this.queue.length >= this.config.maxQueueSize) {
            throw new QueueFullError(`queue is full (${this.queue.length}/${this.config.maxQueueSize})`);
        }
        this.queue.push({ id, run });
        this.dispatch();
    }

    // Drops a job that has not started yet. Returns false if it is running or unknown.
    remove(id: string): boolean {
        const idx = this.queue.findIndex(job => job.id === id);
        if (idx === -1) return false;
        this.queue.splice(idx, 1);
        this.notifyIfIdle();
        return true;
    }

    clearQueue(): string[] {
        const ids = this.queue.map(job => job.id);
        this.queue.length = 0;
        this.notifyIfIdle();
        return ids;
    }

    close(): void {
        this.closed = true;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get queueSize(): number {
        return this.queue.length;
    }

    get activeCount(): number {
        return this.active.size;
    }

    activeIds(): string[] {
        return [...this.active];
    }

    // Resolves true once nothing is queued or running, false if the deadline passes first.
    async drain(timeoutMs: number): Promise<boolean> {
        if (this.isIdle()) return true;

        let handle: NodeJS.Timeout | undefined;
        let waiter: (() => void) | undefined;
        const idle = new Promise<boolean>(resolve => {
            waiter = () => resolve(true);
            this.idleWaiters.push(waiter);
        });
        const deadline = new Promise<boolean>(resolve => {
            handle = setTimeout(() => resolve(false), timeoutMs);
        });

        try {
            return await Promise.race([idle, deadline]);
        } finally {
            clearTimeout(handle);
            this.idleWaiters = this.idleWaiters.filter(w => w !== waiter);
        }
    }

    private isIdle(): boolean {
        return this.queue.length === 0 && this.active.size === 0;
    }

    private dispatch(): void {
        while (this.active.size < this.config.size && this.queue.length > 0) {
            const job = this.queue.shift();
            if (!job) break;
            this.start(job);
        }
    }

    private start(job: Job): void {
        this.active.add(job.id);
        Promise.resolve()
            .then(job.run)
            .catch(err => console.error(`${TAG} job ${job.id} failed:`, err))
            .finally(() => {
                this.active.delete(job.id);
                this.dispatch();
                this.notifyIfIdle();
            });
    }

    private notifyIfIdle(): void {
        if (!this.isIdle()) return;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach(resolve => resolve());
    }
}
