import { TaskNotFoundError } from '../errors/task.errors';
import { TaskRecordStore } from '../store/task-record.store';
import { isTerminal, taskStatus, TaskRecord } from '../store/task.record';

const TAG = '[reaper]';

export interface ReapedTask {
    id: string;
    status: taskStatus;
    action: 'evicted' | 'timed-out';
}

export interface ReaperConfig {
    intervalMs: number;
    retentionSeconds: number;
    taskTimeoutSeconds: number;
    maxTasks: number;
    // Asks a running task to stop; the engine wires TaskService.cancel here.
    cancel: (taskId: string) => Promise<unknown>;
    now?: () => Date;
}

// Keeps the in-memory store bounded: evicts finished tasks past their retention
// window, trims the oldest finished tasks beyond maxTasks, and asks tasks that
// have been running longer than the task timeout to stop.
export class Reaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;
    private readonly now: () => Date;

    constructor(
        private readonly store: TaskRecordStore,
        private readonly config: ReaperConfig,
    ) {
        this.now = config.now ?? (() => new Date());
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.config.intervalMs}ms, retention: ${this.config.retentionSeconds}s, task timeout: ${this.config.taskTimeoutSeconds}s)`);

        this.intervalHandle = setInterval(() => {
            this.reap().catch(err => console.error(`${TAG} reap cycle crashed:`, err));
        }, this.config.intervalMs);
        this.intervalHandle.unref();
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async reap(): Promise<ReapedTask[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        const reaped: ReapedTask[] = [];

        try {
            const records = await this.store.list();
            reaped.push(...await this.expireOverdueTasks(records));
            reaped.push(...await this.evictFinishedTasks(records));

            if (reaped.length > 0) {
                console.log(`${TAG} reaped ${reaped.length} tasks: ${reaped.map(t => `${t.id}(${t.action})`).join(', ')}`);
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        } finally {
            this.isReaping = false;
        }

        return reaped;
    }

    private async expireOverdueTasks(records: TaskRecord[]): Promise<ReapedTask[]> {
        const cutoff = this.now().getTime() - this.config.taskTimeoutSeconds * 1000;
        const overdue = records.filter(r =>
            r.status === taskStatus.RUNNING
            && !r.cancelRequested
            && r.startedAt !== null
            && r.startedAt.getTime() < cutoff);

        const reaped: ReapedTask[] = [];
        for (const record of overdue) {
            if (await this.skipMissing(() => this.config.cancel(record.id))) {
                reaped.push({ id: record.id, status: record.status, action: 'timed-out' });
            }
        }
        return reaped;
    }

    private async evictFinishedTasks(records: TaskRecord[]): Promise<ReapedTask[]> {
        const cutoff = this.now().getTime() - this.config.retentionSeconds * 1000;
        const finished = records
            .filter(r => isTerminal(r.status))
            .sort((a, b) => finishedAt(a) - finishedAt(b));

        // beyond the cap, the oldest finished tasks go first even if still in retention
        const excess = Math.max(0, records.length - this.config.maxTasks);
        const victims = finished.filter((r, idx) => idx < excess || finishedAt(r) < cutoff);

        const reaped: ReapedTask[] = [];
        for (const record of victims) {
            if (await this.skipMissing(() => this.store.delete(record.id))) {
                reaped.push({ id: record.id, status: record.status, action: 'evicted' });
            }
        }
        return reaped;
    }

    // Another caller may have removed the task since the listing was taken.
    private async skipMissing(action: () => Promise<unknown>): Promise<boolean> {
        try {
            await action();
            return true;
        } catch (err) {
            if (err instanceof TaskNotFoundError) return false;
            throw err;
        }
    }
}

function finishedAt(record: TaskRecord): number {
    return (record.completedAt ?? record.updatedAt).getTime();
}
