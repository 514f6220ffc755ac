import type { stageName, StageOutputs } from '@pagesmith/sdk';
import type { WritingLimits } from '../config';
import { QueueFullError, ShuttingDownError, TaskNotFoundError, TaskNotReadyError } from '../errors/task.errors';
import { TaskRecordStore } from '../store/task-record.store';
import { completedStages, isTerminal, taskStatus, TaskError, TaskRecord, transition } from '../store/task.record';
import { validateSubmission } from '../validation/submission';
import { BackpressureMonitor } from './backpressure';
import { PipelineOrchestrator } from './pipeline-orchestrator';
import { WorkerPool } from './worker-pool';

const TAG = '[tasks]';

export interface TaskProgress {
    completed: number;
    total: number;
    message: string;
}

export interface TaskStatusView {
    taskId: string;
    status: taskStatus;
    requestedStages: stageName[];
    completedStages: stageName[];
    currentStage: stageName | null;
    cancelRequested: boolean;
    progress: TaskProgress;
    error: TaskError | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface TaskResultView {
    taskId: string;
    status: taskStatus;
    stageOutputs: StageOutputs;
    error: TaskError | null;
}

export interface CancelOutcome {
    taskId: string;
    previousStatus: taskStatus;
    status: taskStatus;
    cancelRequested: boolean;
}

export interface TaskServiceDeps {
    store: TaskRecordStore;
    pool: WorkerPool;
    orchestrator: PipelineOrchestrator;
    limits: WritingLimits;
    backpressure?: BackpressureMonitor;
}

function progressMessage(record: TaskRecord, completed: number, total: number): string {
    switch (record.status) {
        case taskStatus.PENDING:
            return `Queued (0 of ${total} stages)`;
        case taskStatus.RUNNING:
            return record.currentStage
                ? `Running ${record.currentStage} (stage ${record.requestedStages.indexOf(record.currentStage) + 1} of ${total})`
                : `Starting (0 of ${total} stages)`;
        case taskStatus.COMPLETED:
            return `Completed ${completed} of ${total} stages`;
        case taskStatus.FAILED:
            return `Failed at ${record.error?.stage ?? 'unknown stage'} after ${completed} of ${total} stages`;
        case taskStatus.CANCELLED:
            return `Cancelled after ${completed} of ${total} stages`;
    }
}

export function describeProgress(record: TaskRecord): TaskProgress {
    const total = record.requestedStages.length;
    const completed = completedStages(record).length;
    return { completed, total, message: progressMessage(record, completed, total) };
}

/**
 * The engine's front door: accepts pipeline requests, hands them to the pool
 * and answers status, result and cancel queries from the record store.
 */
export class TaskService {
    private readonly store: TaskRecordStore;
    private readonly pool: WorkerPool;
    private readonly orchestrator: PipelineOrchestrator;
    private readonly limits: WritingLimits;
    private readonly backpressure?: BackpressureMonitor;

    constructor(deps: TaskServiceDeps) {
        this.store = deps.store;
        this.pool = deps.pool;
        this.orchestrator = deps.orchestrator;
        this.limits = deps.limits;
        this.backpressure = deps.backpressure;
    }

    get isShuttingDown(): boolean {
        return this.pool.isClosed;
    }

    async submit(requestedStages: readonly string[], parameters: unknown): Promise<string> {
        if (this.pool.isClosed) {
            throw new ShuttingDownError();
        }

        const submission = validateSubmission(requestedStages, parameters, this.limits);

        const pressure = this.backpressure?.check();
        if (pressure) {
            console.warn(`${TAG} rejecting submission: ${pressure}`);
            throw new QueueFullError(pressure);
        }

        const record = await this.store.create(submission.stages, submission.parameters);
        try {
            this.pool.submit(record.id, () => this.orchestrator.execute(record.id));
        } catch (err) {
            await this.store.delete(record.id);
            throw err;
        }

        console.log(`${TAG} task ${record.id} submitted (stages: ${record.requestedStages.join(', ')})`);
        return record.id;
    }

    async status(taskId: string): Promise<TaskStatusView> {
        const record = await this.require(taskId);
        return {
            taskId: record.id,
            status: record.status,
            requestedStages: record.requestedStages,
            completedStages: completedStages(record),
            currentStage: record.currentStage,
            cancelRequested: record.cancelRequested,
            progress: describeProgress(record),
            error: record.error,
            createdAt: record.createdAt,
            updatedAt: record.updatedAt,
        };
    }

    async result(taskId: string): Promise<TaskResultView> {
        const record = await this.require(taskId);
        if (!isTerminal(record.status)) {
            throw new TaskNotReadyError(taskId, record.status);
        }
        return {
            taskId: record.id,
            status: record.status,
            stageOutputs: record.stageOutputs,
            error: record.error,
        };
    }

    async cancel(taskId: string): Promise<CancelOutcome> {
        const seen: { previous: taskStatus | null } = { previous: null };

        const record = await this.store.update(taskId, draft => {
            seen.previous = draft.status;
            if (draft.status === taskStatus.PENDING) {
                transition(draft, taskStatus.CANCELLED);
            } else if (draft.status === taskStatus.RUNNING) {
                draft.cancelRequested = true;
            }
        });

        // terminal records skip the mutation and come back unchanged
        const previousStatus = seen.previous ?? record.status;
        if (previousStatus === taskStatus.PENDING) {
            this.pool.remove(taskId);
            console.log(`${TAG} task ${taskId} cancelled before it started`);
        } else if (previousStatus === taskStatus.RUNNING) {
            console.log(`${TAG} task ${taskId} will stop at the next stage boundary`);
        }

        return {
            taskId,
            previousStatus,
            status: record.status,
            cancelRequested: record.cancelRequested,
        };
    }

    /**
     * Stops accepting work, cancels everything still queued and gives running
     * tasks until the deadline; whatever is still running then is marked cancelled.
     */
    async shutdown(deadlineMs: number): Promise<void> {
        this.pool.close();

        const queued = this.pool.clearQueue();
        for (const id of queued) {
            await this.forceCancel(id);
        }
        if (queued.length > 0) {
            console.log(`${TAG} cancelled ${queued.length} queued tasks`);
        }

        const drained = await this.pool.drain(deadlineMs);
        if (drained) {
            console.log(`${TAG} all running tasks finished`);
            return;
        }

        const stragglers = this.pool.activeIds();
        for (const id of stragglers) {
            await this.forceCancel(id);
        }
        console.warn(`${TAG} shutdown deadline passed, cancelled ${stragglers.length} running tasks`);
    }

    // Marks a non-terminal task cancelled right away, without waiting for a stage boundary.
    async forceCancel(taskId: string): Promise<boolean> {
        try {
            const record = await this.store.update(taskId, draft => {
                transition(draft, taskStatus.CANCELLED);
            });
            return record.status === taskStatus.CANCELLED;
        } catch (err) {
            if (err instanceof TaskNotFoundError) return false;
            throw err;
        }
    }

    private async require(taskId: string): Promise<TaskRecord> {
        const record = await this.store.get(taskId);
        if (!record) {
            throw new TaskNotFoundError(taskId);
        }
        return record;
    }
}
