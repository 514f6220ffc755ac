import { v7 as uuidv7 } from 'uuid';
import { serialize, snapshot, stageName } from '@pagesmith/sdk';
import { TaskNotFoundError } from '../errors/task.errors';
import type { TaskParameters } from '../validation/submission';
import { isTerminal, taskStatus, TaskRecord } from './task.record';
import { KeyedLock } from './keyed-lock';

export type TaskMutation = (draft: TaskRecord) => void | Promise<void>;

/**
 * In-memory home of every task record.
 *
 * Reads hand out detached snapshots. Writes go through `update`, which applies
 * a mutation to a draft copy under a per-task lock and commits the draft only
 * when the mutation returns; a throwing mutation leaves the committed record
 * as it was. Terminal records are frozen: `update` returns them untouched
 * without invoking the mutation.
 */
export class TaskRecordStore {
    private readonly records = new Map<string, TaskRecord>();
    private readonly locks = new KeyedLock();

    constructor(private readonly now: () => Date = () => new Date()) { }

    async create(requestedStages: stageName[], parameters: TaskParameters): Promise<TaskRecord> {
        const at = this.now();
        const record: TaskRecord = {
            id: uuidv7(),
            status: taskStatus.PENDING,
            requestedStages: [...requestedStages],
            parameters,
            stageOutputs: {},
            currentStage: null,
            cancelRequested: false,
            error: null,
            createdAt: at,
            updatedAt: at,
            startedAt: null,
            completedAt: null,
        };
        const committed = snapshot(record);
        this.records.set(committed.id, committed);
        return snapshot(committed);
    }

    async get(id: string): Promise<TaskRecord | null> {
        const record = this.records.get(id);
        return record ? snapshot(record) : null;
    }

    async list(): Promise<TaskRecord[]> {
        return [...this.records.values()].map(record => snapshot(record));
    }

    get size(): number {
        return this.records.size;
    }

    async update(id: string, mutation: TaskMutation): Promise<TaskRecord> {
        return this.locks.run(id, async () => {
            const current = this.records.get(id);
            if (!current) {
                throw new TaskNotFoundError(id);
            }
            if (isTerminal(current.status)) {
                return snapshot(current);
            }

            const draft = snapshot(current);
            await mutation(draft);

            if (serialize(draft, Infinity) === serialize(current, Infinity)) {
                return snapshot(current);
            }

            const committed = snapshot(draft);
            committed.id = current.id;
            committed.updatedAt = this.now();
            this.records.set(id, committed);
            return snapshot(committed);
        });
    }

    async delete(id: string): Promise<void> {
        await this.locks.run(id, async () => {
            if (!this.records.delete(id)) {
                throw new TaskNotFoundError(id);
            }
        });
    }
}
