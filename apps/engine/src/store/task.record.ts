import { PIPELINE_ORDER, stageName } from '@pagesmith/sdk';
import type { StageOutputMap, StageOutputs } from '@pagesmith/sdk';
import type { TaskParameters } from '../validation/submission';

/**
 * Lifecycle states for pipeline tasks.
 * Tasks progress: PENDING → RUNNING → COMPLETED/FAILED/CANCELLED, or PENDING → CANCELLED.
 */
export enum taskStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled',
}

export type StageFailureReason = 'StageExhausted' | 'StagePermanentFailure';

export interface TaskError {
    stage: stageName;
    reason: StageFailureReason;
    message: string;
    attempts: number;
}

export interface TaskRecord {
    id: string;
    status: taskStatus;
    requestedStages: stageName[];  // pipeline order
    parameters: TaskParameters;
    stageOutputs: StageOutputs;
    currentStage: stageName | null;
    cancelRequested: boolean;
    error: TaskError | null;  // set only when FAILED
    createdAt: Date;
    updatedAt: Date;
    startedAt: Date | null;
    completedAt: Date | null;
}

const TRANSITIONS: Record<taskStatus, readonly taskStatus[]> = {
    [taskStatus.PENDING]: [taskStatus.RUNNING, taskStatus.CANCELLED],
    [taskStatus.RUNNING]: [taskStatus.COMPLETED, taskStatus.FAILED, taskStatus.CANCELLED],
    [taskStatus.COMPLETED]: [],
    [taskStatus.FAILED]: [],
    [taskStatus.CANCELLED]: [],
};

export class InvalidTransitionError extends Error {
    constructor(public readonly from: taskStatus, public readonly to: taskStatus) {
        super(`Cannot move task from ${from} to ${to}`);
        this.name = 'InvalidTransitionError';
    }
}

export function isTerminal(status: taskStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

export function canTransition(from: taskStatus, to: taskStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function transition(record: TaskRecord, to: taskStatus, at: Date = new Date()): void {
    if (!canTransition(record.status, to)) {
        throw new InvalidTransitionError(record.status, to);
    }
    record.status = to;
    if (to === taskStatus.RUNNING) {
        record.startedAt = at;
    }
    if (isTerminal(to)) {
        record.completedAt = at;
        record.currentStage = null;
    }
}

/**
 * Appends one stage output. Outputs are append-only and must arrive in
 * pipeline order: every requested stage before `stage` already has one.
 */
export function recordOutput<S extends stageName>(record: TaskRecord, stage: S, output: StageOutputMap[S]): void {
    if (!record.requestedStages.includes(stage)) {
        throw new Error(`Stage ${stage} was not requested for task ${record.id}`);
    }
    if (record.stageOutputs[stage] !== undefined) {
        throw new Error(`Stage ${stage} already has an output for task ${record.id}`);
    }
    const missing = record.requestedStages
        .slice(0, record.requestedStages.indexOf(stage))
        .filter(earlier => record.stageOutputs[earlier] === undefined);
    if (missing.length > 0) {
        throw new Error(`Stage ${stage} completed before ${missing.join(', ')} for task ${record.id}`);
    }
    record.stageOutputs[stage] = output;
}

export function completedStages(record: TaskRecord): stageName[] {
    return PIPELINE_ORDER.filter(stage => record.stageOutputs[stage] !== undefined);
}
