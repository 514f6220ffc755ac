import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { EngineError, EngineErrorCode, InvalidRequestError } from '../errors/task.errors';
import { taskStatus } from '../store/task.record';
import { TaskService } from '../services/task.service';

const TAG = '[grpc]';

export type ProtoTaskStatus =
    | 'TASK_STATUS_UNSPECIFIED'
    | 'TASK_STATUS_PENDING'
    | 'TASK_STATUS_RUNNING'
    | 'TASK_STATUS_COMPLETED'
    | 'TASK_STATUS_FAILED'
    | 'TASK_STATUS_CANCELLED';

const STATUS_MAP: Record<taskStatus, ProtoTaskStatus> = {
    [taskStatus.PENDING]: 'TASK_STATUS_PENDING',
    [taskStatus.RUNNING]: 'TASK_STATUS_RUNNING',
    [taskStatus.COMPLETED]: 'TASK_STATUS_COMPLETED',
    [taskStatus.FAILED]: 'TASK_STATUS_FAILED',
    [taskStatus.CANCELLED]: 'TASK_STATUS_CANCELLED',
};

const CODE_MAP: Record<EngineErrorCode, grpc.status> = {
    INVALID_REQUEST: grpc.status.INVALID_ARGUMENT,
    TASK_NOT_FOUND: grpc.status.NOT_FOUND,
    TASK_NOT_READY: grpc.status.FAILED_PRECONDITION,
    TASK_CONFLICT: grpc.status.FAILED_PRECONDITION,
    QUEUE_FULL: grpc.status.RESOURCE_EXHAUSTED,
    SHUTTING_DOWN: grpc.status.UNAVAILABLE,
};

export interface SubmitTaskRequest {
    stages: string[];
    parameters: Buffer;
}

export interface SubmitTaskResponse {
    task_id: string;
}

export interface TaskIdRequest {
    task_id: string;
}

export interface GetTaskStatusResponse {
    task_id: string;
    status: ProtoTaskStatus;
    requested_stages: string[];
    completed_stages: string[];
    current_stage: string;
    cancel_requested: boolean;
    progress: { completed: number; total: number; message: string };
    error: Buffer;
    created_at: string;
    updated_at: string;
}

export interface GetTaskResultResponse {
    task_id: string;
    status: ProtoTaskStatus;
    stage_outputs: Buffer;
    error: Buffer;
}

export interface CancelTaskResponse {
    previous_status: ProtoTaskStatus;
    status: ProtoTaskStatus;
    cancel_requested: boolean;
}

// Handlers only read `request`, so tests can hand in a plain object.
type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

export function toGrpcError(err: unknown): Partial<grpc.StatusObject> {
    if (err instanceof EngineError) {
        return { code: CODE_MAP[err.code], details: err.message };
    }
    return { code: grpc.status.INTERNAL, details: err instanceof Error ? err.message : 'Unknown error' };
}

function toJsonBytes(value: unknown): Buffer {
    return value === null || value === undefined ? Buffer.alloc(0) : Buffer.from(JSON.stringify(value));
}

export function parseParameters(bytes: Buffer | undefined): Record<string, unknown> {
    const text = bytes ? bytes.toString('utf-8').trim() : '';
    if (!text) return {};

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        throw new InvalidRequestError('parameters must be valid JSON');
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new InvalidRequestError('parameters must be a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
}

/**
 * gRPC surface over TaskService. Engine errors map onto status codes;
 * anything else surfaces as INTERNAL.
 */
export class PipelineServiceImpl {
    constructor(private readonly tasks: TaskService) { }

    async submitTask(
        call: UnaryCall<SubmitTaskRequest>,
        callback: sendUnaryData<SubmitTaskResponse>,
    ): Promise<void> {
        try {
            const { stages, parameters } = call.request;
            const taskId = await this.tasks.submit(stages ?? [], parseParameters(parameters));
            callback(null, { task_id: taskId });
        } catch (error) {
            this.fail('submitTask', error, callback);
        }
    }

    async getTaskStatus(
        call: UnaryCall<TaskIdRequest>,
        callback: sendUnaryData<GetTaskStatusResponse>,
    ): Promise<void> {
        try {
            const view = await this.tasks.status(call.request.task_id);
            callback(null, {
                task_id: view.taskId,
                status: STATUS_MAP[view.status],
                requested_stages: view.requestedStages,
                completed_stages: view.completedStages,
                current_stage: view.currentStage ?? '',
                cancel_requested: view.cancelRequested,
                progress: view.progress,
                error: toJsonBytes(view.error),
                created_at: view.createdAt.toISOString(),
                updated_at: view.updatedAt.toISOString(),
            });
        } catch (error) {
            this.fail('getTaskStatus', error, callback);
        }
    }

    async getTaskResult(
        call: UnaryCall<TaskIdRequest>,
        callback: sendUnaryData<GetTaskResultResponse>,
    ): Promise<void> {
        try {
            const result = await this.tasks.result(call.request.task_id);
            callback(null, {
                task_id: result.taskId,
                status: STATUS_MAP[result.status],
                stage_outputs: toJsonBytes(result.stageOutputs),
                error: toJsonBytes(result.error),
            });
        } catch (error) {
            this.fail('getTaskResult', error, callback);
        }
    }

    async cancelTask(
        call: UnaryCall<TaskIdRequest>,
        callback: sendUnaryData<CancelTaskResponse>,
    ): Promise<void> {
        try {
            const outcome = await this.tasks.cancel(call.request.task_id);
            callback(null, {
                previous_status: STATUS_MAP[outcome.previousStatus],
                status: STATUS_MAP[outcome.status],
                cancel_requested: outcome.cancelRequested,
            });
        } catch (error) {
            this.fail('cancelTask', error, callback);
        }
    }

    private fail<T>(method: string, error: unknown, callback: sendUnaryData<T>): void {
        if (error instanceof EngineError) {
            console.warn(`${TAG} ${method} rejected: ${error.message}`);
        } else {
            console.error(`${TAG} ${method} error:`, error);
        }
        callback(toGrpcError(error));
    }
}
