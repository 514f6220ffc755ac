export type EngineErrorCode =
    | 'INVALID_REQUEST'
    | 'TASK_NOT_FOUND'
    | 'TASK_NOT_READY'
    | 'TASK_CONFLICT'
    | 'QUEUE_FULL'
    | 'SHUTTING_DOWN';

/**
 * Errors that describe the caller's request rather than a task's outcome.
 * Stage failures never surface as these; they are recorded on the task.
 */
export abstract class EngineError extends Error {
    abstract readonly code: EngineErrorCode;
}

export class InvalidRequestError extends EngineError {
    readonly code = 'INVALID_REQUEST';

    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'InvalidRequestError';
    }
}

export class TaskNotFoundError extends EngineError {
    readonly code = 'TASK_NOT_FOUND';

    constructor(public readonly taskId: string) {
        super(`Task ${taskId} not found`);
        this.name = 'TaskNotFoundError';
    }
}

export class TaskNotReadyError extends EngineError {
    readonly code = 'TASK_NOT_READY';

    constructor(public readonly taskId: string, public readonly status: string) {
        super(`Task ${taskId} is still ${status}`);
        this.name = 'TaskNotReadyError';
    }
}

export class TaskConflictError extends EngineError {
    readonly code = 'TASK_CONFLICT';

    constructor(public readonly taskId: string, public readonly status: string) {
        super(`Task ${taskId} is ${status}; submit a new task to run the pipeline again`);
        this.name = 'TaskConflictError';
    }
}

export class QueueFullError extends EngineError {
    readonly code = 'QUEUE_FULL';

    constructor(reason: string) {
        super(`Engine is not accepting work: ${reason}`);
        this.name = 'QueueFullError';
    }
}

export class ShuttingDownError extends EngineError {
    readonly code = 'SHUTTING_DOWN';

    constructor() {
        super('Engine is shutting down');
        this.name = 'ShuttingDownError';
    }
}
