import { stageName } from '@pagesmith/sdk';
import type { Collaborators, StageInputMap } from '@pagesmith/sdk';
import { TaskConflictError } from '../errors/task.errors';
import { TaskRecordStore } from '../store/task-record.store';
import { recordOutput, taskStatus, TaskRecord, transition } from '../store/task.record';
import { buildStageInput } from './stage-inputs';
import { StageRunner } from './stage-runner';

const TAG = '[orchestrator]';

// Drives one task through its requested stages. Stage failures end the task
// as FAILED and are recorded on it; they are never thrown from here.
export class PipelineOrchestrator {
    constructor(
        private readonly store: TaskRecordStore,
        private readonly runner: StageRunner,
        private readonly collaborators: Collaborators,
    ) { }

    async execute(taskId: string): Promise<TaskRecord> {
        let record = await this.store.update(taskId, draft => {
            if (draft.status !== taskStatus.PENDING) {
                throw new TaskConflictError(taskId, draft.status);
            }
            transition(draft, taskStatus.RUNNING);
        });

        if (record.status === taskStatus.CANCELLED) {
            console.log(`${TAG} task ${taskId} was cancelled before it started`);
            return record;
        }
        if (record.status !== taskStatus.RUNNING) {
            throw new TaskConflictError(taskId, record.status);
        }

        console.log(`${TAG} task ${taskId} started (stages: ${record.requestedStages.join(' → ')})`);

        for (const stage of record.requestedStages) {
            // stage boundary: the only place a cancel request takes effect
            record = await this.store.update(taskId, draft => {
                if (draft.cancelRequested) {
                    transition(draft, taskStatus.CANCELLED);
                } else {
                    draft.currentStage = stage;
                }
            });

            if (record.status !== taskStatus.RUNNING) {
                console.log(`${TAG} task ${taskId} ${record.status} before stage ${stage}`);
                return record;
            }

            record = await this.runStage(stage, record);

            if (record.status !== taskStatus.RUNNING) {
                return record;
            }
        }

        record = await this.store.update(taskId, draft => {
            transition(draft, taskStatus.COMPLETED);
        });
        console.log(`${TAG} task ${taskId} ${record.status}`);
        return record;
    }

    private async runStage<S extends stageName>(stage: S, record: TaskRecord): Promise<TaskRecord> {
        let input: StageInputMap[S];
        try {
            input = buildStageInput(stage, record.parameters, record.stageOutputs);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`${TAG} task ${record.id} cannot build input for ${stage}: ${message}`);
            return this.store.update(record.id, draft => {
                transition(draft, taskStatus.FAILED);
                draft.error = { stage, reason: 'StagePermanentFailure', message, attempts: 0 };
            });
        }

        const result = await this.runner.run(stage, input, this.collaborators[stage], record.id);

        if (result.success) {
            const { output } = result;
            console.log(`${TAG} task ${record.id} stage ${stage} completed (attempts: ${result.attempts})`);
            return this.store.update(record.id, draft => {
                recordOutput(draft, stage, output);
            });
        }

        const { reason, message, attempts } = result;
        return this.store.update(record.id, draft => {
            // a cancel that arrived while the stage was failing wins over the failure
            if (draft.cancelRequested) {
                transition(draft, taskStatus.CANCELLED);
                return;
            }
            transition(draft, taskStatus.FAILED);
            draft.error = { stage, reason, message, attempts };
            console.error(`${TAG} task ${record.id} failed at ${stage} (${reason}): ${message}`);
        });
    }
}
