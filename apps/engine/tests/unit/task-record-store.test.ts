import { stageName } from '@pagesmith/sdk';
import { TaskNotFoundError } from '../../src/errors/task.errors';
import { TaskRecordStore } from '../../src/store/task-record.store';
import { InvalidTransitionError, recordOutput, taskStatus, transition } from '../../src/store/task.record';
import { gate, sleep } from '../helpers/poll';
import { sampleAnalysis, sampleContent, testParameters } from '../helpers/fakes';

const PIPELINE = [stageName.EXTRACT, stageName.ANALYZE, stageName.WRITE, stageName.PUBLISH];

describe('TaskRecordStore', () => {
    let tick: number;
    let store: TaskRecordStore;

    beforeEach(() => {
        tick = 0;
        store = new TaskRecordStore(() => new Date(1_000 + tick++));
    });

    it('creates pending records with no outputs', async () => {
        const record = await store.create(PIPELINE, testParameters());

        expect(record.id).toMatch(/^[0-9a-f-]{36}$/);
        expect(record.status).toBe(taskStatus.PENDING);
        expect(record.requestedStages).toEqual(PIPELINE);
        expect(record.stageOutputs).toEqual({});
        expect(record.cancelRequested).toBe(false);
        expect(record.error).toBeNull();
        expect(record.createdAt.getTime()).toBe(1000);
        expect(record.updatedAt.getTime()).toBe(1000);
        expect(store.size).toBe(1);
    });

    it('returns null for unknown ids', async () => {
        expect(await store.get('missing')).toBeNull();
    });

    it('hands out snapshots that do not alias stored state', async () => {
        const created = await store.create(PIPELINE, testParameters());
        created.status = taskStatus.FAILED;
        created.requestedStages.pop();

        const fetched = await store.get(created.id);
        expect(fetched?.status).toBe(taskStatus.PENDING);
        expect(fetched?.requestedStages).toHaveLength(4);
    });

    it('commits mutations and bumps updatedAt', async () => {
        const { id } = await store.create(PIPELINE, testParameters());

        const updated = await store.update(id, draft => {
            transition(draft, taskStatus.RUNNING, new Date(5_000));
        });

        expect(updated.status).toBe(taskStatus.RUNNING);
        expect(updated.startedAt?.getTime()).toBe(5000);
        expect(updated.createdAt.getTime()).toBe(1000);
        expect(updated.updatedAt.getTime()).toBe(1001);
        expect((await store.get(id))?.status).toBe(taskStatus.RUNNING);
    });

    it('leaves updatedAt alone when a mutation changes nothing', async () => {
        const { id } = await store.create(PIPELINE, testParameters());

        const unchanged = await store.update(id, () => undefined);
        expect(unchanged.updatedAt.getTime()).toBe(1000);
    });

    it('rolls back a mutation that throws', async () => {
        const { id } = await store.create(PIPELINE, testParameters());

        await expect(store.update(id, draft => {
            transition(draft, taskStatus.RUNNING);
            draft.currentStage = stageName.EXTRACT;
            throw new Error('boom');
        })).rejects.toThrow('boom');

        const record = await store.get(id);
        expect(record?.status).toBe(taskStatus.PENDING);
        expect(record?.currentStage).toBeNull();
        expect(record?.updatedAt.getTime()).toBe(1000);
    });

    it('rejects illegal transitions without committing', async () => {
        const { id } = await store.create(PIPELINE, testParameters());

        await expect(store.update(id, draft => {
            transition(draft, taskStatus.COMPLETED);
        })).rejects.toBeInstanceOf(InvalidTransitionError);
        expect((await store.get(id))?.status).toBe(taskStatus.PENDING);
    });

    it('never mutates terminal records', async () => {
        const { id } = await store.create(PIPELINE, testParameters());
        await store.update(id, draft => transition(draft, taskStatus.CANCELLED));

        const mutation = jest.fn();
        const record = await store.update(id, mutation);

        expect(mutation).not.toHaveBeenCalled();
        expect(record.status).toBe(taskStatus.CANCELLED);
        expect(record.completedAt).not.toBeNull();
    });

    it('serializes concurrent updates to the same task', async () => {
        const { id } = await store.create(PIPELINE, testParameters({ targetLength: 1000 }));

        await Promise.all(Array.from({ length: 10 }, () => store.update(id, async draft => {
            const current = draft.parameters.targetLength;
            await sleep(1);
            draft.parameters.targetLength = current + 1;
        })));

        expect((await store.get(id))?.parameters.targetLength).toBe(1010);
    });

    it('keeps serving the last committed record while an update is in flight', async () => {
        const { id } = await store.create(PIPELINE, testParameters());
        const hold = gate();

        const pending = store.update(id, async draft => {
            transition(draft, taskStatus.RUNNING);
            await hold.promise;
        });

        await sleep(5);
        expect((await store.get(id))?.status).toBe(taskStatus.PENDING);

        hold.open();
        await pending;
        expect((await store.get(id))?.status).toBe(taskStatus.RUNNING);
    });

    it('throws TaskNotFoundError for unknown ids', async () => {
        await expect(store.update('missing', () => undefined)).rejects.toBeInstanceOf(TaskNotFoundError);
        await expect(store.delete('missing')).rejects.toThrow('Task missing not found');
    });

    it('deletes records', async () => {
        const { id } = await store.create(PIPELINE, testParameters());
        await store.delete(id);

        expect(await store.get(id)).toBeNull();
        expect(store.size).toBe(0);
    });
});

describe('recordOutput', () => {
    it('requires earlier requested stages to have outputs first', async () => {
        const store = new TaskRecordStore();
        const record = await store.create([stageName.EXTRACT, stageName.ANALYZE], testParameters());

        expect(() => recordOutput(record, stageName.ANALYZE, sampleAnalysis))
            .toThrow(`Stage analyze completed before extract for task ${record.id}`);

        recordOutput(record, stageName.EXTRACT, sampleContent);
        recordOutput(record, stageName.ANALYZE, sampleAnalysis);
        expect(Object.keys(record.stageOutputs)).toEqual(['extract', 'analyze']);
    });

    it('refuses unrequested stages and second outputs', async () => {
        const store = new TaskRecordStore();
        const record = await store.create([stageName.EXTRACT], testParameters());

        expect(() => recordOutput(record, stageName.ANALYZE, sampleAnalysis))
            .toThrow(`Stage analyze was not requested for task ${record.id}`);

        recordOutput(record, stageName.EXTRACT, sampleContent);
        expect(() => recordOutput(record, stageName.EXTRACT, sampleContent))
            .toThrow(`Stage extract already has an output for task ${record.id}`);
    });
});
