import type { Collaborators } from '@pagesmith/sdk';
import type { EngineConfig } from './config';
import { TaskRecordStore } from './store/task-record.store';
import { BackpressureMonitor, EventLoopMonitor } from './services/backpressure';
import { PipelineOrchestrator } from './services/pipeline-orchestrator';
import { Reaper } from './services/reaper';
import { defaultStagePolicies, StageRunner } from './services/stage-runner';
import { TaskService } from './services/task.service';
import { WorkerPool } from './services/worker-pool';

export interface Engine {
    store: TaskRecordStore;
    pool: WorkerPool;
    runner: StageRunner;
    orchestrator: PipelineOrchestrator;
    tasks: TaskService;
    reaper: Reaper;
    shutdown(deadlineMs: number): Promise<void>;
}

export interface EngineOptions {
    // overrides the live event-loop reading; tests pass () => 0
    eventLoopLag?: () => number;
    wait?: (ms: number) => Promise<void>;
}

// Wiring for one engine instance. No timers start here; callers start the reaper.
export function createEngine(config: EngineConfig, collaborators: Collaborators, options: EngineOptions = {}): Engine {
    const store = new TaskRecordStore();
    const pool = new WorkerPool({ size: config.poolSize, maxQueueSize: config.maxQueueSize });
    const runner = new StageRunner(
        defaultStagePolicies(config.stageTimeouts, config.stageMaxAttempts, config.backoff),
        options.wait,
    );
    const orchestrator = new PipelineOrchestrator(store, runner, collaborators);

    let monitor: EventLoopMonitor | null = null;
    let lag = options.eventLoopLag;
    if (!lag) {
        const live = new EventLoopMonitor();
        monitor = live;
        lag = () => live.lag;
    }

    const tasks = new TaskService({
        store,
        pool,
        orchestrator,
        limits: config.writing,
        backpressure: new BackpressureMonitor(config.maxEventLoopLag, lag),
    });

    const reaper = new Reaper(store, {
        intervalMs: config.reaperInterval,
        retentionSeconds: config.taskRetentionSeconds,
        taskTimeoutSeconds: config.taskTimeoutSeconds,
        maxTasks: config.maxTasks,
        cancel: taskId => tasks.cancel(taskId),
    });

    return {
        store,
        pool,
        runner,
        orchestrator,
        tasks,
        reaper,
        async shutdown(deadlineMs: number) {
            reaper.stop();
            await tasks.shutdown(deadlineMs);
            monitor?.disable();
        },
    };
}
