import {
    AgentContext,
    AgentRegistry,
    TaskCancelledError,
    globalRegistry,
} from '@agentdeck/sdk';
import { TaskControl, TaskLauncher } from './orchestration.service';

const TAG = '[executor]';

type Outcome = { ok: true; message?: string } | { ok: false; error: string };

/**
 * Runs the registered agent handler for each task the orchestrator promotes.
 * A resolved handler completes the task, a thrown error fails it, and a
 * handler that stops because its task was cancelled is only logged.
 */
export class AgentExecutor implements TaskLauncher {
    private readonly inFlight = new Map<string, Promise<void>>();

    constructor(private readonly registry: AgentRegistry = globalRegistry) { }

    launch(control: TaskControl): void {
        const run = this.execute(control)
            .catch((err) => console.error(`${TAG} Task ${control.taskId} could not be settled:`, err))
            .finally(() => this.inFlight.delete(control.taskId));
        this.inFlight.set(control.taskId, run);
    }

    get activeCount(): number {
        return this.inFlight.size;
    }

    /**
     * Waits for launched handlers to return, up to `timeoutMs`. Handlers that
     * ignore cancellation can outlive this; returns false when any are left.
     */
    async drain(timeoutMs: number = 10_000): Promise<boolean> {
        if (this.inFlight.size === 0) return true;

        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<false>((resolve) => {
            timer = setTimeout(() => resolve(false), timeoutMs);
        });
        const settled = Promise.allSettled(Array.from(this.inFlight.values())).then(() => true as const);

        const drained = await Promise.race([settled, timedOut]);
        clearTimeout(timer);
        if (!drained) {
            console.warn(`${TAG} ${this.inFlight.size} agent(s) still running after ${timeoutMs}ms`);
        }
        return drained;
    }

    private async execute(control: TaskControl): Promise<void> {
        const task = control.snapshot();
        if (!task) {
            console.warn(`${TAG} Task ${control.taskId} disappeared before execution`);
            return;
        }

        const agent = this.registry.get(task.category);
        if (!agent) {
            control.fail(`No agent registered for category "${task.category}"`);
            return;
        }

        const ctx: AgentContext = {
            task,
            signal: control.signal,
            checkpoint: () => control.waitWhileRunnable(),
            progress: (processedItems, currentAction) => control.updateProgress(processedItems, currentAction),
            progressBytes: (processedBytes, currentAction) => control.updateProgressBytes(processedBytes, currentAction),
            itemFailed: (message) => control.reportItemFailure(message),
        };

        console.log(`${TAG} Task ${task.id} running ${task.category} agent (${task.agentName})`);

        let outcome: Outcome;
        try {
            const message = await agent.handler(ctx);
            outcome = { ok: true, message: message || undefined };
        } catch (err) {
            if (err instanceof TaskCancelledError || control.signal.aborted) {
                console.log(`${TAG} Task ${task.id} stopped after cancellation`);
                return;
            }
            outcome = { ok: false, error: err instanceof Error ? err.message : String(err) };
        }

        // a paused task can only be settled once it runs again
        try {
            await control.waitWhileRunnable();
        } catch (err) {
            if (err instanceof TaskCancelledError) {
                console.log(`${TAG} Task ${task.id} was cancelled before its result was recorded`);
                return;
            }
            throw err;
        }

        if (outcome.ok) {
            control.complete(outcome.message);
        } else {
            console.error(`${TAG} Task ${task.id} failed: ${outcome.error}`);
            control.fail(outcome.error);
        }
    }
}
