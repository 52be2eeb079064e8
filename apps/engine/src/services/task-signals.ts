import { TaskCancelledError } from '@agentdeck/sdk';

interface PauseGate {
    promise: Promise<void>;
    release: () => void;
}

/**
 * Cooperative control signals for one task: an AbortSignal that fires on
 * cancel, and a gate the unit of work waits on while the task is paused.
 * Nothing here interrupts running code; the agent has to look.
 */
export class TaskSignals {
    private readonly controller = new AbortController();
    private gate: PauseGate | null = null;

    constructor(readonly taskId: string) { }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    get paused(): boolean {
        return this.gate !== null;
    }

    get cancelled(): boolean {
        return this.controller.signal.aborted;
    }

    pause(): void {
        if (this.gate || this.cancelled) return;
        let release: () => void = () => undefined;
        const promise = new Promise<void>((resolve) => {
            release = resolve;
        });
        this.gate = { promise, release };
    }

    resume(): void {
        const gate = this.gate;
        this.gate = null;
        gate?.release();
    }

    abort(reason?: string): void {
        if (!this.cancelled) {
            this.controller.abort(new TaskCancelledError(this.taskId, reason));
        }
        // wake anything parked on the pause gate so it can observe the abort
        this.resume();
    }

    throwIfCancelled(): void {
        if (!this.cancelled) return;
        const reason: unknown = this.controller.signal.reason;
        throw reason instanceof TaskCancelledError ? reason : new TaskCancelledError(this.taskId);
    }

    /** Resolves once the task is not paused; rejects with TaskCancelledError once cancelled. */
    async waitWhileRunnable(): Promise<void> {
        for (;;) {
            this.throwIfCancelled();
            const gate = this.gate;
            if (!gate) return;
            await gate.promise;
        }
    }
}
