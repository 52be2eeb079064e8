import { AgentTask } from '@agentdeck/sdk';

const TAG = '[events]';

export type TaskEventType = 'queued' | 'updated' | 'completed';

export const TASK_EVENT_TYPES: readonly TaskEventType[] = ['queued', 'updated', 'completed'];

export interface TaskEvent {
    type: TaskEventType;
    /** Copy of the task taken when the event was published. */
    task: AgentTask;
    message?: string;
    at: Date;
}

export type TaskEventListener = (event: TaskEvent) => void | Promise<void>;

/**
 * Fan-out for the three task notification channels.
 *
 * `publish()` only records the event; delivery happens on a later turn of the
 * event loop, in publish order, so listeners never run inside a state
 * transition. Each listener is isolated: one that throws or rejects is logged
 * and the others still receive the event.
 */
export class TaskEventBus {
    private readonly listeners = new Map<TaskEventType, Set<TaskEventListener>>();
    private readonly anyListeners = new Set<TaskEventListener>();
    private pending: TaskEvent[] = [];
    private scheduled = false;
    private idleWaiters: Array<() => void> = [];

    publish(type: TaskEventType, task: AgentTask, message?: string): void {
        this.pending.push({ type, task: task.clone(), message, at: new Date() });
        if (!this.scheduled) {
            this.scheduled = true;
            setImmediate(() => this.drain());
        }
    }

    /** Returns an unsubscribe function. */
    subscribe(type: TaskEventType, listener: TaskEventListener): () => void {
        let set = this.listeners.get(type);
        if (!set) {
            set = new Set();
            this.listeners.set(type, set);
        }
        const target = set;
        target.add(listener);
        return () => {
            target.delete(listener);
        };
    }

    onAny(listener: TaskEventListener): () => void {
        this.anyListeners.add(listener);
        return () => {
            this.anyListeners.delete(listener);
        };
    }

    listenerCount(type?: TaskEventType): number {
        const typed = type
            ? this.listeners.get(type)?.size ?? 0
            : Array.from(this.listeners.values()).reduce((sum, set) => sum + set.size, 0);
        return typed + this.anyListeners.size;
    }

    clear(): void {
        this.listeners.clear();
        this.anyListeners.clear();
    }

    /** Resolves once every event published so far has been handed to its listeners. */
    flush(): Promise<void> {
        if (!this.scheduled) return Promise.resolve();
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    private drain(): void {
        this.scheduled = false;
        const batch = this.pending;
        this.pending = [];

        for (const event of batch) {
            this.deliver(event);
        }

        // listeners may have published again; wait for that batch too
        if (!this.scheduled) {
            const waiters = this.idleWaiters;
            this.idleWaiters = [];
            for (const resolve of waiters) resolve();
        }
    }

    private deliver(event: TaskEvent): void {
        const targets = [...(this.listeners.get(event.type) ?? []), ...this.anyListeners];
        for (const listener of targets) {
            try {
                const result = listener(event);
                if (result instanceof Promise) {
                    result.catch((err) =>
                        console.error(`${TAG} ${event.type} listener for task ${event.task.id} rejected:`, err),
                    );
                }
            } catch (err) {
                console.error(`${TAG} ${event.type} listener for task ${event.task.id} threw:`, err);
            }
        }
    }
}
