import { AgentTask, PRIORITY_RANK, TaskStatus } from '@agentdeck/sdk';
import { TaskEventBus } from '../events/task-event-bus';
import {
    InvalidTaskArgumentError,
    InvalidTaskStateError,
    TaskNotFoundError,
} from '../errors/orchestration.error';
import { TaskSignals } from './task-signals';

const TAG = '[orchestrator]';

export const DEFAULT_HISTORY_LIMIT = 50;
export const DEFAULT_CANCELLATION_REASON = 'Cancelled by user';
export const SHUTDOWN_REASON = 'Service shutting down';

/**
 * Handle given to the unit of work that executes a task. Every call is
 * scoped to that one task; progress calls become no-ops once it has left
 * the running state.
 */
export interface TaskControl {
    readonly taskId: string;
    readonly signal: AbortSignal;
    snapshot(): AgentTask | undefined;
    isPaused(): boolean;
    waitWhileRunnable(): Promise<void>;
    updateProgress(processedItems: number, currentAction?: string): void;
    updateProgressBytes(processedBytes: number, currentAction?: string): void;
    reportItemFailure(message?: string): void;
    complete(message?: string): void;
    fail(errorMessage: string): void;
}

/** Invoked each time a task is promoted to Running. */
export interface TaskLauncher {
    launch(control: TaskControl): void;
}

export interface OrchestrationServiceOptions {
    historyLimit?: number;
    events?: TaskEventBus;
    launcher?: TaskLauncher;
    /** When false, queued tasks only start through an explicit `start()`. */
    autoStart?: boolean;
}

export interface StatusSummary {
    isVisible: boolean;
    hasActiveTask: boolean;
    agentName: string;
    currentAction: string;
    progressPercentage: number;
    progressText: string;
    elapsedTimeText: string;
    etaText: string;
    queueCount: number;
    isPaused: boolean;
    canPause: boolean;
    canCancel: boolean;
}

interface QueueEntry {
    task: AgentTask;
    seq: number;
}

// priority first, then oldest, then submission order
const byDispatchOrder = (a: QueueEntry, b: QueueEntry): number =>
    PRIORITY_RANK[b.task.priority] - PRIORITY_RANK[a.task.priority] ||
    a.task.createdAt.getTime() - b.task.createdAt.getTime() ||
    a.seq - b.seq;

function assertCount(taskId: string, field: string, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new InvalidTaskArgumentError(`${field} must be a non-negative number (got ${value})`, taskId);
    }
}

/**
 * Owns every agent task for the lifetime of the process.
 *
 * At most one task holds the running slot (Running or Paused); the rest wait
 * in a priority queue. Terminal tasks move into a bounded, newest-first
 * history. All operations are synchronous, so each transition completes
 * before any other caller can observe the collections; notifications and
 * unit-of-work launches are deferred until after the transition.
 */
export class OrchestrationService {
    readonly events: TaskEventBus;
    private readonly historyLimit: number;
    private readonly launcher: TaskLauncher | null;
    private readonly autoStart: boolean;

    private queue: QueueEntry[] = [];
    private current: AgentTask | null = null;
    private history: AgentTask[] = [];
    private readonly signals = new Map<string, TaskSignals>();
    private seq = 0;
    private accepting = true;

    constructor(options: OrchestrationServiceOptions = {}) {
        const historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
        if (!Number.isInteger(historyLimit) || historyLimit < 0) {
            throw new RangeError(`historyLimit must be a non-negative integer (got ${historyLimit})`);
        }
        this.historyLimit = historyLimit;
        this.events = options.events ?? new TaskEventBus();
        this.launcher = options.launcher ?? null;
        this.autoStart = options.autoStart ?? true;
    }

    get currentTask(): AgentTask | undefined {
        return this.current?.clone();
    }

    /** Waiting tasks in the order they would be dispatched. */
    get queuedTasks(): AgentTask[] {
        return [...this.queue].sort(byDispatchOrder).map((entry) => entry.task.clone());
    }

    get activeTasks(): AgentTask[] {
        return this.current ? [this.current.clone()] : [];
    }

    /** Newest first. */
    get completedTasks(): AgentTask[] {
        return this.history.map((task) => task.clone());
    }

    get queueLength(): number {
        return this.queue.length;
    }

    get isRunning(): boolean {
        return this.current?.status === TaskStatus.RUNNING;
    }

    get isAccepting(): boolean {
        return this.accepting;
    }

    getTask(taskId: string): AgentTask | undefined {
        return this.find(taskId)?.clone();
    }

    getStatusSummary(): StatusSummary {
        const task = this.current;
        const queueCount = this.queue.length;

        if (!task) {
            return {
                isVisible: queueCount > 0,
                hasActiveTask: false,
                agentName: '',
                currentAction: queueCount > 0 ? `${queueCount} tasks queued` : 'Idle',
                progressPercentage: 0,
                progressText: '',
                elapsedTimeText: '00:00',
                etaText: '--:--',
                queueCount,
                isPaused: false,
                canPause: false,
                canCancel: false,
            };
        }

        return {
            isVisible: true,
            hasActiveTask: true,
            agentName: task.agentName,
            currentAction: task.currentAction,
            progressPercentage: task.progressPercentage,
            progressText: task.progressText,
            elapsedTimeText: task.elapsedTimeText,
            etaText: task.etaText,
            queueCount,
            isPaused: task.status === TaskStatus.PAUSED,
            canPause: task.canPause,
            canCancel: task.canCancel,
        };
    }

    /**
     * Takes ownership of a copy of `task`, queues it and, when the running
     * slot is free, promotes the best queued candidate.
     */
    submit(task: AgentTask): string {
        if (!this.accepting) {
            throw new InvalidTaskStateError('Service is shutting down and no longer accepts tasks', task.id);
        }
        if (!task.id) {
            throw new InvalidTaskArgumentError('Task id cannot be empty', task.id);
        }
        if (this.find(task.id)) {
            throw new InvalidTaskArgumentError(`Task ${task.id} already exists`, task.id);
        }
        if (task.status !== TaskStatus.PENDING) {
            throw new InvalidTaskStateError(`Task ${task.id} must be pending to be submitted (is ${task.status})`, task.id);
        }
        assertCount(task.id, 'totalItems', task.totalItems);
        assertCount(task.id, 'totalBytes', task.totalBytes);

        const owned = task.clone();
        owned.status = TaskStatus.QUEUED;
        this.queue.push({ task: owned, seq: this.seq++ });
        this.signals.set(owned.id, new TaskSignals(owned.id));

        console.log(`${TAG} queued ${owned.id} (${owned.agentName}, ${owned.priority}): ${owned.description}`);
        this.events.publish('queued', owned);

        if (this.autoStart) this.dispatch();
        return owned.id;
    }

    /**
     * Starts a specific queued task now, ahead of priority order. The slot must be free.
     * Returns a copy of the task as it stands after the transition, as do
     * `pause`, `resume` and `cancel`.
     */
    start(taskId: string): AgentTask {
        const task = this.require(taskId);
        if (task.status !== TaskStatus.QUEUED) {
            throw new InvalidTaskStateError(`Task ${taskId} cannot be started from ${task.status}`, taskId);
        }
        if (this.current) {
            throw new InvalidTaskStateError(`Task ${this.current.id} is already running`, taskId);
        }

        this.queue = this.queue.filter((entry) => entry.task !== task);
        this.begin(task);
        return task.clone();
    }

    updateProgress(taskId: string, processedItems: number, currentAction?: string): void {
        const task = this.runningTask(taskId);
        if (!task) return;
        assertCount(taskId, 'processedItems', processedItems);

        task.processedItems = processedItems;
        if (currentAction) task.currentAction = currentAction;
        this.events.publish('updated', task);
    }

    updateProgressBytes(taskId: string, processedBytes: number, currentAction?: string): void {
        const task = this.runningTask(taskId);
        if (!task) return;
        assertCount(taskId, 'processedBytes', processedBytes);

        task.processedBytes = processedBytes;
        if (currentAction) task.currentAction = currentAction;
        this.events.publish('updated', task);
    }

    /** Counts one failed item on a running task, recording `message` in its error list. */
    reportItemFailure(taskId: string, message?: string): void {
        const task = this.runningTask(taskId);
        if (!task) return;

        task.failedItems += 1;
        if (message) task.errors.push(message);
        this.events.publish('updated', task);
    }

    pause(taskId: string): AgentTask {
        const task = this.require(taskId);
        if (task.status !== TaskStatus.RUNNING) {
            throw new InvalidTaskStateError(`Task ${taskId} cannot be paused from ${task.status}`, taskId);
        }
        if (!task.canPause) {
            throw new InvalidTaskStateError(`Task ${taskId} does not support pausing`, taskId);
        }

        task.status = TaskStatus.PAUSED;
        this.signalsFor(taskId).pause();
        console.log(`${TAG} paused ${taskId} (${task.agentName})`);
        this.events.publish('updated', task, 'Task paused');
        return task.clone();
    }

    resume(taskId: string): AgentTask {
        const task = this.require(taskId);
        if (task.status !== TaskStatus.PAUSED) {
            throw new InvalidTaskStateError(`Task ${taskId} cannot be resumed from ${task.status}`, taskId);
        }
        if (!task.canPause) {
            throw new InvalidTaskStateError(`Task ${taskId} does not support pausing`, taskId);
        }

        task.status = TaskStatus.RUNNING;
        this.signalsFor(taskId).resume();
        console.log(`${TAG} resumed ${taskId} (${task.agentName})`);
        this.events.publish('updated', task, 'Task resumed');
        return task.clone();
    }

    cancel(taskId: string, reason?: string): AgentTask {
        const task = this.require(taskId);
        if (task.isTerminal) {
            throw new InvalidTaskStateError(`Task ${taskId} is already ${task.status}`, taskId);
        }
        if (!task.canCancel) {
            throw new InvalidTaskStateError(`Task ${taskId} does not support cancellation`, taskId);
        }

        this.cancelTask(task, reason || DEFAULT_CANCELLATION_REASON);
        return task.clone();
    }

    /** Marks the running task Completed. `success = false` records a failure instead. */
    complete(taskId: string, success = true, message?: string): void {
        if (!success) {
            this.fail(taskId, message || 'Task reported failure');
            return;
        }

        const task = this.requireRunning(taskId);
        this.finish(task, TaskStatus.COMPLETED, message || 'Task completed');
        console.log(`${TAG} completed ${taskId} (${task.agentName}): ${task.processedItems}/${task.totalItems} items`);
        this.dispatchIfAuto();
    }

    /** Records an agent failure on the running task. The failure is data, not an exception. */
    fail(taskId: string, errorMessage: string): void {
        const task = this.requireRunning(taskId);
        task.errors.push(errorMessage);
        this.finish(task, TaskStatus.FAILED, errorMessage);
        console.error(`${TAG} failed ${taskId} (${task.agentName}): ${errorMessage}`);
        this.dispatchIfAuto();
    }

    clearHistory(): void {
        const cleared = this.history.length;
        this.history = [];
        console.log(`${TAG} cleared ${cleared} tasks from history`);
    }

    /** Publishes a refresh of the running task so observers can redraw elapsed time and ETA. */
    refreshRunning(): void {
        if (this.current?.status === TaskStatus.RUNNING) {
            this.events.publish('updated', this.current);
        }
    }

    /**
     * Stops accepting submissions and cancels every queued and active task,
     * ignoring `canCancel`. Returns the number of tasks cancelled.
     */
    shutdown(reason: string = SHUTDOWN_REASON): number {
        this.accepting = false;

        const doomed = [...this.queue].sort(byDispatchOrder).map((entry) => entry.task);
        if (this.current) doomed.push(this.current);

        for (const task of doomed) {
            this.cancelTask(task, reason);
        }

        console.log(`${TAG} shut down, cancelled ${doomed.length} tasks`);
        return doomed.length;
    }

    private find(taskId: string): AgentTask | undefined {
        if (this.current?.id === taskId) return this.current;
        return (
            this.queue.find((entry) => entry.task.id === taskId)?.task ??
            this.history.find((task) => task.id === taskId)
        );
    }

    private require(taskId: string): AgentTask {
        const task = this.find(taskId);
        if (!task) throw new TaskNotFoundError(taskId);
        return task;
    }

    private requireRunning(taskId: string): AgentTask {
        const task = this.require(taskId);
        if (task !== this.current || task.status !== TaskStatus.RUNNING) {
            throw new InvalidTaskStateError(`Task ${taskId} is not running (is ${task.status})`, taskId);
        }
        return task;
    }

    private runningTask(taskId: string): AgentTask | undefined {
        const task = this.current;
        return task?.id === taskId && task.status === TaskStatus.RUNNING ? task : undefined;
    }

    private signalsFor(taskId: string): TaskSignals {
        let signals = this.signals.get(taskId);
        if (!signals) {
            signals = new TaskSignals(taskId);
            this.signals.set(taskId, signals);
        }
        return signals;
    }

    private dispatchIfAuto(): void {
        if (this.autoStart && this.accepting) this.dispatch();
    }

    private dispatch(): void {
        if (this.current || this.queue.length === 0) return;

        const [next, ...rest] = [...this.queue].sort(byDispatchOrder);
        this.queue = rest;
        this.begin(next.task);
    }

    private begin(task: AgentTask): void {
        task.status = TaskStatus.RUNNING;
        task.markStarted();
        this.current = task;

        console.log(`${TAG} started ${task.id} (${task.agentName}): ${task.description}`);
        this.events.publish('updated', task, 'Task started');
        this.scheduleLaunch(task);
    }

    private cancelTask(task: AgentTask, reason: string): void {
        const heldSlot = this.current === task;
        if (heldSlot) {
            this.current = null;
        } else {
            this.queue = this.queue.filter((entry) => entry.task !== task);
        }

        task.cancellationReason = reason;
        task.markFinished(TaskStatus.CANCELLED);
        this.signals.get(task.id)?.abort(reason);
        this.signals.delete(task.id);
        this.archive(task);

        console.log(`${TAG} cancelled ${task.id} (${task.agentName}): ${reason}`);
        this.events.publish('updated', task, 'Task cancelled');
        this.events.publish('completed', task, 'Task cancelled');

        if (heldSlot) this.dispatchIfAuto();
    }

    private finish(task: AgentTask, status: TaskStatus.COMPLETED | TaskStatus.FAILED, message: string): void {
        this.current = null;
        task.markFinished(status);
        this.signals.delete(task.id);
        this.archive(task);
        this.events.publish('completed', task, message);
    }

    private archive(task: AgentTask): void {
        this.history.unshift(task);
        if (this.history.length > this.historyLimit) {
            this.history.length = this.historyLimit;
        }
    }

    private scheduleLaunch(task: AgentTask): void {
        const launcher = this.launcher;
        if (!launcher) return;

        const control = this.createControl(task.id);
        // after the 'updated' event above has gone out
        setImmediate(() => {
            if (this.current?.id !== task.id || task.isTerminal) {
                console.warn(`${TAG} ${task.id} left the running slot before launch, skipping`);
                return;
            }
            try {
                launcher.launch(control);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                console.error(`${TAG} launcher threw for ${task.id}:`, err);
                if (this.runningTask(task.id)) this.fail(task.id, `Launch failed: ${message}`);
            }
        });
    }

    private createControl(taskId: string): TaskControl {
        const signals = this.signalsFor(taskId);
        return {
            taskId,
            signal: signals.signal,
            snapshot: () => this.getTask(taskId),
            isPaused: () => signals.paused,
            waitWhileRunnable: () => signals.waitWhileRunnable(),
            updateProgress: (processedItems, currentAction) =>
                this.updateProgress(taskId, processedItems, currentAction),
            updateProgressBytes: (processedBytes, currentAction) =>
                this.updateProgressBytes(taskId, processedBytes, currentAction),
            reportItemFailure: (message) => this.reportItemFailure(taskId, message),
            complete: (message) => this.complete(taskId, true, message),
            fail: (errorMessage) => this.fail(taskId, errorMessage),
        };
    }
}
