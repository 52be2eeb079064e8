import { v7 as uuid } from 'uuid';
import {
    AgentCategory,
    TaskInit,
    TaskMetadata,
    TaskPriority,
    TaskSnapshot,
    TaskStatus,
    isTerminalStatus,
} from './types';
import { formatDuration, formatEta, formatProgress } from './utils/format';

/**
 * One unit of agent work and its live progress.
 *
 * The identity is fixed at construction; everything else is mutated in place
 * by the orchestration service while the task is queued or running. Progress
 * metrics are derived on every read and never stored.
 *
 * Two progress axes are tracked independently: items (files) and bytes.
 * `progressPercentage` and the ETA are computed from the item axis only.
 */
export class AgentTask {
    readonly id: string;
    readonly createdAt: Date;

    agentName: string;
    category: AgentCategory;
    description: string;
    currentAction = '';
    status: TaskStatus = TaskStatus.PENDING;
    priority: TaskPriority;

    startedAt?: Date;
    completedAt?: Date;

    totalItems: number;
    processedItems = 0;
    failedItems = 0;
    totalBytes: number;
    processedBytes = 0;

    errors: string[] = [];
    cancellationReason?: string;
    metadata: TaskMetadata;

    canPause: boolean;
    canCancel: boolean;

    constructor(init: TaskInit) {
        this.id = init.id || uuid();
        this.createdAt = init.createdAt ? new Date(init.createdAt.getTime()) : new Date();
        this.agentName = init.agentName;
        this.category = init.category;
        this.description = init.description ?? '';
        this.priority = init.priority ?? TaskPriority.NORMAL;
        this.totalItems = init.totalItems ?? 0;
        this.totalBytes = init.totalBytes ?? 0;
        this.canPause = init.canPause ?? true;
        this.canCancel = init.canCancel ?? true;
        this.metadata = { ...(init.metadata ?? {}) };
    }

    get isTerminal(): boolean {
        return isTerminalStatus(this.status);
    }

    /** Percent of items processed, one decimal place, clamped to [0, 100]. */
    get progressPercentage(): number {
        if (this.totalItems <= 0) return 0;
        const pct = Math.round((this.processedItems / this.totalItems) * 1000) / 10;
        return Math.min(100, Math.max(0, pct));
    }

    /** Milliseconds since start; frozen at the completion instant once terminal. */
    get elapsedTime(): number {
        if (!this.startedAt) return 0;
        const end = this.completedAt ? this.completedAt.getTime() : Date.now();
        return Math.max(0, end - this.startedAt.getTime());
    }

    /**
     * Linear extrapolation of the remaining time from the average item rate so
     * far. Not smoothed: bursty agents produce a jumpy estimate.
     */
    get estimatedTimeRemaining(): number | undefined {
        if (!this.startedAt || this.processedItems <= 0 || this.totalItems <= 0) {
            return undefined;
        }

        const elapsedSeconds = this.elapsedTime / 1000;
        const itemsPerSecond = this.processedItems / elapsedSeconds;
        if (!Number.isFinite(itemsPerSecond) || itemsPerSecond <= 0) {
            return undefined;
        }

        const remainingItems = Math.max(0, this.totalItems - this.processedItems);
        return (remainingItems / itemsPerSecond) * 1000;
    }

    get progressText(): string {
        return formatProgress(this.processedItems, this.totalItems);
    }

    get elapsedTimeText(): string {
        return formatDuration(this.elapsedTime);
    }

    get etaText(): string {
        return formatEta(this.estimatedTimeRemaining);
    }

    /** Sets `startedAt` the first time only. */
    markStarted(at: Date = new Date()): void {
        if (!this.startedAt) {
            this.startedAt = at;
        }
    }

    /** Moves to a terminal status and stamps `completedAt` the first time only. */
    markFinished(status: TaskStatus, at: Date = new Date()): void {
        this.status = status;
        if (!this.completedAt) {
            this.completedAt = at;
        }
    }

    clone(): AgentTask {
        const copy = new AgentTask({
            id: this.id,
            agentName: this.agentName,
            category: this.category,
            description: this.description,
            priority: this.priority,
            totalItems: this.totalItems,
            totalBytes: this.totalBytes,
            canPause: this.canPause,
            canCancel: this.canCancel,
            metadata: this.metadata,
            createdAt: this.createdAt,
        });
        copy.currentAction = this.currentAction;
        copy.status = this.status;
        copy.startedAt = this.startedAt ? new Date(this.startedAt.getTime()) : undefined;
        copy.completedAt = this.completedAt ? new Date(this.completedAt.getTime()) : undefined;
        copy.processedItems = this.processedItems;
        copy.failedItems = this.failedItems;
        copy.processedBytes = this.processedBytes;
        copy.errors = [...this.errors];
        copy.cancellationReason = this.cancellationReason;
        return copy;
    }

    toJSON(): TaskSnapshot {
        const eta = this.estimatedTimeRemaining;
        return {
            id: this.id,
            agentName: this.agentName,
            category: this.category,
            description: this.description,
            currentAction: this.currentAction,
            status: this.status,
            priority: this.priority,
            createdAt: this.createdAt.toISOString(),
            startedAt: this.startedAt?.toISOString() ?? null,
            completedAt: this.completedAt?.toISOString() ?? null,
            totalItems: this.totalItems,
            processedItems: this.processedItems,
            failedItems: this.failedItems,
            totalBytes: this.totalBytes,
            processedBytes: this.processedBytes,
            progressPercentage: this.progressPercentage,
            elapsedMs: this.elapsedTime,
            etaMs: eta === undefined ? null : Math.round(eta),
            progressText: this.progressText,
            elapsedTimeText: this.elapsedTimeText,
            etaText: this.etaText,
            errors: [...this.errors],
            cancellationReason: this.cancellationReason ?? null,
            metadata: { ...this.metadata },
            canPause: this.canPause,
            canCancel: this.canCancel,
        };
    }
}
