/**
 * Lifecycle states for agent tasks.
 * Tasks progress: PENDING → QUEUED → RUNNING ⇄ PAUSED → COMPLETED/FAILED/CANCELLED
 * A queued or paused task may also go straight to CANCELLED.
 */
export enum TaskStatus {
    PENDING = 'pending',
    QUEUED = 'queued',
    RUNNING = 'running',
    PAUSED = 'paused',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled'
}

export enum TaskPriority {
    LOW = 'low',
    NORMAL = 'normal',
    HIGH = 'high',
    CRITICAL = 'critical'
}

/** The kind of file-system work an agent performs. */
export enum AgentCategory {
    DISCOVERY = 'discovery',
    CLASSIFICATION = 'classification',
    ORGANIZATION = 'organization',
    CLEANUP = 'cleanup',
    SEARCH = 'search',
    MONITORING = 'monitoring',
    BATCH_RENAME = 'batch-rename',
    DUPLICATE_DETECTION = 'duplicate-detection',
    SPACE_RECOVERY = 'space-recovery',
    BACKUP = 'backup',
    RESTORE = 'restore'
}

// Higher rank is dispatched first.
export const PRIORITY_RANK: Readonly<Record<TaskPriority, number>> = {
    [TaskPriority.LOW]: 0,
    [TaskPriority.NORMAL]: 1,
    [TaskPriority.HIGH]: 2,
    [TaskPriority.CRITICAL]: 3,
};

const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set([
    TaskStatus.COMPLETED,
    TaskStatus.FAILED,
    TaskStatus.CANCELLED,
]);

export function isTerminalStatus(status: TaskStatus): boolean {
    return TERMINAL_STATUSES.has(status);
}

const CATEGORY_VALUES: ReadonlySet<string> = new Set(Object.values(AgentCategory));
const PRIORITY_VALUES: ReadonlySet<string> = new Set(Object.values(TaskPriority));
const STATUS_VALUES: ReadonlySet<string> = new Set(Object.values(TaskStatus));

export function isAgentCategory(value: string): value is AgentCategory {
    return CATEGORY_VALUES.has(value);
}

export function isTaskPriority(value: string): value is TaskPriority {
    return PRIORITY_VALUES.has(value);
}

export function isTaskStatus(value: string): value is TaskStatus {
    return STATUS_VALUES.has(value);
}

/** Agent-specific extra data carried alongside a task. */
export type TaskMetadata = Record<string, unknown>;

/**
 * What a producer supplies to describe a unit of agent work.
 * Everything except the agent name and category has a default.
 */
export interface TaskInit {
    id?: string;
    agentName: string;
    category: AgentCategory;
    description?: string;
    priority?: TaskPriority;
    totalItems?: number;
    totalBytes?: number;
    canPause?: boolean;
    canCancel?: boolean;
    metadata?: TaskMetadata;
    createdAt?: Date;
}

/** Plain, JSON-safe view of a task including its derived metrics. */
export interface TaskSnapshot {
    id: string;
    agentName: string;
    category: AgentCategory;
    description: string;
    currentAction: string;
    status: TaskStatus;
    priority: TaskPriority;
    createdAt: string;
    startedAt: string | null;
    completedAt: string | null;
    totalItems: number;
    processedItems: number;
    failedItems: number;
    totalBytes: number;
    processedBytes: number;
    progressPercentage: number;
    elapsedMs: number;
    etaMs: number | null;
    progressText: string;
    elapsedTimeText: string;
    etaText: string;
    errors: string[];
    cancellationReason: string | null;
    metadata: TaskMetadata;
    canPause: boolean;
    canCancel: boolean;
}
