import * as grpc from '@grpc/grpc-js';
import { sendUnaryData } from '@grpc/grpc-js';
import {
    AgentTask,
    SerializationError,
    TaskPriority,
    decodeMetadata,
    encodeMetadata,
    isAgentCategory,
    isTaskPriority,
} from '@agentdeck/sdk';
import { OrchestrationService } from '../services/orchestration.service';
import { InvalidTaskArgumentError, OrchestrationError } from '../errors/orchestration.error';
import { TASK_EVENT_TYPES, TaskEvent, TaskEventType } from '../events/task-event-bus';

const TAG = '[AgentService]';

/** Only the part of a gRPC call the handlers read. */
export interface UnaryCall<Req> {
    request: Req;
}

export interface TaskEventStream {
    request: WatchTasksRequest;
    write(message: TaskEventMessage): boolean;
    on(event: 'cancelled' | 'close' | 'error', listener: () => void): unknown;
}

// int64 fields arrive as strings (longs: String) and may be sent as numbers
type Int64 = string | number;

export interface SubmitTaskRequest {
    id: string;
    agent_name: string;
    category: string;
    description: string;
    priority: string;
    total_items: Int64;
    total_bytes: Int64;
    disallow_pause: boolean;
    disallow_cancel: boolean;
    metadata: Buffer;
}

export interface SubmitTaskResponse {
    task_id: string;
}

export interface TaskRef {
    task_id: string;
}

export interface CancelTaskRequest {
    task_id: string;
    reason: string;
}

export interface TaskView {
    id: string;
    agent_name: string;
    category: string;
    description: string;
    current_action: string;
    status: string;
    priority: string;
    created_at: string;
    started_at: string;
    completed_at: string;
    total_items: Int64;
    processed_items: Int64;
    failed_items: Int64;
    total_bytes: Int64;
    processed_bytes: Int64;
    progress_percentage: number;
    elapsed_ms: Int64;
    eta_ms: Int64;
    has_eta: boolean;
    progress_text: string;
    elapsed_time_text: string;
    eta_text: string;
    errors: string[];
    cancellation_reason: string;
    metadata: Buffer;
    can_pause: boolean;
    can_cancel: boolean;
}

export interface ListTasksResponse {
    current: TaskView | null;
    has_current: boolean;
    queued: TaskView[];
    completed: TaskView[];
    queue_length: number;
    is_running: boolean;
}

export interface WatchTasksRequest {
    types: string[];
}

export interface TaskEventMessage {
    type: string;
    task: TaskView;
    message: string;
    at: string;
}

type Empty = Record<string, never>;

function toCount(value: Int64 | undefined, field: string, taskId: string): number {
    const n = typeof value === 'number' ? value : Number(value || 0);
    if (!Number.isSafeInteger(n) || n < 0) {
        throw new InvalidTaskArgumentError(`${field} must be a non-negative integer`, taskId);
    }
    return n;
}

// a view must never fail once a transition has happened
function metadataBytes(task: AgentTask): Buffer {
    try {
        return Buffer.from(encodeMetadata(task.metadata), 'utf-8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`${TAG} Task ${task.id} metadata left out of view: ${message}`);
        return Buffer.alloc(0);
    }
}

export function toTaskView(task: AgentTask): TaskView {
    const eta = task.estimatedTimeRemaining;
    return {
        id: task.id,
        agent_name: task.agentName,
        category: task.category,
        description: task.description,
        current_action: task.currentAction,
        status: task.status,
        priority: task.priority,
        created_at: task.createdAt.toISOString(),
        started_at: task.startedAt?.toISOString() ?? '',
        completed_at: task.completedAt?.toISOString() ?? '',
        total_items: task.totalItems,
        processed_items: task.processedItems,
        failed_items: task.failedItems,
        total_bytes: task.totalBytes,
        processed_bytes: task.processedBytes,
        progress_percentage: task.progressPercentage,
        elapsed_ms: Math.round(task.elapsedTime),
        eta_ms: eta === undefined ? 0 : Math.round(eta),
        has_eta: eta !== undefined,
        progress_text: task.progressText,
        elapsed_time_text: task.elapsedTimeText,
        eta_text: task.etaText,
        errors: [...task.errors],
        cancellation_reason: task.cancellationReason ?? '',
        metadata: metadataBytes(task),
        can_pause: task.canPause,
        can_cancel: task.canCancel,
    };
}

export function toEventMessage(event: TaskEvent): TaskEventMessage {
    return {
        type: event.type,
        task: toTaskView(event.task),
        message: event.message ?? '',
        at: event.at.toISOString(),
    };
}

export function toServiceError(err: unknown): Partial<grpc.StatusObject> {
    const message = err instanceof Error ? err.message : 'Unknown error';

    if (err instanceof OrchestrationError) {
        switch (err.code) {
            case 'NOT_FOUND':
                return { code: grpc.status.NOT_FOUND, details: message };
            case 'INVALID_STATE':
                return { code: grpc.status.FAILED_PRECONDITION, details: message };
            case 'INVALID_ARGUMENT':
                return { code: grpc.status.INVALID_ARGUMENT, details: message };
        }
    }
    if (err instanceof SerializationError) {
        return { code: grpc.status.INVALID_ARGUMENT, details: message };
    }
    return { code: grpc.status.INTERNAL, details: message };
}

const isEventType = (value: string): value is TaskEventType =>
    TASK_EVENT_TYPES.some((type) => type === value);

/**
 * gRPC service implementation for agent task control and observation.
 * Structural errors from the orchestrator map onto gRPC status codes:
 * NOT_FOUND, FAILED_PRECONDITION (invalid state) and INVALID_ARGUMENT.
 */
export class AgentServiceImpl {
    constructor(private readonly service: OrchestrationService) { }

    /**
     * Builds a task from the request and submits it.
     * Metadata bytes are expected to be superjson-encoded.
     */
    submitTask(call: UnaryCall<SubmitTaskRequest>, callback: sendUnaryData<SubmitTaskResponse>): void {
        try {
            const req = call.request;
            const id = req.id ?? '';

            if (!req.agent_name) {
                throw new InvalidTaskArgumentError('agent_name is required', id);
            }
            if (!isAgentCategory(req.category)) {
                throw new InvalidTaskArgumentError(`Unknown agent category "${req.category}"`, id);
            }
            const priority = req.priority || TaskPriority.NORMAL;
            if (!isTaskPriority(priority)) {
                throw new InvalidTaskArgumentError(`Unknown priority "${priority}"`, id);
            }

            const task = new AgentTask({
                id: id || undefined,
                agentName: req.agent_name,
                category: req.category,
                description: req.description,
                priority,
                totalItems: toCount(req.total_items, 'total_items', id),
                totalBytes: toCount(req.total_bytes, 'total_bytes', id),
                canPause: !req.disallow_pause,
                canCancel: !req.disallow_cancel,
                metadata: decodeMetadata(req.metadata?.toString('utf-8')),
            });

            callback(null, { task_id: this.service.submit(task) });
        } catch (err) {
            this.reject('submitTask', err, callback);
        }
    }

    startTask(call: UnaryCall<TaskRef>, callback: sendUnaryData<TaskView>): void {
        this.transition('startTask', call.request.task_id, callback, (id) => this.service.start(id));
    }

    pauseTask(call: UnaryCall<TaskRef>, callback: sendUnaryData<TaskView>): void {
        this.transition('pauseTask', call.request.task_id, callback, (id) => this.service.pause(id));
    }

    resumeTask(call: UnaryCall<TaskRef>, callback: sendUnaryData<TaskView>): void {
        this.transition('resumeTask', call.request.task_id, callback, (id) => this.service.resume(id));
    }

    cancelTask(call: UnaryCall<CancelTaskRequest>, callback: sendUnaryData<TaskView>): void {
        const { task_id, reason } = call.request;
        this.transition('cancelTask', task_id, callback, (id) => this.service.cancel(id, reason || undefined));
    }

    getTask(call: UnaryCall<TaskRef>, callback: sendUnaryData<TaskView>): void {
        this.transition('getTask', call.request.task_id, callback, (id) => this.service.getTask(id));
    }

    listTasks(_call: UnaryCall<Empty>, callback: sendUnaryData<ListTasksResponse>): void {
        try {
            const current = this.service.currentTask;
            callback(null, {
                current: current ? toTaskView(current) : null,
                has_current: current !== undefined,
                queued: this.service.queuedTasks.map(toTaskView),
                completed: this.service.completedTasks.map(toTaskView),
                queue_length: this.service.queueLength,
                is_running: this.service.isRunning,
            });
        } catch (err) {
            this.reject('listTasks', err, callback);
        }
    }

    clearHistory(_call: UnaryCall<Empty>, callback: sendUnaryData<Empty>): void {
        try {
            this.service.clearHistory();
            callback(null, {});
        } catch (err) {
            this.reject('clearHistory', err, callback);
        }
    }

    /** Streams task events until the client goes away. An empty type filter means all events. */
    watchTasks(call: TaskEventStream): void {
        const requested = call.request.types ?? [];
        const unknown = requested.filter((type) => !isEventType(type));
        if (unknown.length > 0) {
            console.warn(`${TAG} watchTasks ignoring unknown event types: ${unknown.join(', ')}`);
        }
        const types = new Set(requested.filter(isEventType));

        const unsubscribe = this.service.events.onAny((event) => {
            if (types.size > 0 && !types.has(event.type)) return;
            call.write(toEventMessage(event));
        });

        let closed = false;
        const stop = () => {
            if (closed) return;
            closed = true;
            unsubscribe();
        };
        call.on('cancelled', stop);
        call.on('close', stop);
        call.on('error', stop);
    }

    private transition(
        name: string,
        taskId: string,
        callback: sendUnaryData<TaskView>,
        op: (taskId: string) => AgentTask | undefined,
    ): void {
        try {
            const task = op(taskId);
            if (!task) {
                return callback({ code: grpc.status.NOT_FOUND, details: `Task ${taskId} not found` });
            }
            callback(null, toTaskView(task));
        } catch (err) {
            this.reject(name, err, callback);
        }
    }

    private reject<T>(name: string, err: unknown, callback: sendUnaryData<T>): void {
        const status = toServiceError(err);
        if (status.code === grpc.status.INTERNAL) {
            console.error(`${TAG} ${name} error:`, err);
        } else {
            console.warn(`${TAG} ${name} rejected: ${status.details}`);
        }
        callback(status);
    }
}
