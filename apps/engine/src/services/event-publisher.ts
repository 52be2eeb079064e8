import Redis from 'ioredis';
import { AgentTask, TaskSnapshot, encodeMetadata } from '@agentdeck/sdk';
import { TaskEvent, TaskEventBus, TaskEventType } from '../events/task-event-bus';

const TAG = '[publisher]';

export const DEFAULT_EVENT_CHANNEL = 'agentdeck:events';

/** The one Redis command the publisher needs. */
export interface ChannelPublisher {
    publish(channel: string, message: string): Promise<number>;
}

/** Task snapshot whose metadata is superjson-encoded, so dates and bigints survive JSON. */
export type PublishedTask = Omit<TaskSnapshot, 'metadata'> & { metadata: string };

export interface PublishedTaskEvent {
    type: TaskEventType;
    message: string | null;
    at: string;
    task: PublishedTask;
}

function publishedMetadata(task: AgentTask): string {
    try {
        return encodeMetadata(task.metadata);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`${TAG} Task ${task.id} metadata left out of event: ${message}`);
        return '';
    }
}

export function toPublishedEvent(event: TaskEvent): PublishedTaskEvent {
    return {
        type: event.type,
        message: event.message ?? null,
        at: event.at.toISOString(),
        task: { ...event.task.toJSON(), metadata: publishedMetadata(event.task) },
    };
}

/**
 * Forwards every task notification to a Redis channel as JSON so that
 * observers in other processes can follow progress. Publishing is
 * fire-and-forget: a slow or unreachable Redis is logged and never holds up
 * the orchestrator.
 */
export class RedisEventPublisher {
    private detach: (() => void) | null = null;
    private failures = 0;

    constructor(
        private readonly redis: ChannelPublisher,
        private readonly channel: string = DEFAULT_EVENT_CHANNEL
    ) { }

    attach(bus: TaskEventBus): void {
        if (this.detach) {
            console.warn(`${TAG} already attached`);
            return;
        }
        this.detach = bus.onAny((event) => this.forward(event));
        console.log(`${TAG} forwarding task events to ${this.channel}`);
    }

    stop(): void {
        this.detach?.();
        this.detach = null;
    }

    get failureCount(): number {
        return this.failures;
    }

    private async forward(event: TaskEvent): Promise<void> {
        try {
            await this.redis.publish(this.channel, JSON.stringify(toPublishedEvent(event)));
        } catch (err) {
            this.failures += 1;
            console.error(`${TAG} failed to publish ${event.type} for task ${event.task.id}:`, err);
        }
    }
}

export function createRedis(url: string): Redis {
    const redis = new Redis(url, { maxRetriesPerRequest: 3 });
    redis.on('error', (err) => console.error(`${TAG} redis error:`, err));
    return redis;
}
