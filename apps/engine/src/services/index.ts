export { OrchestrationService, DEFAULT_HISTORY_LIMIT, DEFAULT_CANCELLATION_REASON, SHUTDOWN_REASON } from './orchestration.service';
export type { TaskControl, TaskLauncher, OrchestrationServiceOptions, StatusSummary } from './orchestration.service';
export { AgentExecutor } from './agent-executor';
export { StatusTicker } from './status-ticker';
export { TaskSignals } from './task-signals';
export { RedisEventPublisher, createRedis, toPublishedEvent, DEFAULT_EVENT_CHANNEL } from './event-publisher';
export type { ChannelPublisher, PublishedTask, PublishedTaskEvent } from './event-publisher';
