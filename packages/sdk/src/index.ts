// public api for @agentdeck/sdk
// usage:
//   import { AgentTask, AgentCategory, agent } from '@agentdeck/sdk';
//   const task = new AgentTask({ agentName: 'Temp sweeper', category: AgentCategory.CLEANUP, totalItems: 120 });
//   agent(AgentCategory.CLEANUP, async (ctx) => { ... });

export {
    TaskStatus,
    TaskPriority,
    AgentCategory,
    PRIORITY_RANK,
    isTerminalStatus,
    isAgentCategory,
    isTaskPriority,
    isTaskStatus,
} from './types';
export type { TaskInit, TaskMetadata, TaskSnapshot } from './types';

export { AgentTask } from './task';
export { AgentRegistry, globalRegistry, agent } from './agent';
export type { Agent, AgentContext, AgentHandler } from './agent';
export { TaskCancelledError } from './errors';

export { formatDuration, formatEta, formatCount, formatProgress } from './utils/format';
export { encodeMetadata, decodeMetadata, SerializationError } from './utils/serialization';
