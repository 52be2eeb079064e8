import { AgentTask } from './task';
import { AgentCategory, isAgentCategory } from './types';

/**
 * What a running agent sees. Everything here is advisory: the orchestrator
 * never preempts the handler, so long-running loops should call
 * `checkpoint()` between items to honour pause and cancel requests.
 */
export interface AgentContext {
    /** Snapshot of the task taken when the handler was launched. */
    task: AgentTask;
    /** Aborted when the task is cancelled. Pass it to I/O that accepts one. */
    signal: AbortSignal;
    /** Resolves immediately when running, waits while paused, throws `TaskCancelledError` once cancelled. */
    checkpoint(): Promise<void>;
    progress(processedItems: number, currentAction?: string): void;
    progressBytes(processedBytes: number, currentAction?: string): void;
    itemFailed(message?: string): void;
}

/** Resolving completes the task (an optional string becomes the completion message); throwing fails it. */
export type AgentHandler = (ctx: AgentContext) => Promise<string | void>;

export interface Agent {
    category: AgentCategory;
    handler: AgentHandler;
}

export class AgentRegistry {
    private agents = new Map<AgentCategory, Agent>();

    register(category: string, handler: AgentHandler): Agent {
        if (!category) {
            throw new Error('Agent category cannot be empty');
        }
        if (!isAgentCategory(category)) {
            throw new Error(`Unknown agent category "${category}"`);
        }
        if (this.agents.has(category)) {
            throw new Error(`An agent for "${category}" is already registered.`);
        }
        const agent: Agent = { category, handler };
        this.agents.set(category, agent);
        return agent;
    }

    unregister(category: AgentCategory): boolean {
        return this.agents.delete(category);
    }

    get(category: AgentCategory): Agent | undefined {
        return this.agents.get(category);
    }

    list(): AgentCategory[] {
        return Array.from(this.agents.keys());
    }
}

export const globalRegistry = new AgentRegistry();

/**
 * Registers the handler the engine runs for every task of `category`.
 *
 * @example
 * agent(AgentCategory.CLEANUP, async (ctx) => {
 *   for (const [i, file] of files.entries()) {
 *     await ctx.checkpoint();
 *     await removeTempFile(file, { signal: ctx.signal });
 *     ctx.progress(i + 1, `Removing ${file}`);
 *   }
 * });
 */
export function agent(category: AgentCategory, handler: AgentHandler): Agent {
    return globalRegistry.register(category, handler);
}
