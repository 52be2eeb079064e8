import path from 'path';
import { globalRegistry } from '@agentdeck/sdk';

const TAG = '[agents]';

/**
 * Loads agent modules for their side effect of calling `agent(...)`.
 * Relative paths resolve against the working directory, not this file.
 * Returns the categories that have a handler afterwards.
 */
export function loadAgentModules(modulePaths: string[], cwd: string = process.cwd()): string[] {
    if (modulePaths.length === 0) {
        console.log(`${TAG} No AGENTDECK_AGENTS set, tasks will fail until an agent is registered`);
    }

    for (const p of modulePaths) {
        const resolved = path.isAbsolute(p) ? p : path.resolve(cwd, p);
        try {
            // eslint-disable-next-line
            require(resolved);
            console.log(`${TAG} Loaded agents from: ${resolved}`);
        } catch (err) {
            console.error(`${TAG} Failed to load agent module: ${p}`, err);
        }
    }

    return globalRegistry.list();
}
