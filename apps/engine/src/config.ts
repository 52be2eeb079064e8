import { DEFAULT_HISTORY_LIMIT } from './services/orchestration.service';

export interface EngineConfig {
    port: number;
    historyLimit: number;
    statusTickMs: number;
    autoStart: boolean;
    shutdownGraceMs: number;
    redisUrl?: string;
    agentModules: string[];
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(`${key} must be an integer >= ${min} (got "${raw}")`);
    }
    return value;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
    const raw = env[key]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    throw new ConfigError(`${key} must be true or false (got "${raw}")`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    return {
        port: readInt(env, 'PORT', 50051, 0),
        historyLimit: readInt(env, 'HISTORY_LIMIT', DEFAULT_HISTORY_LIMIT, 0),
        statusTickMs: readInt(env, 'STATUS_TICK_MS', 500, 10),
        autoStart: readBool(env, 'AUTO_START', true),
        shutdownGraceMs: readInt(env, 'SHUTDOWN_GRACE_MS', 10_000, 0),
        redisUrl: env.REDIS_URL?.trim() || undefined,
        agentModules: (env.AGENTDECK_AGENTS ?? '')
            .split(',')
            .map((p) => p.trim())
            .filter(Boolean),
    };
}
