import { ConfigError, loadConfig } from '../../src/config';

describe('loadConfig', () => {
    it('uses defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            port: 50051,
            historyLimit: 50,
            statusTickMs: 500,
            autoStart: true,
            shutdownGraceMs: 10000,
            redisUrl: undefined,
            agentModules: [],
        });
    });

    it('reads every setting', () => {
        const config = loadConfig({
            PORT: '6000',
            HISTORY_LIMIT: '10',
            STATUS_TICK_MS: '250',
            AUTO_START: 'false',
            SHUTDOWN_GRACE_MS: '0',
            REDIS_URL: ' redis://localhost:6379 ',
            AGENTDECK_AGENTS: './agents/cleanup.js, ./agents/backup.js,,',
        });

        expect(config).toEqual({
            port: 6000,
            historyLimit: 10,
            statusTickMs: 250,
            autoStart: false,
            shutdownGraceMs: 0,
            redisUrl: 'redis://localhost:6379',
            agentModules: ['./agents/cleanup.js', './agents/backup.js'],
        });
    });

    it('accepts 1 and 0 for booleans', () => {
        expect(loadConfig({ AUTO_START: '0' }).autoStart).toBe(false);
        expect(loadConfig({ AUTO_START: 'TRUE' }).autoStart).toBe(true);
    });

    it('rejects malformed numbers', () => {
        expect(() => loadConfig({ HISTORY_LIMIT: 'ten' })).toThrow(ConfigError);
        expect(() => loadConfig({ HISTORY_LIMIT: '-1' })).toThrow('HISTORY_LIMIT must be an integer >= 0 (got "-1")');
        expect(() => loadConfig({ STATUS_TICK_MS: '5' })).toThrow('STATUS_TICK_MS must be an integer >= 10 (got "5")');
    });

    it('rejects malformed booleans', () => {
        expect(() => loadConfig({ AUTO_START: 'maybe' })).toThrow('AUTO_START must be true or false (got "maybe")');
    });
});
