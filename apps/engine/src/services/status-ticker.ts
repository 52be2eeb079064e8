import { OrchestrationService } from './orchestration.service';

/**
 * Periodically republishes the running task so observers see elapsed time
 * and ETA move even when the agent reports progress rarely.
 */
export class StatusTicker {
    private readonly intervalMs: number;
    private intervalHandle: NodeJS.Timeout | null = null;

    constructor(
        private readonly service: Pick<OrchestrationService, 'refreshRunning'>,
        intervalMs: number = 500
    ) {
        this.intervalMs = intervalMs;
    }

    start(): void {
        if (this.intervalHandle) {
            console.warn('[ticker] already running');
            return;
        }

        console.log(`[ticker] started (interval: ${this.intervalMs}ms)`);
        this.intervalHandle = setInterval(() => this.tick(), this.intervalMs);
    }

    stop(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
            console.log('[ticker] stopped');
        }
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    private tick(): void {
        try {
            this.service.refreshRunning();
        } catch (err) {
            console.error('[ticker] refresh failed:', err);
        }
    }
}
