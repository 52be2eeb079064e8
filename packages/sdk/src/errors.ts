/**
 * Raised inside a unit of work when it observes that its task was cancelled.
 * Agents normally let it propagate; the executor treats it as a clean stop.
 */
export class TaskCancelledError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly cancellationReason?: string
    ) {
        super(cancellationReason ? `Task ${taskId} was cancelled: ${cancellationReason}` : `Task ${taskId} was cancelled`);
        this.name = 'TaskCancelledError';
    }
}
