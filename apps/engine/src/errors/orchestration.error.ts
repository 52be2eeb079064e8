export type OrchestrationErrorCode = 'NOT_FOUND' | 'INVALID_STATE' | 'INVALID_ARGUMENT';

/**
 * Structural errors raised synchronously by the orchestration service.
 * They are thrown before any state is touched, so a caller that catches one
 * can assume nothing changed.
 */
export abstract class OrchestrationError extends Error {
    abstract readonly code: OrchestrationErrorCode;

    constructor(
        message: string,
        public readonly taskId: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class TaskNotFoundError extends OrchestrationError {
    readonly code = 'NOT_FOUND';

    constructor(taskId: string) {
        super(`Task ${taskId} not found`, taskId);
    }
}

export class InvalidTaskStateError extends OrchestrationError {
    readonly code = 'INVALID_STATE';
}

export class InvalidTaskArgumentError extends OrchestrationError {
    readonly code = 'INVALID_ARGUMENT';
}
