import { sendUnaryData } from '@grpc/grpc-js';
import { OrchestrationService } from '../services/orchestration.service';
import { UnaryCall } from './agent.service';

// enums are loaded as strings (enums: String)
export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: ServingStatus;
}

export interface HealthWatchStream {
    request: HealthCheckRequest;
    write(message: HealthCheckResponse): boolean;
    end(): void;
}

const KNOWN_SERVICES = new Set(['', 'agentdeck.AgentService']);

/**
 * Standard gRPC health check service implementation.
 * Reports SERVING while the orchestrator still accepts submissions.
 */
export class HealthService {
    constructor(private readonly service: Pick<OrchestrationService, 'isAccepting'>) { }

    check(call: UnaryCall<HealthCheckRequest>, callback: sendUnaryData<HealthCheckResponse>): void {
        callback(null, { status: this.statusFor(call.request.service) });
    }

    watch(call: HealthWatchStream): void {
        call.write({ status: this.statusFor(call.request.service) });
        call.end();
    }

    private statusFor(name: string | undefined): ServingStatus {
        if (!KNOWN_SERVICES.has(name ?? '')) return 'SERVICE_UNKNOWN';
        return this.service.isAccepting ? 'SERVING' : 'NOT_SERVING';
    }
}
