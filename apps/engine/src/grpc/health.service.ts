import { ServerUnaryCall, sendUnaryData, ServerWritableStream } from '@grpc/grpc-js';

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckRequest {
    service: string;
}

export interface HealthCheckResponse {
    status: ServingStatus;
}

/**
 * Standard gRPC health check service implementation.
 * Reports NOT_SERVING once the engine has begun shutting down.
 */
export class HealthService {
    constructor(private readonly isServing: () => boolean) { }

    check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>,
    ): void {
        callback(null, { status: this.currentStatus() });
    }

    watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>): void {
        call.write({ status: this.currentStatus() });
        call.end();
    }

    private currentStatus(): ServingStatus {
        return this.isServing() ? 'SERVING' : 'NOT_SERVING';
    }
}
