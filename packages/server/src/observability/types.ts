/**
 * Observability types for health checks and tracing
 */

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  latencyMs?: number;
  message?: string;
  lastCheck?: string;
}

export interface HealthCheckResponse {
  status: HealthStatus;
  timestamp: string;
  version: string;
  uptime: number;
  components: Record<string, ComponentHealth>;
}

/**
 * Liveness check response (is the process running)
 */
export interface LivenessResponse {
  live: boolean;
}

/**
 * Readiness check response (can the service handle traffic)
 */
export interface ReadinessResponse {
  ready: boolean;
  checks?: Record<string, boolean>;
}

/**
 * Request context for tracing
 */
export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
  method: string;
  path: string;
  userAgent?: string;
  clientIp?: string;
}
