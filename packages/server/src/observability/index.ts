/**
 * Observability module exports
 */

export type {
  HealthStatus,
  ComponentHealth,
  HealthCheckResponse,
  LivenessResponse,
  ReadinessResponse,
  RequestContext,
} from './types.js';

export { HealthChecks, BuiltInChecks, type HealthCheckFn } from './health.js';

export { registerTracing } from './tracing.js';
