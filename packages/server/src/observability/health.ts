/**
 * Health checks with named component checks
 */

import type { HealthStatus, ComponentHealth, HealthCheckResponse } from './types.js';

export type HealthCheckFn = () => Promise<ComponentHealth> | ComponentHealth;

const SERVICE_VERSION = process.env.npm_package_version ?? '0.1.0';

/**
 * Registry of component checks owned by one server instance
 */
export class HealthChecks {
  private readonly checks: Map<string, HealthCheckFn> = new Map();
  private readonly startTime = Date.now();

  register(name: string, check: HealthCheckFn): void {
    this.checks.set(name, check);
  }

  unregister(name: string): void {
    this.checks.delete(name);
  }

  /**
   * Run all checks and return aggregated status
   */
  async run(): Promise<HealthCheckResponse> {
    const components: Record<string, ComponentHealth> = {};
    let overallStatus: HealthStatus = 'healthy';

    for (const [name, check] of this.checks) {
      try {
        const startTime = Date.now();
        const result = await check();
        const latencyMs = Date.now() - startTime;

        components[name] = {
          ...result,
          latencyMs: result.latencyMs ?? latencyMs,
          lastCheck: new Date().toISOString(),
        };

        if (result.status === 'unhealthy') {
          overallStatus = 'unhealthy';
        } else if (result.status === 'degraded' && overallStatus === 'healthy') {
          overallStatus = 'degraded';
        }
      } catch (error) {
        components[name] = {
          status: 'unhealthy',
          message: error instanceof Error ? error.message : 'Check failed',
          lastCheck: new Date().toISOString(),
        };
        overallStatus = 'unhealthy';
      }
    }

    if (this.checks.size === 0) {
      components['self'] = {
        status: 'healthy',
        message: 'Service is running',
        lastCheck: new Date().toISOString(),
      };
    }

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      uptime: (Date.now() - this.startTime) / 1000,
      components,
    };
  }

  /**
   * Ready unless a component is unhealthy
   */
  async isReady(): Promise<{ ready: boolean; checks: Record<string, boolean> }> {
    const checks: Record<string, boolean> = {};
    let ready = true;

    for (const [name, check] of this.checks) {
      try {
        const result = await check();
        checks[name] = result.status !== 'unhealthy';
        if (result.status === 'unhealthy') {
          ready = false;
        }
      } catch {
        checks[name] = false;
        ready = false;
      }
    }

    if (this.checks.size === 0) {
      checks['self'] = true;
    }

    return { ready, checks };
  }

  isLive(): boolean {
    return true;
  }
}

/**
 * Built-in health checks
 */
export const BuiltInChecks = {
  /**
   * Heap usage; degrades above 75%, unhealthy above 90%
   */
  memory: (): ComponentHealth => {
    const usage = process.memoryUsage();
    const heapUsedMB = usage.heapUsed / 1024 / 1024;
    const heapTotalMB = usage.heapTotal / 1024 / 1024;
    const usagePercent = (heapUsedMB / heapTotalMB) * 100;

    let status: HealthStatus = 'healthy';
    if (usagePercent > 90) {
      status = 'unhealthy';
    } else if (usagePercent > 75) {
      status = 'degraded';
    }

    return {
      status,
      message: `Heap: ${heapUsedMB.toFixed(1)}MB / ${heapTotalMB.toFixed(1)}MB (${usagePercent.toFixed(1)}%)`,
    };
  },

  /**
   * Event loop lag
   */
  eventLoop: (): Promise<ComponentHealth> => {
    return new Promise((resolve) => {
      const start = Date.now();
      setImmediate(() => {
        const lag = Date.now() - start;
        let status: HealthStatus = 'healthy';
        if (lag > 100) {
          status = 'unhealthy';
        } else if (lag > 50) {
          status = 'degraded';
        }

        resolve({
          status,
          latencyMs: lag,
          message: `Event loop lag: ${lag}ms`,
        });
      });
    });
  },

  /**
   * Transfer bookkeeping; always healthy, reports counts
   */
  createTransfersCheck: (counts: () => { active: number; agents: number }): HealthCheckFn => {
    return (): ComponentHealth => {
      const { active, agents } = counts();
      return {
        status: 'healthy',
        message: `${active} active transfer(s), ${agents} connected agent(s)`,
      };
    };
  },

  /**
   * Download directory must be writable
   */
  createWritableDirCheck: (probe: () => Promise<void>): HealthCheckFn => {
    return async (): Promise<ComponentHealth> => {
      const startTime = Date.now();
      try {
        await probe();
        return { status: 'healthy', latencyMs: Date.now() - startTime, message: 'Writable' };
      } catch (error) {
        return {
          status: 'unhealthy',
          latencyMs: Date.now() - startTime,
          message: error instanceof Error ? error.message : 'Not writable',
        };
      }
    };
  },
};
