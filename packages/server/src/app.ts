import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { CLIENT_ID_PARAM } from '@edgepull/protocol';
import { loadConfig, type ServerConfig } from './config.js';
import { ControlPlaneError } from './errors.js';
import { healthRoutes, clientRoutes, downloadRoutes } from './routes/index.js';
import { websocketPlugin, InMemoryConnectionRegistry } from './ws/index.js';
import { TransferOrchestrator } from './transfers/index.js';
import { HealthChecks, BuiltInChecks, registerTracing } from './observability/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    config: ServerConfig;
    agents: InMemoryConnectionRegistry;
    transfers: TransferOrchestrator;
    healthChecks: HealthChecks;
  }
}

export interface BuildAppOptions {
  /** Overrides applied on top of the environment configuration */
  config?: Partial<ServerConfig>;
  /** Transfer id generator, for deterministic tests */
  generateId?: () => string;
}

const CLIENT_ID_QUERY = new RegExp(`${CLIENT_ID_PARAM}=[^&]+`);

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config: ServerConfig = { ...loadConfig(), ...options.config };

  const app = Fastify({
    logger: {
      level: config.logLevel,
      // Structured JSON logging outside development
      transport:
        config.nodeEnv === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
              },
            }
          : undefined,
      serializers: {
        req(request) {
          const url = request.url?.replace(CLIENT_ID_QUERY, `${CLIENT_ID_PARAM}=***`) ?? request.url;
          return {
            method: request.method,
            url,
            hostname: request.hostname,
            remoteAddress: request.ip,
          };
        },
      },
    },
    // Request logging is handled by the tracing hooks
    disableRequestLogging: true,
    genReqId: () => randomUUID(),
  });

  const agents = new InMemoryConnectionRegistry();
  const transfers = new TransferOrchestrator({
    registry: agents,
    logger: app.log,
    downloadDir: config.downloadDir,
    chunkSize: config.chunkSize,
    inactivityTimeoutMs: config.transferInactivityTimeoutMs,
    concurrency: config.transferConcurrency,
    generateId: options.generateId,
  });
  const healthChecks = new HealthChecks();

  app.decorate('config', config);
  app.decorate('agents', agents);
  app.decorate('transfers', transfers);
  app.decorate('healthChecks', healthChecks);

  registerTracing(app);

  healthChecks.register('memory', BuiltInChecks.memory);
  healthChecks.register('eventLoop', BuiltInChecks.eventLoop);
  healthChecks.register(
    'transfers',
    BuiltInChecks.createTransfersCheck(() => ({ active: transfers.activeCount, agents: agents.size }))
  );
  healthChecks.register(
    'downloadDir',
    BuiltInChecks.createWritableDirCheck(async () => {
      await fs.mkdir(config.downloadDir, { recursive: true });
      await fs.access(config.downloadDir, fs.constants.W_OK);
    })
  );

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ControlPlaneError) {
      return reply.status(error.statusCode).send({ error: error.code, message: error.message });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: 'BadRequest', message: error.message });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Security middleware
  await app.register(helmet);
  await app.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  await app.register(healthRoutes);
  await app.register(clientRoutes, { prefix: '/api' });
  await app.register(downloadRoutes, { prefix: '/api' });

  await app.register(websocketPlugin, {
    registry: agents,
    orchestrator: transfers,
    heartbeatInterval: config.wsHeartbeatInterval,
    pingTimeout: config.wsPingTimeout,
    maxPayload: config.wsMaxPayload,
  });

  return app;
}
