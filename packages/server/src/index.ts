import { buildApp } from './app.js';
import { loadConfig, validateServerConfig } from './config.js';

async function start(): Promise<void> {
  const config = loadConfig();
  const errors = validateServerConfig(config);
  if (errors.length > 0) {
    console.error(`Invalid configuration:\n  ${errors.join('\n  ')}`);
    process.exit(1);
  }

  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      {
        port: config.port,
        host: config.host,
        env: config.nodeEnv,
        downloadDir: config.downloadDir,
      },
      `Server running at http://${config.host}:${config.port}`
    );
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      app.log.info('Server closed');
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

start().catch(console.error);
