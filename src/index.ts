import { createApp } from './app';
import { env } from './config/env';
import { createRuntime } from './runtime';
import { logger } from './utils/logger';

const runtime = createRuntime(env);
const app = createApp(runtime.services, {
  corsOrigins: env.NODE_ENV === 'development' ? ['http://localhost:5173', 'http://localhost:3001'] : [],
});

const server = app.listen(env.PORT, '0.0.0.0', async () => {
  logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);

  try {
    await runtime.consumer.start();
  } catch (error) {
    logger.error({ error }, 'Failed to start pipeline worker');
  }
});

async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down gracefully`);
  try {
    await runtime.shutdown();
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
  }
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
