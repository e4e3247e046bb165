import http from 'http';
import env from './config/env';
import logger from './middleware/requestLogger';
import { buildExpressApp } from './app';
import { connectDB, disconnectDB } from './config/db';
import { closeRedis } from './redis/client';
import { initRealtime, closeRealtime, socketEvents } from './realtime/socket';
import { createDefaultDeps, createServices } from './services';

/**
 * Local / VPS entrypoint.
 * Creates HTTP + WebSocket server and handles graceful shutdown.
 */
async function bootstrap() {
  await connectDB();

  const services = createServices(createDefaultDeps({ events: socketEvents }));
  const app = buildExpressApp(services);
  const server = http.createServer(app);

  initRealtime(server, services.access);

  server.listen(env.PORT, () => {
    logger.info(`HTTP + WebSocket server running at http://localhost:${env.PORT}`);
  });

  const closeAll = async () => {
    await closeRealtime();
    await closeRedis();
    await disconnectDB();
  };

  const shutdown = (signal: string) => {
    logger.info(`${signal} received: closing server, websockets, and DB...`);
    server.close(() => {
      closeAll()
        .then(() => {
          logger.info('Clean shutdown complete.');
          process.exit(0);
        })
        .catch((err) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.warn('Forcing shutdown...');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err) => {
  logger.fatal({ err }, 'Fatal startup error');
  process.exit(1);
});
