/**
 * PrintFleet - Backend Entry Point
 */

import { createServer } from './server.js';
import { loadConfig } from './config/index.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  try {
    const config = await loadConfig();

    const { server, cleanup } = await createServer(config, { logger });

    const { port, host } = config.server;

    server.listen(port, host, () => {
      logger.info({ host, port, machines: config.machines.length }, `Backend listening on http://${host}:${port}`);
    });

    const handleShutdown = (signal: string) => {
      logger.info(`${signal} signal, shutting down...`);

      // Force exit after 10 seconds if graceful shutdown fails
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();

      cleanup()
        .catch((error) => {
          logger.error({ err: error }, 'Cleanup failed');
        })
        .finally(() => {
          server.close(() => {
            logger.info('Server closed');
            process.exit(0);
          });
        });
    };

    process.on('SIGTERM', () => handleShutdown('SIGTERM'));
    process.on('SIGINT', () => handleShutdown('SIGINT'));

  } catch (error) {
    logger.fatal({ err: error }, 'Startup error');
    process.exit(1);
  }
}

void main();
