import type { Logger } from 'pino';
import type { LifecycleApplication } from '../../src/services/application.js';

/**
 * Stop the application on SIGINT/SIGTERM, then exit.
 */
export function installShutdownHandlers(app: LifecycleApplication, logger: Logger): void {
  let isShuttingDown = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (isShuttingDown) {
      logger.warn('Already shutting down, please wait...');
      return;
    }

    isShuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully');

    app.shutdown().then(
      () => {
        logger.info('Stopped');
        process.exit(0);
      },
      (error: unknown) => {
        logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
