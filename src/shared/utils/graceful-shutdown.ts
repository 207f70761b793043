import { INestApplicationContext, Logger } from '@nestjs/common';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Closes the application (and with it every module destroy hook: database
 * pool, queue connections) on the first termination signal.
 */
export function setupGracefulShutdown(
  app: INestApplicationContext,
  name: string,
): void {
  const logger = new Logger('GracefulShutdown');
  let closing = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (closing) return;
    closing = true;

    logger.log(`${signal} received: closing ${name}...`);
    try {
      await app.close();
      logger.log(`${name} closed gracefully.`);
      process.exit(0);
    } catch (err) {
      logger.error(`Error during graceful shutdown of ${name}: ${err}`);
      process.exit(1);
    }
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, (received) => void shutdown(received));
  }
}
