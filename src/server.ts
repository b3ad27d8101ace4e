import { loadConfig } from './config/env';
import { createApp } from './app';
import { createContext } from './context';
import { logger, setLogLevel } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const ctx = await createContext(config);
  const app = createApp(ctx, {
    corsOrigin: config.corsOrigin,
    accessLog: config.nodeEnv !== 'test'
  });

  // Boot
  app.listen(config.port, () => {
    logger.info(`API listening on http://localhost:${config.port}`, {
      cars: ctx.fleet.size,
      bookings: ctx.bookings.listBookings().length,
      storage: config.bookingStorage
    });
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', {
    message: error instanceof Error ? error.message : String(error)
  });
  process.exitCode = 1;
});
