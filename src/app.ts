import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import type { AppContext } from './context';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { availabilityRouter } from './routes (APIs)/availability';
import { bookingsRouter } from './routes (APIs)/bookings';
import { carsRouter } from './routes (APIs)/cars';
import { stream } from './utils/logger';

export interface AppOptions {
  corsOrigin?: string;
  /** HTTP access log; off in tests */
  accessLog?: boolean;
}

export function createApp(ctx: AppContext, options: AppOptions = {}) {
  const app = express();

  // Middlewares
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  app.use(express.json());
  if (options.accessLog) {
    app.use(morgan('combined', { stream }));
  }

  // Routes
  app.get('/', (_req, res) => res.json({ message: 'Welcome to rental car API!' }));
  app.use(carsRouter(ctx));
  app.use(availabilityRouter(ctx));
  app.use(bookingsRouter(ctx));

  // Healthcheck
  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
