/**
 * Runtime configuration, read once from the environment (and `.env`).
 */

import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger';

dotenv.config();

// Repository-level data directory; same relative spot from src/ and dist/
const DATA_DIR = path.join(__dirname, '..', '..', 'data');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  CARS_FILE: z.string().min(1).optional(),
  BOOKINGS_FILE: z.string().min(1).optional(),
  BOOKING_STORAGE: z.enum(['file', 'memory']).default('file'),
  CORS_ORIGIN: z.string().default('*'),
});

export type BookingStorage = 'file' | 'memory';

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  logLevel: LogLevel;
  carsFile: string;
  bookingsFile: string;
  bookingStorage: BookingStorage;
  corsOrigin: string;
}

/**
 * Parse and validate configuration. Throws with every offending variable
 * listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === 'production' ? 'info' : 'debug'),
    carsFile: vars.CARS_FILE ? path.resolve(vars.CARS_FILE) : path.join(DATA_DIR, 'cars.json'),
    bookingsFile: vars.BOOKINGS_FILE ? path.resolve(vars.BOOKINGS_FILE) : path.join(DATA_DIR, 'bookings.json'),
    bookingStorage: vars.BOOKING_STORAGE,
    corsOrigin: vars.CORS_ORIGIN,
  };
}
