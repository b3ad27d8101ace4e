import fs from 'fs/promises';
import { z } from 'zod';
import { Booking, Car } from '../models/structures';
import { bookingsFileSchema, carsFileSchema } from '../models/schemas';
import { KeyedMutex } from '../utils/keyedMutex';
import { logger } from '../utils/logger';
import type { BookingPersistence } from './bookingStore';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJson<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.infer<S>> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Malformed data file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

// Fleet seed: { "cars": [{ "id": 1, "name": "..." }] }
export async function loadCars(filePath: string): Promise<Car[]> {
  const { cars } = await readJson(filePath, carsFileSchema);
  return cars;
}

// A bookings file that does not exist yet means nothing has been booked
export async function loadBookings(filePath: string): Promise<Booking[]> {
  try {
    const { bookings } = await readJson(filePath, bookingsFileSchema);
    return bookings;
  } catch (error) {
    if (isMissingFile(error)) {
      logger.info('No bookings file yet, starting empty', { filePath });
      return [];
    }
    throw error;
  }
}

/**
 * Keeps a JSON bookings file in step with accepted bookings. Each append
 * rewrites the whole file; writes are serialized so concurrent creates on
 * different cars cannot overwrite each other.
 */
export class JsonBookingFile implements BookingPersistence {
  private readonly records: Booking[];
  private readonly writes = new KeyedMutex();

  constructor(private readonly filePath: string, existing: Booking[] = []) {
    this.records = existing.map(b => ({ ...b }));
  }

  async append(booking: Booking): Promise<void> {
    await this.writes.runExclusive(this.filePath, async () => {
      this.records.push({ ...booking });
      try {
        await fs.writeFile(this.filePath, JSON.stringify({ bookings: this.records }, null, 2), 'utf-8');
      } catch (error) {
        this.records.pop();
        logger.error('Failed to persist booking', { filePath: this.filePath, bookingId: booking.id });
        throw error;
      }
    });
  }
}
