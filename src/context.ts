import type { AppConfig } from './config/env';
import { BookingStore } from './services/bookingStore';
import { JsonBookingFile, loadBookings, loadCars } from './services/dataFiles';
import { FleetRegistry } from './services/fleetRegistry';

/** Everything a request handler needs; built once at start-up and passed in. */
export interface AppContext {
  fleet: FleetRegistry;
  bookings: BookingStore;
}

export async function createContext(
  config: Pick<AppConfig, 'carsFile' | 'bookingsFile' | 'bookingStorage'>
): Promise<AppContext> {
  const fleet = new FleetRegistry(await loadCars(config.carsFile));

  if (config.bookingStorage === 'memory') {
    return { fleet, bookings: new BookingStore(fleet) };
  }

  const existing = await loadBookings(config.bookingsFile);
  const bookings = new BookingStore(fleet, {
    initial: existing,
    persistence: new JsonBookingFile(config.bookingsFile, existing)
  });
  return { fleet, bookings };
}
