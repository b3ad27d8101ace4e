import { Booking, DateRange, NewBooking, Result, ok, err } from '../models/structures';
import { rangesOverlap } from '../utils/dates';
import { KeyedMutex } from '../utils/keyedMutex';
import { logHelpers } from '../utils/logger';
import { FleetRegistry } from './fleetRegistry';
import { validateNewBooking } from './validation';

/** Where accepted bookings are written before they become visible. */
export interface BookingPersistence {
  append(booking: Booking): Promise<void>;
}

export interface BookingStoreOptions {
  /** Bookings already on record, e.g. loaded from disk at start-up. */
  initial?: Booking[];
  persistence?: BookingPersistence;
}

/**
 * Booking records for the fleet. Creation checks the car, the dates and
 * existing bookings of that car; creates for one car are serialized so the
 * no-overlap rule holds under concurrent requests.
 */
export class BookingStore {
  private readonly bookings: Booking[] = [];
  private readonly locks = new KeyedMutex();
  private readonly persistence?: BookingPersistence;
  private nextId = 1;

  constructor(private readonly fleet: FleetRegistry, options: BookingStoreOptions = {}) {
    this.persistence = options.persistence;

    const seen = new Set<number>();
    for (const b of options.initial ?? []) {
      if (seen.has(b.id)) {
        throw new Error(`Duplicate booking id on record: ${b.id}`);
      }
      if (!fleet.findCar(b.carId)) {
        throw new Error(`Booking ${b.id} references unknown car ${b.carId}`);
      }
      seen.add(b.id);
      this.bookings.push({ ...b });
      this.nextId = Math.max(this.nextId, b.id + 1);
    }
  }

  // CREATE a booking
  async createBooking(input: NewBooking): Promise<Result<Booking>> {
    if (!this.fleet.findCar(input.carId)) {
      return err('CAR_NOT_FOUND', 'Car not found.');
    }

    const valid = validateNewBooking(input);
    if (!valid.ok) return valid;

    return this.locks.runExclusive(`car:${input.carId}`, async () => {
      if (!this.isCarAvailable(input.carId, input)) {
        return err('BOOKING_CONFLICT', 'Car already booked for the given time range.');
      }

      const booking: Booking = {
        id: this.nextId++,
        carId: input.carId,
        startDate: input.startDate,
        endDate: input.endDate,
        pickupTime: input.pickupTime,
        dropoffTime: input.dropoffTime
      };

      // Persist first: a failed write must leave no record behind
      if (this.persistence) {
        await this.persistence.append(booking);
      }
      this.bookings.push(booking);

      logHelpers.business('booking_created', {
        bookingId: booking.id,
        carId: booking.carId,
        startDate: booking.startDate,
        endDate: booking.endDate
      });
      return ok({ ...booking });
    });
  }

  bookingsForCar(carId: number): Booking[] {
    return this.bookings.filter(b => b.carId === carId).map(b => ({ ...b }));
  }

  listBookings(): Booking[] {
    return this.bookings.map(b => ({ ...b }));
  }

  // A car is available when none of its bookings shares a day with the range
  isCarAvailable(carId: number, range: DateRange): boolean {
    return !this.bookings.some(b => b.carId === carId && rangesOverlap(b, range));
  }
}
