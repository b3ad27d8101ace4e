import { Car, Result, ok, err } from '../models/structures';
import type { AppContext } from '../context';
import { validateDateRange } from './validation';

export const NO_AVAILABLE_CARS_MESSAGE = 'No available cars found for the given dates and model.';

export interface AvailabilityQuery {
  startDate: string;
  endDate: string;
  carModel?: string;
}

/**
 * Cars with no booking overlapping [startDate, endDate], in fleet order,
 * optionally limited to one model. An empty answer is reported as an error,
 * never as an empty list.
 */
export function checkAvailability(
  { fleet, bookings }: AppContext,
  query: AvailabilityQuery
): Result<Car[]> {
  const range = validateDateRange(query);
  if (!range.ok) return range;

  const candidates = query.carModel ? fleet.carsNamed(query.carModel) : fleet.listCars();
  if (query.carModel && candidates.length === 0) {
    return err('CAR_MODEL_NOT_FOUND', NO_AVAILABLE_CARS_MESSAGE);
  }

  const available = candidates.filter(car => bookings.isCarAvailable(car.id, range.data));
  if (available.length === 0) {
    return err('NO_AVAILABLE_CARS', NO_AVAILABLE_CARS_MESSAGE);
  }
  return ok(available);
}
