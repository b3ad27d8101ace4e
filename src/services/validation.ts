import { DateRange, NewBooking, Result, ok, err } from '../models/structures';
import { compareDates, compareTimes, isCalendarDate, isClockTime } from '../utils/dates';

// Both ends must be real dates and the range must not run backwards
export function validateDateRange(range: DateRange): Result<DateRange> {
  if (!isCalendarDate(range.startDate)) {
    return err('INVALID_DATE', 'Invalid start date: expected a calendar date in YYYY-MM-DD format');
  }
  if (!isCalendarDate(range.endDate)) {
    return err('INVALID_DATE', 'Invalid end date: expected a calendar date in YYYY-MM-DD format');
  }
  if (compareDates(range.endDate, range.startDate) < 0) {
    return err('INVALID_DATE_RANGE', 'End date must not be before start date.');
  }
  return ok(range);
}

export function validateNewBooking(input: NewBooking): Result<NewBooking> {
  const range = validateDateRange(input);
  if (!range.ok) return range;

  if (!isClockTime(input.pickupTime)) {
    return err('INVALID_TIME', 'Invalid pick-up time: expected HH:MM');
  }
  if (!isClockTime(input.dropoffTime)) {
    return err('INVALID_TIME', 'Invalid drop-off time: expected HH:MM');
  }

  // Same-day rental: the car cannot come back before it leaves
  if (input.startDate === input.endDate && compareTimes(input.dropoffTime, input.pickupTime) < 0) {
    return err('INVALID_TIME_RANGE', 'Drop-off time must not be before pick-up time on a single-day booking.');
  }
  return ok(input);
}
