import { z } from 'zod';
import { isCalendarDate, isClockTime } from '../utils/dates';

const isoDate = z.string().refine(isCalendarDate, { message: 'Expected a calendar date in YYYY-MM-DD format' });
const clockTime = z.string().refine(isClockTime, { message: 'Expected a time in HH:MM format' });

// ---- Requests ----

export const availabilityQuerySchema = z.object({
  start_date: isoDate,
  end_date: isoDate,
  // An empty car_model is the same as leaving it out
  car_model: z
    .string()
    .optional()
    .transform((v) => (v ? v : undefined)),
});

export const bookingRequestSchema = z.object({
  car_id: z.number().int().positive(),
  start_date: isoDate,
  end_date: isoDate,
  pickup_time: clockTime,
  dropoff_time: clockTime,
});

export const carIdParamsSchema = z.object({
  carId: z.coerce.number().int().positive(),
});

export type AvailabilityQuery = z.infer<typeof availabilityQuerySchema>;
export type BookingRequest = z.infer<typeof bookingRequestSchema>;

// ---- Data files ----

export const carSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
});

export const carsFileSchema = z.object({
  cars: z.array(carSchema),
});

export const bookingRecordSchema = z.object({
  id: z.number().int().positive(),
  carId: z.number().int(),
  startDate: isoDate,
  endDate: isoDate,
  pickupTime: clockTime,
  dropoffTime: clockTime,
});

export const bookingsFileSchema = z.object({
  bookings: z.array(bookingRecordSchema),
});
