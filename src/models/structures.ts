
// Car in the rental fleet (seed data, never mutated)
export interface Car {
    id: number;
    name: string;
}

// Booking record, dates as YYYY-MM-DD and times as HH:MM
export interface Booking {
    id: number;
    carId: number;
    startDate: string;
    endDate: string;
    pickupTime: string;
    dropoffTime: string;
}

export type NewBooking = Omit<Booking, 'id'>;

// Inclusive calendar date interval
export interface DateRange {
    startDate: string;
    endDate: string;
}

export type ServiceErrorCode =
  | 'INVALID_DATE'
  | 'INVALID_TIME'
  | 'INVALID_DATE_RANGE'
  | 'INVALID_TIME_RANGE'
  | 'CAR_NOT_FOUND'
  | 'CAR_MODEL_NOT_FOUND'
  | 'NO_AVAILABLE_CARS'
  | 'BOOKING_CONFLICT';

export type ServiceError = {
  code: ServiceErrorCode;
  message: string;
};

export type Ok<T> = { ok: true; data: T };
export type Err = { ok: false; error: ServiceError };
export type Result<T> = Ok<T> | Err;

// Result constructors, for uniform error handling
export function ok<T>(data: T): Ok<T> {
  return { ok: true, data };
}

export function err(code: ServiceErrorCode, message: string): Err {
  return { ok: false, error: { code, message } };
}
