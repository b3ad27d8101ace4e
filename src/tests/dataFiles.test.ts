import { describe, test, expect, jest, beforeEach } from '@jest/globals';
import { createContext } from '../context';
import { JsonBookingFile, loadBookings, loadCars } from '../services/dataFiles';
import { booking } from './__mocks__/cars.fixture';
import { __failWrites, __getFile, __reset, __setFile, writeCalls } from './__mocks__/fs.promises.mock';

jest.mock('fs/promises', () => jest.requireActual('./__mocks__/fs.promises.mock'));

const CARS = '/virtual/cars.json';
const BOOKINGS = '/virtual/bookings.json';

const carsJson = JSON.stringify({
  cars: [
    { id: 1, name: 'SEAT Ibiza' },
    { id: 3, name: 'Renault Clio' }
  ]
});

beforeEach(() => {
  __reset();
  __setFile(CARS, carsJson);
});

describe('dataFiles: loading', () => {
  test('loadCars reads the fleet seed', async () => {
    await expect(loadCars(CARS)).resolves.toEqual([
      { id: 1, name: 'SEAT Ibiza' },
      { id: 3, name: 'Renault Clio' }
    ]);
  });

  test('loadCars rejects a malformed seed', async () => {
    __setFile(CARS, JSON.stringify({ cars: [{ id: 'one', name: 'SEAT Ibiza' }] }));
    await expect(loadCars(CARS)).rejects.toThrow(`Malformed data file ${CARS}: cars.0.id: Expected number, received string`);
  });

  test('loadCars fails when the seed is missing', async () => {
    await expect(loadCars('/virtual/none.json')).rejects.toThrow('ENOENT');
  });

  test('loadBookings treats a missing file as no bookings', async () => {
    await expect(loadBookings(BOOKINGS)).resolves.toEqual([]);
  });

  test('loadBookings reads records on file', async () => {
    __setFile(BOOKINGS, JSON.stringify({ bookings: [booking(4, 3, '2024-11-25', '2024-11-30')] }));
    await expect(loadBookings(BOOKINGS)).resolves.toEqual([booking(4, 3, '2024-11-25', '2024-11-30')]);
  });

  test('loadBookings rejects impossible dates on file', async () => {
    __setFile(BOOKINGS, JSON.stringify({ bookings: [booking(4, 3, '2024-11-31', '2024-12-01')] }));
    await expect(loadBookings(BOOKINGS)).rejects.toThrow('bookings.0.startDate');
  });
});

describe('dataFiles: JsonBookingFile', () => {
  test('append rewrites the file with every record so far', async () => {
    const file = new JsonBookingFile(BOOKINGS, [booking(1, 1, '2024-11-01', '2024-11-02')]);

    await file.append(booking(2, 3, '2024-11-25', '2024-11-30'));

    expect(writeCalls).toHaveLength(1);
    const persisted = JSON.parse(writeCalls[0].data);
    expect(persisted.bookings.map((b: { id: number }) => b.id)).toEqual([1, 2]);
  });

  test('concurrent appends are written one after another and none is lost', async () => {
    const file = new JsonBookingFile(BOOKINGS);

    await Promise.all([
      file.append(booking(1, 1, '2024-11-01', '2024-11-02')),
      file.append(booking(2, 3, '2024-11-01', '2024-11-02'))
    ]);

    expect(writeCalls).toHaveLength(2);
    const last = JSON.parse(__getFile(BOOKINGS) ?? '{}');
    expect(last.bookings).toHaveLength(2);
  });

  test('a failed write is not remembered', async () => {
    const file = new JsonBookingFile(BOOKINGS);

    __failWrites(true);
    await expect(file.append(booking(1, 1, '2024-11-01', '2024-11-02'))).rejects.toThrow('EACCES');

    __failWrites(false);
    await file.append(booking(2, 1, '2024-11-05', '2024-11-06'));
    const persisted = JSON.parse(__getFile(BOOKINGS) ?? '{}');
    expect(persisted.bookings.map((b: { id: number }) => b.id)).toEqual([2]);
  });
});

describe('createContext', () => {
  test('file storage: loads both files and persists new bookings', async () => {
    __setFile(BOOKINGS, JSON.stringify({ bookings: [booking(5, 3, '2024-11-25', '2024-11-30')] }));

    const ctx = await createContext({ carsFile: CARS, bookingsFile: BOOKINGS, bookingStorage: 'file' });
    expect(ctx.fleet.listCars().map(c => c.id)).toEqual([1, 3]);
    expect(ctx.bookings.bookingsForCar(3)).toHaveLength(1);

    const res = await ctx.bookings.createBooking({
      carId: 1,
      startDate: '2024-12-01',
      endDate: '2024-12-10',
      pickupTime: '08:00',
      dropoffTime: '18:00'
    });
    expect(res.ok && res.data.id).toBe(6);

    const persisted = JSON.parse(__getFile(BOOKINGS) ?? '{}');
    expect(persisted.bookings.map((b: { id: number }) => b.id)).toEqual([5, 6]);
  });

  test('memory storage: never touches the bookings file', async () => {
    const ctx = await createContext({ carsFile: CARS, bookingsFile: BOOKINGS, bookingStorage: 'memory' });

    const res = await ctx.bookings.createBooking({
      carId: 3,
      startDate: '2024-12-01',
      endDate: '2024-12-10',
      pickupTime: '08:00',
      dropoffTime: '18:00'
    });
    expect(res.ok).toBe(true);
    expect(writeCalls).toHaveLength(0);
    expect(__getFile(BOOKINGS)).toBeUndefined();
  });
});
