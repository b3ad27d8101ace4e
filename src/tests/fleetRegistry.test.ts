import { describe, test, expect } from '@jest/globals';
import { FleetRegistry } from '../services/fleetRegistry';
import { baseCars } from './__mocks__/cars.fixture';

describe('FleetRegistry', () => {
  test('listCars returns every car in seed order', () => {
    const fleet = new FleetRegistry(baseCars);
    expect(fleet.listCars().map(c => c.id)).toEqual([1, 2, 3, 4, 9]);
    expect(fleet.size).toBe(5);
  });

  test('listCars hands out a copy, the fleet itself cannot be changed', () => {
    const fleet = new FleetRegistry(baseCars);
    const list = fleet.listCars();
    list.pop();
    expect(fleet.listCars()).toHaveLength(5);
  });

  test('findCar looks up by id', () => {
    const fleet = new FleetRegistry(baseCars);
    expect(fleet.findCar(9)).toEqual({ id: 9, name: 'Dacia Sandero' });
    expect(fleet.findCar(42)).toBeUndefined();
  });

  test('carsNamed matches the exact name only', () => {
    const fleet = new FleetRegistry(baseCars);
    expect(fleet.carsNamed('Volkswagen Polo').map(c => c.id)).toEqual([2, 4]);
    expect(fleet.carsNamed('dacia sandero')).toEqual([]);
    expect(fleet.carsNamed(' Dacia Sandero')).toEqual([]);
    expect(fleet.carsNamed('Volkswagen')).toEqual([]);
  });

  test('rejects a seed with duplicate car ids', () => {
    expect(() => new FleetRegistry([{ id: 1, name: 'A' }, { id: 1, name: 'B' }])).toThrow(
      'Duplicate car id in fleet: 1'
    );
  });
});
