import { Car } from '../models/structures';

/**
 * Read-only view over the seeded fleet. Cars keep their seed order.
 */
export class FleetRegistry {
  private readonly cars: readonly Car[];
  private readonly byId = new Map<number, Car>();

  constructor(cars: Car[]) {
    for (const car of cars) {
      if (this.byId.has(car.id)) {
        throw new Error(`Duplicate car id in fleet: ${car.id}`);
      }
      this.byId.set(car.id, Object.freeze({ id: car.id, name: car.name }));
    }
    this.cars = Object.freeze([...this.byId.values()]);
  }

  // LIST all cars
  listCars(): Car[] {
    return [...this.cars];
  }

  findCar(id: number): Car | undefined {
    return this.byId.get(id);
  }

  // Cars whose name is exactly the given model ("dacia sandero" is not "Dacia Sandero")
  carsNamed(model: string): Car[] {
    return this.cars.filter(c => c.name === model);
  }

  get size(): number {
    return this.cars.length;
  }
}
