/**
 * Regional vehicle factories
 *
 * Each factory stamps its own regional specification onto the vehicles it
 * builds.
 */

import { UnsupportedOptionError } from '../errors/index.js';
import { Car, Motorcycle, type Vehicle, type VehicleKind } from './vehicle.js';

export abstract class VehicleFactory {
  constructor(public readonly regionSpec: string) {}

  abstract createCar(make: string, model: string): Vehicle;

  abstract createMotorcycle(make: string, model: string): Vehicle;

  create(kind: VehicleKind, make: string, model: string): Vehicle {
    switch (kind) {
      case 'car':
        return this.createCar(make, model);
      case 'motorcycle':
        return this.createMotorcycle(make, model);
    }
  }
}

export class USVehicleFactory extends VehicleFactory {
  constructor() {
    super('US Spec');
  }

  createCar(make: string, model: string): Vehicle {
    return new Car(make, model, this.regionSpec);
  }

  createMotorcycle(make: string, model: string): Vehicle {
    return new Motorcycle(make, model, this.regionSpec);
  }
}

export class EUVehicleFactory extends VehicleFactory {
  constructor() {
    super('EU Spec');
  }

  createCar(make: string, model: string): Vehicle {
    return new Car(make, model, this.regionSpec);
  }

  createMotorcycle(make: string, model: string): Vehicle {
    return new Motorcycle(make, model, this.regionSpec);
  }
}

export type Region = 'us' | 'eu';

export const REGIONS: readonly Region[] = ['us', 'eu'];

export const VEHICLE_KINDS: readonly VehicleKind[] = ['car', 'motorcycle'];

export function isRegion(value: string): value is Region {
  return (REGIONS as readonly string[]).includes(value);
}

export function isVehicleKind(value: string): value is VehicleKind {
  return (VEHICLE_KINDS as readonly string[]).includes(value);
}

/**
 * Resolve a factory from a region name (case-insensitive).
 */
export function getVehicleFactory(region: string): VehicleFactory {
  const key = region.trim().toLowerCase();
  if (!isRegion(key)) {
    throw new UnsupportedOptionError('region', region, REGIONS);
  }
  return key === 'us' ? new USVehicleFactory() : new EUVehicleFactory();
}

export function parseVehicleKind(kind: string): VehicleKind {
  const key = kind.trim().toLowerCase();
  if (!isVehicleKind(key)) {
    throw new UnsupportedOptionError('kind', kind, VEHICLE_KINDS);
  }
  return key;
}
