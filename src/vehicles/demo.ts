import { EUVehicleFactory, USVehicleFactory, type VehicleFactory } from './vehicle-factory.js';
import type { Vehicle } from './vehicle.js';

export interface VehicleDemoFactories {
  us: VehicleFactory;
  eu: VehicleFactory;
}

/**
 * Build an EU-spec car and a US-spec motorcycle and start both engines.
 */
export function runVehicleDemo(
  factories: VehicleDemoFactories = { us: new USVehicleFactory(), eu: new EUVehicleFactory() }
): Vehicle[] {
  const vehicles = [
    factories.eu.createCar('Toyota', 'Corolla'),
    factories.us.createMotorcycle('Harley-Davidson', 'Sportster'),
  ];

  for (const vehicle of vehicles) {
    vehicle.startEngine();
  }

  return vehicles;
}
