/**
 * Tests for the regional vehicle factories
 */

import { UnsupportedOptionError } from '../../src/errors';
import { Car, Motorcycle } from '../../src/vehicles/vehicle';
import {
  EUVehicleFactory,
  getVehicleFactory,
  parseVehicleKind,
  USVehicleFactory,
} from '../../src/vehicles/vehicle-factory';
import { runVehicleDemo } from '../../src/vehicles/demo';
import { captureLogs, resetLogger, type RecordingSink } from '../test-utils';

describe('Vehicle factories', () => {
  let sink: RecordingSink;

  beforeEach(() => {
    sink = captureLogs();
  });

  afterEach(() => {
    resetLogger();
  });

  it('should stamp the US region on cars', () => {
    const car = new USVehicleFactory().createCar('Ford', 'Mustang');

    expect(car).toBeInstanceOf(Car);
    expect(car.kind).toBe('car');
    expect(car.regionSpec).toBe('US Spec');
    expect(car.label).toBe('Ford Mustang (US Spec)');
    expect(String(car)).toBe('Ford Mustang (US Spec)');
  });

  it('should stamp the EU region on motorcycles', () => {
    const bike = new EUVehicleFactory().createMotorcycle('Ducati', 'Monster');

    expect(bike).toBeInstanceOf(Motorcycle);
    expect(bike.label).toBe('Ducati Monster (EU Spec)');
  });

  it('should log the engine start line for cars', () => {
    new USVehicleFactory().createCar('Ford', 'Mustang').startEngine();

    expect(sink.messages('info')).toEqual(['Ford Mustang (US Spec): Engine started']);
    expect(sink.entries[0].scope).toBe('pattern-drills.vehicles');
  });

  it('should log the same start line for motorcycles', () => {
    new EUVehicleFactory().createMotorcycle('Ducati', 'Monster').startEngine();

    expect(sink.messages()).toEqual(['Ducati Monster (EU Spec): Engine started']);
  });

  it('should produce labels that differ only in the regional suffix', () => {
    const us = new USVehicleFactory().createCar('Toyota', 'Corolla');
    const eu = new EUVehicleFactory().createCar('Toyota', 'Corolla');

    expect(us.make).toBe(eu.make);
    expect(us.model).toBe(eu.model);
    expect(us.label.replace(' (US Spec)', '')).toBe(eu.label.replace(' (EU Spec)', ''));

    us.startEngine();
    eu.startEngine();
    const [usLine, euLine] = sink.messages();
    expect(usLine.replace('(US Spec)', '')).toBe(euLine.replace('(EU Spec)', ''));
  });

  it('should build by kind', () => {
    const factory = new EUVehicleFactory();
    expect(factory.create('car', 'VW', 'Golf')).toBeInstanceOf(Car);
    expect(factory.create('motorcycle', 'BMW', 'R 1250')).toBeInstanceOf(Motorcycle);
  });
});

describe('getVehicleFactory', () => {
  it('should resolve regions case-insensitively', () => {
    expect(getVehicleFactory('us')).toBeInstanceOf(USVehicleFactory);
    expect(getVehicleFactory(' EU ')).toBeInstanceOf(EUVehicleFactory);
  });

  it('should reject unknown regions', () => {
    expect(() => getVehicleFactory('jp')).toThrow(UnsupportedOptionError);
    expect(() => getVehicleFactory('jp')).toThrow('Unsupported region "jp" (expected one of: us, eu)');
  });
});

describe('parseVehicleKind', () => {
  it('should normalise known kinds', () => {
    expect(parseVehicleKind('Motorcycle')).toBe('motorcycle');
  });

  it('should reject unknown kinds', () => {
    expect(() => parseVehicleKind('truck')).toThrow(
      'Unsupported kind "truck" (expected one of: car, motorcycle)'
    );
  });
});

describe('runVehicleDemo', () => {
  afterEach(() => {
    resetLogger();
  });

  it('should start an EU car and a US motorcycle', () => {
    const sink = captureLogs();
    const vehicles = runVehicleDemo();

    expect(vehicles.map(v => v.label)).toEqual([
      'Toyota Corolla (EU Spec)',
      'Harley-Davidson Sportster (US Spec)',
    ]);
    expect(sink.messages()).toEqual([
      'Toyota Corolla (EU Spec): Engine started',
      'Harley-Davidson Sportster (US Spec): Engine started',
    ]);
  });
});
