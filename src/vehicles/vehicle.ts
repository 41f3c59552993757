/**
 * Vehicles
 *
 * Vehicle variants know their make and model and carry whatever regional
 * specification label their factory hands them. They never decide it.
 */

import { logger } from '../utils/logger.js';

const log = logger.child('vehicles');

export type VehicleKind = 'car' | 'motorcycle';

export abstract class Vehicle {
  abstract readonly kind: VehicleKind;

  constructor(
    public readonly make: string,
    public readonly model: string,
    public readonly regionSpec: string
  ) {}

  /** Display identity, e.g. `Toyota Corolla (EU Spec)` */
  get label(): string {
    return `${this.make} ${this.model} (${this.regionSpec})`;
  }

  toString(): string {
    return this.label;
  }

  abstract startEngine(): void;

  protected announce(action: string): void {
    log.info(`${this.label}: ${action}`);
  }
}

export class Car extends Vehicle {
  readonly kind = 'car';

  startEngine(): void {
    this.announce('Engine started');
  }
}

export class Motorcycle extends Vehicle {
  readonly kind = 'motorcycle';

  startEngine(): void {
    this.announce('Engine started');
  }
}
