/**
 * `pattern-drills vehicles` CLI command
 *
 * Runs the regional factory demonstration, or builds and starts a single
 * vehicle when --make and --model are given.
 */

import { Command } from 'commander';
import { PatternDrillsError } from '../errors/index.js';
import { runVehicleDemo } from '../vehicles/demo.js';
import { getVehicleFactory, parseVehicleKind } from '../vehicles/vehicle-factory.js';

interface VehiclesOptions {
  region: string;
  kind: string;
  make?: string;
  model?: string;
}

export function createVehiclesCommand(): Command {
  const cmd = new Command('vehicles');

  cmd
    .description('Build vehicles through the US and EU factories and start their engines')
    .option('-r, --region <region>', 'Factory region: us|eu', 'us')
    .option('-k, --kind <kind>', 'Vehicle kind: car|motorcycle', 'car')
    .option('--make <make>', 'Manufacturer (builds a single vehicle)')
    .option('--model <model>', 'Model (builds a single vehicle)')
    .action((opts: VehiclesOptions) => {
      if (opts.make === undefined && opts.model === undefined) {
        runVehicleDemo();
        return;
      }
      if (opts.make === undefined || opts.model === undefined) {
        throw new PatternDrillsError('MISSING_OPTION', '--make and --model must be given together');
      }

      const factory = getVehicleFactory(opts.region);
      const vehicle = factory.create(parseVehicleKind(opts.kind), opts.make, opts.model);
      vehicle.startEngine();
    });

  return cmd;
}
