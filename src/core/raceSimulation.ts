import type { DriveController } from "../control/driveController";
import { Vehicle, type VehicleOptions } from "../gameplay/vehicle";
import { logger } from "../logger";
import type { ColorLookup, SimConfig, SpawnPose } from "../types";
import { FixedStepRunner } from "./fixedStep";

export interface RaceEntry {
  id: string;
  vehicle: Vehicle;
  controller: DriveController | null;
}

export interface RaceStatus {
  tick: number;
  elapsedSeconds: number;
  total: number;
  alive: number;
  finished: number;
}

export interface RaceSimulationOptions {
  maxSubSteps?: number;
  onLapTime?: (id: string, lapTimeSeconds: number) => void;
}

/**
 * Drives a field of vehicles over one shared map. Each tick every live
 * vehicle first acts on its latest sensor readings, then advances.
 */
export class RaceSimulation {
  private readonly entries: RaceEntry[] = [];
  private readonly runner: FixedStepRunner;
  private tickCount = 0;

  constructor(
    private readonly map: ColorLookup,
    private readonly config: SimConfig,
    private readonly options: RaceSimulationOptions = {}
  ) {
    this.runner = new FixedStepRunner(config.tickSeconds, options.maxSubSteps);
  }

  addVehicle(
    id: string,
    pose: SpawnPose,
    controller: DriveController | null,
    vehicleOptions: VehicleOptions = {}
  ): Vehicle {
    if (this.entries.some((entry) => entry.id === id)) {
      throw new Error(`RaceSimulation: duplicate vehicle id "${id}"`);
    }

    const vehicle = new Vehicle(this.config, pose, vehicleOptions);
    this.entries.push({ id, vehicle, controller });
    return vehicle;
  }

  getEntries(): readonly RaceEntry[] {
    return this.entries;
  }

  getVehicle(id: string): Vehicle | undefined {
    return this.entries.find((entry) => entry.id === id)?.vehicle;
  }

  /** Advances by a wall-clock frame; returns how many ticks ran. */
  advance(frameSeconds: number): number {
    return this.runner.step(frameSeconds, () => {
      this.tick();
    });
  }

  tick(): RaceStatus {
    for (const entry of this.entries) {
      const { vehicle, controller } = entry;
      if (!vehicle.isAlive()) {
        continue;
      }

      const state = vehicle.getState();
      if (controller && this.config.sensorsEnabled && !state.controlDisabled) {
        const command = controller.decide(vehicle.controllerInput());
        if (command) {
          vehicle.applyCommand(command);
        }
      }

      vehicle.tick(this.map, {
        onLapTime: (lapTime) => {
          logger.log("race", "lap completed", { id: entry.id, lapTime });
          this.options.onLapTime?.(entry.id, lapTime);
        }
      });
    }

    this.tickCount += 1;
    return this.status();
  }

  runTicks(count: number): RaceStatus {
    for (let index = 0; index < count && !this.isOver(); index += 1) {
      this.tick();
    }
    return this.status();
  }

  status(): RaceStatus {
    let alive = 0;
    let finished = 0;
    for (const { vehicle } of this.entries) {
      if (vehicle.isAlive()) {
        alive += 1;
      }
      if (vehicle.isFinished()) {
        finished += 1;
      }
    }

    return {
      tick: this.tickCount,
      elapsedSeconds: this.tickCount * this.config.tickSeconds,
      total: this.entries.length,
      alive,
      finished
    };
  }

  /** True once no vehicle is both alive and still short of the line. */
  isOver(): boolean {
    return this.entries.every(({ vehicle }) => !vehicle.isAlive() || vehicle.isFinished());
  }
}
