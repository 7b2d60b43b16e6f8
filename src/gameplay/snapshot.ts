import { z } from "zod";
import { logger } from "../logger";
import type { SimConfig, SnapshotRecord, Vec2 } from "../types";
import { createVehicleState, Vehicle } from "./vehicle";

const finite = z.number().finite();
const vec2Schema = z.tuple([finite, finite]);

export const snapshotSchema = z.object({
  position: vec2Schema,
  heading: finite,
  speed: finite,
  speedSet: finite,
  radars: z.array(z.tuple([vec2Schema, finite])),
  analogDigitalPairs: z.array(z.tuple([finite.int(), finite])),
  distanceTraveled: finite,
  elapsedTime: finite.min(0),
  power: finite.optional(),
  steerAngle: finite.optional(),
  rawThrottle: finite.optional(),
  rawServo: finite.optional()
});

export class SnapshotError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid snapshot:\n- ${issues.join("\n- ")}`);
    this.name = "SnapshotError";
  }
}

export function toSnapshotRecord(vehicle: Vehicle): SnapshotRecord {
  const state = vehicle.getState();
  const command = vehicle.getLastCommand();

  const record: SnapshotRecord = {
    position: [state.position[0], state.position[1]],
    heading: state.heading,
    speed: state.speed,
    speedSet: vehicle.speedSet,
    radars: vehicle
      .getRadars()
      .map((reading): [Vec2, number] => [
        [reading.endpoint[0], reading.endpoint[1]],
        Math.trunc(reading.distance)
      ]),
    analogDigitalPairs: vehicle
      .getSamples()
      .map((sample): [number, number] => [Math.trunc(sample.digitalBit), sample.analogVolt]),
    distanceTraveled: state.distanceTraveled,
    elapsedTime: state.elapsedTime,
    power: state.power,
    steerAngle: state.steerAngle
  };

  if (command) {
    record.rawThrottle = command.power;
    record.rawServo = command.servo;
  }

  return record;
}

export function serializeVehicle(vehicle: Vehicle): string {
  return JSON.stringify(toSnapshotRecord(vehicle));
}

/** Validates an untrusted record, or its JSON text. Throws `SnapshotError`. */
export function parseSnapshot(input: unknown): SnapshotRecord {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SnapshotError([`not valid JSON: ${reason}`]);
    }
  }

  const result = snapshotSchema.safeParse(value);
  if (!result.success) {
    throw new SnapshotError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  return result.data;
}

/**
 * Rebuilds a live vehicle from a record. Missing power and steer default to
 * zero; the reverse sequencer starts idle.
 */
export function restoreVehicle(config: SimConfig, input: unknown): Vehicle {
  const record = parseSnapshot(input);
  const vehicle = new Vehicle(config, { position: record.position, heading: record.heading }, {
    speedSet: record.speedSet
  });

  vehicle.restore(
    {
      ...createVehicleState({ position: record.position, heading: record.heading }),
      speed: record.speed,
      power: record.power ?? 0,
      steerAngle: record.steerAngle ?? 0,
      distanceTraveled: record.distanceTraveled,
      elapsedTime: record.elapsedTime
    },
    record.radars.map(([endpoint, distance]) => ({ endpoint: [endpoint[0], endpoint[1]], distance })),
    record.analogDigitalPairs.map(([digitalBit, analogVolt]) => ({ digitalBit, analogVolt }))
  );

  logger.log("snapshot", "vehicle restored", {
    position: record.position,
    elapsedTime: record.elapsedTime
  });

  return vehicle;
}
