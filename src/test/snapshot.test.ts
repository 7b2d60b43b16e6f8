import { describe, expect, it } from "vitest";
import { DEFAULT_SIM_CONFIG } from "../config/defaults";
import {
  SnapshotError,
  parseSnapshot,
  restoreVehicle,
  serializeVehicle,
  toSnapshotRecord
} from "../gameplay/snapshot";
import { Vehicle } from "../gameplay/vehicle";
import { FREE, uniformMap } from "./helpers";

function drivenVehicle(): Vehicle {
  const vehicle = new Vehicle(DEFAULT_SIM_CONFIG, { position: [300, 300], heading: 0 }, { speedSet: 1 });
  vehicle.applyCommand({ power: 50, servo: 2 });
  vehicle.tick(uniformMap(FREE));
  vehicle.tick(uniformMap(FREE));
  return vehicle;
}

describe("snapshot", () => {
  it("records pose, sensors and raw commands", () => {
    const vehicle = drivenVehicle();
    const state = vehicle.getState();
    const record = toSnapshotRecord(vehicle);

    expect(record.position).toEqual(state.position);
    expect(record.heading).toBe(state.heading);
    expect(record.speedSet).toBe(1);
    expect(record.radars).toHaveLength(3);
    expect(record.analogDigitalPairs).toHaveLength(3);
    expect(record.elapsedTime).toBe(state.elapsedTime);
    expect(record.power).toBe(50);
    expect(record.rawThrottle).toBe(50);
    expect(record.rawServo).toBe(2);
  });

  it("parses what it serializes", () => {
    const vehicle = drivenVehicle();
    expect(parseSnapshot(serializeVehicle(vehicle))).toEqual(toSnapshotRecord(vehicle));
  });

  it("restores a vehicle that carries on from the same pose", () => {
    const original = drivenVehicle();
    const restored = restoreVehicle(DEFAULT_SIM_CONFIG, serializeVehicle(original));
    const before = original.getState();
    const after = restored.getState();

    expect(after.position).toEqual(before.position);
    expect(after.heading).toBe(before.heading);
    expect(after.speed).toBe(before.speed);
    expect(after.power).toBe(before.power);
    expect(after.steerAngle).toBe(before.steerAngle);
    expect(after.distanceTraveled).toBe(before.distanceTraveled);
    expect(restored.getRadars()).toEqual(original.getRadars());
    expect(restored.speedSet).toBe(1);
  });

  it("accepts records without the optional fields", () => {
    const record = parseSnapshot({
      position: [10, 20],
      heading: 90,
      speed: 0,
      speedSet: 0,
      radars: [],
      analogDigitalPairs: [],
      distanceTraveled: 0,
      elapsedTime: 0
    });
    expect(record.power).toBeUndefined();

    const vehicle = restoreVehicle(DEFAULT_SIM_CONFIG, record);
    expect(vehicle.getState().power).toBe(0);
    expect(vehicle.getState().position).toEqual([10, 20]);
  });

  it("rejects broken JSON", () => {
    expect(() => parseSnapshot("{")).toThrowError(SnapshotError);
  });

  it("lists each invalid field", () => {
    const record = toSnapshotRecord(drivenVehicle());

    try {
      parseSnapshot({ ...record, heading: "north", elapsedTime: -1 });
      expect.unreachable("parseSnapshot should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotError);
      if (error instanceof SnapshotError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^heading: /);
        expect(error.issues[1]).toMatch(/^elapsedTime: /);
      }
    }
  });
});
