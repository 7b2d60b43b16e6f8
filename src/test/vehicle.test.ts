import { describe, expect, it } from "vitest";
import { BORDER_COLOR, DEFAULT_SIM_CONFIG, FINISH_LINE_COLOR } from "../config/defaults";
import { Vehicle } from "../gameplay/vehicle";
import { stepSpeed } from "../physics/dynamics";
import { defaultUnits } from "../physics/units";
import { FREE, uniformMap } from "./helpers";

const OPEN = uniformMap(FREE);

function spawn(): Vehicle {
  return new Vehicle(DEFAULT_SIM_CONFIG, { position: [300, 300], heading: 0 });
}

describe("vehicle", () => {
  it("accelerates and moves forward on open track", () => {
    const vehicle = spawn();
    expect(vehicle.applyCommand({ power: 50, servo: 0 })).toBe(true);

    const speed = stepSpeed(0, 50, 0);
    expect(vehicle.getState().power).toBe(50);
    expect(vehicle.getState().speed).toBeCloseTo(speed, 12);

    const state = vehicle.tick(OPEN);
    expect(state.position[0]).toBeCloseTo(300 + speed, 9);
    expect(state.position[1]).toBeCloseTo(300, 9);
    expect(state.elapsedTime).toBe(0.01);
    expect(state.alive).toBe(true);
  });

  it("samples three radars after each tick", () => {
    const vehicle = spawn();
    vehicle.tick(OPEN);

    const radars = vehicle.getRadars();
    expect(radars).toHaveLength(3);
    expect(vehicle.getSamples()).toHaveLength(3);
    for (const reading of radars) {
      expect(reading.distance).toBeGreaterThan(95);
      expect(reading.distance).toBeLessThanOrEqual(105);
    }

    const input = vehicle.controllerInput();
    expect(input.radarDistances).toEqual(radars.map((reading) => defaultUnits.toReal(reading.distance)));
  });

  it("skips sensing when sensors are disabled", () => {
    const vehicle = new Vehicle(
      { ...DEFAULT_SIM_CONFIG, sensorsEnabled: false },
      { position: [300, 300], heading: 0 }
    );
    vehicle.tick(OPEN);
    expect(vehicle.getRadars()).toEqual([]);
    expect(vehicle.getSamples()).toEqual([]);
  });

  it("maps the servo command onto a mirrored steer angle", () => {
    const vehicle = spawn();
    vehicle.applyCommand({ power: 0, servo: 10 });
    expect(vehicle.getState().steerAngle).toBeCloseTo(-14.93, 10);

    vehicle.applyCommand({ power: 0, servo: 40 });
    expect(vehicle.getState().steerAngle).toBeCloseTo(-14.93, 10);
  });

  it("runs the reverse sequence across ticks", () => {
    const vehicle = spawn();
    vehicle.applyCommand({ power: 50, servo: 0 });
    vehicle.applyCommand({ power: -40, servo: 0 });

    expect(vehicle.getReversePhase()).toBe("counterThrust");
    expect(vehicle.getState().power).toBe(-30);
    const brakingSpeed = vehicle.getState().speed;

    const braked = vehicle.tick(OPEN);
    expect(vehicle.getReversePhase()).toBe("counterThrust");
    expect(braked.power).toBe(-30);
    expect(braked.position[0]).toBeCloseTo(300 + brakingSpeed, 9);

    vehicle.tick(OPEN);
    expect(vehicle.getReversePhase()).toBe("freewheel");
    expect(vehicle.getState().power).toBe(0);

    vehicle.tick(OPEN);
    expect(vehicle.getReversePhase()).toBe("reverse");
    expect(vehicle.getState().power).toBe(-40);
  });

  it("holds every reverse stage for the configured number of ticks", () => {
    const vehicle = new Vehicle(
      { ...DEFAULT_SIM_CONFIG, actuation: { ...DEFAULT_SIM_CONFIG.actuation, pauseTicks: 2 } },
      { position: [300, 300], heading: 0 }
    );
    vehicle.applyCommand({ power: 50, servo: 0 });
    vehicle.applyCommand({ power: -40, servo: 0 });

    const phases: string[] = [];
    for (let tick = 0; tick < 5; tick += 1) {
      vehicle.tick(OPEN);
      phases.push(vehicle.getReversePhase());
    }

    expect(phases).toEqual(["counterThrust", "counterThrust", "freewheel", "freewheel", "reverse"]);
  });

  it("keeps the braking stage when a reverse request repeats in the same tick", () => {
    const vehicle = spawn();
    vehicle.applyCommand({ power: 50, servo: 0 });
    vehicle.applyCommand({ power: -40, servo: 0 });
    vehicle.applyCommand({ power: -60, servo: 0 });

    vehicle.tick(OPEN);
    expect(vehicle.getReversePhase()).toBe("counterThrust");

    vehicle.tick(OPEN);
    vehicle.tick(OPEN);
    expect(vehicle.getState().power).toBe(-60);
  });

  it("latches the first lap time", () => {
    const vehicle = spawn();
    const laps: number[] = [];
    const finishMap = uniformMap(FINISH_LINE_COLOR);

    for (let tick = 0; tick < 3; tick += 1) {
      vehicle.tick(finishMap, { onLapTime: (lapTime) => laps.push(lapTime) });
    }

    expect(laps).toEqual([0.01]);
    expect(vehicle.getState().lapTime).toBe(0.01);
    expect(vehicle.isFinished()).toBe(true);
  });

  it("disables control after a stop collision", () => {
    const vehicle = spawn();
    vehicle.tick(uniformMap(BORDER_COLOR), { policy: "stop" });

    expect(vehicle.getState().controlDisabled).toBe(true);
    expect(vehicle.getState().speed).toBe(0);
    expect(vehicle.applyCommand({ power: 50, servo: 0 })).toBe(false);
    expect(vehicle.getState().power).toBe(0);
  });

  it("freezes after a remove collision", () => {
    const vehicle = spawn();
    vehicle.tick(uniformMap(BORDER_COLOR), { policy: "remove" });
    expect(vehicle.isAlive()).toBe(false);

    const frozen = vehicle.tick(OPEN);
    expect(frozen.elapsedTime).toBe(0.01);
    expect(vehicle.applyCommand({ power: 50, servo: 0 })).toBe(false);
  });

  it("rewards distance in half car lengths", () => {
    const vehicle = spawn();
    vehicle.applyCommand({ power: 80, servo: 0 });
    vehicle.tick(OPEN);

    const halfLength = defaultUnits.toSim(40) / 2;
    expect(vehicle.reward()).toBeCloseTo(vehicle.getState().distanceTraveled / halfLength, 12);
    expect(vehicle.reward()).toBeGreaterThan(0);
  });

  it("ignores non-finite commands", () => {
    const vehicle = spawn();
    vehicle.applyCommand({ power: Number.NaN, servo: Number.NaN });
    const state = vehicle.tick(OPEN);

    expect(state.power).toBe(0);
    expect(state.steerAngle).toBe(0);
    expect(state.position).toEqual([300, 300]);
  });

  it("exposes two front wheels", () => {
    expect(spawn().wheels).toHaveLength(2);
  });
});
