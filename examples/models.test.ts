import {describe, expect, it} from "vitest";
import {ErrorEvent} from "../events.js";
import {
  calculateCo2Emissions,
  calculateFuelConsumption,
  createCo2EmissionModel,
  createVehicleModel,
} from "./co2-emission-model.js";
import {createCycleModel} from "./cycle-model.js";
import {calculateSpeedVelocityRatio, createEngineModel} from "./engine-model.js";

describe("engine model", () => {
  it("computes engine speed and power from the gearing", () => {
    const {solution, workflow} = createEngineModel().dispatch(
      {velocity: 50, final_drive_ratio: 4, gear_ratio: 1, engine_torque: 100},
      ["engine_power"]
    );

    expect(solution.speed_velocity_ratio).toBeCloseTo(35.3678, 4);
    expect(solution.engine_speed).toBeCloseTo(1768.39, 2);
    expect(solution.engine_power).toBeCloseTo(18.5185, 4);
    expect(workflow.has("identify_speed_velocity_ratio")).toBe(false);
  });

  it("identifies the ratio from a measured point when the gearing is unknown", () => {
    const {solution, workflow} = createEngineModel().dispatch(
      {velocity: 50, measured_engine_speed: 2000},
      ["engine_speed"]
    );

    expect(solution.speed_velocity_ratio).toBe(40);
    expect(solution.engine_speed).toBe(2000);
    expect(workflow.invocationOrder).toEqual(["identify_speed_velocity_ratio", "calculate_engine_speed"]);
  });

  it("never drops below idle", () => {
    const {solution} = createEngineModel().dispatch({velocity: 0, final_drive_ratio: 4, gear_ratio: 1}, ["engine_speed"]);

    expect(solution.engine_speed).toBe(800);
  });
});

describe("cycle model", () => {
  it("runs the NEDC profile only", () => {
    const {solution, workflow} = createCycleModel().dispatch({cycle_type: "NEDC"});

    expect(solution.velocities).toEqual([0, 50, 120, 50, 0]);
    expect(solution.distance).toBeCloseTo(61.111, 3);
    expect(solution.cycle_duration).toBe(4);
    expect(solution.velocity).toBe(120);
    expect(workflow.has("nedc")).toBe(true);
    expect(workflow.has("wltp")).toBe(false);
  });

  it("runs the WLTP profile for the requested class", () => {
    const {solution, workflow} = createCycleModel().dispatch({cycle_type: "WLTP", wltp_class: "class2"}, ["distance"]);

    expect(solution.velocities).toEqual([0, 45, 90, 90, 45, 0]);
    expect(solution.distance).toBeCloseTo(75, 6);
    expect(workflow.has("nedc")).toBe(false);
  });

  it("rejects an unknown cycle type", () => {
    const {solution, events} = createCycleModel().dispatch({cycle_type: "FTP75"});

    expect(solution.velocities).toBeUndefined();
    const rejection = events.find((event) => event instanceof ErrorEvent);
    expect(rejection).toMatchObject({nodeId: "cycle_type"});
  });

  it("uses a supplied velocity trace", () => {
    const {solution} = createCycleModel().dispatch({velocities: [0, 36, 0], time_step: 2}, ["distance", "cycle_duration"]);

    expect(solution.distance).toBeCloseTo(20, 6);
    expect(solution.cycle_duration).toBe(4);
  });
});

describe("CO2 emission model", () => {
  it("computes emissions from the fuel burnt", () => {
    const {solution} = createCo2EmissionModel().dispatch({fuel_mass: 50, distance: 1000}, ["co2_emission"]);

    expect(solution.fuel_consumption).toBe(50);
    expect(solution.fuel_carbon_content).toBe(3.17);
    expect(solution.co2_emission).toBeCloseTo(158.5, 6);
  });

  it("falls back to the generic carbon content for unknown fuels", () => {
    const {solution, workflow} = createCo2EmissionModel().dispatch(
      {fuel_mass: 50, distance: 1000, fuel_type: "hydrogen"},
      ["co2_emission"]
    );

    expect(solution.fuel_carbon_content).toBe(3.1);
    expect(solution.co2_emission).toBeCloseTo(155, 6);
    expect(workflow.getNode("lookup_fuel_carbon_content")).toMatchObject({status: "failed"});
  });
});

describe("vehicle model", () => {
  it("chains the nested models", () => {
    const {solution, workflow} = createVehicleModel().dispatch({
      cycle_type: "WLTP",
      final_drive_ratio: 4,
      gear_ratio: 1,
      fuel_mass: 5,
    });

    const distance = 420 / 3.6;
    expect(solution.max_velocity).toBe(120);
    expect(solution.distance).toBeCloseTo(distance, 6);
    expect(solution.peak_velocity).toBe(120);
    expect(solution.peak_engine_speed).toBeCloseTo(120 * calculateSpeedVelocityRatio(4, 1, 0.3), 6);
    expect(solution.fuel_consumption).toBeCloseTo(calculateFuelConsumption(5, distance), 6);
    expect(solution.co2_emission).toBeCloseTo(calculateCo2Emissions(calculateFuelConsumption(5, distance), 3.17), 6);
    expect(workflow.invocationOrder).toEqual(["cycle", "engine", "emissions"]);
  });
});
