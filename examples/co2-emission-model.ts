/**
 * @fileoverview Example CO2 emission model, and a vehicle model that nests the cycle,
 * engine and CO2 models as sub-dispatchers.
 */

import {z} from "zod";
import {Dispatcher} from "../dispatcher.js";
import {createCycleModel} from "./cycle-model.js";
import {createEngineModel} from "./engine-model.js";

/**
 * Grams of CO2 released per gram of fuel burnt.
 */
export const FUEL_CARBON_CONTENT: Record<string, number> = {
  gasoline: 3.17,
  diesel: 3.16,
  lpg: 3.02,
};

export function fuelCarbonContent(fuelType: string): number {
  const content = FUEL_CARBON_CONTENT[fuelType];
  if (content === undefined) {
    throw new Error(`Unknown fuel type '${fuelType}'`);
  }
  return content;
}

/**
 * Fuel consumption [g/km] from the fuel burnt [g] over a distance [m].
 */
export function calculateFuelConsumption(fuelMass: number, distance: number): number {
  return (fuelMass / distance) * 1000;
}

/**
 * CO2 emissions [g/km].
 */
export function calculateCo2Emissions(fuelConsumption: number, carbonContent: number): number {
  return fuelConsumption * carbonContent;
}

/**
 * Builds the CO2 model. When the fuel type is unknown, the carbon content falls back to
 * a generic value that waits until nothing else can provide it.
 */
export function createCo2EmissionModel(): Dispatcher {
  const co2 = new Dispatcher({name: "co2_emission", description: "CO2 emissions from fuel consumption"});

  co2.addData("fuel_type", {defaultValue: "gasoline", schema: z.string()});
  co2.addData("fuel_carbon_content", {defaultValue: 3.1, waitInput: true, description: "CO2 per fuel mass [g/g]"});
  co2.addData("co2_emission", {schema: z.number().nonnegative(), description: "CO2 emissions [g/km]"});

  co2.addFunction({
    id: "lookup_fuel_carbon_content",
    callable: fuelCarbonContent,
    inputs: ["fuel_type"],
    outputs: ["fuel_carbon_content"],
  });
  co2.addFunction({
    id: "calculate_fuel_consumption",
    callable: calculateFuelConsumption,
    inputs: ["fuel_mass", "distance"],
    outputs: ["fuel_consumption"],
  });
  co2.addFunction({
    id: "calculate_co2_emissions",
    callable: calculateCo2Emissions,
    inputs: ["fuel_consumption", "fuel_carbon_content"],
    outputs: ["co2_emission"],
  });

  return co2;
}

/**
 * The whole vehicle: the cycle gives the distance and peak velocity, the engine the
 * speed at that velocity, the CO2 model the emissions.
 */
export function createVehicleModel(): Dispatcher {
  const vehicle = new Dispatcher({name: "vehicle", description: "Cycle, engine and CO2 emission models"});

  vehicle.addSubDispatcher({
    id: "cycle",
    dispatcher: createCycleModel(),
    inputs: {cycle_type: "cycle_type", max_velocity: "max_velocity"},
    outputs: {distance: "distance", velocity: "peak_velocity"},
    includeDefaults: true,
  });
  vehicle.addSubDispatcher({
    id: "engine",
    dispatcher: createEngineModel(),
    inputs: {peak_velocity: "velocity", final_drive_ratio: "final_drive_ratio", gear_ratio: "gear_ratio"},
    outputs: {engine_speed: "peak_engine_speed"},
  });
  vehicle.addSubDispatcher({
    id: "emissions",
    dispatcher: createCo2EmissionModel(),
    inputs: {fuel_mass: "fuel_mass", distance: "distance", fuel_type: "fuel_type"},
    outputs: {co2_emission: "co2_emission", fuel_consumption: "fuel_consumption"},
    includeDefaults: true,
  });

  return vehicle;
}
