/**
 * @fileoverview Example driving-cycle model. The NEDC and WLTP profiles are separate
 * sub-models; `cycle_type` decides which one may run.
 */

import {z} from "zod";
import {Dispatcher} from "../dispatcher.js";
import {SINK} from "../nodes.js";
import {bypass} from "../patterns.js";

export const CYCLE_TYPES = ["NEDC", "WLTP"] as const;

const WLTP_CLASS_FACTORS: Record<string, number> = {
  class1: 0.5,
  class2: 0.75,
  class3b: 1,
};

/**
 * Simplified NEDC velocity profile [km/h], one sample per time step.
 */
export function nedcVelocities(maxVelocity: number): number[] {
  return [0, 50, maxVelocity, 50, 0];
}

/**
 * Simplified WLTP velocity profile [km/h], scaled by the vehicle class.
 */
export function wltpVelocities(maxVelocity: number, wltpClass: string): number[] {
  const factor = WLTP_CLASS_FACTORS[wltpClass];
  if (factor === undefined) {
    throw new Error(`Unknown WLTP class '${wltpClass}'`);
  }
  const top = maxVelocity * factor;
  return [0, top / 2, top, top, top / 2, 0];
}

/**
 * Distance [m] covered by a velocity profile sampled every `timeStep` seconds.
 */
export function calculateDistance(velocities: number[], timeStep: number): number {
  return (velocities.reduce((sum, velocity) => sum + velocity, 0) * timeStep) / 3.6;
}

export function calculateCycleDuration(velocities: number[], timeStep: number): number {
  return (velocities.length - 1) * timeStep;
}

function createNedcModel(): Dispatcher {
  return Dispatcher.builder({name: "nedc", description: "New European Driving Cycle"})
    .data("max_velocity", {defaultValue: 120})
    .fn({id: "nedc_velocities", callable: nedcVelocities, inputs: ["max_velocity"], outputs: ["velocities"]})
    .build();
}

function createWltpModel(): Dispatcher {
  return Dispatcher.builder({name: "wltp", description: "Worldwide harmonised Light vehicles Test Procedure"})
    .data("max_velocity", {defaultValue: 120})
    .data("wltp_class", {defaultValue: "class3b", schema: z.enum(["class1", "class2", "class3b"])})
    .fn({
      id: "wltp_velocities",
      callable: wltpVelocities,
      inputs: ["max_velocity", "wltp_class"],
      outputs: ["velocities"],
    })
    .build();
}

/**
 * Builds the cycle model. Exactly one of the two profiles runs, depending on the
 * supplied `cycle_type`; `velocities` may also be supplied directly as a measured trace.
 */
export function createCycleModel(): Dispatcher {
  const cycleIs = (type: (typeof CYCLE_TYPES)[number]) => (inputs: Readonly<Record<string, unknown>>) =>
    inputs.cycle_type === type;

  return Dispatcher.builder({name: "cycle", description: "Velocity profile, distance and duration of a driving cycle"})
    .data("cycle_type", {schema: z.enum(CYCLE_TYPES), description: "Type of the driving cycle"})
    .data("max_velocity", {schema: z.number().positive(), description: "Top velocity of the cycle [km/h]"})
    .data("time_step", {defaultValue: 1, description: "Sampling period [s]"})
    .sub({
      id: "nedc",
      dispatcher: createNedcModel(),
      inputs: {cycle_type: SINK, max_velocity: "max_velocity"},
      outputs: {velocities: "velocities"},
      inputDomain: cycleIs("NEDC"),
      includeDefaults: true,
    })
    .sub({
      id: "wltp",
      dispatcher: createWltpModel(),
      inputs: {cycle_type: SINK, max_velocity: "max_velocity", wltp_class: "wltp_class"},
      outputs: {velocities: "velocities"},
      inputDomain: cycleIs("WLTP"),
      includeDefaults: true,
    })
    .fn({id: "calculate_distance", callable: calculateDistance, inputs: ["velocities", "time_step"], outputs: ["distance"]})
    .fn({
      id: "calculate_cycle_duration",
      callable: calculateCycleDuration,
      inputs: ["velocities", "time_step"],
      outputs: ["cycle_duration"],
    })
    .fn({id: "max_velocity_of_profile", callable: (velocities: number[]) => Math.max(...velocities), inputs: ["velocities"], outputs: ["peak_velocity"]})
    .fn({id: "copy_peak_velocity", callable: bypass, inputs: ["peak_velocity"], outputs: ["velocity"]})
    .build();
}
