/**
 * @fileoverview Example engine model: engine speed from vehicle velocity and gearing,
 * engine power from speed and torque.
 */

import {z} from "zod";
import {Dispatcher} from "../dispatcher.js";

/**
 * Engine speed per unit of vehicle velocity [rpm / (km/h)].
 */
export function calculateSpeedVelocityRatio(finalDriveRatio: number, gearRatio: number, wheelRadius: number): number {
  return (finalDriveRatio * gearRatio * 60) / (3.6 * 2 * Math.PI * wheelRadius);
}

/**
 * The same ratio identified from a measured operating point.
 */
export function identifySpeedVelocityRatio(velocity: number, measuredEngineSpeed: number): number {
  if (velocity <= 0) {
    throw new Error("velocity must be positive to identify the speed/velocity ratio");
  }
  return measuredEngineSpeed / velocity;
}

/**
 * Engine speed [rpm]; never below idle.
 */
export function calculateEngineSpeed(velocity: number, ratio: number, idleEngineSpeed: number): number {
  return Math.max(idleEngineSpeed, velocity * ratio);
}

/**
 * Engine power [kW] from speed [rpm] and torque [N·m].
 */
export function calculateEnginePower(engineSpeed: number, engineTorque: number): number {
  return (engineSpeed * engineTorque * 2 * Math.PI) / 60000;
}

export function createEngineModel(): Dispatcher {
  const engine = new Dispatcher({
    name: "engine",
    description: "Computes engine speed and power from the vehicle's state",
  });

  engine.addFromLists({
    data: [
      {id: "idle_engine_speed", defaultValue: 800, schema: z.number().positive(), description: "Idle engine speed [rpm]"},
      {id: "wheel_radius", defaultValue: 0.3, schema: z.number().positive(), description: "Dynamic wheel radius [m]"},
      {id: "velocity", schema: z.number().nonnegative(), description: "Vehicle velocity [km/h]"},
      {id: "engine_speed", schema: z.number().nonnegative(), description: "Engine speed [rpm]"},
    ],
    functions: [
      {
        id: "calculate_speed_velocity_ratio",
        callable: calculateSpeedVelocityRatio,
        inputs: ["final_drive_ratio", "gear_ratio", "wheel_radius"],
        outputs: ["speed_velocity_ratio"],
      },
      {
        id: "identify_speed_velocity_ratio",
        callable: identifySpeedVelocityRatio,
        inputs: ["velocity", "measured_engine_speed"],
        outputs: ["speed_velocity_ratio"],
        weight: 10,
      },
      {
        id: "calculate_engine_speed",
        callable: calculateEngineSpeed,
        inputs: ["velocity", "speed_velocity_ratio", "idle_engine_speed"],
        outputs: ["engine_speed"],
      },
      {
        id: "calculate_engine_power",
        callable: calculateEnginePower,
        inputs: ["engine_speed", "engine_torque"],
        outputs: ["engine_power"],
      },
    ],
  });

  return engine;
}
