/**
 * @file helpers.ts
 * @description Timing helpers used to measure callable invocations and dispatch runs.
 */

/**
 * Performance record yielded alongside the other events of a run
 */
export interface PerformanceRecord {
  type: "performance";
  level: "info";
  message: string;
  operation: string;
  duration?: number;
  statistics?: PerformanceStats;
  timestamp: number;
  [key: string]: unknown;
}

/**
 * Performance statistics object
 */
export interface PerformanceStats {
  count: number;
  total: number;
  average: number;
  minimum: number;
  maximum: number;
}

const round = (value: number) => Math.round(value * 100) / 100;

/**
 * Performance timer class for measuring operation durations
 */
export class PerformanceTimer {
  /**
   * Name of the operation being timed
   */
  name: string;

  /**
   * Array of duration measurements
   */
  measurements: number[];

  constructor(name: string) {
    this.name = name;
    this.measurements = [];
  }

  /**
   * Adds a measurement taken elsewhere
   */
  record(duration: number): PerformanceTimer {
    this.measurements.push(duration);
    return this;
  }

  /**
   * Gets performance statistics
   */
  getStats(): PerformanceStats {
    if (this.measurements.length === 0) {
      return {count: 0, total: 0, average: 0, minimum: 0, maximum: 0};
    }

    const total = this.measurements.reduce((sum, duration) => sum + duration, 0);
    return {
      count: this.measurements.length,
      total: round(total),
      average: round(total / this.measurements.length),
      minimum: round(Math.min(...this.measurements)),
      maximum: round(Math.max(...this.measurements)),
    };
  }

  /**
   * Creates a performance record with statistics
   */
  performanceStats(metadata: Record<string, unknown> = {}): PerformanceRecord {
    const stats = this.getStats();

    return {
      ...metadata,
      type: "performance",
      level: "info",
      message: `Performance: ${this.name} - ${stats.count} operations, avg: ${stats.average}ms, min: ${stats.minimum}ms, max: ${stats.maximum}ms, total: ${stats.total}ms`,
      operation: this.name,
      statistics: stats,
      timestamp: Date.now(),
    };
  }

  /**
   * Resets the timer, clearing all measurements
   */
  reset(): PerformanceTimer {
    this.measurements = [];
    return this;
  }
}

/**
 * Creates a new performance timer
 */
export function createPerformanceTimer(name: string): PerformanceTimer {
  return new PerformanceTimer(name);
}

/**
 * Outcome of a measured call: either its result or what it threw, with the elapsed time
 */
export type MeasureResult<T> =
  | {ok: true; result: T; duration: number}
  | {ok: false; error: unknown; duration: number};

/**
 * Measures the execution time of a synchronous function. Errors are returned, not thrown.
 */
export function measure<T>(fn: () => T): MeasureResult<T> {
  const startTime = Date.now();
  try {
    const result = fn();
    return {ok: true, result, duration: round(Date.now() - startTime)};
  } catch (error) {
    return {ok: false, error, duration: round(Date.now() - startTime)};
  }
}
