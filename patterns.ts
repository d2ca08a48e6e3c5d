/**
 * @file patterns.ts
 * @description Small callables that recur when wiring models: pass-through, fan-out,
 * picking from a record, packing into one.
 */

/**
 * Returns its single argument unchanged, or all arguments as an array when given several.
 * Registered with one output per argument, it copies values between data nodes.
 *
 * @example
 * dsp.addFunction({ callable: bypass, inputs: ["a", "b"], outputs: ["c", "d"] });
 */
export function bypass(...values: unknown[]): unknown {
  return values.length === 1 ? values[0] : values;
}

/**
 * Returns a callable that repeats its argument `copies` times, for one input fanned out
 * to several outputs.
 */
export function replicate(copies: number): (value: unknown) => unknown[] {
  if (!Number.isInteger(copies) || copies < 1) {
    throw new RangeError(`replicate expects a positive integer, got ${copies}`);
  }
  return (value: unknown) => Array.from({length: copies}, () => value);
}

/**
 * Returns a callable that picks `keys` out of a record, in order. With one key the value
 * itself is returned.
 */
export function selector(keys: readonly string[]): (record: Record<string, unknown>) => unknown {
  return (record: Record<string, unknown>) => {
    const values = keys.map((key) => {
      if (!Object.prototype.hasOwnProperty.call(record, key)) {
        throw new Error(`Key '${key}' is missing from the record`);
      }
      return record[key];
    });
    return keys.length === 1 ? values[0] : values;
  };
}

/**
 * Adds its arguments.
 */
export function summation(...values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0);
}

/**
 * Returns a callable that packs its positional arguments into a record under `keys`.
 */
export function combine(keys: readonly string[]): (...values: unknown[]) => Record<string, unknown> {
  return (...values: unknown[]) => {
    if (values.length !== keys.length) {
      throw new Error(`Expected ${keys.length} values, got ${values.length}`);
    }
    return Object.fromEntries(keys.map((key, index): [string, unknown] => [key, values[index]]));
  };
}
