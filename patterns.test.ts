import {describe, expect, it} from "vitest";
import {dispatch} from "./resolver.js";
import {CapabilityGraph} from "./graph.js";
import {bypass, combine, replicate, selector, summation} from "./patterns.js";

describe("patterns", () => {
  it("bypass passes one value through and packs several", () => {
    expect(bypass(1)).toBe(1);
    expect(bypass(1, "a")).toEqual([1, "a"]);
  });

  it("replicate fans one value out", () => {
    expect(replicate(3)("x")).toEqual(["x", "x", "x"]);
    expect(() => replicate(0)).toThrow("replicate expects a positive integer, got 0");
  });

  it("selector picks values in key order", () => {
    const record = {speed: 10, gear: 2, temperature: 90};

    expect(selector(["gear", "speed"])(record)).toEqual([2, 10]);
    expect(selector(["temperature"])(record)).toBe(90);
    expect(() => selector(["torque"])(record)).toThrow("Key 'torque' is missing from the record");
  });

  it("summation adds its arguments", () => {
    expect(summation(1, 2, 3.5)).toBe(6.5);
    expect(summation()).toBe(0);
  });

  it("combine packs positional values", () => {
    expect(combine(["speed", "gear"])(10, 2)).toEqual({speed: 10, gear: 2});
    expect(() => combine(["speed"])(1, 2)).toThrow("Expected 1 values, got 2");
  });

  it("wires into a graph", () => {
    const graph = new CapabilityGraph();
    graph.addFunction({id: "copy", callable: bypass, inputs: ["a", "b"], outputs: ["c", "d"]});
    graph.addFunction({id: "fan", callable: replicate(2), inputs: ["a"], outputs: ["e", "f"]});
    graph.addFunction({id: "pack", callable: combine(["first", "second"]), inputs: ["a", "b"], outputs: ["record"]});
    graph.addFunction({id: "pick", callable: selector(["second"]), inputs: ["record"], outputs: ["g"]});
    graph.addFunction({id: "total", callable: summation, inputs: ["a", "b", "g"], outputs: ["sum"]});

    const {solution} = dispatch(graph, {a: 1, b: 2});

    expect(solution).toMatchObject({c: 1, d: 2, e: 1, f: 1, record: {first: 1, second: 2}, g: 2, sum: 5});
  });
});
