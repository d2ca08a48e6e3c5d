import {describe, expect, it, vi} from "vitest";
import {z} from "zod";
import {UnknownNode} from "./errors.js";
import {InvocationEvent, SettlementEvent} from "./events.js";
import {CapabilityGraph} from "./graph.js";
import {SINK} from "./nodes.js";
import {dispatch} from "./resolver.js";
import {SubDispatcher} from "./subDispatcher.js";

function doublingGraph(name?: string) {
  const child = new CapabilityGraph({name});
  child.addFunction({id: "double", callable: (x: number) => x * 2, inputs: ["x"], outputs: ["y"]});
  return child;
}

describe("SubDispatcher", () => {
  it("renames values in both directions", () => {
    const child = doublingGraph();
    child.addFunction({id: "halve", callable: (x: number) => x / 2, inputs: ["x"], outputs: ["z"]});
    const adapter = new SubDispatcher(child, {a: "x", mode: SINK}, {y: "b", z: "b"});

    expect(adapter.parentInputs()).toEqual(["a", "mode"]);
    expect(adapter.parentOutputs()).toEqual(["b"]);
    expect(adapter.childOutputs()).toEqual(["y", "z"]);
    expect(adapter.childInputs(new Map<string, unknown>([["a", 1], ["mode", "on"]]))).toEqual({x: 1});
    expect(adapter.parentValues({y: 4, z: 1})).toEqual(new Map([["b", 4]]));
    expect(adapter.parentValues({z: 1})).toEqual(new Map([["b", 1]]));
  });

  it("refuses child ids that are not data nodes", () => {
    const child = doublingGraph();

    expect(() => new SubDispatcher(child, {a: "missing"}, {})).toThrow(
      "Node 'missing' is not a data node of the sub-dispatcher graph"
    );
    expect(() => new SubDispatcher(child, {}, {double: "b"})).toThrow(UnknownNode);
  });

  it("starts on any wired input once the sink-bound ones are settled", () => {
    const child = doublingGraph();
    child.addData("z");
    const adapter = new SubDispatcher(child, {mode: SINK, a: "x", c: "z"}, {y: "b"});

    expect(adapter.canRun((id) => id === "a")).toBe(false);
    expect(adapter.canRun((id) => id === "mode")).toBe(false);
    expect(adapter.canRun((id) => id === "mode" || id === "c")).toBe(true);
    expect(new SubDispatcher(child, {mode: SINK}, {y: "b"}).canRun((id) => id === "mode")).toBe(true);
  });

  it("lists the child defaults of mapped inputs", () => {
    const child = doublingGraph();
    child.addData("x", {defaultValue: 5});

    const defaults = new SubDispatcher(child, {a: "x"}, {y: "b"}).childDefaults();

    expect(defaults.map(([parent, node]) => [parent, node.defaultValue])).toEqual([["a", 5]]);
  });
});

describe("embedded graphs", () => {
  it("runs the child graph as one function node", () => {
    const parent = new CapabilityGraph();
    const id = parent.addSubDispatcher({graph: doublingGraph("child"), inputs: {a: "x"}, outputs: {y: "b"}});

    const {solution, workflow, events} = dispatch(parent, {a: 2}, {outputs: ["b"]});

    expect(id).toBe("child");
    expect(parent.getFunctionNode("child")).toMatchObject({inputs: ["a"], outputs: ["b"]});
    expect(solution).toEqual({a: 2, b: 4});
    expect(workflow.invocationOrder).toEqual(["child"]);

    const node = workflow.getNode("child");
    const nested = node?.type === "function" ? node.workflow : undefined;
    expect(nested?.invocationOrder).toEqual(["double"]);
    expect(nested?.settlementOrder).toEqual(["x", "y"]);

    expect(events.map((event) => [event.type, event.path])).toEqual([
      ["settlement", undefined],
      ["invocation", undefined],
      ["settlement", ["child"]],
      ["invocation", ["child"]],
      ["settlement", ["child"]],
      ["settlement", undefined],
    ]);
    const invocation = events.find((event): event is InvocationEvent => event instanceof InvocationEvent);
    expect(invocation).toMatchObject({functionId: "child", inputs: {a: 2}, outputs: {b: 4}});
  });

  it("derives ids for unnamed child graphs", () => {
    const parent = new CapabilityGraph();

    expect(parent.addSubDispatcher({graph: doublingGraph(), inputs: {a: "x"}, outputs: {y: "b"}})).toBe("sub_dispatcher");
    expect(parent.addSubDispatcher({graph: doublingGraph(), inputs: {a: "x"}, outputs: {y: "c"}})).toBe("sub_dispatcher<0>");
  });

  it("requires inputs bound to the sink without passing them on", () => {
    const parent = new CapabilityGraph();
    parent.addSubDispatcher({
      id: "gated",
      graph: doublingGraph(),
      inputs: {mode: SINK, a: "x"},
      outputs: {y: "b"},
      inputDomain: (inputs) => inputs.mode === "on",
    });

    expect(dispatch(parent, {a: 1}).solution).toEqual({a: 1});
    expect(dispatch(parent, {a: 1, mode: "off"}).solution).toEqual({a: 1, mode: "off"});

    const {solution, workflow} = dispatch(parent, {a: 1, mode: "on"});
    expect(solution).toEqual({a: 1, mode: "on", b: 2});
    const node = workflow.getNode("gated");
    expect(node?.type === "function" ? node.workflow?.settlementOrder : undefined).toEqual(["x", "y"]);
  });

  it("copies child defaults to the parent on request", () => {
    const child = doublingGraph();
    child.addData("x", {defaultValue: 5, waitInput: true});
    const parent = new CapabilityGraph();
    parent.addData("a");
    parent.addSubDispatcher({graph: child, inputs: {a: "x"}, outputs: {y: "b"}, includeDefaults: true});

    expect(parent.getDataNode("a")).toMatchObject({hasDefault: true, defaultValue: 5, waitInput: true});
    expect(dispatch(parent).solution).toEqual({a: 5, b: 10});
  });

  it("keeps a parent default over the child's", () => {
    const child = doublingGraph();
    child.addData("x", {defaultValue: 5});
    const parent = new CapabilityGraph();
    parent.addData("a", {defaultValue: 1});
    parent.addSubDispatcher({graph: child, inputs: {a: "x"}, outputs: {y: "b"}, includeDefaults: true});

    expect(dispatch(parent).solution).toEqual({a: 1, b: 2});
  });

  it("competes with parent producers on cost, not on nesting", () => {
    const parent = new CapabilityGraph();
    parent.addSubDispatcher({id: "nested", graph: doublingGraph(), inputs: {a: "x"}, outputs: {y: "b"}, weight: 5});
    const local = vi.fn((a: number) => a + 100);
    parent.addFunction({id: "local", callable: local, inputs: ["a"], outputs: ["b"], weight: 1});

    const {solution, workflow} = dispatch(parent, {a: 1}, {outputs: ["b"]});

    expect(solution.b).toBe(101);
    expect(workflow.invocationOrder).toEqual(["local"]);
    expect(workflow.getNode("b")).toMatchObject({via: "local", cost: 1});
  });

  it("falls back when the nested run cannot resolve an output", () => {
    const child = new CapabilityGraph();
    child.addFunction({id: "broken", callable: () => { throw new Error("no"); }, inputs: ["x"], outputs: ["y"]});
    const parent = new CapabilityGraph();
    parent.addSubDispatcher({id: "nested", graph: child, inputs: {a: "x"}, outputs: {y: "b"}});
    parent.addFunction({id: "fallback", callable: () => "fallback", inputs: ["a"], outputs: ["b"], weight: 10});

    const {solution, workflow, events} = dispatch(parent, {a: 1}, {outputs: ["b"]});

    expect(solution.b).toBe("fallback");
    expect(workflow.invocationOrder).toEqual(["nested", "fallback"]);
    const nestedError = events.find((event) => event.type === "error_event");
    expect(nestedError?.path).toEqual(["nested"]);
    const settled = events.filter((event): event is SettlementEvent => event instanceof SettlementEvent);
    expect(settled.filter((event) => event.path === undefined).map((event) => event.dataId)).toEqual(["a", "b"]);
  });

  it("lets the child's defaults fill inputs the parent never settles", () => {
    const child = new CapabilityGraph({name: "scale"});
    child.addData("k", {defaultValue: 10});
    child.addFunction({id: "multiply", callable: (x: number, k: number) => x * k, inputs: ["x", "k"], outputs: ["out"]});
    const parent = new CapabilityGraph();
    parent.addSubDispatcher({graph: child, inputs: {x: "x", k: "k"}, outputs: {out: "out"}});

    const {solution, events} = dispatch(parent, {x: 2}, {outputs: ["out"]});

    expect(solution).toEqual({x: 2, out: 20});
    const invocation = events.find((event): event is InvocationEvent => event instanceof InvocationEvent);
    expect(invocation).toMatchObject({functionId: "scale", inputs: {x: 2}, outputs: {out: 20}});
  });

  it("accepts ids that are both inputs and outputs", () => {
    const child = new CapabilityGraph();
    child.addFunction({
      id: "profile",
      callable: (times: number[]) => times.map((time) => time * 10),
      inputs: ["times"],
      outputs: ["velocities"],
    });
    const parent = new CapabilityGraph();
    parent.addSubDispatcher({
      id: "cycle",
      graph: child,
      inputs: {times: "times", velocities: "velocities"},
      outputs: {times: "times", velocities: "velocities"},
    });

    const {solution, workflow} = dispatch(parent, {times: [0, 1, 2]}, {outputs: ["velocities"]});

    expect(solution).toEqual({times: [0, 1, 2], velocities: [0, 10, 20]});
    expect(workflow.getNode("velocities")).toMatchObject({via: "cycle", cost: 0});
    expect(parent.diagnose()).toEqual([]);
  });

  it("names nested events after the child graph", () => {
    const parent = new CapabilityGraph();
    parent.addSubDispatcher({graph: doublingGraph("child"), inputs: {a: "x"}, outputs: {y: "b"}});

    const {events} = dispatch(parent, {a: 2}, {runnableName: "parent"});

    expect(events.map((event) => [event.type, event.runnableName])).toEqual([
      ["settlement", "parent"],
      ["invocation", "parent"],
      ["settlement", "child"],
      ["invocation", "child"],
      ["settlement", "child"],
      ["settlement", "parent"],
    ]);
  });

  it("diagnoses schema mismatches across the rename tables", () => {
    const child = new CapabilityGraph();
    child.addData("x", {schema: z.number()});
    child.addData("y", {schema: z.string()});
    child.addFunction({id: "show", callable: (x: number) => String(x), inputs: ["x"], outputs: ["y"]});
    const parent = new CapabilityGraph();
    parent.addData("a", {schema: z.string()});
    parent.addData("b", {schema: z.string()});
    parent.addSubDispatcher({id: "nested", graph: child, inputs: {a: "x"}, outputs: {y: "b"}});

    expect(parent.diagnose().filter((warning) => warning.startsWith("Sub-dispatcher"))).toEqual([
      "Sub-dispatcher 'nested' input 'a' -> 'x': Incompatible types: source type 'string' is not accepted by target type 'number'",
    ]);
  });
});
