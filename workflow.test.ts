import {describe, expect, it} from "vitest";
import {CallableFailure} from "./errors.js";
import {ErrorEvent, InvocationEvent, SettlementEvent} from "./events.js";
import {CapabilityGraph} from "./graph.js";
import {SINK, START} from "./nodes.js";
import {dispatch} from "./resolver.js";
import {Workflow, WorkflowRecorder} from "./workflow.js";

describe("WorkflowRecorder", () => {
  it("records settlements, invocations and their value edges", () => {
    const recorder = new WorkflowRecorder("model");
    recorder.recordStart();
    recorder.recordSettlement("a", 3, START, 0);
    recorder.recordInvocation("f", {a: 3}, {b: 4}, 0);
    recorder.recordSettlement("b", 4, "f", 1);

    const workflow = recorder.toWorkflow();

    expect(workflow.nodes().map((node) => node.id)).toEqual([START, "a", "f", "b"]);
    expect(workflow.edges()).toEqual([
      {from: START, to: "a", value: 3},
      {from: "a", to: "f", value: 3},
      {from: "f", to: "b", value: 4},
    ]);
    expect(workflow.predecessors("b")).toEqual(["f"]);
    expect(workflow.successors("a")).toEqual(["f"]);
    expect(workflow.edgeValue("f", "b")).toBe(4);
    expect(workflow.edgeValue("b", "f")).toBeUndefined();
    expect(workflow.invocationOrder).toEqual(["f"]);
    expect(workflow.settlementOrder).toEqual(["a", "b"]);

    const [first, second, third] = recorder.events();
    expect(first).toBeInstanceOf(SettlementEvent);
    expect(second).toBeInstanceOf(InvocationEvent);
    expect(third).toMatchObject({type: "settlement", dataId: "b", via: "f", cost: 1, runnableName: "model"});
  });

  it("records failures and rejections as error events", () => {
    const recorder = new WorkflowRecorder();
    recorder.recordStart();
    recorder.recordRejection("a", new Error("not a number"));
    recorder.recordFailure("f", new CallableFailure("f", "boom"), {});
    recorder.recordGateError("g", new CallableFailure("g", "bad gate"));

    const workflow = recorder.toWorkflow();

    expect(workflow.getNode("a")).toEqual({
      type: "data",
      id: "a",
      settled: false,
      rejected: {name: "Error", message: "not a number"},
    });
    expect(workflow.getNode("f")).toMatchObject({status: "failed", failure: {message: "Function 'f' failed: boom"}});
    expect(workflow.has("g")).toBe(false);
    expect(recorder.events().map((event) => event instanceof ErrorEvent && event.nodeId)).toEqual(["a", "f", "g"]);
  });

  it("adds a sink node instead of settling the sink", () => {
    const recorder = new WorkflowRecorder();
    recorder.recordStart();
    recorder.recordSettlement(SINK, "ignored", "log", 0);

    const workflow = recorder.toWorkflow();

    expect(workflow.getNode(SINK)).toEqual({type: "sink", id: SINK});
    expect(workflow.settlementOrder).toEqual([]);
    expect(workflow.predecessors(SINK)).toEqual(["log"]);
  });
});

describe("Workflow", () => {
  it("cannot be changed once built", () => {
    const workflow = new Workflow([{type: "start", id: START}], [], [], []);

    expect(Object.isFrozen(workflow.getNode(START))).toBe(true);
    expect(Object.isFrozen(workflow.invocationOrder)).toBe(true);
    workflow.edges().push({from: START, to: "x", value: 1});
    expect(workflow.edges()).toEqual([]);
  });

  it("traces only what a run visited", () => {
    const graph = new CapabilityGraph();
    graph.addFunction({id: "f", callable: (a: number) => a + 1, inputs: ["a"], outputs: ["b"]});
    graph.addFunction({id: "unused", callable: (c: number) => c, inputs: ["c"], outputs: ["d"]});

    const {workflow} = dispatch(graph, {a: 1});

    expect(workflow.nodes().map((node) => node.id)).toEqual([START, "a", "f", "b"]);
    expect(graph.has("unused")).toBe(true);
    expect(workflow.has("unused")).toBe(false);
  });
});
