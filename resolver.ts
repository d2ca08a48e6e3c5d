/**
 * @file resolver.ts
 * @description Weighted AND/OR best-first search over a capability graph.
 *
 * Data nodes have OR semantics (any one producer suffices), function nodes AND semantics
 * (every input must be settled). Sub-dispatchers are the exception: they become ready on
 * their first settled input and run with whatever mapped inputs are settled when they are
 * popped. Entries are pushed, never re-keyed: a data id may sit in the queue several times
 * and only its first pop settles it. Callables run lazily, when one of their outputs is
 * popped as the cheapest candidate. With requested outputs, only functions upstream of
 * them are ever queued.
 */

import { CallableFailure, InvalidGraph } from "./errors.js";
import type { WorkflowEvent } from "./events.js";
import { CapabilityGraph } from "./graph.js";
import { MinHeap } from "./heap.js";
import { measure } from "./helpers.js";
import { type DataNode, type DataValues, type FunctionNode, SINK, START, isDataNode, isSentinel } from "./nodes.js";
import { Workflow, WorkflowRecorder } from "./workflow.js";

/**
 * Options for one dispatch run
 */
export type DispatchOptions = {
    /**
     * Requested outputs. The run stops once all of them are settled; when empty or
     * omitted, everything reachable is computed.
     */
    outputs?: string[];
    /**
     * Name attached to the events of the run
     */
    runnableName?: string;
};

/**
 * What a dispatch run hands back to its caller
 */
export type DispatchResult = {
    /**
     * Every settled data id and its value. Unresolvable requested outputs are absent.
     */
    solution: DataValues;
    workflow: Workflow;
    /**
     * Settlements, invocations and absorbed errors, in the order they happened
     */
    events: WorkflowEvent[];
};

type EntrySource =
    | { kind: "input" }
    | { kind: "default" }
    | { kind: "function"; functionId: string };

type QueueEntry = {
    cost: number;
    /**
     * Tie-break between equal costs: supplied inputs, then defaults, then functions by registration order
     */
    rank: number;
    seq: number;
    dataId: string;
    source: EntrySource;
};

const INPUT_RANK = -2;
const DEFAULT_RANK = -1;

function compareEntries(a: QueueEntry, b: QueueEntry): number {
    return a.cost - b.cost || a.rank - b.rank || a.seq - b.seq;
}

type Settlement = {
    value: unknown;
    cost: number;
    via: string;
};

/**
 * Mutable state of one run. Never shared between runs.
 */
class Resolution {
    readonly #graph: CapabilityGraph;
    readonly #inputs: Readonly<DataValues>;
    readonly #requested: Set<string>;
    /**
     * Node ids upstream of the requested outputs; unset when everything is computed
     */
    readonly #relevant?: Set<string>;
    readonly #recorder: WorkflowRecorder;
    readonly #runnableName?: string;

    #queue = new MinHeap<QueueEntry>(compareEntries);
    #seq = 0;
    #settled: Map<string, Settlement> = new Map();
    #values: Map<string, unknown> = new Map();
    #pending: Map<string, number> = new Map();
    #readied: Set<string> = new Set();
    #discarded: Set<string> = new Set();
    #results: Map<string, Map<string, unknown>> = new Map();
    #deferred: DataNode[] = [];

    constructor(graph: CapabilityGraph, inputs: Readonly<DataValues>, options: DispatchOptions) {
        this.#graph = graph;
        this.#inputs = inputs;
        this.#requested = new Set(options.outputs ?? []);
        if (this.#requested.size > 0) {
            this.#relevant = upstreamOf(graph, this.#requested);
        }
        this.#runnableName = options.runnableName;
        this.#recorder = new WorkflowRecorder(options.runnableName);
    }

    run(): DispatchResult {
        this.#recorder.recordStart();
        this.#settled.set(START, { value: undefined, cost: 0, via: START });
        for (const fn of this.#graph.functionNodes()) {
            if (fn.inputs.length === 0) {
                this.#ready(fn);
            }
        }

        for (const dataId of Object.keys(this.#inputs)) {
            if (!isSentinel(dataId)) {
                this.#push(dataId, 0, INPUT_RANK, { kind: "input" });
            }
        }
        for (const node of this.#graph.dataNodes()) {
            if (!Object.prototype.hasOwnProperty.call(this.#inputs, node.id)) {
                this.#queueDefault(node);
            }
        }

        while (!this.#done()) {
            const entry = this.#queue.pop() ?? this.#nextDeferred();
            if (!entry) {
                break;
            }
            this.#process(entry);
        }

        const solution: DataValues = {};
        for (const [dataId, { value }] of this.#settled) {
            if (dataId !== START) {
                solution[dataId] = value;
            }
        }
        return {
            solution,
            workflow: this.#recorder.toWorkflow(),
            events: this.#recorder.events(),
        };
    }

    #done(): boolean {
        if (this.#requested.size === 0) {
            return false;
        }
        for (const dataId of this.#requested) {
            if (!this.#settled.has(dataId)) {
                return false;
            }
        }
        return true;
    }

    #push(dataId: string, cost: number, rank: number, source: EntrySource): void {
        this.#queue.push({ cost, rank, seq: this.#seq++, dataId, source });
    }

    #queueDefault(node: DataNode): void {
        if (!node.hasDefault) {
            return;
        }
        if (node.waitInput) {
            this.#deferred.push(node);
        } else {
            this.#push(node.id, 0, DEFAULT_RANK, { kind: "default" });
        }
    }

    /**
     * Waiting defaults are released one at a time, only once the queue has drained.
     */
    #nextDeferred(): QueueEntry | undefined {
        let node = this.#deferred.shift();
        while (node && this.#settled.has(node.id)) {
            node = this.#deferred.shift();
        }
        if (!node) {
            return undefined;
        }
        return { cost: 0, rank: DEFAULT_RANK, seq: this.#seq++, dataId: node.id, source: { kind: "default" } };
    }

    #process(entry: QueueEntry): void {
        const { dataId, cost, source } = entry;
        if (this.#settled.has(dataId)) {
            return;
        }

        switch (source.kind) {
            case "input": {
                const checked = this.#check(dataId, this.#inputs[dataId]);
                if (checked.ok) {
                    this.#settle(dataId, checked.value, START, cost);
                    return;
                }
                this.#recorder.recordRejection(dataId, checked.error);
                const node = this.#graph.getNode(dataId);
                if (isDataNode(node)) {
                    this.#queueDefault(node);
                }
                return;
            }
            case "default": {
                this.#settle(dataId, this.#graph.getDataNode(dataId).defaultValue, START, cost);
                return;
            }
            case "function": {
                if (this.#discarded.has(source.functionId)) {
                    return;
                }
                const outputs = this.#invoke(this.#graph.getFunctionNode(source.functionId));
                if (!outputs?.has(dataId)) {
                    return;
                }
                if (dataId === SINK) {
                    this.#recorder.recordSettlement(SINK, outputs.get(SINK), source.functionId, cost);
                    return;
                }
                this.#settle(dataId, outputs.get(dataId), source.functionId, cost);
                return;
            }
        }
    }

    #settle(dataId: string, value: unknown, via: string, cost: number): void {
        this.#settled.set(dataId, { value, cost, via });
        this.#values.set(dataId, value);
        this.#recorder.recordSettlement(dataId, value, via, cost);

        const node = this.#graph.getNode(dataId);
        if (!isDataNode(node)) {
            return;
        }
        for (const functionId of node.consumers) {
            const fn = this.#graph.getFunctionNode(functionId);
            const implementation = fn.implementation;
            if (implementation.kind === "subDispatcher") {
                if (implementation.adapter.canRun((id) => this.#settled.has(id))) {
                    this.#ready(fn);
                }
                continue;
            }
            const remaining = (this.#pending.get(functionId) ?? new Set(fn.inputs).size) - 1;
            this.#pending.set(functionId, remaining);
            if (remaining === 0) {
                this.#ready(fn);
            }
        }
    }

    /**
     * `fn` can run: gate it, cost it on the inputs settled so far and queue its outputs.
     * Happens at most once per function.
     */
    #ready(fn: FunctionNode): void {
        if (this.#readied.has(fn.id) || !this.#wanted(fn.id)) {
            return;
        }
        this.#readied.add(fn.id);
        if (this.#discarded.has(fn.id) || !this.#eligible(fn)) {
            this.#discarded.add(fn.id);
            return;
        }

        const inputCosts = Array.from(new Set(fn.inputs)).flatMap((id) => {
            const settlement = this.#settled.get(id);
            return settlement ? [settlement.cost] : [];
        });
        const cost = fn.weight + Math.max(0, ...inputCosts);
        for (const output of new Set(fn.outputs)) {
            if (!this.#settled.has(output) && this.#wanted(output)) {
                this.#push(output, cost, fn.order, { kind: "function", functionId: fn.id });
            }
        }
    }

    #wanted(id: string): boolean {
        return this.#relevant === undefined || this.#relevant.has(id);
    }

    #eligible(fn: FunctionNode): boolean {
        if (!fn.inputDomain) {
            return true;
        }
        try {
            return fn.inputDomain(this.#inputs);
        } catch (error) {
            this.#recorder.recordGateError(fn.id, CallableFailure.from(fn.id, error));
            return false;
        }
    }

    /**
     * Runs a function at most once per dispatch and caches its output values.
     * @returns The output values, or `undefined` when the invocation failed
     */
    #invoke(fn: FunctionNode): Map<string, unknown> | undefined {
        const cached = this.#results.get(fn.id);
        if (cached) {
            return cached;
        }

        const inputsUsed: Record<string, unknown> = {};
        for (const id of fn.inputs) {
            if (this.#values.has(id)) {
                inputsUsed[id] = this.#values.get(id);
            }
        }

        const implementation = fn.implementation;
        let outputs: Map<string, unknown>;
        let duration: number;
        let nested: DispatchResult | undefined;

        if (implementation.kind === "callable") {
            const args = fn.inputs.map((id) => this.#values.get(id));
            const measured = measure(() => implementation.callable(...args));
            duration = measured.duration;
            if (!measured.ok) {
                return this.#fail(fn, CallableFailure.from(fn.id, measured.error), inputsUsed);
            }
            const unpacked = this.#unpack(fn, measured.result);
            if (unpacked instanceof CallableFailure) {
                return this.#fail(fn, unpacked, inputsUsed);
            }
            outputs = unpacked;
        } else {
            const adapter = implementation.adapter;
            const measured = measure(() =>
                dispatch(adapter.graph, adapter.childInputs(this.#values), {
                    outputs: adapter.childOutputs(),
                    runnableName: adapter.graph.name ?? this.#runnableName,
                })
            );
            duration = measured.duration;
            if (!measured.ok) {
                return this.#fail(fn, CallableFailure.from(fn.id, measured.error), inputsUsed);
            }
            nested = measured.result;
            outputs = adapter.parentValues(nested.solution);
        }

        for (const [dataId, value] of outputs) {
            const checked = this.#check(dataId, value);
            if (!checked.ok) {
                return this.#fail(
                    fn,
                    new CallableFailure(fn.id, `output '${dataId}' rejected: ${checked.error.message}`, checked.error),
                    inputsUsed
                );
            }
            outputs.set(dataId, checked.value);
        }

        this.#results.set(fn.id, outputs);
        this.#recorder.recordInvocation(fn.id, inputsUsed, Object.fromEntries(outputs), duration);
        if (nested) {
            this.#recorder.recordSubWorkflow(fn.id, nested.workflow, nested.events);
        }
        return outputs;
    }

    /**
     * Matches a callable's return value positionally to the function's outputs.
     */
    #unpack(fn: FunctionNode, result: unknown): Map<string, unknown> | CallableFailure {
        if (fn.outputs.length === 1) {
            return new Map([[fn.outputs[0], result]]);
        }
        if (fn.outputs.length === 0) {
            return new Map();
        }
        if (!Array.isArray(result) || result.length !== fn.outputs.length) {
            const got = Array.isArray(result) ? `${result.length} values` : typeof result;
            return new CallableFailure(fn.id, `expected ${fn.outputs.length} return values, got ${got}`);
        }
        const values: unknown[] = result;
        return new Map(fn.outputs.map((id, index): [string, unknown] => [id, values[index]]));
    }

    #fail(fn: FunctionNode, error: CallableFailure, inputsUsed: Record<string, unknown>): undefined {
        this.#discarded.add(fn.id);
        this.#recorder.recordFailure(fn.id, error, inputsUsed);
        return undefined;
    }

    /**
     * Validates a value against its data node's schema, if any.
     */
    #check(dataId: string, value: unknown): { ok: true; value: unknown } | { ok: false; error: Error } {
        const node = this.#graph.getNode(dataId);
        if (!isDataNode(node) || !node.schema) {
            return { ok: true, value };
        }
        const parsed = node.schema.safeParse(value);
        return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: parsed.error };
    }
}

/**
 * Walks producers and inputs backwards from `targets`.
 */
function upstreamOf(graph: CapabilityGraph, targets: Iterable<string>): Set<string> {
    const seen = new Set<string>();
    const stack = Array.from(targets);
    for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
        if (seen.has(id)) {
            continue;
        }
        seen.add(id);
        if (id !== SINK && !graph.has(id)) {
            continue;
        }
        stack.push(...graph.predecessors(id));
    }
    return seen;
}

/**
 * Resolves the requested outputs of `graph` from `inputs`, invoking only the functions
 * on the cheapest path to them.
 *
 * Never throws for callable failures or unreachable outputs; those are recorded in the
 * workflow and show up as missing keys in the solution.
 *
 * @throws InvalidGraph when `graph` is not a capability graph or the arguments are malformed
 */
export function dispatch(
    graph: CapabilityGraph,
    inputs: Readonly<DataValues> = {},
    options: DispatchOptions = {}
): DispatchResult {
    if (!(graph instanceof CapabilityGraph)) {
        throw new InvalidGraph("dispatch() requires a CapabilityGraph");
    }
    if (typeof inputs !== "object" || inputs === null || Array.isArray(inputs)) {
        throw new InvalidGraph("dispatch() inputs must be a record of data ids to values");
    }
    if (options.outputs !== undefined && !Array.isArray(options.outputs)) {
        throw new InvalidGraph("dispatch() outputs must be an array of data ids");
    }
    return new Resolution(graph, inputs, options).run();
}
