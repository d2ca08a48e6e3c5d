/**
 * @file workflow.ts
 * @description Records the nodes and edges one dispatch run actually visited, with the
 * values that flowed along them, and exposes the result as a read-only graph.
 */

import { ErrorEvent, InvocationEvent, SettlementEvent, type WorkflowEvent } from "./events.js";
import { SINK, START } from "./nodes.js";

/**
 * Serializable description of an error attached to a workflow node.
 */
export type WorkflowError = {
    name: string;
    message: string;
};

export type WorkflowNode =
    | { type: "start"; id: string }
    | { type: "sink"; id: string }
    | {
          type: "data";
          id: string;
          /**
           * Whether the node received a value. Rejected inputs stay unsettled.
           */
          settled: boolean;
          value?: unknown;
          cost?: number;
          /**
           * Function id that produced the value, or START for supplied inputs and defaults
           */
          via?: string;
          rejected?: WorkflowError;
      }
    | {
          type: "function";
          id: string;
          status: "invoked" | "failed";
          failure?: WorkflowError;
          /**
           * The nested run, for sub-dispatcher nodes
           */
          workflow?: Workflow;
      };

export type WorkflowNodeType = WorkflowNode["type"];

/**
 * An edge along which a value flowed.
 */
export type WorkflowEdge = {
    from: string;
    to: string;
    value: unknown;
};

/**
 * The trace of one dispatch run. Built by a {@link WorkflowRecorder}; never changes afterwards.
 */
export class Workflow {
    readonly #nodes: ReadonlyMap<string, Readonly<WorkflowNode>>;
    readonly #edges: readonly Readonly<WorkflowEdge>[];

    /**
     * Function ids in the order they were invoked (failed invocations included)
     */
    readonly invocationOrder: readonly string[];

    /**
     * Data ids in the order they were settled
     */
    readonly settlementOrder: readonly string[];

    constructor(
        nodes: Iterable<WorkflowNode>,
        edges: Iterable<WorkflowEdge>,
        invocationOrder: Iterable<string>,
        settlementOrder: Iterable<string>
    ) {
        this.#nodes = new Map(
            Array.from(nodes, (node): [string, Readonly<WorkflowNode>] => [node.id, Object.freeze({ ...node })])
        );
        this.#edges = Object.freeze(Array.from(edges, (edge) => Object.freeze({ ...edge })));
        this.invocationOrder = Object.freeze(Array.from(invocationOrder));
        this.settlementOrder = Object.freeze(Array.from(settlementOrder));
    }

    /**
     * Visited nodes in the order they were first visited.
     */
    nodes(): Readonly<WorkflowNode>[] {
        return Array.from(this.#nodes.values());
    }

    edges(): Readonly<WorkflowEdge>[] {
        return [...this.#edges];
    }

    getNode(id: string): Readonly<WorkflowNode> | undefined {
        return this.#nodes.get(id);
    }

    has(id: string): boolean {
        return this.#nodes.has(id);
    }

    predecessors(id: string): string[] {
        return this.#edges.filter((edge) => edge.to === id).map((edge) => edge.from);
    }

    successors(id: string): string[] {
        return this.#edges.filter((edge) => edge.from === id).map((edge) => edge.to);
    }

    /**
     * The value that flowed along an edge, if that edge was traversed.
     */
    edgeValue(from: string, to: string): unknown {
        return this.#edges.find((edge) => edge.from === from && edge.to === to)?.value;
    }
}

/**
 * Passive observer attached to one resolver run.
 */
export class WorkflowRecorder {
    #nodes: Map<string, WorkflowNode> = new Map();
    #edges: WorkflowEdge[] = [];
    #invocations: string[] = [];
    #settlements: string[] = [];
    #events: WorkflowEvent[] = [];

    /**
     * Name attached to recorded events
     */
    readonly runnableName?: string;

    constructor(runnableName?: string) {
        this.runnableName = runnableName;
    }

    /**
     * The run started: START is visited first.
     */
    recordStart(): void {
        this.#ensureSentinel(START);
    }

    /**
     * A data node received its value. `via` is the producing function id, or START.
     */
    recordSettlement(dataId: string, value: unknown, via: string, cost: number): void {
        this.#ensureSentinel(via);
        if (dataId === SINK) {
            this.#ensureSentinel(SINK);
        } else {
            this.#nodes.set(dataId, { type: "data", id: dataId, settled: true, value, cost, via });
            this.#settlements.push(dataId);
        }
        this.#edges.push({ from: via, to: dataId, value });
        this.#events.push(new SettlementEvent(dataId, value, via, cost, this.#metadata()));
    }

    /**
     * A function node ran. Input edges are recorded here; output edges are recorded
     * as its outputs settle.
     */
    recordInvocation(
        functionId: string,
        inputsUsed: Record<string, unknown>,
        outputsProduced: Record<string, unknown>,
        duration: number
    ): void {
        this.#nodes.set(functionId, { type: "function", id: functionId, status: "invoked" });
        this.#recordInputs(functionId, inputsUsed);
        this.#invocations.push(functionId);
        this.#events.push(
            new InvocationEvent(functionId, inputsUsed, outputsProduced, duration, this.#metadata())
        );
    }

    /**
     * A function node's invocation failed. Its outputs are left to other producers.
     */
    recordFailure(functionId: string, error: Error, inputsUsed: Record<string, unknown> = {}): void {
        this.#nodes.set(functionId, {
            type: "function",
            id: functionId,
            status: "failed",
            failure: { name: error.name, message: error.message },
        });
        this.#recordInputs(functionId, inputsUsed);
        this.#invocations.push(functionId);
        this.#events.push(new ErrorEvent(error, { ...this.#metadata(), nodeId: functionId }));
    }

    /**
     * A supplied value was refused by its data node's schema.
     */
    recordRejection(dataId: string, error: Error): void {
        this.#nodes.set(dataId, {
            type: "data",
            id: dataId,
            settled: false,
            rejected: { name: error.name, message: error.message },
        });
        this.#events.push(new ErrorEvent(error, { ...this.#metadata(), nodeId: dataId }));
    }

    /**
     * An eligibility predicate threw. The function is treated as ineligible and stays
     * out of the workflow graph; only the event is kept.
     */
    recordGateError(functionId: string, error: Error): void {
        this.#events.push(new ErrorEvent(error, { ...this.#metadata(), nodeId: functionId }));
    }

    /**
     * Attaches the nested run of a sub-dispatcher node and adopts its events,
     * prefixing their path with the sub-dispatcher id.
     */
    recordSubWorkflow(functionId: string, workflow: Workflow, events: readonly WorkflowEvent[]): void {
        const node = this.#nodes.get(functionId);
        if (node?.type === "function") {
            node.workflow = workflow;
        }
        for (const event of events) {
            event.path = [functionId, ...(event.path ?? [])];
            this.#events.push(event);
        }
    }

    /**
     * Events recorded so far, in order.
     */
    events(): WorkflowEvent[] {
        return [...this.#events];
    }

    toWorkflow(): Workflow {
        return new Workflow(this.#nodes.values(), this.#edges, this.#invocations, this.#settlements);
    }

    #recordInputs(functionId: string, inputsUsed: Record<string, unknown>): void {
        for (const [dataId, value] of Object.entries(inputsUsed)) {
            this.#edges.push({ from: dataId, to: functionId, value });
        }
    }

    #ensureSentinel(id: string): void {
        if (this.#nodes.has(id)) {
            return;
        }
        if (id === START) {
            this.#nodes.set(id, { type: "start", id });
        } else if (id === SINK) {
            this.#nodes.set(id, { type: "sink", id });
        }
    }

    #metadata(): { runnableName?: string } {
        return this.runnableName === undefined ? {} : { runnableName: this.runnableName };
    }
}
