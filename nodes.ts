/**
 * @file nodes.ts
 * @description Declarative node records held by a capability graph. Nothing in here executes.
 */

import type { z } from "zod";
import type { SubDispatcher } from "./subDispatcher.js";

/**
 * Sentinel data node that is always settled first, at cost 0.
 */
export const START = "__start__";

/**
 * Sentinel data node that accepts a value and discards it.
 */
export const SINK = "__sink__";

/**
 * Values supplied to, or produced by, a dispatch run.
 */
export type DataValues = Record<string, unknown>;

/**
 * Eligibility predicate evaluated against the raw inputs of a run.
 */
export type InputDomain = (inputs: Readonly<DataValues>) => boolean;

/**
 * A plain callable registered as a function node.
 */
export type NodeCallable = (...args: any[]) => unknown;

/**
 * A named value slot.
 */
export type DataNode = {
    type: "data";
    /**
     * Unique identifier inside the graph
     */
    id: string;
    /**
     * Registration order index
     */
    order: number;
    /**
     * Whether a default value is set (the default itself may be `undefined`)
     */
    hasDefault: boolean;
    defaultValue?: unknown;
    /**
     * When set, the default is only used once nothing else can produce the value
     */
    waitInput: boolean;
    description?: string;
    /**
     * Optional schema every settled value must satisfy
     */
    schema?: z.ZodTypeAny;
    /**
     * Whether the node was created implicitly while wiring a function
     */
    implicit: boolean;
    /**
     * Function ids producing this value (its OR alternatives)
     */
    producers: Set<string>;
    /**
     * Function ids consuming this value
     */
    consumers: Set<string>;
};

/**
 * How a function node is carried out: a callable, or a nested graph.
 */
export type FunctionImplementation =
    | { kind: "callable"; callable: NodeCallable }
    | { kind: "subDispatcher"; adapter: SubDispatcher };

/**
 * A registered computation with fixed inputs and outputs.
 */
export type FunctionNode = {
    type: "function";
    id: string;
    order: number;
    /**
     * Required inputs, all of which must be settled (AND semantics)
     */
    inputs: readonly string[];
    /**
     * Outputs resolved together from one invocation
     */
    outputs: readonly string[];
    /**
     * Non-negative resolution cost; lower is preferred
     */
    weight: number;
    inputDomain?: InputDomain;
    description?: string;
    implementation: FunctionImplementation;
};

export type GraphNode = DataNode | FunctionNode;

/**
 * Edge of the bipartite capability graph.
 */
export type CapabilityEdge = {
    from: string;
    to: string;
};

/**
 * Options accepted when registering a data node.
 */
export type DataNodeOptions = {
    defaultValue?: unknown;
    waitInput?: boolean;
    description?: string;
    schema?: z.ZodTypeAny;
};

/**
 * Options accepted when registering a function node.
 */
export type FunctionNodeOptions = {
    /**
     * Explicit id; derived from the callable's name when omitted
     */
    id?: string;
    callable: NodeCallable;
    inputs?: string[];
    outputs?: string[];
    weight?: number;
    inputDomain?: InputDomain;
    description?: string;
};

/**
 * Builds a fresh implicit data node record.
 */
export function createDataNode(id: string, order: number, implicit: boolean): DataNode {
    return {
        type: "data",
        id,
        order,
        hasDefault: false,
        waitInput: false,
        implicit,
        producers: new Set(),
        consumers: new Set(),
    };
}

export function isDataNode(node: GraphNode | undefined): node is DataNode {
    return node !== undefined && node.type === "data";
}

export function isFunctionNode(node: GraphNode | undefined): node is FunctionNode {
    return node !== undefined && node.type === "function";
}

/**
 * Whether the id names one of the two sentinels.
 */
export function isSentinel(id: string): boolean {
    return id === START || id === SINK;
}
