/**
 * @file graph.ts
 * @description The capability graph: a bipartite registry of data nodes and function nodes,
 * wired data → function → data, with the structural queries the resolver and the drawing code need.
 */

import { DuplicateNodeId, UnknownNode } from "./errors.js";
import {
    type CapabilityEdge,
    type DataNode,
    type DataNodeOptions,
    type FunctionImplementation,
    type FunctionNode,
    type FunctionNodeOptions,
    type GraphNode,
    type InputDomain,
    SINK,
    START,
    createDataNode,
    isDataNode,
    isFunctionNode,
    isSentinel,
} from "./nodes.js";
import { validateZodTypeCompatibility } from "./schema-validator.js";
import { SubDispatcher } from "./subDispatcher.js";

/**
 * Configuration options for a CapabilityGraph
 */
export type CapabilityGraphOptions = {
    /**
     * Name of the model this graph describes
     */
    name?: string;
    /**
     * Description of the model this graph describes
     */
    description?: string;
    /**
     * Whether wiring a function to an unregistered data id creates that data node.
     * When false, every data node must be added with `addData` first.
     */
    autoCreateData?: boolean;
};

/**
 * Options accepted when embedding a child graph as one function node.
 */
export type SubDispatcherOptions = {
    /**
     * Explicit id; derived from the child graph's name when omitted
     */
    id?: string;
    /**
     * The child graph
     */
    graph: CapabilityGraph;
    /**
     * Parent data id → child data id (or SINK)
     */
    inputs: Record<string, string>;
    /**
     * Child data id → parent data id
     */
    outputs: Record<string, string>;
    /**
     * Gate evaluated against the parent's raw inputs before the child is considered
     */
    inputDomain?: InputDomain;
    weight?: number;
    /**
     * Copy the child's defaults of mapped inputs to parent data nodes that have none
     */
    includeDefaults?: boolean;
    description?: string;
};

/**
 * Entries accepted by {@link CapabilityGraph.addFromLists}.
 */
export type NodeLists = {
    data?: Array<DataNodeOptions & { id: string }>;
    functions?: FunctionNodeOptions[];
};

/**
 * A bipartite graph of data nodes and function nodes.
 *
 * Cyclic wiring is legal: the resolver settles each data node once, so a cycle is
 * simply never closed at run time.
 */
export class CapabilityGraph {
    /**
     * Name of the model
     */
    name?: string;

    /**
     * Description of the model
     */
    description?: string;

    /**
     * Nodes keyed by id, in registration order
     */
    #nodes: Map<string, GraphNode> = new Map();

    /**
     * Function ids that write to SINK
     */
    #sinkProducers: Set<string> = new Set();

    /**
     * Next registration order index
     */
    #order = 0;

    #options: Required<Pick<CapabilityGraphOptions, "autoCreateData">> & CapabilityGraphOptions;

    constructor(options: CapabilityGraphOptions = {}) {
        this.name = options.name;
        this.description = options.description;
        this.#options = {
            ...options,
            autoCreateData: options.autoCreateData ?? true,
        };
    }

    /**
     * Number of registered nodes (sentinels excluded).
     */
    get size(): number {
        return this.#nodes.size;
    }

    /**
     * Registers a data node. A node created implicitly by earlier wiring may be
     * claimed once; any other reuse of an id fails.
     * @returns The data node id
     */
    addData(id: string, options: DataNodeOptions = {}): string {
        const existing = this.#nodes.get(id);
        if (isSentinel(id) || (existing && !(isDataNode(existing) && existing.implicit))) {
            throw new DuplicateNodeId(id);
        }

        const hasDefault = "defaultValue" in options;
        const defaultValue = hasDefault && options.schema
            ? options.schema.parse(options.defaultValue)
            : options.defaultValue;

        const node = existing ?? createDataNode(id, this.#order++, false);
        node.implicit = false;
        node.description = options.description;
        node.schema = options.schema;
        node.waitInput = options.waitInput ?? false;
        if (hasDefault) {
            node.hasDefault = true;
            node.defaultValue = defaultValue;
        }

        this.#nodes.set(id, node);
        return id;
    }

    /**
     * Sets (or replaces) the default value of an existing data node.
     */
    setDefaultValue(id: string, value: unknown, waitInput?: boolean): void {
        const node = this.getDataNode(id);
        this.#applyDefault(node, value, waitInput ?? node.waitInput);
    }

    /**
     * Registers a function node.
     * @returns The function node id
     */
    addFunction(options: FunctionNodeOptions): string {
        const id = this.#functionId(options.id, options.callable.name);
        return this.#registerFunction(id, {
            inputs: options.inputs ?? [],
            outputs: options.outputs ?? [],
            weight: options.weight ?? 0,
            inputDomain: options.inputDomain,
            description: options.description,
            implementation: { kind: "callable", callable: options.callable },
        });
    }

    /**
     * Embeds a child graph as one function node.
     * @returns The function node id
     */
    addSubDispatcher(options: SubDispatcherOptions): string {
        const adapter = new SubDispatcher(options.graph, options.inputs, options.outputs);
        const id = this.#functionId(options.id, options.graph.name ?? "sub_dispatcher");
        const registered = this.#registerFunction(id, {
            inputs: adapter.parentInputs(),
            outputs: adapter.parentOutputs(),
            weight: options.weight ?? 0,
            inputDomain: options.inputDomain,
            description: options.description ?? options.graph.description,
            implementation: { kind: "subDispatcher", adapter },
        });

        if (options.includeDefaults) {
            for (const [parent, child] of adapter.childDefaults()) {
                const node = this.getDataNode(parent);
                if (!node.hasDefault) {
                    this.#applyDefault(node, child.defaultValue, child.waitInput);
                }
            }
        }

        return registered;
    }

    /**
     * Registers data nodes, then function nodes, in list order.
     * @returns The ids that were registered
     */
    addFromLists(lists: NodeLists): { data: string[]; functions: string[] } {
        const data = (lists.data ?? []).map(({ id, ...options }) => this.addData(id, options));
        const functions = (lists.functions ?? []).map((options) => this.addFunction(options));
        return { data, functions };
    }

    /**
     * Looks a node up without failing.
     */
    getNode(id: string): GraphNode | undefined {
        return this.#nodes.get(id);
    }

    has(id: string): boolean {
        return this.#nodes.has(id);
    }

    getDataNode(id: string): DataNode {
        const node = this.#nodes.get(id);
        if (!isDataNode(node)) {
            throw new UnknownNode(id, node ? "is not a data node" : "does not exist");
        }
        return node;
    }

    getFunctionNode(id: string): FunctionNode {
        const node = this.#nodes.get(id);
        if (!isFunctionNode(node)) {
            throw new UnknownNode(id, node ? "is not a function node" : "does not exist");
        }
        return node;
    }

    /**
     * All nodes in registration order.
     */
    nodes(): GraphNode[] {
        return Array.from(this.#nodes.values()).sort((a, b) => a.order - b.order);
    }

    dataNodes(): DataNode[] {
        return this.nodes().filter(isDataNode);
    }

    functionNodes(): FunctionNode[] {
        return this.nodes().filter(isFunctionNode);
    }

    /**
     * Default values keyed by data id.
     */
    defaultValues(): Map<string, unknown> {
        const defaults = new Map<string, unknown>();
        for (const node of this.dataNodes()) {
            if (node.hasDefault) {
                defaults.set(node.id, node.defaultValue);
            }
        }
        return defaults;
    }

    /**
     * Ids with an edge into the given node.
     */
    predecessors(id: string): string[] {
        if (id === START) {
            return [];
        }
        if (id === SINK) {
            return Array.from(this.#sinkProducers);
        }

        const node = this.#require(id);
        if (isDataNode(node)) {
            return [...(node.hasDefault ? [START] : []), ...node.producers];
        }
        return node.inputs.length === 0 ? [START] : Array.from(new Set(node.inputs));
    }

    /**
     * Ids the given node has an edge into.
     */
    successors(id: string): string[] {
        if (id === SINK) {
            return [];
        }
        if (id === START) {
            return this.nodes()
                .filter((node) => isDataNode(node) ? node.hasDefault : node.inputs.length === 0)
                .map((node) => node.id);
        }

        const node = this.#require(id);
        if (isDataNode(node)) {
            return Array.from(node.consumers);
        }
        return Array.from(new Set(node.outputs));
    }

    /**
     * Every edge of the graph, grouped by target node in registration order.
     */
    edges(): CapabilityEdge[] {
        const edges: CapabilityEdge[] = [];
        for (const node of this.nodes()) {
            if (isDataNode(node)) {
                if (node.hasDefault) {
                    edges.push({ from: START, to: node.id });
                }
                continue;
            }
            for (const from of this.predecessors(node.id)) {
                edges.push({ from, to: node.id });
            }
            for (const to of this.successors(node.id)) {
                edges.push({ from: node.id, to });
            }
        }
        return edges;
    }

    /**
     * Reports malformed or suspicious registrations. Nothing here prevents a dispatch.
     */
    diagnose(): string[] {
        const warnings: string[] = [];

        for (const node of this.functionNodes()) {
            const implementation = node.implementation;
            if (implementation.kind === "subDispatcher") {
                // wired inputs are optional and may double as outputs
                warnings.push(...this.#diagnoseRenames(node.id, implementation.adapter));
                continue;
            }
            for (const output of node.outputs) {
                if (node.inputs.includes(output)) {
                    warnings.push(`Function '${node.id}' writes its own input '${output}'`);
                }
            }
            for (const input of new Set(node.inputs)) {
                const data = this.getDataNode(input);
                if (data.producers.size === 0 && !data.hasDefault) {
                    warnings.push(
                        `Function '${node.id}' input '${input}' has no producer and no default; it must be supplied`
                    );
                }
            }
        }

        for (const node of this.dataNodes()) {
            if (node.producers.size === 0 && node.consumers.size === 0) {
                warnings.push(`Data node '${node.id}' is neither produced nor consumed`);
            }
        }

        return warnings;
    }

    /**
     * Checks schema compatibility on both sides of a sub-dispatcher's rename tables.
     */
    #diagnoseRenames(id: string, adapter: SubDispatcher): string[] {
        const warnings: string[] = [];
        const check = (label: string, from?: DataNode, to?: DataNode) => {
            if (!from?.schema || !to?.schema) {
                return;
            }
            const { compatible, errors } = validateZodTypeCompatibility(from.schema, to.schema);
            if (!compatible) {
                warnings.push(`Sub-dispatcher '${id}' ${label}: ${errors.join(", ")}`);
            }
        };

        for (const [parent, child] of adapter.inputs) {
            if (child === SINK) {
                continue;
            }
            check(
                `input '${parent}' -> '${child}'`,
                this.getDataNode(parent),
                adapter.graph.getDataNode(child)
            );
        }
        for (const [child, parent] of adapter.outputs) {
            if (parent === SINK) {
                continue;
            }
            check(
                `output '${child}' -> '${parent}'`,
                adapter.graph.getDataNode(child),
                this.getDataNode(parent)
            );
        }
        return warnings;
    }

    #require(id: string): GraphNode {
        const node = this.#nodes.get(id);
        if (!node) {
            throw new UnknownNode(id);
        }
        return node;
    }

    #applyDefault(node: DataNode, value: unknown, waitInput: boolean): void {
        node.defaultValue = node.schema ? node.schema.parse(value) : value;
        node.hasDefault = true;
        node.waitInput = waitInput;
    }

    /**
     * Resolves the id of a new function node: an explicit id must be free, a derived
     * one is disambiguated as `name<0>`, `name<1>`, …
     */
    #functionId(explicit: string | undefined, base: string): string {
        if (explicit !== undefined) {
            if (isSentinel(explicit) || this.#nodes.has(explicit)) {
                throw new DuplicateNodeId(explicit);
            }
            return explicit;
        }

        const guess = base || "unknown";
        if (!isSentinel(guess) && !this.#nodes.has(guess)) {
            return guess;
        }
        let index = 0;
        while (this.#nodes.has(`${guess}<${index}>`)) {
            index++;
        }
        return `${guess}<${index}>`;
    }

    /**
     * Validates every data reference first, so that a failed registration leaves the graph untouched.
     */
    #registerFunction(
        id: string,
        spec: {
            inputs: string[];
            outputs: string[];
            weight: number;
            inputDomain?: InputDomain;
            description?: string;
            implementation: FunctionImplementation;
        }
    ): string {
        if (!Number.isFinite(spec.weight) || spec.weight < 0) {
            throw new RangeError(`Function '${id}' weight must be a non-negative number, got ${spec.weight}`);
        }
        if (spec.inputs.includes(id) || spec.outputs.includes(id)) {
            throw new UnknownNode(id, "is a function node, not a data node");
        }
        for (const input of spec.inputs) {
            if (isSentinel(input)) {
                throw new UnknownNode(input, "is a sentinel and cannot be consumed");
            }
            this.#checkDataReference(input);
        }
        for (const output of spec.outputs) {
            if (output === START) {
                throw new UnknownNode(output, "is a sentinel and cannot be produced");
            }
            if (output !== SINK) {
                this.#checkDataReference(output);
            }
        }

        const node: FunctionNode = {
            type: "function",
            id,
            order: this.#order++,
            inputs: [...spec.inputs],
            outputs: [...spec.outputs],
            weight: spec.weight,
            inputDomain: spec.inputDomain,
            description: spec.description,
            implementation: spec.implementation,
        };
        this.#nodes.set(id, node);

        for (const input of spec.inputs) {
            this.#dataNodeFor(input).consumers.add(id);
        }
        for (const output of spec.outputs) {
            if (output === SINK) {
                this.#sinkProducers.add(id);
            } else {
                this.#dataNodeFor(output).producers.add(id);
            }
        }

        return id;
    }

    #checkDataReference(id: string): void {
        const node = this.#nodes.get(id);
        if (isFunctionNode(node)) {
            throw new UnknownNode(id, "is a function node, not a data node");
        }
        if (!node && !this.#options.autoCreateData) {
            throw new UnknownNode(id);
        }
    }

    #dataNodeFor(id: string): DataNode {
        const node = this.#nodes.get(id);
        if (isDataNode(node)) {
            return node;
        }
        const created = createDataNode(id, this.#order++, true);
        this.#nodes.set(id, created);
        return created;
    }
}
