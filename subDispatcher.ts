/**
 * @file subDispatcher.ts
 * @description Adapter that embeds a whole capability graph as one function node of a parent graph.
 */

import type { CapabilityGraph } from "./graph.js";
import { UnknownNode } from "./errors.js";
import { type DataNode, type DataValues, SINK, isDataNode } from "./nodes.js";

/**
 * Rename tables between a parent graph and an embedded child graph.
 *
 * Inputs map `parent id → child id` (or {@link SINK}: the parent value is required
 * and visible to the gate, but not passed into the child). Wired inputs are optional;
 * the child's own defaults and producers fill whatever the parent has not settled.
 * Outputs map `child id → parent id`; an id may be both an input and an output.
 */
export class SubDispatcher {
    /**
     * The embedded graph. Built once by the caller and treated as read-only afterwards.
     */
    readonly graph: CapabilityGraph;

    /**
     * Parent data id to child data id
     */
    readonly inputs: ReadonlyMap<string, string>;

    /**
     * Child data id to parent data id
     */
    readonly outputs: ReadonlyMap<string, string>;

    constructor(
        graph: CapabilityGraph,
        inputs: Record<string, string>,
        outputs: Record<string, string>
    ) {
        for (const child of Object.values(inputs)) {
            if (child !== SINK && !isDataNode(graph.getNode(child))) {
                throw new UnknownNode(child, "is not a data node of the sub-dispatcher graph");
            }
        }
        for (const child of Object.keys(outputs)) {
            if (!isDataNode(graph.getNode(child))) {
                throw new UnknownNode(child, "is not a data node of the sub-dispatcher graph");
            }
        }

        this.graph = graph;
        this.inputs = new Map(Object.entries(inputs));
        this.outputs = new Map(Object.entries(outputs));
    }

    /**
     * Parent ids this adapter reads, in declaration order.
     */
    parentInputs(): string[] {
        return Array.from(this.inputs.keys());
    }

    /**
     * Parent ids this adapter produces, in declaration order. When two child outputs
     * rename to the same parent id, the first one declared owns it.
     */
    parentOutputs(): string[] {
        return Array.from(new Set(this.outputs.values()));
    }

    /**
     * Child ids requested from every nested run.
     */
    childOutputs(): string[] {
        return Array.from(this.outputs.keys());
    }

    /**
     * Whether a nested run may start: every input bound to SINK is settled and, when
     * any input is wired into the child, at least one of those is.
     */
    canRun(isSettled: (parentId: string) => boolean): boolean {
        let wired = 0;
        let settled = 0;
        for (const [parent, child] of this.inputs) {
            if (child === SINK) {
                if (!isSettled(parent)) {
                    return false;
                }
                continue;
            }
            wired++;
            if (isSettled(parent)) {
                settled++;
            }
        }
        return wired === 0 || settled > 0;
    }

    /**
     * Renames settled parent values into the child's namespace, skipping inputs bound to SINK.
     */
    childInputs(parentValues: ReadonlyMap<string, unknown>): DataValues {
        const values: DataValues = {};
        for (const [parent, child] of this.inputs) {
            if (child === SINK || !parentValues.has(parent)) {
                continue;
            }
            values[child] = parentValues.get(parent);
        }
        return values;
    }

    /**
     * Renames a nested solution back into the parent's namespace. Child outputs the
     * nested run did not resolve are left out.
     */
    parentValues(childSolution: Readonly<DataValues>): Map<string, unknown> {
        const values = new Map<string, unknown>();
        for (const [child, parent] of this.outputs) {
            if (values.has(parent) || !Object.prototype.hasOwnProperty.call(childSolution, child)) {
                continue;
            }
            values.set(parent, childSolution[child]);
        }
        return values;
    }

    /**
     * Child data nodes with a default value, keyed by the parent id bound to them.
     */
    childDefaults(): Array<[string, DataNode]> {
        const defaults: Array<[string, DataNode]> = [];
        for (const [parent, child] of this.inputs) {
            const node = this.graph.getNode(child);
            if (isDataNode(node) && node.hasDefault) {
                defaults.push([parent, node]);
            }
        }
        return defaults;
    }
}
