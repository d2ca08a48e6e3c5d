/**
 * @file draw.ts
 * @description Renders capability graphs and dispatch workflows as Graphviz DOT text.
 */

import { Dispatcher } from "./dispatcher.js";
import { CapabilityGraph } from "./graph.js";
import { type CapabilityEdge, type GraphNode, SINK, START, isDataNode, isFunctionNode } from "./nodes.js";
import type { Workflow, WorkflowNode } from "./workflow.js";

/**
 * Options for {@link toDot}
 */
export type DrawOptions = {
    /**
     * Draw this run instead of the static graph
     */
    workflow?: Workflow;
    /**
     * Graph title; the model name when omitted
     */
    title?: string;
    /**
     * Show `engine_speed` as `engine speed` in labels
     */
    replaceUnderscores?: boolean;
    /**
     * Longest edge or default label before it is cut (default: 40)
     */
    maxValueLength?: number;
};

const INDENT = "  ";

/**
 * Turns single underscores between two non-blank characters into spaces.
 * Leading, trailing and repeated underscores are kept.
 *
 * @example
 * replaceUnderscore("engine_speed_at__idle"); // "engine speed at__idle"
 */
export function replaceUnderscore(label: string): string {
    return label.replace(/(?<=[^\s_])_(?=[^\s_])/g, " ");
}

/**
 * Renders a graph (or a dispatcher's graph) as DOT. With `workflow`, only the visited
 * nodes are drawn and edges carry the values that flowed along them.
 */
export function toDot(source: CapabilityGraph | Dispatcher, options: DrawOptions = {}): string {
    const graph = source instanceof Dispatcher ? source.graph : source;
    const painter = new Painter(options);
    const title = options.title ?? graph.name ?? "dispatcher";
    const body = options.workflow
        ? painter.workflow(graph, options.workflow, "", 1)
        : painter.graph(graph, "", 1);
    return [`digraph ${quote(title)} {`, `${INDENT}rankdir=LR;`, ...body, "}"].join("\n");
}

function quote(text: string): string {
    return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`;
}

/**
 * Quotes already-escaped label lines, joined by DOT line breaks.
 */
function label(lines: string[]): string {
    return `"${lines.map((line) => quote(line).slice(1, -1)).join("\\n")}"`;
}

/**
 * JSON where possible; `String()` for what JSON cannot express (bigint, cycles, undefined).
 */
function formatValue(value: unknown): string {
    if (typeof value === "string") {
        return value;
    }
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

class Painter {
    readonly #options: DrawOptions;
    readonly #maxValueLength: number;

    constructor(options: DrawOptions) {
        this.#options = options;
        this.#maxValueLength = options.maxValueLength ?? 40;
    }

    /**
     * Statements drawing every node and edge of `graph`.
     */
    graph(graph: CapabilityGraph, prefix: string, depth: number): string[] {
        const pad = INDENT.repeat(depth);
        const edges = graph.edges();
        const lines: string[] = [];

        for (const sentinel of [START, SINK]) {
            if (edges.some((edge) => edge.from === sentinel || edge.to === sentinel)) {
                lines.push(`${pad}${this.#sentinel(sentinel, prefix)}`);
            }
        }
        for (const node of graph.nodes()) {
            lines.push(...this.#staticNode(node, prefix, depth));
        }
        for (const edge of edges) {
            lines.push(`${pad}${this.#edge(edge, prefix)};`);
        }
        return lines;
    }

    /**
     * Statements drawing the nodes and edges a run visited.
     */
    workflow(graph: CapabilityGraph, workflow: Workflow, prefix: string, depth: number): string[] {
        const pad = INDENT.repeat(depth);
        const lines: string[] = [];

        for (const node of workflow.nodes()) {
            lines.push(...this.#visitedNode(graph, node, prefix, depth));
        }
        for (const edge of workflow.edges()) {
            lines.push(`${pad}${this.#edge(edge, prefix)} [label=${label([this.#value(edge.value)])}];`);
        }
        return lines;
    }

    #staticNode(node: GraphNode, prefix: string, depth: number): string[] {
        const pad = INDENT.repeat(depth);
        const id = quote(prefix + node.id);
        if (isDataNode(node)) {
            const lines = [this.#text(node.id)];
            if (node.hasDefault) {
                lines.push(`default = ${this.#value(node.defaultValue)}`);
            }
            return [`${pad}${id} [shape=oval, label=${label(lines)}];`];
        }
        const implementation = node.implementation;
        if (implementation.kind === "callable") {
            return [`${pad}${id} [shape=box, label=${label([this.#text(node.id)])}];`];
        }
        return this.#cluster(node.id, prefix, depth, (childPrefix) =>
            this.graph(implementation.adapter.graph, childPrefix, depth + 1)
        );
    }

    #visitedNode(graph: CapabilityGraph, node: Readonly<WorkflowNode>, prefix: string, depth: number): string[] {
        const pad = INDENT.repeat(depth);
        const id = quote(prefix + node.id);
        switch (node.type) {
            case "start":
            case "sink":
                return [`${pad}${this.#sentinel(node.id, prefix)}`];
            case "data": {
                const style = node.settled ? "" : ", style=dashed";
                return [`${pad}${id} [shape=oval, label=${label([this.#text(node.id)])}${style}];`];
            }
            case "function": {
                const registered = graph.getNode(node.id);
                const failed = node.status === "failed" ? ", color=red" : "";
                const child = node.workflow;
                if (!child || !isFunctionNode(registered) || registered.implementation.kind !== "subDispatcher") {
                    return [`${pad}${id} [shape=box, label=${label([this.#text(node.id)])}${failed}];`];
                }
                const childGraph = registered.implementation.adapter.graph;
                return this.#cluster(node.id, prefix, depth, (childPrefix) =>
                    this.workflow(childGraph, child, childPrefix, depth + 1)
                );
            }
        }
    }

    /**
     * A grey cluster holding the sub-dispatcher's box and its nested drawing. Nested ids are
     * prefixed with the sub-dispatcher id so that they cannot collide with the parent's.
     */
    #cluster(functionId: string, prefix: string, depth: number, body: (childPrefix: string) => string[]): string[] {
        const pad = INDENT.repeat(depth);
        const inner = INDENT.repeat(depth + 1);
        const childPrefix = `${prefix}${functionId}/`;
        return [
            `${pad}subgraph ${quote(`cluster_${prefix}${functionId}`)} {`,
            `${inner}label=${label([this.#text(functionId)])};`,
            `${inner}style=filled;`,
            `${inner}fillcolor=lightgrey;`,
            `${inner}${quote(prefix + functionId)} [shape=box, label=${label([this.#text(functionId)])}];`,
            ...body(childPrefix),
            `${pad}}`,
        ];
    }

    #sentinel(id: string, prefix: string): string {
        const shape = id === START ? "triangle" : "house";
        const text = id === START ? "start" : "sink";
        return `${quote(prefix + id)} [shape=${shape}, label=${quote(text)}];`;
    }

    #edge(edge: CapabilityEdge, prefix: string): string {
        return `${quote(prefix + edge.from)} -> ${quote(prefix + edge.to)}`;
    }

    #text(id: string): string {
        return this.#options.replaceUnderscores ? replaceUnderscore(id) : id;
    }

    #value(value: unknown): string {
        const text = formatValue(value);
        return text.length > this.#maxValueLength ? `${text.slice(0, this.#maxValueLength - 3)}...` : text;
    }
}
