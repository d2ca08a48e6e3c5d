/**
 * @file dispatcher.ts
 * @description A runnable model: one capability graph plus the operations to register
 * nodes on it and to dispatch it.
 */

import { DispatcherBuilder } from "./dispatcherBuilder.js";
import { ErrorEvent, InvocationEvent, LogEvent, type WorkflowEvent } from "./events.js";
import { CapabilityGraph, type NodeLists, type SubDispatcherOptions } from "./graph.js";
import { type PerformanceRecord, createPerformanceTimer } from "./helpers.js";
import type { DataNodeOptions, DataValues, FunctionNodeOptions } from "./nodes.js";
import { type DispatchResult, dispatch } from "./resolver.js";
import { Runnable, type RunnableOptions } from "./runnable.js";
import { describeSchema } from "./schema-validator.js";
import type { Workflow } from "./workflow.js";

/**
 * Configuration options for a Dispatcher
 */
export type DispatcherOptions = RunnableOptions & {
    /**
     * Whether wiring a function to an unregistered data id creates that data node (default: true)
     */
    autoCreateData?: boolean;
};

/**
 * Context accepted by {@link Dispatcher.invoke}
 */
export type DispatchContext = {
    /**
     * Requested outputs; everything reachable is computed when omitted
     */
    outputs?: string[];
};

/**
 * Events yielded by {@link Dispatcher.invoke}
 */
export type DispatchYield = LogEvent | WorkflowEvent | PerformanceRecord;

/**
 * Options for embedding another model as a sub-dispatcher
 */
export type EmbedOptions = Omit<SubDispatcherOptions, "graph"> & {
    dispatcher: Dispatcher | CapabilityGraph;
};

/**
 * A model built by wiring small functions into a shared capability graph.
 *
 * @example
 * const dsp = new Dispatcher({ name: "Wheels" });
 * dsp.addFunction({ callable: (r: number) => 2 * Math.PI * r, inputs: ["radius"], outputs: ["circumference"] });
 * dsp.dispatch({ radius: 0.3 }, ["circumference"]).solution.circumference;
 */
export class Dispatcher extends Runnable<DataValues, DataValues, DispatchYield, DispatchContext> {
    /**
     * Creates a builder for constructing dispatchers fluently.
     */
    static builder(options?: DispatcherOptions): DispatcherBuilder {
        return new DispatcherBuilder(options);
    }

    /**
     * The capability graph this model owns
     */
    readonly graph: CapabilityGraph;

    /**
     * Workflow of the most recent {@link dispatch} call
     */
    lastWorkflow?: Workflow;

    constructor(options: DispatcherOptions = {}) {
        super(options);
        this.graph = new CapabilityGraph({
            name: options.name,
            description: options.description,
            autoCreateData: options.autoCreateData,
        });
    }

    addData(id: string, options?: DataNodeOptions): string {
        return this.graph.addData(id, options);
    }

    addFunction(options: FunctionNodeOptions): string {
        return this.graph.addFunction(options);
    }

    /**
     * Embeds another model (or a bare graph) as one function node.
     */
    addSubDispatcher({ dispatcher, ...options }: EmbedOptions): string {
        const graph = dispatcher instanceof Dispatcher ? dispatcher.graph : dispatcher;
        return this.graph.addSubDispatcher({ ...options, graph });
    }

    addFromLists(lists: NodeLists): { data: string[]; functions: string[] } {
        return this.graph.addFromLists(lists);
    }

    setDefaultValue(id: string, value: unknown, waitInput?: boolean): void {
        this.graph.setDefaultValue(id, value, waitInput);
    }

    /**
     * Synchronously resolves `outputs` (or everything reachable) from `inputs`.
     */
    dispatch(inputs: DataValues = {}, outputs?: string[]): DispatchResult {
        const result = dispatch(this.graph, inputs, { outputs, runnableName: this.name });
        this.lastWorkflow = result.workflow;
        return result;
    }

    /**
     * Dispatches the model, yielding the run's events, and returns the solution.
     */
    async *invoke(input: DataValues, context: DispatchContext = {}): AsyncGenerator<DispatchYield, DataValues, void> {
        const inputs = this.parseInput(input);
        const metadata = { runnableName: this.name };

        yield new LogEvent("info", `Starting dispatch: ${this.name ?? "Unnamed Dispatcher"}`, metadata);

        const result = this.dispatch(inputs, context.outputs);
        const timer = createPerformanceTimer(`${this.name ?? "dispatch"} invocations`);
        let failed = 0;
        for (const event of result.events) {
            if (event instanceof InvocationEvent && event.path === undefined) {
                timer.record(event.duration);
            } else if (event instanceof ErrorEvent) {
                failed++;
            }
            yield event;
        }
        yield timer.performanceStats(metadata);

        const missing = (context.outputs ?? []).filter(
            (id) => !Object.prototype.hasOwnProperty.call(result.solution, id)
        );
        if (missing.length > 0) {
            yield new LogEvent("warn", `Requested outputs not resolved: ${missing.join(", ")}`, {
                ...metadata,
                details: { missing },
            });
        }

        yield new LogEvent("info", `Dispatch completed: ${this.name ?? "Unnamed Dispatcher"}`, {
            ...metadata,
            details: {
                settled: result.workflow.settlementOrder.length,
                invoked: result.workflow.invocationOrder.length,
                failed,
            },
        });

        return this.parseOutput(result.solution);
    }

    /**
     * Reports malformed registrations, printing them as warnings.
     */
    validate(): string[] {
        const warnings = this.graph.diagnose();
        if (warnings.length > 0) {
            globalThis.console.warn(`Dispatcher '${this.name ?? "unnamed"}' validation warnings:`);
            for (const warning of warnings) {
                globalThis.console.warn(`- ${warning}`);
            }
        }
        return warnings;
    }

    protected helpSections(): Array<[string, string[]]> {
        const data = this.graph.dataNodes().map((node) => {
            const parts = [node.id];
            if (node.schema) parts.push(`: ${describeSchema(node.schema)}`);
            if (node.hasDefault) parts.push(` = ${JSON.stringify(node.defaultValue) ?? String(node.defaultValue)}`);
            if (node.waitInput) parts.push(" (wait input)");
            if (node.description) parts.push(` - ${node.description}`);
            return parts.join("");
        });
        const functions = this.graph.functionNodes().map((node) => {
            const kind = node.implementation.kind === "subDispatcher" ? " [sub-dispatcher]" : "";
            const weight = node.weight > 0 ? ` (weight ${node.weight})` : "";
            return `${node.id}${kind}: (${node.inputs.join(", ")}) -> (${node.outputs.join(", ")})${weight}`;
        });
        return [
            ["Data", data],
            ["Functions", functions],
        ];
    }
}
