/**
 * @file runnable.ts
 * @description Defines the Runnable base class: an executable unit that yields events and returns a result.
 */

import { z } from "zod";
import { describeSchema } from "./schema-validator.js";

/**
 * Configuration options for a Runnable instance.
 */
export type RunnableOptions = {
    /**
     * An optional name for this runnable instance, used for events and identification.
     */
    name?: string;
    /**
     * An optional description of what this runnable does.
     */
    description?: string;
    /**
     * An optional Zod schema for validating input data.
     */
    inputSchema?: z.ZodTypeAny;
    /**
     * An optional Zod schema for validating output data.
     */
    outputSchema?: z.ZodTypeAny;
    /**
     * Whether to validate input using the input schema.
     */
    validateInput?: boolean;
    /**
     * Whether to validate output using the output schema.
     */
    validateOutput?: boolean;
};

/**
 * Represents an operation that can be executed, yielding intermediate events
 * and ultimately returning a final output.
 *
 * @template InputType - The type of the input data for the `invoke` method.
 * @template OutputType - The type of the final result returned by the `invoke` generator.
 * @template YieldType - The type of events yielded by the `invoke` generator during execution.
 * @template ContextType - The type of the optional context object passed to `invoke`.
 */
export abstract class Runnable<InputType = unknown, OutputType = unknown, YieldType = unknown, ContextType = unknown> {
    /**
     * Optional name for this runnable instance.
     */
    name?: string;

    /**
     * Optional description of what this runnable does.
     */
    description?: string;

    /**
     * Optional Zod schema for validating input data.
     */
    inputSchema?: z.ZodTypeAny;

    /**
     * Optional Zod schema for validating output data.
     */
    outputSchema?: z.ZodTypeAny;

    /**
     * Whether to validate the input using the input schema.
     */
    validateInput: boolean;

    /**
     * Whether to validate the output using the output schema.
     */
    validateOutput: boolean;

    /**
     * @param options - Configuration options for the Runnable.
     */
    constructor(options: RunnableOptions = {}) {
        this.name = options.name;
        this.description = options.description;
        this.inputSchema = options.inputSchema;
        this.outputSchema = options.outputSchema;
        this.validateInput = options.validateInput !== false;
        this.validateOutput = options.validateOutput !== false;
    }

    /**
     * Returns a formatted help message showing the runnable's configuration.
     */
    help(): string {
        const lines = [];

        lines.push("═".repeat(60));
        lines.push(`  ${this.name || "Unnamed Runnable"}`);
        lines.push("═".repeat(60));

        if (this.description) {
            lines.push("");
            lines.push("Description:");
            lines.push(`  ${this.description}`);
        }

        lines.push("");
        lines.push("Input Schema:");
        lines.push(this.inputSchema
            ? `  ${describeSchema(this.inputSchema)}`
            : "  No input schema defined (accepts any input)");

        lines.push("");
        lines.push("Output Schema:");
        lines.push(this.outputSchema
            ? `  ${describeSchema(this.outputSchema)}`
            : "  No output schema defined (returns any output)");

        for (const [title, entries] of this.helpSections()) {
            lines.push("");
            lines.push(`${title}:`);
            lines.push(...(entries.length > 0 ? entries.map((entry) => `  ${entry}`) : ["  (none)"]));
        }

        lines.push("");
        lines.push("═".repeat(60));

        return lines.join("\n");
    }

    /**
     * Extra sections appended to {@link help}, as `[title, lines]` pairs.
     */
    protected helpSections(): Array<[string, string[]]> {
        return [];
    }

    /**
     * Applies the input schema when validation is enabled.
     * @throws ZodError when the input does not match
     */
    protected parseInput(input: InputType): InputType {
        if (this.validateInput && this.inputSchema) {
            return this.inputSchema.parse(input);
        }
        return input;
    }

    /**
     * Applies the output schema when validation is enabled.
     * @throws ZodError when the output does not match
     */
    protected parseOutput(output: OutputType): OutputType {
        if (this.validateOutput && this.outputSchema) {
            return this.outputSchema.parse(output);
        }
        return output;
    }

    /**
     * Executes the runnable's logic: an async generator yielding `YieldType` events
     * and returning an `OutputType`.
     *
     * @param input - The input data for the runnable.
     * @param context - Optional context providing additional data for execution.
     */
    abstract invoke(input: InputType, context?: ContextType): AsyncGenerator<YieldType, OutputType, void>;

    /**
     * Convenience helper that executes {@link invoke} and returns only the final
     * result. Any yielded events are consumed and discarded.
     */
    async run(input: InputType, context?: ContextType): Promise<OutputType> {
        const iterator = this.invoke(input, context)[Symbol.asyncIterator]();
        let result = await iterator.next();
        while (!result.done) {
            result = await iterator.next();
        }
        return result.value;
    }
}
