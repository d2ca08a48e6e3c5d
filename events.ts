/**
 * @file events.ts
 * @description Event types yielded by a Runnable's `invoke` generator and recorded during a dispatch run.
 */

/**
 * Base properties for all events yielded by a Runnable.
 */
export type BaseRunnableEvent = {
    /**
     * The specific type of the event (e.g., 'log', 'settlement').
     */
    type: string;
    /**
     * The name of the Runnable instance that yielded this event.
     */
    runnableName?: string;
    /**
     * Unix timestamp (milliseconds) of when the event occurred.
     */
    timestamp: number;
    /**
     * Path of sub-dispatcher ids leading to the run that produced the event, outermost first.
     */
    path?: string[];
};

export type LogLevel = "debug" | "info" | "warn" | "error";

// Base class providing timestamp handling and metadata spread
class BaseEvent {
    /** The specific type of the event */
    type: string;
    /** Unix timestamp (milliseconds) of when the event occurred */
    timestamp: number;
    /** The runnable that yielded the event */
    runnableName?: string;
    /** Sub-dispatcher path of the run that produced the event */
    path?: string[];

    /**
     * @param type The event type
     * @param metadata Additional metadata for the event
     */
    constructor(type: string, metadata: Partial<BaseRunnableEvent> = {}) {
        this.type = type;
        this.timestamp = Date.now();
        Object.assign(this, metadata);
    }
}

/**
 * LogEvent class representing a log message.
 */
export class LogEvent extends BaseEvent {
    /** The severity level of the log */
    level: LogLevel;
    /** The log message */
    message: string;
    /** Optional structured details */
    details?: Record<string, unknown>;

    constructor(
        level: LogLevel,
        message: string,
        metadata: Partial<BaseRunnableEvent> & { details?: Record<string, unknown> } = {}
    ) {
        super("log", metadata);
        this.level = level;
        this.message = message;
        this.details = metadata.details;
    }
}

/**
 * ErrorEvent represents an error absorbed during a run, such as a failed callable
 * or a rejected input.
 */
export class ErrorEvent extends BaseEvent {
    /** Details of the error */
    error: {
        name: string;
        message: string;
        stack?: string;
    };
    /** The node the error is attached to */
    nodeId?: string;

    constructor(
        err: Error | string,
        metadata: Partial<BaseRunnableEvent> & { nodeId?: string } = {}
    ) {
        super("error_event", metadata);
        this.error = err instanceof Error
            ? { name: err.name, message: err.message, stack: err.stack }
            : { name: "Error", message: err };
        this.nodeId = metadata.nodeId;
    }
}

/**
 * A data node received its final value for the run.
 */
export class SettlementEvent extends BaseEvent {
    dataId: string;
    value: unknown;
    /** Function id, or the sentinel START for supplied inputs and defaults */
    via: string;
    cost: number;

    constructor(
        dataId: string,
        value: unknown,
        via: string,
        cost: number,
        metadata: Partial<BaseRunnableEvent> = {}
    ) {
        super("settlement", metadata);
        this.dataId = dataId;
        this.value = value;
        this.via = via;
        this.cost = cost;
    }
}

/**
 * A function node's callable (or nested graph) was invoked successfully.
 */
export class InvocationEvent extends BaseEvent {
    functionId: string;
    inputs: Record<string, unknown>;
    outputs: Record<string, unknown>;
    /** Duration of the call in milliseconds */
    duration: number;

    constructor(
        functionId: string,
        inputs: Record<string, unknown>,
        outputs: Record<string, unknown>,
        duration: number,
        metadata: Partial<BaseRunnableEvent> = {}
    ) {
        super("invocation", metadata);
        this.functionId = functionId;
        this.inputs = inputs;
        this.outputs = outputs;
        this.duration = duration;
    }
}

/**
 * Events recorded while a dispatch run resolves its graph.
 */
export type WorkflowEvent = SettlementEvent | InvocationEvent | ErrorEvent;
