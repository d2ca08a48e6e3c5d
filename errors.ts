/**
 * @file errors.ts
 * @description Error classes raised while building capability graphs or recorded while dispatching.
 */

/**
 * Base class of every error the dispatcher raises or records.
 */
export class DispatcherError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * An explicit node id is already registered in the graph.
 */
export class DuplicateNodeId extends DispatcherError {
    /** The id that was registered twice */
    nodeId: string;

    constructor(nodeId: string) {
        super(`Node with id '${nodeId}' already exists`);
        this.nodeId = nodeId;
    }
}

/**
 * A node id was referenced that the graph does not hold (or holds with the wrong type).
 */
export class UnknownNode extends DispatcherError {
    /** The id that could not be found */
    nodeId: string;

    constructor(nodeId: string, detail = "does not exist") {
        super(`Node '${nodeId}' ${detail}`);
        this.nodeId = nodeId;
    }
}

/**
 * `dispatch` was called with something that is not a capability graph, or with malformed arguments.
 */
export class InvalidGraph extends DispatcherError {}

/**
 * A function node's callable threw, returned the wrong number of values,
 * or produced a value its output schema rejected.
 * Captured per invocation and recorded in the workflow; never thrown out of `dispatch`.
 */
export class CallableFailure extends DispatcherError {
    /** The function node that failed */
    functionId: string;

    constructor(functionId: string, message: string, cause?: unknown) {
        super(`Function '${functionId}' failed: ${message}`, { cause });
        this.functionId = functionId;
    }

    /**
     * Wraps whatever a callable threw.
     */
    static from(functionId: string, error: unknown): CallableFailure {
        if (error instanceof CallableFailure) {
            return error;
        }
        const message = error instanceof Error ? error.message : String(error);
        return new CallableFailure(functionId, message, error);
    }
}
