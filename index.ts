/**
 * @file index.ts
 * @description Entry point for the computation-dispatcher package.
 * Exports the Dispatcher, the capability graph and resolver, and related types.
 */

// Export the Dispatcher facade and its builder
export {Dispatcher} from "./dispatcher.js";
export {DispatcherBuilder} from "./dispatcherBuilder.js";
export type {DispatcherOptions, DispatchContext, DispatchYield, EmbedOptions} from "./dispatcher.js";

// Export core Runnable class and options type
export {Runnable} from "./runnable.js";
export type {RunnableOptions} from "./runnable.js";

// Export graph related classes and types
export {CapabilityGraph} from "./graph.js";
export type {CapabilityGraphOptions, SubDispatcherOptions, NodeLists} from "./graph.js";
export {SubDispatcher} from "./subDispatcher.js";
export {START, SINK, isDataNode, isFunctionNode, isSentinel} from "./nodes.js";
export type {
  DataNode,
  DataNodeOptions,
  DataValues,
  FunctionNode,
  FunctionNodeOptions,
  GraphNode,
  CapabilityEdge,
  InputDomain,
  NodeCallable,
} from "./nodes.js";

// Export the resolver
export {dispatch} from "./resolver.js";
export type {DispatchOptions, DispatchResult} from "./resolver.js";

// Export workflow classes and types
export {Workflow, WorkflowRecorder} from "./workflow.js";
export type {WorkflowNode, WorkflowNodeType, WorkflowEdge, WorkflowError} from "./workflow.js";

// Export error classes
export {DispatcherError, DuplicateNodeId, UnknownNode, InvalidGraph, CallableFailure} from "./errors.js";

// Export schema validation functions
export {
  validateZodTypeCompatibility,
  validateSchemaCompatibility,
  extractSchemaInfo,
  describeSchema,
} from "./schema-validator.js";
export type {ValidationResult, SchemaInfo} from "./schema-validator.js";

// Export zod for schema definitions
export {z} from "zod";

// Export helper functions and classes
export {createPerformanceTimer, PerformanceTimer, measure} from "./helpers.js";
export type {PerformanceRecord, PerformanceStats, MeasureResult} from "./helpers.js";

// Export event classes and types
export {LogEvent, ErrorEvent, SettlementEvent, InvocationEvent} from "./events.js";
export type {BaseRunnableEvent, LogLevel, WorkflowEvent} from "./events.js";

// Export function helpers and drawing
export {bypass, replicate, selector, summation, combine} from "./patterns.js";
export {toDot, replaceUnderscore} from "./draw.js";
export type {DrawOptions} from "./draw.js";
