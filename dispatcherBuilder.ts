import {Dispatcher, type DispatcherOptions, type EmbedOptions} from "./dispatcher.js";
import type {DataNodeOptions, FunctionNodeOptions} from "./nodes.js";

/**
 * Builder class for constructing Dispatcher instances with a fluent API.
 */
export class DispatcherBuilder {
  /**
   * The dispatcher being built
   */
  readonly #dispatcher: Dispatcher;

  /**
   * Creates a new builder instance.
   */
  constructor(options?: DispatcherOptions) {
    this.#dispatcher = new Dispatcher(options);
  }

  /**
   * Adds a data node.
   */
  data(id: string, options?: DataNodeOptions): DispatcherBuilder {
    this.#dispatcher.addData(id, options);
    return this;
  }

  /**
   * Adds a function node.
   */
  fn(options: FunctionNodeOptions): DispatcherBuilder {
    this.#dispatcher.addFunction(options);
    return this;
  }

  /**
   * Embeds another dispatcher as a function node.
   */
  sub(options: EmbedOptions): DispatcherBuilder {
    this.#dispatcher.addSubDispatcher(options);
    return this;
  }

  /**
   * Builds and returns the configured dispatcher.
   */
  build(): Dispatcher {
    return this.#dispatcher;
  }
}
