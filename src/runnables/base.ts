import { InvalidConfigError, PipelineAbortedError } from "../domain/errors.js";
import type { Bundle } from "../domain/types.js";
import {
  PipelineGraph,
  type GraphSpan,
  type RunnableKind,
  type RunnableShape,
} from "./graph.js";

export interface RunnableConfig {
  /** Aborting cancels the invocation before the next stage starts. */
  signal?: AbortSignal;
}

/**
 * A composable stage mapping one input to one output. Instances carry no
 * per-call state, so one pipeline can serve concurrent invocations.
 */
export abstract class Runnable<RunInput, RunOutput> {
  abstract readonly kind: RunnableKind;

  abstract readonly label: string;

  abstract readonly shape: RunnableShape;

  async invoke(input: RunInput, config: RunnableConfig = {}): Promise<RunOutput> {
    throwIfAborted(config.signal);
    return this.run(input, config);
  }

  async batch(inputs: readonly RunInput[], config: RunnableConfig = {}): Promise<RunOutput[]> {
    const outputs = new Array<RunOutput>(inputs.length);
    await Promise.all(
      inputs.map((input, index) =>
        this.invoke(input, config).then((output) => {
          outputs[index] = output;
        }),
      ),
    );
    return outputs;
  }

  pipe<NewOutput>(
    next: Runnable<RunOutput, NewOutput>,
  ): RunnableSequence<RunInput, RunOutput, NewOutput> {
    return new RunnableSequence<RunInput, RunOutput, NewOutput>(this, next);
  }

  /** Adds this runnable's nodes to `graph` and reports where it attaches. */
  addToGraph(graph: PipelineGraph): GraphSpan {
    const node = graph.addNode(this.label, this.kind, this.shape);
    return { entry: node.id, exit: node.id };
  }

  getGraph(): PipelineGraph {
    const graph = new PipelineGraph();
    const input = graph.addNode("Input", "input", {
      input: this.shape.input,
      output: this.shape.input,
    });
    const span = this.addToGraph(graph);
    const output = graph.addNode("Output", "output", {
      input: this.shape.output,
      output: this.shape.output,
    });
    graph.addEdge(input.id, span.entry);
    graph.addEdge(span.exit, output.id);
    return graph;
  }

  protected abstract run(input: RunInput, config: RunnableConfig): Promise<RunOutput>;
}

export class RunnableIdentity<T> extends Runnable<T, T> {
  readonly kind = "identity";

  readonly label = "Identity";

  readonly shape: RunnableShape;

  constructor(typeName = "unknown") {
    super();
    this.shape = { input: typeName, output: typeName };
  }

  protected async run(input: T): Promise<T> {
    return input;
  }
}

export type LambdaFunction<RunInput, RunOutput> = (
  input: RunInput,
  config: RunnableConfig,
) => RunOutput | Promise<RunOutput>;

export interface LambdaOptions {
  label?: string;
  shape?: Partial<RunnableShape>;
}

export class RunnableLambda<RunInput, RunOutput> extends Runnable<RunInput, RunOutput> {
  readonly kind = "lambda";

  readonly label: string;

  readonly shape: RunnableShape;

  private readonly fn: LambdaFunction<RunInput, RunOutput>;

  constructor(fn: LambdaFunction<RunInput, RunOutput>, options: LambdaOptions = {}) {
    super();
    this.fn = fn;
    this.label = options.label ?? (fn.name || "Lambda");
    this.shape = {
      input: options.shape?.input ?? "unknown",
      output: options.shape?.output ?? "unknown",
    };
  }

  protected async run(input: RunInput, config: RunnableConfig): Promise<RunOutput> {
    return this.fn(input, config);
  }
}

/**
 * `last.invoke(first.invoke(x))`. Nesting is associative: either grouping of
 * three stages runs them in the same order and draws the same graph.
 */
export class RunnableSequence<RunInput, Middle, RunOutput> extends Runnable<
  RunInput,
  RunOutput
> {
  readonly kind = "sequence";

  readonly label = "Sequence";

  readonly shape: RunnableShape;

  constructor(
    readonly first: Runnable<RunInput, Middle>,
    readonly last: Runnable<Middle, RunOutput>,
  ) {
    super();
    this.shape = { input: first.shape.input, output: last.shape.output };
  }

  addToGraph(graph: PipelineGraph): GraphSpan {
    const head = this.first.addToGraph(graph);
    const tail = this.last.addToGraph(graph);
    graph.addEdge(head.exit, tail.entry);
    return { entry: head.entry, exit: tail.exit };
  }

  protected run(input: RunInput, config: RunnableConfig): Promise<RunOutput> {
    return this.first
      .invoke(input, config)
      .then((middle) => this.last.invoke(middle, config));
  }
}

export type BranchMap<RunInput, RunOutput> = {
  [K in keyof RunOutput]: Runnable<RunInput, RunOutput[K]>;
};

export type ParallelMode = "concurrent" | "sequential";

export interface ParallelOptions {
  mode?: ParallelMode;
}

/**
 * Fans one input out to named branches and merges their outputs into a
 * bundle keyed by branch name, in declaration order.
 *
 * In concurrent mode the first branch failure rejects the join; the other
 * branches see their signal aborted and whatever they return is dropped.
 * Sequential mode runs branches one at a time in declaration order.
 */
export class RunnableParallel<RunInput, RunOutput extends Bundle> extends Runnable<
  RunInput,
  RunOutput
> {
  readonly kind = "parallel";

  readonly label = "Parallel";

  readonly shape: RunnableShape;

  readonly mode: ParallelMode;

  readonly keys: readonly Extract<keyof RunOutput, string>[];

  private readonly branches: BranchMap<RunInput, RunOutput>;

  constructor(branches: BranchMap<RunInput, RunOutput>, options: ParallelOptions = {}) {
    super();
    this.branches = branches;
    this.mode = options.mode ?? "concurrent";
    this.keys = Object.keys(branches).filter(
      (key): key is Extract<keyof RunOutput, string> => hasOwn(branches, key),
    );
    if (this.keys.length === 0) {
      throw new InvalidConfigError("A parallel join needs at least one branch.");
    }
    const inputs = new Set(this.keys.map((key) => this.branches[key].shape.input));
    this.shape = {
      input: inputs.size === 1 ? [...inputs][0] : "unknown",
      output: `{${this.keys.join(", ")}}`,
    };
  }

  addToGraph(graph: PipelineGraph): GraphSpan {
    const fanOut = graph.addNode("ParallelInput", "input", {
      input: this.shape.input,
      output: this.shape.input,
    });
    const spans = this.keys.map((key) => ({
      key,
      span: this.branches[key].addToGraph(graph),
    }));
    const fanIn = graph.addNode("ParallelOutput", "output", {
      input: this.shape.output,
      output: this.shape.output,
    });
    for (const { key, span } of spans) {
      graph.addEdge(fanOut.id, span.entry, key);
      graph.addEdge(span.exit, fanIn.id);
    }
    return { entry: fanOut.id, exit: fanIn.id };
  }

  protected async run(input: RunInput, config: RunnableConfig): Promise<RunOutput> {
    const collected: Partial<RunOutput> = {};

    if (this.mode === "sequential") {
      for (const key of this.keys) {
        await this.runBranch(key, input, config, collected);
      }
    } else {
      await this.runConcurrently(input, config, collected);
    }

    const ordered: Partial<RunOutput> = {};
    for (const key of this.keys) {
      if (hasOwn(collected, key)) {
        ordered[key] = collected[key];
      }
    }
    if (!hasEveryKey(ordered, this.keys)) {
      throw new InvalidConfigError("A parallel branch finished without producing a value.");
    }
    return ordered;
  }

  private async runConcurrently(
    input: RunInput,
    config: RunnableConfig,
    collected: Partial<RunOutput>,
  ): Promise<void> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(config.signal?.reason);
    config.signal?.addEventListener("abort", forwardAbort, { once: true });

    const branchConfig: RunnableConfig = { ...config, signal: controller.signal };
    try {
      await Promise.all(
        this.keys.map((key) => this.runBranch(key, input, branchConfig, collected)),
      );
    } catch (error) {
      controller.abort(error);
      throw error;
    } finally {
      config.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private runBranch<K extends keyof RunOutput>(
    key: K,
    input: RunInput,
    config: RunnableConfig,
    sink: Partial<RunOutput>,
  ): Promise<void> {
    return this.branches[key].invoke(input, config).then((value) => {
      sink[key] = value;
    });
  }
}

export function identity<T>(typeName?: string): RunnableIdentity<T> {
  return new RunnableIdentity<T>(typeName);
}

export function lambda<RunInput, RunOutput>(
  fn: LambdaFunction<RunInput, RunOutput>,
  options?: LambdaOptions,
): RunnableLambda<RunInput, RunOutput> {
  return new RunnableLambda(fn, options);
}

export function sequence<RunInput, Middle, RunOutput>(
  first: Runnable<RunInput, Middle>,
  last: Runnable<Middle, RunOutput>,
): RunnableSequence<RunInput, Middle, RunOutput> {
  return new RunnableSequence(first, last);
}

export function parallel<RunInput, RunOutput extends Bundle>(
  branches: BranchMap<RunInput, RunOutput>,
  options?: ParallelOptions,
): RunnableParallel<RunInput, RunOutput> {
  return new RunnableParallel(branches, options);
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PipelineAbortedError({ cause: signal.reason });
  }
}

function hasOwn(value: object, key: PropertyKey): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

function hasEveryKey<T extends object>(
  value: Partial<T>,
  keys: readonly (keyof T)[],
): value is T {
  return keys.every((key) => hasOwn(value, key));
}
