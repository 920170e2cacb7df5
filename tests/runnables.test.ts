import { describe, expect, it, vi } from "vitest";
import { InvalidConfigError, PipelineAbortedError } from "../src/domain/errors.js";
import {
  RunnableParallel,
  identity,
  lambda,
  parallel,
  sequence,
  type Runnable,
} from "../src/runnables/base.js";
import type { GraphEdge } from "../src/runnables/graph.js";
import { deferred } from "./support/fakes.js";

const addOne = lambda((x: number) => x + 1, { label: "AddOne" });
const double = lambda((x: number) => x * 2, { label: "Double" });
const describeNumber = lambda((x: number) => `n=${x}`, { label: "Describe" });

function sortedEdges(edges: readonly GraphEdge[]): GraphEdge[] {
  return [...edges].sort(
    (a, b) => a.source.localeCompare(b.source) || a.target.localeCompare(b.target),
  );
}

describe("Runnable", () => {
  it("identity returns its input", async () => {
    const payload = { answer: 42 };
    await expect(identity<typeof payload>().invoke(payload)).resolves.toBe(payload);
  });

  it("lambda takes its label from the function name when none is given", () => {
    function shout(text: string): string {
      return text.toUpperCase();
    }
    expect(lambda(shout).label).toBe("shout");
    expect(lambda((text: string) => text).label).toBe("Lambda");
  });

  it("batch keeps input order", async () => {
    const slowFirst = lambda(async (x: number) => {
      await new Promise((resolve) => setTimeout(resolve, x === 1 ? 20 : 0));
      return x * 10;
    });

    await expect(slowFirst.batch([1, 2, 3])).resolves.toEqual([10, 20, 30]);
  });
});

describe("RunnableSequence", () => {
  it("feeds each stage the previous output", async () => {
    const pipeline = addOne.pipe(double).pipe(describeNumber);

    await expect(pipeline.invoke(3)).resolves.toBe("n=8");
  });

  it("is associative in output and graph", async () => {
    const left = sequence(sequence(addOne, double), describeNumber);
    const right = sequence(addOne, sequence(double, describeNumber));

    for (const input of [0, 5, -3]) {
      expect(await left.invoke(input)).toBe(await right.invoke(input));
    }

    const leftGraph = left.getGraph().toJSON();
    const rightGraph = right.getGraph().toJSON();
    expect(leftGraph.nodes).toEqual(rightGraph.nodes);
    expect(sortedEdges(leftGraph.edges)).toEqual(sortedEdges(rightGraph.edges));
    expect(left.getGraph().drawAscii()).toBe(right.getGraph().drawAscii());
  });

  it("flattens nested sequences into a chain of nodes", () => {
    const graph = addOne.pipe(double).pipe(describeNumber).getGraph();

    expect(graph.nodes.map((node) => node.label)).toEqual([
      "Input",
      "AddOne",
      "Double",
      "Describe",
      "Output",
    ]);
    expect(graph.successors("node_1").map((node) => node.label)).toEqual(["Double"]);
    expect(graph.getNode("node_4")).toEqual({
      id: "node_4",
      label: "Output",
      kind: "output",
      shape: { input: "unknown", output: "unknown" },
    });
  });

  it("stops before the next stage once the signal is aborted", async () => {
    const controller = new AbortController();
    const second = vi.fn((x: number) => x);
    const pipeline = lambda((x: number) => {
      controller.abort();
      return x;
    }).pipe(lambda(second));

    await expect(pipeline.invoke(1, { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineAbortedError,
    );
    expect(second).not.toHaveBeenCalled();
  });

  it("rejects immediately when invoked with an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(addOne.invoke(1, { signal: controller.signal })).rejects.toThrow(
      "Pipeline invocation was aborted.",
    );
  });

  it("propagates stage errors unchanged", async () => {
    const failure = new Error("stage failed");
    const pipeline = addOne.pipe(
      lambda(() => {
        throw failure;
      }),
    );

    await expect(pipeline.invoke(1)).rejects.toBe(failure);
  });
});

describe("RunnableParallel", () => {
  it.each(["concurrent", "sequential"] as const)(
    "gives every branch the same input in %s mode",
    async (mode) => {
      const join = parallel<number, { plus: number; times: number; label: string }>(
        { plus: addOne, times: double, label: describeNumber },
        { mode },
      );

      const bundle = await join.invoke(4);

      expect(bundle).toEqual({ plus: 5, times: 8, label: "n=4" });
      expect(Object.keys(bundle)).toEqual(["plus", "times", "label"]);
    },
  );

  it("assembles keys in declaration order whatever finishes first", async () => {
    const gate = deferred<string>();
    const join = parallel<string, { slow: string; fast: string }>({
      slow: lambda(() => gate.promise),
      fast: lambda((text: string) => text.toUpperCase()),
    });

    const pending = join.invoke("hi");
    gate.resolve("done");

    const bundle = await pending;
    expect(Object.keys(bundle)).toEqual(["slow", "fast"]);
    expect(bundle).toEqual({ slow: "done", fast: "HI" });
  });

  it("runs branches one at a time in sequential mode", async () => {
    const order: string[] = [];
    const track = (name: string) =>
      lambda(async (x: number) => {
        order.push(`start:${name}`);
        await new Promise((resolve) => setTimeout(resolve, 1));
        order.push(`end:${name}`);
        return x;
      });

    await parallel<number, { a: number; b: number }>(
      { a: track("a"), b: track("b") },
      { mode: "sequential" },
    ).invoke(1);

    expect(order).toEqual(["start:a", "end:a", "start:b", "end:b"]);
  });

  it("fails with the first branch error and aborts the other branches", async () => {
    let siblingAborted = false;
    const failure = new Error("branch failed");
    const join = parallel<number, { waiting: string; failing: string }>({
      waiting: lambda(
        (_x: number, config) =>
          new Promise<string>((resolve) => {
            config.signal?.addEventListener("abort", () => {
              siblingAborted = true;
              resolve("ignored");
            });
          }),
      ),
      failing: lambda(() => {
        throw failure;
      }),
    });

    await expect(join.invoke(1)).rejects.toBe(failure);
    expect(siblingAborted).toBe(true);
  });

  it("forwards an outer abort to running branches", async () => {
    const controller = new AbortController();
    const join = parallel<number, { waiting: number }>({
      waiting: lambda(
        (_x: number, config) =>
          new Promise<number>((_resolve, reject) => {
            config.signal?.addEventListener("abort", () => reject(new PipelineAbortedError()));
          }),
      ),
    });

    const pending = join.invoke(1, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(PipelineAbortedError);
  });

  it("rejects a join without branches", () => {
    expect(() => new RunnableParallel<number, Record<string, number>>({})).toThrow(
      InvalidConfigError,
    );
  });

  it("draws fan-out and fan-in markers with branch-labelled edges", () => {
    const join: Runnable<number, { a: number; b: number }> = parallel<
      number,
      { a: number; b: number }
    >({
      a: identity<number>("number"),
      b: identity<number>("number"),
    });
    const graph = join.getGraph();

    expect(graph.nodes.map((node) => node.label)).toEqual([
      "Input",
      "ParallelInput",
      "Identity",
      "Identity",
      "ParallelOutput",
      "Output",
    ]);
    expect(graph.toJSON().edges).toEqual([
      { source: "node_1", target: "node_2", label: "a" },
      { source: "node_2", target: "node_4" },
      { source: "node_1", target: "node_3", label: "b" },
      { source: "node_3", target: "node_4" },
      { source: "node_0", target: "node_1" },
      { source: "node_4", target: "node_5" },
    ]);
    expect(graph.nodes[4].shape).toEqual({ input: "{a, b}", output: "{a, b}" });
    expect(graph.drawAscii().split("\n")).toContain("| Identity |  | Identity |");
  });
});

describe("PipelineGraph.drawAscii", () => {
  it("renders a single identity stage", () => {
    expect(identity().getGraph().drawAscii()).toBe(
      [
        "+-------+",
        "| Input |",
        "+-------+",
        "      |",
        "      v",
        "+----------+",
        "| Identity |",
        "+----------+",
        "     |",
        "     v",
        "+--------+",
        "| Output |",
        "+--------+",
      ].join("\n"),
    );
  });
});
