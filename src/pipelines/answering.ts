import {
  InvalidConfigError,
  MalformedResponseError,
  MissingVariableError,
} from "../domain/errors.js";
import type { Bundle, Chunk } from "../domain/types.js";
import type { ChatModelPort, RawResponse } from "../infra/ai/types.js";
import {
  Runnable,
  identity,
  lambda,
  parallel,
  type RunnableConfig,
} from "../runnables/base.js";
import type { RunnableShape } from "../runnables/graph.js";
import { formatDocuments, type VectorStoreRetriever } from "./retrieval.js";

export const DEFAULT_TEMPERATURE = 0.2;

export const GROUNDED_ANSWER_TEMPLATE = [
  "You answer questions about a video using only its transcript.",
  "Use the context below. If it does not contain the answer, say that you don't know.",
  "",
  "Context:",
  "{context}",
  "",
  "Question: {question}",
].join("\n");

type TemplatePart = { type: "text"; value: string } | { type: "variable"; name: string };

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Fills `{name}` placeholders from a bundle. `{{` and `}}` produce literal
 * braces.
 */
export class PromptTemplate extends Runnable<Bundle, string> {
  readonly kind = "prompt";

  readonly label = "PromptTemplate";

  readonly shape: RunnableShape;

  readonly inputVariables: readonly string[];

  private readonly parts: readonly TemplatePart[];

  constructor(readonly template: string) {
    super();
    this.parts = parseTemplate(template);
    const names: string[] = [];
    for (const part of this.parts) {
      if (part.type === "variable" && !names.includes(part.name)) {
        names.push(part.name);
      }
    }
    this.inputVariables = names;
    this.shape = { input: `{${names.join(", ")}}`, output: "string" };
  }

  format(values: Bundle): string {
    return this.parts
      .map((part) => {
        if (part.type === "text") {
          return part.value;
        }
        const value = Object.prototype.hasOwnProperty.call(values, part.name)
          ? values[part.name]
          : undefined;
        if (value === undefined) {
          throw new MissingVariableError(part.name);
        }
        return typeof value === "string" ? value : JSON.stringify(value);
      })
      .join("");
  }

  protected async run(input: Bundle): Promise<string> {
    return this.format(input);
  }
}

export interface ChatModelRunnableOptions {
  model: ChatModelPort;
  temperature?: number;
}

export class ChatModelRunnable extends Runnable<string, RawResponse> {
  readonly kind = "generator";

  readonly label = "ChatModel";

  readonly shape: RunnableShape = { input: "string", output: "RawResponse" };

  readonly temperature: number;

  private readonly model: ChatModelPort;

  constructor(options: ChatModelRunnableOptions) {
    super();
    this.model = options.model;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  }

  protected async run(input: string, config: RunnableConfig): Promise<RawResponse> {
    return this.model.generate(input, {
      temperature: this.temperature,
      signal: config.signal,
    });
  }
}

export class StringOutputParser extends Runnable<RawResponse, string> {
  readonly kind = "parser";

  readonly label = "StringOutputParser";

  readonly shape: RunnableShape = { input: "RawResponse", output: "string" };

  parse(response: RawResponse): string {
    if (typeof response.content !== "string") {
      throw new MalformedResponseError(
        `Response from ${response.model} has no text content.`,
      );
    }
    return response.content.trim();
  }

  protected async run(input: RawResponse): Promise<string> {
    return this.parse(input);
  }
}

export type AnswerBundle = {
  context: string;
  question: string;
};

export interface AnswerChainOptions {
  retriever: VectorStoreRetriever;
  model: ChatModelPort;
  temperature?: number;
  template?: string;
}

/**
 * question → {context, question} → prompt → model → answer text.
 */
export function createAnswerChain(options: AnswerChainOptions): Runnable<string, string> {
  const context = options.retriever.pipe(
    lambda((chunks: Chunk[]) => formatDocuments(chunks), {
      label: "FormatDocuments",
      shape: { input: "Chunk[]", output: "string" },
    }),
  );

  return parallel<string, AnswerBundle>({
    context,
    question: identity<string>("string"),
  })
    .pipe(new PromptTemplate(options.template ?? GROUNDED_ANSWER_TEMPLATE))
    .pipe(new ChatModelRunnable({ model: options.model, temperature: options.temperature }))
    .pipe(new StringOutputParser());
}

function parseTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = "";
  let cursor = 0;

  while (cursor < template.length) {
    const char = template[cursor];

    if (char === "{" && template[cursor + 1] === "{") {
      text += "{";
      cursor += 2;
      continue;
    }
    if (char === "}" && template[cursor + 1] === "}") {
      text += "}";
      cursor += 2;
      continue;
    }
    if (char === "}") {
      throw new InvalidConfigError(`Unmatched "}" at position ${cursor} in prompt template.`);
    }
    if (char !== "{") {
      text += char;
      cursor += 1;
      continue;
    }

    const close = template.indexOf("}", cursor + 1);
    if (close < 0) {
      throw new InvalidConfigError(`Unclosed "{" at position ${cursor} in prompt template.`);
    }
    const name = template.slice(cursor + 1, close).trim();
    if (!VARIABLE_NAME.test(name)) {
      throw new InvalidConfigError(`Invalid prompt variable "${name}" in prompt template.`);
    }

    if (text) {
      parts.push({ type: "text", value: text });
      text = "";
    }
    parts.push({ type: "variable", name });
    cursor = close + 1;
  }

  if (text) {
    parts.push({ type: "text", value: text });
  }
  return parts;
}
