import {
  streamSimple,
  type AssistantMessage,
  type AssistantMessageEvent,
  type Context
} from "@mariozechner/pi-ai";

import type { ResolvedModelConfig } from "./models.js";

export interface GenerateRequest {
  prompt: string;
  systemPrompt?: string;
  signal?: AbortSignal;
}

/** What the workflow nodes need from a language model. */
export interface LanguageModel {
  generate(request: GenerateRequest): Promise<string>;
  stream(request: GenerateRequest): AsyncIterable<string>;
}

export class LanguageModelError extends Error {
  constructor(
    message: string,
    readonly reason: "error" | "aborted"
  ) {
    super(message);
    this.name = "LanguageModelError";
  }
}

export function buildContext(request: GenerateRequest): Context {
  return {
    ...(request.systemPrompt ? { systemPrompt: request.systemPrompt } : {}),
    messages: [
      {
        role: "user",
        content: request.prompt,
        timestamp: Date.now()
      }
    ]
  };
}

function extractText(message: AssistantMessage): string {
  return message.content
    .filter((block): block is { type: "text"; text: string } => block.type === "text")
    .map((block) => block.text)
    .join("");
}

function failureOf(event: AssistantMessageEvent): LanguageModelError | null {
  if (event.type !== "error") {
    return null;
  }
  return new LanguageModelError(event.error.errorMessage ?? "LLM error", event.reason);
}

export class PiAiLanguageModel implements LanguageModel {
  constructor(private readonly config: ResolvedModelConfig) {}

  async generate(request: GenerateRequest): Promise<string> {
    const stream = this.open(request);
    for await (const event of stream) {
      const failure = failureOf(event);
      if (failure) {
        throw failure;
      }
    }
    return extractText(await stream.result());
  }

  async *stream(request: GenerateRequest): AsyncIterable<string> {
    for await (const event of this.open(request)) {
      const failure = failureOf(event);
      if (failure) {
        throw failure;
      }
      if (event.type === "text_delta") {
        yield event.delta;
      }
    }
  }

  private open(request: GenerateRequest) {
    const { config } = this;
    return streamSimple(config.model, buildContext(request), {
      ...(config.reasoningLevel ? { reasoning: config.reasoningLevel } : {}),
      ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
      ...(config.maxTokens !== undefined ? { maxTokens: config.maxTokens } : {}),
      ...(request.signal ? { signal: request.signal } : {})
    });
  }
}
