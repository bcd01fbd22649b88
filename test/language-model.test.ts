import {
  registerApiProvider,
  resetApiProviders,
  type AssistantMessage,
  type AssistantMessageEvent,
  type AssistantMessageEventStream,
  type Context
} from "@mariozechner/pi-ai";
import { afterEach, describe, expect, it } from "vitest";

import { buildContext, LanguageModelError, PiAiLanguageModel } from "../src/llm/language-model.js";
import { listModelIds, listProviders, validateModelConfig, type ResolvedModelConfig } from "../src/llm/models.js";

function usage() {
  return {
    input: 10,
    output: 10,
    cacheRead: 0,
    cacheWrite: 0,
    totalTokens: 20,
    cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 }
  };
}

function assistantMessage(
  config: ResolvedModelConfig,
  text: string,
  stopReason: AssistantMessage["stopReason"],
  errorMessage?: string
): AssistantMessage {
  return {
    role: "assistant",
    provider: config.model.provider,
    model: config.model.id,
    api: config.model.api,
    content: text ? [{ type: "text", text }] : [],
    usage: usage(),
    stopReason,
    ...(errorMessage !== undefined ? { errorMessage } : {}),
    timestamp: Date.now()
  };
}

function staticStream(events: AssistantMessageEvent[], message: AssistantMessage): AssistantMessageEventStream {
  return {
    async result() {
      return message;
    },
    [Symbol.asyncIterator]: async function* () {
      for (const event of events) {
        yield event;
      }
    }
  };
}

function catalogConfig(): ResolvedModelConfig {
  const provider = listProviders()[0];
  const modelId = provider ? listModelIds(provider)[0] : undefined;
  if (!provider || !modelId) {
    throw new Error("No models found in pi-ai model catalog");
  }
  return validateModelConfig({ provider, modelId, temperature: 0.1 });
}

/** Registers a provider for the catalog model's API that answers every call from `reply`. */
function fakeProvider(config: ResolvedModelConfig, reply: (context: Context) => AssistantMessageEventStream): Context[] {
  const seen: Context[] = [];
  const respond = (_model: unknown, context: Context) => {
    seen.push(context);
    return reply(context);
  };
  registerApiProvider({ api: config.model.api, stream: respond, streamSimple: respond }, "incident-test-provider");
  return seen;
}

afterEach(() => {
  resetApiProviders();
});

describe("pi-ai language model", () => {
  it("builds a context with the system prompt and one user message", () => {
    const context = buildContext({ prompt: "diagnose this", systemPrompt: "be brief" });
    expect(context.systemPrompt).toBe("be brief");
    expect(context.messages).toMatchObject([{ role: "user", content: "diagnose this" }]);
    expect(buildContext({ prompt: "x" }).systemPrompt).toBeUndefined();
  });

  it("returns the text of the final message", async () => {
    const config = catalogConfig();
    const seen = fakeProvider(config, () => {
      const message = assistantMessage(config, '{"error_type": "database"}', "stop");
      return staticStream([{ type: "done", reason: "stop", message }], message);
    });

    const text = await new PiAiLanguageModel(config).generate({ prompt: "log", systemPrompt: "diagnose" });

    expect(text).toBe('{"error_type": "database"}');
    expect(seen[0]?.systemPrompt).toBe("diagnose");
  });

  it("yields text deltas while streaming", async () => {
    const config = catalogConfig();
    fakeProvider(config, () => {
      const partial = assistantMessage(config, "Restart", "stop");
      const message = assistantMessage(config, "Restart the database.", "stop");
      return staticStream(
        [
          { type: "text_delta", contentIndex: 0, delta: "Restart", partial },
          { type: "text_delta", contentIndex: 0, delta: " the database.", partial },
          { type: "done", reason: "stop", message }
        ],
        message
      );
    });

    const chunks: string[] = [];
    for await (const chunk of new PiAiLanguageModel(config).stream({ prompt: "explain" })) {
      chunks.push(chunk);
    }

    expect(chunks).toEqual(["Restart", " the database."]);
  });

  it("raises provider errors", async () => {
    const config = catalogConfig();
    fakeProvider(config, () => {
      const message = assistantMessage(config, "", "error", "quota exhausted");
      return staticStream([{ type: "error", reason: "error", error: message }], message);
    });

    const failure = new PiAiLanguageModel(config).generate({ prompt: "log" });

    await expect(failure).rejects.toBeInstanceOf(LanguageModelError);
    await expect(failure).rejects.toThrow("quota exhausted");
  });
});
