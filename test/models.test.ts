import { describe, expect, it } from "vitest";

import { listModelIds, listProviders, ModelConfigError, providerApiKeyEnv, validateModelConfig } from "../src/llm/models.js";

function catalogModel() {
  const provider = listProviders()[0];
  if (!provider) {
    throw new Error("No providers found in pi-ai model catalog");
  }
  const modelId = listModelIds(provider)[0];
  if (!modelId) {
    throw new Error(`No models found for provider ${provider}`);
  }
  return { provider, modelId };
}

function codeOf(run: () => unknown): string {
  try {
    run();
  } catch (error) {
    if (error instanceof ModelConfigError) {
      return error.code;
    }
    throw error;
  }
  return "none";
}

describe("model config validation", () => {
  it("accepts a provider/model from the pi-ai catalog", () => {
    const config = validateModelConfig({ ...catalogModel(), temperature: 0.1, maxTokens: 1024 });

    expect(config.model.provider).toBe(config.provider);
    expect(config.model.id).toBe(config.modelId);
  });

  it("fails fast for unknown providers and models", () => {
    const { provider } = catalogModel();
    expect(codeOf(() => validateModelConfig({ provider: "not-a-real-provider", modelId: "anything" }))).toBe(
      "INVALID_PROVIDER"
    );
    expect(codeOf(() => validateModelConfig({ provider, modelId: "not-a-real-model" }))).toBe("INVALID_MODEL");
    expect(listModelIds("not-a-real-provider")).toEqual([]);
  });

  it("rejects out-of-range sampling settings", () => {
    expect(codeOf(() => validateModelConfig({ ...catalogModel(), temperature: 3 }))).toBe("INVALID_TEMPERATURE");
    expect(codeOf(() => validateModelConfig({ ...catalogModel(), maxTokens: 0 }))).toBe("INVALID_MAX_TOKENS");
  });

  it("checks the reasoning level before handing it to pi-ai", () => {
    expect(codeOf(() => validateModelConfig({ ...catalogModel(), reasoningLevel: "extreme" }))).toBe(
      "INVALID_REASONING_LEVEL"
    );
    expect(() => validateModelConfig({ ...catalogModel(), reasoningLevel: "extreme" })).toThrow(
      "reasoningLevel must be one of minimal, low, medium, high, xhigh"
    );
    expect(validateModelConfig({ ...catalogModel(), reasoningLevel: "high" }).reasoningLevel).toBe("high");
  });

  it("keeps only the tuning that was set", () => {
    const { provider, modelId } = catalogModel();
    const config = validateModelConfig({ provider, modelId });
    expect(Object.keys(config).sort()).toEqual(["model", "modelId", "provider"]);
  });

  it("knows where provider keys come from", () => {
    expect(providerApiKeyEnv("google")).toBe("GEMINI_API_KEY");
    expect(providerApiKeyEnv("not-a-real-provider")).toBeNull();
  });
});
