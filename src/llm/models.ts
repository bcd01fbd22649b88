import {
  getModel,
  getModels,
  getProviders,
  type Api,
  type Model,
  type ThinkingLevel
} from "@mariozechner/pi-ai";
import { z } from "zod";

/** Model settings as they arrive from the environment or the command line. */
export interface ModelConfig {
  provider: string;
  modelId: string;
  reasoningLevel?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ResolvedModelConfig extends ModelConfig {
  reasoningLevel?: ThinkingLevel;
  model: Model<Api>;
}

export type ModelConfigErrorCode =
  | "INVALID_PROVIDER"
  | "INVALID_MODEL"
  | "INVALID_REASONING_LEVEL"
  | "INVALID_TEMPERATURE"
  | "INVALID_MAX_TOKENS";

export class ModelConfigError extends Error {
  constructor(
    message: string,
    readonly code: ModelConfigErrorCode
  ) {
    super(message);
    this.name = "ModelConfigError";
  }
}

export const REASONING_LEVELS = ["minimal", "low", "medium", "high", "xhigh"] as const satisfies readonly ThinkingLevel[];

const reasoningMessage = `reasoningLevel must be one of ${REASONING_LEVELS.join(", ")}`;
const temperatureMessage = "temperature must be between 0 and 2";
const maxTokensMessage = "maxTokens must be a positive integer";

const tuningSchema = z.object({
  reasoningLevel: z.enum(REASONING_LEVELS, { errorMap: () => ({ message: reasoningMessage }) }).optional(),
  temperature: z
    .number({ invalid_type_error: temperatureMessage })
    .finite(temperatureMessage)
    .min(0, temperatureMessage)
    .max(2, temperatureMessage)
    .optional(),
  maxTokens: z
    .number({ invalid_type_error: maxTokensMessage })
    .int(maxTokensMessage)
    .positive(maxTokensMessage)
    .optional()
});

const tuningCodes: Record<keyof z.infer<typeof tuningSchema>, ModelConfigErrorCode> = {
  reasoningLevel: "INVALID_REASONING_LEVEL",
  temperature: "INVALID_TEMPERATURE",
  maxTokens: "INVALID_MAX_TOKENS"
};

export function listProviders(): string[] {
  return [...getProviders()].sort((a, b) => a.localeCompare(b));
}

export function listModelIds(provider: string): string[] {
  if (!listProviders().includes(provider)) {
    return [];
  }
  return getModels(provider as never)
    .map((model) => model.id)
    .sort((a, b) => a.localeCompare(b));
}

function tuningOf(config: ModelConfig): z.infer<typeof tuningSchema> {
  const parsed = tuningSchema.safeParse({
    reasoningLevel: config.reasoningLevel,
    temperature: config.temperature,
    maxTokens: config.maxTokens
  });
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const field = issue?.path[0];
  const code =
    field === "reasoningLevel" || field === "temperature" || field === "maxTokens"
      ? tuningCodes[field]
      : "INVALID_MODEL";
  throw new ModelConfigError(issue?.message ?? "Invalid model settings", code);
}

/** Resolves the configured provider/model against the pi-ai catalog and checks its tuning. */
export function validateModelConfig(config: ModelConfig): ResolvedModelConfig {
  if (!listProviders().includes(config.provider)) {
    throw new ModelConfigError(`Unknown provider: ${config.provider}`, "INVALID_PROVIDER");
  }
  if (!listModelIds(config.provider).includes(config.modelId)) {
    throw new ModelConfigError(
      `Unknown model "${config.modelId}" for provider "${config.provider}"`,
      "INVALID_MODEL"
    );
  }
  const tuning = tuningOf(config);

  const model = getModel(config.provider as never, config.modelId as never) as Model<Api> | undefined;
  if (!model) {
    throw new ModelConfigError(`Model lookup failed for "${config.provider}/${config.modelId}"`, "INVALID_MODEL");
  }

  const resolved: ResolvedModelConfig = { provider: config.provider, modelId: config.modelId, model };
  if (tuning.reasoningLevel !== undefined) {
    resolved.reasoningLevel = tuning.reasoningLevel;
  }
  if (tuning.temperature !== undefined) {
    resolved.temperature = tuning.temperature;
  }
  if (tuning.maxTokens !== undefined) {
    resolved.maxTokens = tuning.maxTokens;
  }
  return resolved;
}

const providerKeyEnv: Record<string, string> = {
  google: "GEMINI_API_KEY",
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
  groq: "GROQ_API_KEY",
  mistral: "MISTRAL_API_KEY",
  xai: "XAI_API_KEY"
};

/** Name of the environment variable pi-ai reads the provider's API key from, when known. */
export function providerApiKeyEnv(provider: string): string | null {
  return providerKeyEnv[provider] ?? null;
}
