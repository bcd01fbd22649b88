import { isAbsolute, resolve } from "node:path";

import { z } from "zod";

import type { ModelConfig } from "./llm/models.js";
import { providerApiKeyEnv } from "./llm/models.js";
import type { ResearchPolicy } from "./nodes/routing.js";

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ResponderConfig {
  model: ModelConfig;
  tavilyApiKey: string | null;
  workspaceDir: string;
  policy: ResearchPolicy;
  nodeTimeoutMs: number;
  checkpointDir: string;
  redisUrl: string | null;
  server: ServerConfig;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  LLM_PROVIDER: z.string().default("google"),
  LLM_MODEL: z.string().default("gemini-2.5-flash-lite"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  LLM_REASONING_LEVEL: z.string().optional(),
  TAVILY_API_KEY: z.string().optional(),
  WORKSPACE_DIR: z.string().optional(),
  MAX_RESEARCH_ITERATIONS: z.coerce.number().int().min(1).max(10).default(3),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  NODE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  CHECKPOINT_DIR: z.string().default(".incident-checkpoints"),
  REDIS_URL: z.string().url().optional(),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080)
});

/** Blank variables count as unset so that `FOO=` in a .env file falls back to the default. */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) {
      values[key] = trimmed;
    }
  }
  return values;
}

function absolute(path: string, cwd: string): string {
  return isAbsolute(path) ? path : resolve(cwd, path);
}

export function responderConfigFromEnv(env: NodeJS.ProcessEnv, cwd = process.cwd()): ResponderConfig {
  const parsed = envSchema.safeParse(presentValues(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const values = parsed.data;

  return {
    model: {
      provider: values.LLM_PROVIDER,
      modelId: values.LLM_MODEL,
      temperature: values.LLM_TEMPERATURE,
      ...(values.LLM_MAX_TOKENS !== undefined ? { maxTokens: values.LLM_MAX_TOKENS } : {}),
      ...(values.LLM_REASONING_LEVEL !== undefined ? { reasoningLevel: values.LLM_REASONING_LEVEL } : {})
    },
    tavilyApiKey: values.TAVILY_API_KEY ?? null,
    workspaceDir: absolute(values.WORKSPACE_DIR ?? ".", cwd),
    policy: {
      maxIterations: values.MAX_RESEARCH_ITERATIONS,
      confidenceThreshold: values.CONFIDENCE_THRESHOLD
    },
    nodeTimeoutMs: values.NODE_TIMEOUT_MS,
    checkpointDir: absolute(values.CHECKPOINT_DIR, cwd),
    redisUrl: values.REDIS_URL ?? null,
    server: {
      host: values.HOST,
      port: values.PORT
    }
  };
}

/** Missing credentials do not stop startup; the affected collaborator fails when first used. */
export function credentialWarnings(config: ResponderConfig, env: NodeJS.ProcessEnv): string[] {
  const warnings: string[] = [];
  const keyEnv = providerApiKeyEnv(config.model.provider);
  if (keyEnv && !env[keyEnv]?.trim()) {
    warnings.push(`${keyEnv} is not set; ${config.model.provider} requests will fail`);
  }
  if (!config.tavilyApiKey) {
    warnings.push("TAVILY_API_KEY is not set; web research will report failed searches");
  }
  return warnings;
}
