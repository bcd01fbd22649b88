import express from "express";
import { Redis } from "ioredis";

import { runEventChannel } from "@incident-responder/shared-types";
import type { EngineEvent } from "@incident-responder/graph-engine";

import { MemoryCheckpointStore } from "../../../src/checkpoints/store.js";
import { RedisCheckpointStore } from "../../../src/checkpoints/redis-store.js";
import { credentialWarnings, responderConfigFromEnv } from "../../../src/config.js";
import { PiAiLanguageModel } from "../../../src/llm/language-model.js";
import { validateModelConfig } from "../../../src/llm/models.js";
import { createEventLogger, stdoutLine } from "../../../src/logging.js";
import { IncidentResponder } from "../../../src/responder.js";
import { FileReader } from "../../../src/tools/file-reader.js";
import { TavilySearchClient } from "../../../src/tools/search.js";
import { getCheckpoint, resumeRun, startRun, type ApiResponse } from "./runs.js";

const config = responderConfigFromEnv(process.env);
for (const warning of credentialWarnings(config, process.env)) {
  process.stderr.write(`warning: ${warning}\n`);
}

const redis = config.redisUrl ? new Redis(config.redisUrl) : null;
const logEvent = createEventLogger(stdoutLine);

async function onEvent(event: EngineEvent): Promise<void> {
  logEvent(event);
  if (redis) {
    await redis.publish(runEventChannel(event.runId), JSON.stringify(event));
  }
}

const responder = new IncidentResponder({
  collaborators: {
    model: new PiAiLanguageModel(validateModelConfig(config.model)),
    search: new TavilySearchClient({ apiKey: config.tavilyApiKey }),
    files: new FileReader({ baseDir: config.workspaceDir })
  },
  policy: config.policy,
  store: redis ? new RedisCheckpointStore(redis) : new MemoryCheckpointStore(),
  nodeTimeoutMs: config.nodeTimeoutMs,
  onEvent
});

const app = express();
app.use(express.json({ limit: "1mb" }));

function route(handler: (req: express.Request) => Promise<ApiResponse>): express.RequestHandler {
  return (req, res, next) => {
    handler(req)
      .then((response) => {
        res.status(response.status).json(response.body);
      })
      .catch(next);
  };
}

app.get("/api/health", (_req, res) => {
  res.json({
    status: "ok",
    service: "incident-api",
    plan: responder.plan.name,
    checkpointStore: redis ? "redis" : "memory"
  });
});

app.post(
  "/api/runs",
  route((req) => startRun(responder, req.body))
);

app.post(
  "/api/runs/:runId/resume",
  route((req) => resumeRun(responder, req.params.runId ?? "", req.body))
);

app.get(
  "/api/runs/:runId/checkpoint",
  route((req) => getCheckpoint(responder, req.params.runId ?? ""))
);

app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  const message = err instanceof Error ? err.message : String(err);
  res.status(500).json({ error: message });
});

app.listen(config.server.port, config.server.host, () => {
  process.stdout.write(`incident-api listening on http://${config.server.host}:${config.server.port}\n`);
});
