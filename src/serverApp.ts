import fastify, { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "./config";
import { ArtifactStore } from "./services/artifactStore";
import { RunLogIndexEntry, RunLogSnapshot } from "./services/runLogArchive";
import { isTerminalStatus, RunStore } from "./services/runStore";
import { RunInput } from "./types";
import { errorMessage } from "./utils/text";

export interface CoordinatorLike {
  start(input: RunInput): Promise<string>;
  cancel(runId: string): boolean;
}

export interface LlmLike {
  generate(prompt: string, system: string, maxOutputTokens: number): Promise<string>;
}

export interface RunLogReaderLike {
  list(limit?: number): Promise<RunLogIndexEntry[]>;
  readByRunId(runId: string): Promise<RunLogSnapshot | undefined>;
}

export interface ServerDeps {
  store: RunStore;
  artifacts: ArtifactStore;
  coordinator: CoordinatorLike;
  llm: LlmLike;
  runLogs: RunLogReaderLike;
}

const runInputSchema = z.object({
  target: z.string().trim().min(1).max(4000),
  driverName: z
    .string()
    .regex(/^[a-zA-Z0-9_-]{1,40}$/, "Use letters, digits, dash or underscore.")
    .optional(),
  maxRetries: z.number().int().min(1).max(20).optional(),
  maxSupervisorAttempts: z.number().int().min(1).max(10).optional(),
  envVars: z.record(z.string()).optional()
});

const llmPingSchema = z.object({
  prompt: z.string().min(1).max(200).default("Respond with one short line: pong")
});

const runLogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20)
});

type RunParams = { Params: { id: string } };

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: true });

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/tools/overview", async () => ({
    ok: true,
    service: "driver-forge",
    port: config.port,
    model: config.model,
    diagnosticModel: config.diagnosticModel,
    openaiBaseUrl: config.openaiBaseUrl,
    outputRoot: config.outputRoot,
    sandboxCommand: config.sandboxCommand,
    now: new Date().toISOString()
  }));

  app.post("/api/tools/llm/ping", async (request, reply) => {
    const parsed = llmPingSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const started = Date.now();
    try {
      const output = await deps.llm.generate(
        parsed.data.prompt,
        "You are a health-check assistant. Respond in one short plain-text sentence.",
        64
      );
      return {
        ok: true,
        latencyMs: Date.now() - started,
        output: output.slice(0, 1000)
      };
    } catch (error: unknown) {
      return reply.code(502).send({
        ok: false,
        latencyMs: Date.now() - started,
        error: errorMessage(error)
      });
    }
  });

  app.post("/api/runs", async (request, reply) => {
    const parsed = runInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const body = parsed.data;
    const runId = await deps.coordinator.start({
      target: body.target,
      ...(body.driverName ? { driverName: body.driverName } : {}),
      maxRetries: body.maxRetries ?? config.maxRetries,
      maxSupervisorAttempts: body.maxSupervisorAttempts ?? config.maxSupervisorAttempts,
      ...(body.envVars ? { envVars: body.envVars } : {})
    });
    return reply.code(202).send({ runId });
  });

  app.get("/api/runs", async () => ({ runs: deps.store.all() }));

  app.get<RunParams>("/api/runs/:id", async (request, reply) => {
    const { id } = request.params;
    const run = deps.store.get(id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return { run, events: deps.store.getEvents(id) };
  });

  app.get<RunParams>("/api/runs/:id/events", async (request, reply) => {
    const { id } = request.params;
    const run = deps.store.get(id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }

    reply.raw.setHeader("Content-Type", "text/event-stream");
    reply.raw.setHeader("Cache-Control", "no-cache");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.flushHeaders?.();

    const send = (data: unknown): void => {
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    const unsubscribe = deps.store.follow(id, send);
    request.raw.on("close", () => {
      unsubscribe();
      reply.raw.end();
    });
  });

  app.get<RunParams>("/api/runs/:id/artifacts", async (request, reply) => {
    const { id } = request.params;
    const run = deps.store.get(id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return {
      artifacts: deps.artifacts.getAll(id),
      finalArtifactId: run.report?.finalArtifact?.id ?? null,
      outputPath: run.outputPath ?? null
    };
  });

  app.post<RunParams>("/api/runs/:id/cancel", async (request, reply) => {
    const { id } = request.params;
    const run = deps.store.get(id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    if (isTerminalStatus(run.status) || !deps.coordinator.cancel(id)) {
      return reply.code(409).send({ error: `Run is not cancellable (status: ${run.status}).` });
    }
    return reply.code(202).send({ runId: id, cancelRequested: true });
  });

  app.get("/api/run-logs", async (request, reply) => {
    const parsed = runLogsQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }
    return { runLogs: await deps.runLogs.list(parsed.data.limit) };
  });

  app.get<{ Params: { runId: string } }>("/api/run-logs/:runId", async (request, reply) => {
    const snapshot = await deps.runLogs.readByRunId(request.params.runId);
    if (!snapshot) {
      return reply.code(404).send({ error: "Run log not found" });
    }
    return { snapshot };
  });

  return app;
};
