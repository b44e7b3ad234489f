import bodyParser from "body-parser";
import cors from "cors";
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { z } from "zod";
import type { ChatCompressionService } from "../compression/compressionService";
import { COMPRESSION_STRATEGIES } from "../compression/types";
import { AIError, ValidationError, type AIErrorKind } from "../errors";
import { isRecord } from "../providers/shared";
import type { ChatRouter } from "../router";
import type { SchedulerManager } from "../scheduler/schedulerManager";
import type { ConfigRepository } from "../sessions/configRepository";
import type { ChatSession, SessionRepository } from "../sessions/sessionRepository";
import { PROVIDER_LABELS, PROVIDER_TYPES, defaultModelOf, isProviderType } from "../types";
import { Logger } from "../utils/logger";

export interface AppDeps {
  router: ChatRouter;
  sessions: SessionRepository;
  configs: ConfigRepository;
  compression: ChatCompressionService;
  scheduler: SchedulerManager;
  corsOrigins: string[];
  bodyLimit: string;
  logger?: Logger;
}

const providerIdSchema = z.enum(PROVIDER_TYPES);

const chatBodySchema = z.object({
  message: z.string().min(1),
  sessionId: z.string().min(1).optional(),
  providerId: providerIdSchema.optional(),
  model: z.string().min(1).optional(),
  systemPrompt: z.string().optional(),
  parameters: z
    .object({
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
      topP: z.number().min(0).max(1).optional(),
      topK: z.number().int().positive().optional(),
      frequencyPenalty: z.number().optional(),
      presencePenalty: z.number().optional(),
      stopSequences: z.array(z.string()).optional(),
      responseFormat: z.enum(["plain_text", "json", "xml"]).optional(),
    })
    .optional(),
});

const compressBodySchema = z.object({
  providerId: providerIdSchema.optional(),
  model: z.string().min(1).optional(),
});

const fraction = z.number().gt(0).max(1);

const compressionConfigBodySchema = z.object({
  strategy: z.enum(COMPRESSION_STRATEGIES).optional(),
  fullReplacementMessageThreshold: z.number().int().positive().optional(),
  slidingWindowMessageThreshold: z.number().int().positive().optional(),
  slidingWindowKeepLast: z.number().int().positive().optional(),
  tokenBasedThresholdPercent: fraction.optional(),
  tokenBasedKeepPercent: fraction.optional(),
});

const createTaskBodySchema = z.object({
  title: z.string().optional(),
  taskRequest: z.string(),
  intervalSeconds: z.number().int().positive(),
  executeImmediately: z.boolean().optional(),
  providerId: providerIdSchema.optional(),
  model: z.string().min(1).optional(),
});

export function statusForKind(kind: AIErrorKind): number {
  switch (kind) {
    case "validation":
    case "unsupported_provider":
      return 400;
    case "not_found":
      return 404;
    case "configuration":
      return 503;
    case "network":
    case "parse":
      return 502;
    default:
      return 500;
  }
}

function sendError(res: Response, error: AIError): void {
  const body: Record<string, unknown> = { ok: false, error: error.message, kind: error.kind };
  if (error instanceof ValidationError) body.errors = error.errors;
  res.status(statusForKind(error.kind)).json(body);
}

function sendInvalidBody(res: Response, error: z.ZodError): void {
  res.status(400).json({
    ok: false,
    error: "Invalid request body",
    kind: "validation",
    errors: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
  });
}

function sessionSummary(session: ChatSession) {
  return {
    id: session.id,
    providerId: session.providerId,
    title: session.title,
    scheduledTaskId: session.scheduledTaskId,
    messageCount: session.messages.length,
    compressionCount: session.compressionCount,
    createdAt: session.createdAt,
    lastAccessedAt: session.lastAccessedAt,
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { router, sessions, configs, compression, scheduler } = deps;
  const logger = deps.logger ?? new Logger({ service: "http" });

  const app = express();
  app.use(cors({ origin: deps.corsOrigins, credentials: true }));
  app.use(bodyParser.json({ limit: deps.bodyLimit }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post(
    "/v1/chat",
    route(async (req, res) => {
      const body = chatBodySchema.safeParse(req.body);
      if (!body.success) return sendInvalidBody(res, body.error);

      const result = await router.sendMessage(body.data);
      if (!result.ok) return sendError(res, result.error);
      res.json({ ok: true, ...result.value });
    }),
  );

  app.get(
    "/v1/providers",
    route(async (_req, res) => {
      const stored = await configs.getAllConfigs();
      if (!stored.ok) return sendError(res, stored.error);

      const providers = await Promise.all(
        stored.value.map(async (config) => {
          const validation = await router.validateProvider(config.type);
          return {
            providerId: config.type,
            label: PROVIDER_LABELS[config.type],
            defaultModel: defaultModelOf(config),
            isDefault: config.type === router.defaultProvider,
            validation: validation.ok ? validation.value : { valid: false, errors: [validation.error.message] },
          };
        }),
      );
      res.json({ ok: true, providers });
    }),
  );

  app.get(
    "/v1/providers/:providerId/models",
    route(async (req, res) => {
      const { providerId } = req.params;
      if (providerId === undefined || !isProviderType(providerId)) {
        res.status(400).json({ ok: false, error: `Unknown provider: ${providerId}`, kind: "unsupported_provider" });
        return;
      }
      const models = await router.getModels(providerId);
      if (!models.ok) return sendError(res, models.error);
      res.json({ ok: true, models: models.value });
    }),
  );

  app.get(
    "/v1/sessions",
    route(async (_req, res) => {
      const listed = await sessions.listSessions();
      if (!listed.ok) return sendError(res, listed.error);
      res.json({ ok: true, sessions: listed.value.map(sessionSummary) });
    }),
  );

  app.get(
    "/v1/sessions/:id",
    route(async (req, res) => {
      const session = await sessions.getSession(req.params.id ?? "");
      if (!session.ok) return sendError(res, session.error);
      res.json({ ok: true, session: session.value });
    }),
  );

  app.delete(
    "/v1/sessions/:id",
    route(async (req, res) => {
      const sessionId = req.params.id ?? "";
      // A task's session goes away with its task
      const task = scheduler.getTaskBySessionId(sessionId);
      const deleted = task ? await scheduler.deleteTask(task.id) : await sessions.deleteSession(sessionId);
      if (!deleted.ok) return sendError(res, deleted.error);
      res.json({ ok: true });
    }),
  );

  app.post(
    "/v1/sessions/:id/clear",
    route(async (req, res) => {
      const cleared = await sessions.clearMessages(req.params.id ?? "");
      if (!cleared.ok) return sendError(res, cleared.error);
      res.json({ ok: true });
    }),
  );

  app.post(
    "/v1/sessions/:id/compress",
    route(async (req, res) => {
      const body = compressBodySchema.safeParse(req.body ?? {});
      if (!body.success) return sendInvalidBody(res, body.error);

      const session = await sessions.getSession(req.params.id ?? "");
      if (!session.ok) return sendError(res, session.error);

      const result = await compression.compressSession(
        session.value.id,
        body.data.providerId ?? session.value.providerId,
        body.data.model,
      );
      if (!result.ok) return sendError(res, result.error);
      res.json({
        ok: true,
        summaryGenerated: result.value.summaryGenerated,
        originalMessageCount: result.value.originalMessageCount,
        newMessageCount: result.value.newMessageCount,
        compressionRatio: result.value.compressionRatio,
      });
    }),
  );

  app.put(
    "/v1/sessions/:id/compression",
    route(async (req, res) => {
      const body = compressionConfigBodySchema.safeParse(req.body ?? {});
      if (!body.success) return sendInvalidBody(res, body.error);

      const updated = await compression.updateCompressionConfig(req.params.id ?? "", body.data);
      if (!updated.ok) return sendError(res, updated.error);
      res.json({ ok: true, compressionConfig: updated.value });
    }),
  );

  app.post(
    "/v1/scheduler/tasks",
    route(async (req, res) => {
      const body = createTaskBodySchema.safeParse(req.body);
      if (!body.success) return sendInvalidBody(res, body.error);

      const created = await scheduler.createTask(body.data);
      if (!created.ok) return sendError(res, created.error);
      res.status(201).json({ ok: true, ...created.value });
    }),
  );

  app.get("/v1/scheduler/tasks", (_req, res) => {
    res.json({ ok: true, tasks: scheduler.listTasks() });
  });

  app.get("/v1/scheduler/tasks/:id", (req, res) => {
    const info = scheduler.getTaskInfo(req.params.id ?? "");
    if (!info) {
      res.status(404).json({ ok: false, error: `Task not found: ${req.params.id}`, kind: "not_found" });
      return;
    }
    res.json({ ok: true, task: info });
  });

  app.post("/v1/scheduler/tasks/:id/start", (req, res) => {
    const started = scheduler.startTask(req.params.id ?? "");
    if (!started.ok) return sendError(res, started.error);
    res.json({ ok: true });
  });

  app.post("/v1/scheduler/tasks/:id/stop", (req, res) => {
    const stopped = scheduler.stopTask(req.params.id ?? "");
    if (!stopped.ok) return sendError(res, stopped.error);
    res.json({ ok: true });
  });

  app.delete(
    "/v1/scheduler/tasks/:id",
    route(async (req, res) => {
      const deleted = await scheduler.deleteTask(req.params.id ?? "");
      if (!deleted.ok) return sendError(res, deleted.error);
      res.json({ ok: true });
    }),
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isRecord(error) && error.type === "entity.parse.failed") {
      res.status(400).json({ ok: false, error: "Malformed JSON body", kind: "validation" });
      return;
    }
    if (error instanceof AIError) return sendError(res, error);

    logger.error("Unhandled request error", error);
    res.status(500).json({ ok: false, error: error instanceof Error ? error.message : "Unknown error" });
  });

  return app;
}
