import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { NexusConfig } from "../nexus/config.js";
import { toNexusError } from "../nexus/errors.js";
import { createChildLogger } from "../nexus/logger.js";
import { ROUTING_DECISIONS, specialistsFor } from "../nexus/orchestrator/index.js";
import type { Orchestrator, RunInput, RunResult } from "../nexus/orchestrator/index.js";
import { ConcurrencyLimiter, CapacityExceededError } from "../nexus/utils/concurrencyLimiter.js";
import { MAX_TIMEOUT_MS } from "../nexus/utils/deadline.js";
import { VERSION } from "../version.js";

const log = createChildLogger({ service: "HttpServer" });

/** Per-request ceiling on the iteration override */
export const MAX_REQUEST_ITERATIONS = 50;

const QuerySchema = z.object({
  query: z.string().trim().min(3, "Query must be at least 3 characters"),
  userId: z.string().min(1).optional(),
  userRole: z.string().min(1).optional(),
  maxIterations: z.number().int().positive().max(MAX_REQUEST_ITERATIONS).optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional()
});

export type HttpAppOptions = {
  orchestrator: Orchestrator;
  /** Maximum concurrent runs */
  maxConcurrentRuns?: number;
  /** Timeout for waiting in queue (ms) */
  queueTimeoutMs?: number;
};

function statusFor(result: RunResult): 200 | 500 | 502 | 503 {
  if (result.status !== "failed") return 200;
  switch (result.error?.code) {
    case "ALL_SPECIALISTS_FAILED":
    case "RUN_CANCELLED":
      return 503;
    case "REASONING_SERVICE_ERROR":
      return 502;
    default:
      return 500;
  }
}

export function createApp(options: HttpAppOptions): Hono {
  const app = new Hono();
  const { orchestrator } = options;

  // Ingress limiter - wraps query execution only
  const limiter = new ConcurrencyLimiter({
    maxConcurrent: options.maxConcurrentRuns ?? 5,
    queueTimeoutMs: options.queueTimeoutMs ?? 30_000
  });

  app.onError((err, c) => {
    if (err instanceof CapacityExceededError) {
      return c.json({
        code: "CAPACITY_EXCEEDED",
        message: err.message,
        retryAfterMs: err.retryAfterMs
      }, 503);
    }
    const nexusErr = toNexusError(err);
    if (nexusErr.code === "BAD_REQUEST") {
      return c.json(nexusErr.toJSON(), 400);
    }
    log.error({ err }, "Unhandled request error");
    return c.json(nexusErr.toJSON(), 500);
  });

  app.get("/health", (c) => {
    return c.json({
      ok: true,
      version: VERSION,
      reasoning: orchestrator.reasoningStatus,
      specialists: orchestrator.catalog().map((s) => s.id),
      limiter: {
        running: limiter.running,
        queued: limiter.queued,
        atCapacity: limiter.atCapacity
      }
    });
  });

  app.get("/specialists", (c) => {
    const routing = ROUTING_DECISIONS.map((label) => ({ label, specialists: specialistsFor(label) }));
    return c.json({ specialists: orchestrator.catalog(), routing });
  });

  app.post("/query", async (c) => {
    let json: unknown;
    try {
      json = await c.req.json();
    } catch {
      return c.json({ code: "BAD_REQUEST", message: "Invalid JSON body" }, 400);
    }

    const parsed = QuerySchema.safeParse(json);
    if (!parsed.success) {
      return c.json(toNexusError(parsed.error).toJSON(), 400);
    }
    const body = parsed.data;

    const input: RunInput = { query: body.query };
    if (body.userId !== undefined) input.userId = body.userId;
    if (body.userRole !== undefined) input.userRole = body.userRole;
    const config: NonNullable<RunInput["config"]> = {};
    if (body.maxIterations !== undefined) config.maxIterations = body.maxIterations;
    if (body.timeoutMs !== undefined) config.runTimeoutMs = body.timeoutMs;
    if (Object.keys(config).length > 0) input.config = config;

    const result = await limiter.run(() => orchestrator.run(input));

    return c.json({
      runId: result.runId,
      response: result.finalResponse,
      routingDecision: result.routingDecision,
      specialistsInvolved: result.specialistsInvolved,
      status: result.status,
      synthesized: result.synthesized,
      specialists: result.specialists,
      ...(result.error !== undefined && { error: result.error }),
      executionTimeMs: result.durationMs,
      timestamp: new Date().toISOString()
    }, statusFor(result));
  });

  return app;
}

export type HttpServerOptions = HttpAppOptions & {
  config: Readonly<NexusConfig>;
};

export function startHttpServer(options: HttpServerOptions): ReturnType<typeof serve> {
  const { host, port } = options.config.server;
  const app = createApp({
    orchestrator: options.orchestrator,
    maxConcurrentRuns: options.maxConcurrentRuns ?? options.config.maxConcurrentRuns,
    queueTimeoutMs: options.queueTimeoutMs ?? options.config.queueTimeoutMs
  });

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    log.info({ host, port: info.port }, `HTTP server listening on http://${host}:${info.port}`);
  });
  return server;
}
