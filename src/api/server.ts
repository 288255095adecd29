import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import type { Orchestrator } from "../agents/orchestrator.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { toHttpError } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface ApiServerDeps {
  orchestrator: Orchestrator;
  rateLimiter: RateLimiter;
}

interface SendMessageBody {
  message?: unknown;
}

/** Builds the HTTP front end without listening, so tests can `inject`. */
export async function buildApiServer(deps: ApiServerDeps): Promise<FastifyInstance> {
  const { orchestrator, rateLimiter } = deps;
  const app = Fastify({ logger: false });

  await app.register(fastifyCors, { origin: true });

  app.post<{ Body: SendMessageBody | null }>("/api/send_message", async (request, reply) => {
    const message = request.body?.message;
    if (typeof message !== "string" || !message.trim()) {
      reply.code(400);
      return { error: "Message cannot be empty.", status: "invalid" };
    }

    try {
      const result = await orchestrator.submitUserMessage(message);
      return {
        response: result.finalResponse,
        instances: result.instances,
        degraded: result.degraded,
        warnings: result.warnings,
      };
    } catch (err) {
      const { statusCode, body } = toHttpError(err);
      reply.code(statusCode);
      return body;
    }
  });

  app.get("/api/instances", async () => {
    return orchestrator.listInstances();
  });

  app.get<{ Params: { id: string } }>("/api/instance/:id", async (request, reply) => {
    const instance = orchestrator.getInstance(request.params.id);
    if (!instance) {
      reply.code(404);
      return { error: "Instance not found" };
    }
    return instance;
  });

  app.get("/api/network/stats", async () => {
    return orchestrator.networkStats();
  });

  app.post("/api/clear", async (_request, reply) => {
    try {
      orchestrator.clear();
      return { success: true };
    } catch (err) {
      const { statusCode, body } = toHttpError(err);
      reply.code(statusCode);
      return body;
    }
  });

  app.get("/api/metrics", async () => {
    return { endpoints: rateLimiter.getCallMetrics() };
  });

  app.get("/api/health", async () => {
    const stats = orchestrator.networkStats();
    return { ok: true, timestamp: Date.now(), mother: stats.motherStatus, busy: orchestrator.isBusy };
  });

  app.setNotFoundHandler(async (_request, reply) => {
    reply.code(404);
    return { error: "Not found" };
  });

  return app;
}

export async function startApiServer(
  deps: ApiServerDeps,
  port: number,
  host: string,
): Promise<FastifyInstance> {
  const app = await buildApiServer(deps);
  await app.listen({ port, host });
  logger.info({ port, host }, "API server started");
  return app;
}
