/**
 * HTTP status surface for operators and scrapers
 *
 * GET /health   overall + per-service probe results
 * GET /status   full runtime report (breakers, pool, cache, diagnostics...)
 * GET /metrics  Prometheus exposition
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { logger } from "../../utils/logger.js";
import { AppError, isOperationalError, sanitizeError } from "../../utils/errors.js";
import { getMetrics, metricsRegistry } from "../../utils/metrics.js";
import type { ClientRuntime } from "../api/runtime.js";

export interface StatusServerOptions {
  /** Browser origins allowed to read the endpoints (dashboards) */
  allowedOrigins?: string[];
  /** Fastify request logging */
  logRequests?: boolean;
}

type StatusSource = Pick<ClientRuntime, "getStatus" | "health">;

export async function buildStatusServer(
  runtime: StatusSource,
  options: StatusServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logRequests ?? false });
  const allowedOrigins = options.allowedOrigins ?? [];

  await app.register(cors, {
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, Prometheus, health checkers)
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      logger.warn("CORS blocked origin", { origin });
      callback(new AppError("Origin not allowed", "CORS_ORIGIN_DENIED", 403), false);
    },
    methods: ["GET"],
    maxAge: 3600,
  });

  app.setErrorHandler((error, request, reply) => {
    const context = { method: request.method, url: request.url, error };
    if (isOperationalError(error)) {
      logger.warn("Status request failed", context);
    } else {
      logger.error("Status request failed unexpectedly", context);
    }

    const statusCode = error instanceof AppError ? error.statusCode : 500;
    return reply.status(statusCode).send({ error: sanitizeError(error) });
  });

  app.get("/health", async () => {
    const services = await runtime.health.checkAll();
    const allHealthy = Object.values(services).every(Boolean);

    return {
      status: allHealthy ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      services,
    };
  });

  app.get("/status", async () => runtime.getStatus());

  app.get("/metrics", async (_, reply) => {
    reply.header("Content-Type", metricsRegistry.contentType);
    return getMetrics();
  });

  return app;
}
