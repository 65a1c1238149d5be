import Fastify from "fastify";
import type { FastifyError } from "fastify";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { identify } from "./auth.js";
import type { Config } from "./config.js";
import type { Logger } from "./logger.js";
import { httpRequestDurationSeconds, httpRequestsTotal } from "./metrics.js";
import { getOrCreateRequestId } from "./request_id.js";
import { shortenerRoutes } from "./routes.js";
import type { ShortenerService } from "./service.js";

declare module "fastify" {
  interface FastifyRequest {
    /** Opaque id from the signed user cookie, or one minted for this request. */
    userId: string;
    authenticated: boolean;
    metricsStart?: bigint;
  }
}

export type AppConfig = Pick<
  Config,
  "cookieSecret" | "bodyLimitBytes" | "rateLimitEnabled" | "rateLimitMax" | "rateLimitTimeWindowMs"
>;

export interface AppOptions {
  config: AppConfig;
  service: ShortenerService;
  logger: Logger;
  buildInfo?: Record<string, string>;
}

export async function buildApp({ config, service, logger, buildInfo = {} }: AppOptions) {
  const app = Fastify({
    loggerInstance: logger,
    bodyLimit: config.bodyLimitBytes,
    trustProxy: true,
    genReqId: (req) => getOrCreateRequestId(req.headers)
  });

  app.decorateRequest("userId", "");
  app.decorateRequest("authenticated", false);

  app.addHook("onRequest", async (req, reply) => {
    reply.header("X-Request-Id", req.id);
    req.metricsStart = process.hrtime.bigint();

    const identity = identify(req.headers.cookie, config.cookieSecret);
    req.userId = identity.userId;
    req.authenticated = identity.authenticated;
    if (identity.setCookie) reply.header("Set-Cookie", identity.setCookie);
  });

  app.addHook("onResponse", async (req, reply) => {
    const start = req.metricsStart;
    if (start === undefined) return;

    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    const labels = {
      method: req.method,
      route: req.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode)
    };

    httpRequestsTotal.inc(labels);
    httpRequestDurationSeconds.observe(labels, durationSeconds);
  });

  await app.register(helmet, {
    contentSecurityPolicy: false
  });

  if (config.rateLimitEnabled) {
    await app.register(rateLimit, {
      max: config.rateLimitMax,
      timeWindow: config.rateLimitTimeWindowMs
    });
  }

  app.setErrorHandler((err: FastifyError, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      req.log.error({ err }, "request failed");
    } else {
      req.log.info({ err }, "request rejected");
    }

    let error = "internal_error";
    if (statusCode === 429) error = "rate_limited";
    else if (statusCode < 500) error = "bad_request";

    return reply.code(statusCode).send({ error });
  });

  await app.register(shortenerRoutes, { service, buildInfo });

  return app;
}
