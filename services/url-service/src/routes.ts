import type { FastifyPluginAsync, FastifyReply } from "fastify";
import { PingNotSupportedError } from "./errors.js";
import { registry } from "./metrics.js";
import type { ShortenerService } from "./service.js";
import { validateHttpUrl } from "./validate_url.js";

export interface ShortenerRoutesOptions {
  service: ShortenerService;
  buildInfo: Record<string, string>;
}

interface BatchRequestItem {
  correlation_id: string;
  original_url: string;
}

const errorBody = {
  type: "object",
  properties: { error: { type: "string" } }
} as const;

const shortenResultBody = {
  type: "object",
  properties: { result: { type: "string" } }
} as const;

/** Aborts when the client goes away before the response is written. */
function clientGone(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

export const shortenerRoutes: FastifyPluginAsync<ShortenerRoutesOptions> = async (app, { service, buildInfo }) => {
  app.get("/health", async () => {
    return { status: "ok", ...buildInfo };
  });

  app.get("/ready", async (req, reply) => {
    try {
      await service.ping();
    } catch (err) {
      if (!(err instanceof PingNotSupportedError)) {
        req.log.warn({ err }, "storage not ready");
        return reply.code(503).send({ status: "unavailable", storage: service.storeKind });
      }
    }
    return { status: "ready", storage: service.storeKind };
  });

  app.get("/ping", async (req, reply) => {
    reply.type("text/plain; charset=utf-8");
    try {
      await service.ping(clientGone(reply));
      return reply.send("database connection is OK");
    } catch (err) {
      if (err instanceof PingNotSupportedError) {
        return reply.send("storage does not require a database connection");
      }
      req.log.error({ err }, "database ping failed");
      return reply.code(500).send("database connection error");
    }
  });

  app.get("/metrics", async (req, reply) => {
    try {
      const metrics = await registry.metrics();
      reply.header("Content-Type", registry.contentType).code(200).send(metrics);
    } catch (err) {
      req.log.error({ err }, "metrics failed");
      reply.code(500).send("metrics_error");
    }
  });

  // Plain-text shorten. A request without Content-Type is read as text too.
  await app.register(async (plain) => {
    plain.addContentTypeParser("*", { parseAs: "string" }, (_req, body, done) => {
      done(null, body);
    });

    plain.post<{ Body: string }>(
      "/",
      {
        schema: {
          body: { type: "string", minLength: 1, maxLength: 2048 }
        }
      },
      async (req, reply) => {
        reply.type("text/plain; charset=utf-8");

        const contentType = req.headers["content-type"];
        if (contentType !== undefined && !contentType.includes("text/plain")) {
          return reply.code(400).send("Content-Type must be text/plain");
        }

        const originalUrl = req.body.trim();
        const check = validateHttpUrl(originalUrl);
        if (!check.ok) {
          return reply.code(400).send(check.error);
        }

        const res = await service.shorten(originalUrl, req.userId, clientGone(reply));
        return reply.code(res.isNew ? 201 : 409).send(res.shortUrl);
      }
    );
  });

  app.post<{ Body: { url: string } }>(
    "/api/shorten",
    {
      schema: {
        body: {
          type: "object",
          required: ["url"],
          properties: {
            url: { type: "string", minLength: 1, maxLength: 2048 }
          }
        },
        response: {
          201: shortenResultBody,
          409: shortenResultBody,
          400: errorBody
        }
      }
    },
    async (req, reply) => {
      const check = validateHttpUrl(req.body.url);
      if (!check.ok) {
        return reply.code(400).send({ error: check.error });
      }

      const res = await service.shorten(req.body.url, req.userId, clientGone(reply));
      return reply.code(res.isNew ? 201 : 409).send({ result: res.shortUrl });
    }
  );

  app.post<{ Body: BatchRequestItem[] }>(
    "/api/shorten/batch",
    {
      schema: {
        body: {
          type: "array",
          minItems: 1,
          items: {
            type: "object",
            required: ["correlation_id", "original_url"],
            properties: {
              correlation_id: { type: "string", minLength: 1 },
              original_url: { type: "string", minLength: 1, maxLength: 2048 }
            }
          }
        },
        response: {
          201: {
            type: "array",
            items: {
              type: "object",
              properties: {
                correlation_id: { type: "string" },
                short_url: { type: "string" }
              }
            }
          },
          400: errorBody
        }
      }
    },
    async (req, reply) => {
      for (const item of req.body) {
        const check = validateHttpUrl(item.original_url, "original_url");
        if (!check.ok) {
          return reply.code(400).send({ error: `${item.correlation_id}: ${check.error}` });
        }
      }

      const results = await service.shortenBatch(
        req.body.map((item) => ({ correlationId: item.correlation_id, originalUrl: item.original_url })),
        req.userId,
        clientGone(reply)
      );

      return reply
        .code(201)
        .send(results.map((r) => ({ correlation_id: r.correlationId, short_url: r.shortUrl })));
    }
  );

  app.get(
    "/api/user/urls",
    {
      schema: {
        response: {
          200: {
            type: "array",
            items: {
              type: "object",
              properties: {
                short_url: { type: "string" },
                original_url: { type: "string" }
              }
            }
          },
          401: errorBody
        }
      }
    },
    async (req, reply) => {
      if (!req.authenticated) {
        return reply.code(401).send({ error: "unauthorized" });
      }

      const urls = await service.getUrlsByUserId(req.userId, clientGone(reply));
      if (urls.length === 0) {
        return reply.code(204).send();
      }

      return reply.send(urls.map((u) => ({ short_url: u.shortUrl, original_url: u.originalUrl })));
    }
  );

  app.delete<{ Body: string[] }>(
    "/api/user/urls",
    {
      schema: {
        body: {
          type: "array",
          items: { type: "string", minLength: 1, maxLength: 64 }
        },
        response: { 401: errorBody }
      }
    },
    async (req, reply) => {
      if (!req.authenticated) {
        return reply.code(401).send({ error: "unauthorized" });
      }

      await service.deleteUrls(req.body, req.userId, clientGone(reply));
      return reply.code(202).send();
    }
  );

  app.get<{ Params: { id: string } }>(
    "/:id",
    {
      schema: {
        params: {
          type: "object",
          required: ["id"],
          properties: { id: { type: "string", minLength: 1, maxLength: 64 } }
        },
        response: { 404: errorBody }
      }
    },
    async (req, reply) => {
      const originalUrl = await service.get(req.params.id, clientGone(reply));
      if (originalUrl === null) {
        return reply.code(404).send({ error: "not_found" });
      }

      return reply.code(307).header("Location", originalUrl).send();
    }
  );
};
