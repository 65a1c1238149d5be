import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { LightMyRequestResponse } from "fastify";
import { buildApp } from "../../src/app.js";
import { ShortenerService } from "../../src/service.js";
import { MemoryUrlStore } from "../../src/storage_memory.js";
import { sequenceGenerator, silentLogger } from "./helpers.js";

const config = {
  cookieSecret: "test-secret",
  bodyLimitBytes: 16384,
  rateLimitEnabled: false,
  rateLimitMax: 60,
  rateLimitTimeWindowMs: 60000
};

function cookieFrom(res: LightMyRequestResponse): string {
  const raw = res.headers["set-cookie"];
  const first = Array.isArray(raw) ? raw[0] : raw;
  return typeof first === "string" ? (first.split(";")[0] ?? "") : "";
}

describe("url-service http", () => {
  let service: ShortenerService;
  let app: Awaited<ReturnType<typeof buildApp>>;

  beforeEach(async () => {
    const logger = silentLogger();
    service = new ShortenerService({
      store: new MemoryUrlStore(),
      generator: sequenceGenerator("abc12345", "def67890", "ghi13579"),
      baseUrl: "http://x",
      logger
    });
    app = await buildApp({ config, service, logger, buildInfo: { service: "url-service" } });
  });

  afterEach(async () => {
    await app.close();
    await service.close();
  });

  test("POST / shortens a plain-text url, then answers 409 for it", async () => {
    const send = () =>
      app.inject({
        method: "POST",
        url: "/",
        headers: { "content-type": "text/plain" },
        payload: "  https://example.com  "
      });

    const first = await send();
    expect(first.statusCode).toBe(201);
    expect(first.body).toBe("http://x/abc12345");

    const second = await send();
    expect(second.statusCode).toBe(409);
    expect(second.body).toBe("http://x/abc12345");
  });

  test("POST / rejects a non-http url", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/",
      headers: { "content-type": "text/plain" },
      payload: "not-a-url"
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe("url must be a valid URL");
  });

  test("POST / reads a body without Content-Type as plain text", async () => {
    const res = await app.inject({ method: "POST", url: "/", payload: "https://example.com" });

    expect(res.statusCode).toBe(201);
    expect(res.body).toBe("http://x/abc12345");
  });

  test("POST / rejects other content types", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/",
      headers: { "content-type": "application/xml" },
      payload: "https://example.com"
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe("Content-Type must be text/plain");
  });

  test("POST /api/shorten returns the result as json", async () => {
    const res = await app.inject({ method: "POST", url: "/api/shorten", payload: { url: "https://example.com" } });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ result: "http://x/abc12345" });
  });

  test("POST /api/shorten without a url is a bad request", async () => {
    const res = await app.inject({ method: "POST", url: "/api/shorten", payload: {} });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "bad_request" });
  });

  test("POST /api/shorten/batch keeps correlation ids", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/shorten/batch",
      payload: [
        { correlation_id: "c1", original_url: "https://one.test" },
        { correlation_id: "c2", original_url: "https://two.test" }
      ]
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual([
      { correlation_id: "c1", short_url: "http://x/abc12345" },
      { correlation_id: "c2", short_url: "http://x/def67890" }
    ]);
  });

  test("POST /api/shorten/batch names the item with a bad url", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/shorten/batch",
      payload: [
        { correlation_id: "c1", original_url: "https://one.test" },
        { correlation_id: "c2", original_url: "mailto:someone@example.com" }
      ]
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "c2: original_url must be http/https" });
  });

  test("GET /:id redirects, and 404s for unknown ids", async () => {
    await app.inject({ method: "POST", url: "/api/shorten", payload: { url: "https://example.com" } });

    const hit = await app.inject({ method: "GET", url: "/abc12345" });
    expect(hit.statusCode).toBe(307);
    expect(hit.headers.location).toBe("https://example.com");

    const miss = await app.inject({ method: "GET", url: "/nope" });
    expect(miss.statusCode).toBe(404);
    expect(miss.json()).toEqual({ error: "not_found" });
  });

  test("user urls need the signed cookie", async () => {
    const res = await app.inject({ method: "GET", url: "/api/user/urls" });

    expect(res.statusCode).toBe(401);
    expect(cookieFrom(res).startsWith("user_id=")).toBe(true);
  });

  test("a user lists and deletes their own urls", async () => {
    const created = await app.inject({ method: "POST", url: "/api/shorten", payload: { url: "https://example.com" } });
    const cookie = cookieFrom(created);

    const listed = await app.inject({ method: "GET", url: "/api/user/urls", headers: { cookie } });
    expect(listed.statusCode).toBe(200);
    expect(listed.headers["set-cookie"]).toBeUndefined();
    expect(listed.json()).toEqual([{ short_url: "http://x/abc12345", original_url: "https://example.com" }]);

    const deleted = await app.inject({
      method: "DELETE",
      url: "/api/user/urls",
      headers: { cookie },
      payload: ["abc12345"]
    });
    expect(deleted.statusCode).toBe(202);
    await service.idle();

    expect((await app.inject({ method: "GET", url: "/abc12345" })).statusCode).toBe(404);
    expect((await app.inject({ method: "GET", url: "/api/user/urls", headers: { cookie } })).statusCode).toBe(204);
  });

  test("another user's delete leaves the url in place", async () => {
    await app.inject({ method: "POST", url: "/api/shorten", payload: { url: "https://example.com" } });
    const other = cookieFrom(await app.inject({ method: "GET", url: "/health" }));

    const stranger = await app.inject({ method: "GET", url: "/api/user/urls", headers: { cookie: other } });
    expect(stranger.statusCode).toBe(204);

    const deleted = await app.inject({
      method: "DELETE",
      url: "/api/user/urls",
      headers: { cookie: other },
      payload: ["abc12345"]
    });
    expect(deleted.statusCode).toBe(202);
    await service.idle();

    expect((await app.inject({ method: "GET", url: "/abc12345" })).statusCode).toBe(307);
  });

  test("GET /ping reports that memory storage has no database", async () => {
    const res = await app.inject({ method: "GET", url: "/ping" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe("storage does not require a database connection");
  });

  test("GET /ready names the storage", async () => {
    const res = await app.inject({ method: "GET", url: "/ready" });
    expect(res.json()).toEqual({ status: "ready", storage: "memory" });
  });

  test("GET /health returns build info", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.json()).toEqual({ status: "ok", service: "url-service" });
  });

  test("echoes X-Request-Id", async () => {
    const res = await app.inject({ method: "GET", url: "/health", headers: { "x-request-id": "demo-123" } });
    expect(res.headers["x-request-id"]).toBe("demo-123");
  });

  test("GET /metrics exposes request counters", async () => {
    await app.inject({ method: "GET", url: "/health" });
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("http_requests_total");
    expect(res.body).toContain("urls_shortened_total");
  });
});
