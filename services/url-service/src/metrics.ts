import client from "prom-client";

export const registry = new client.Registry();

// Default Node.js / process metrics (CPU, memory, GC, event loop, etc.)
client.collectDefaultMetrics({ register: registry });

export const httpRequestsTotal = new client.Counter({
  name: "http_requests_total",
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

// "existing" counts shorten calls answered by dedup
export const urlsShortenedTotal = new client.Counter({
  name: "urls_shortened_total",
  help: "Shorten results by whether a new short id was created",
  labelNames: ["result"] as const,
  registers: [registry],
});

export const urlDeletionsTotal = new client.Counter({
  name: "url_deletions_total",
  help: "Background per-id delete attempts by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});
