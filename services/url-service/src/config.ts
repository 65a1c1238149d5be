import { DEFAULT_SHORT_ID_LENGTH } from "./generator.js";
import { LOG_LEVELS } from "./logger.js";
import type { LogLevel } from "./logger.js";
import { DEFAULT_DELETE_CONCURRENCY } from "./service.js";

export interface Config {
  port: number;
  host: string;
  /** No trailing slash. */
  baseUrl: string;
  databaseUrl?: string;
  fileStoragePath?: string;
  logLevel: LogLevel;
  shortIdLength: number;
  deleteConcurrency: number;
  cookieSecret: string;
  bodyLimitBytes: number;
  rateLimitEnabled: boolean;
  rateLimitMax: number;
  rateLimitTimeWindowMs: number;
}

type Env = Record<string, string | undefined>;

function mustBeUrl(s: string): string {
  try {
    const u = new URL(s);
    if (u.protocol !== "http:" && u.protocol !== "https:") throw new Error("bad protocol");
    return s.replace(/\/+$/, "");
  } catch {
    throw new Error(`Invalid BASE_URL: ${s}`);
  }
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`Invalid ${name}: ${raw}`);
  return n;
}

function logLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === "") return "info";
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) throw new Error(`Invalid LOG_LEVEL: ${raw}`);
  return level;
}

function optional(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    port: positiveInt(env, "PORT", 8080),
    host: env.HOST ?? "0.0.0.0",
    baseUrl: mustBeUrl(env.BASE_URL ?? "http://localhost:8080"),
    databaseUrl: optional(env.DATABASE_DSN) ?? optional(env.DATABASE_URL),
    fileStoragePath: optional(env.FILE_STORAGE_PATH),
    logLevel: logLevel(env.LOG_LEVEL),
    shortIdLength: positiveInt(env, "SHORT_ID_LENGTH", DEFAULT_SHORT_ID_LENGTH),
    deleteConcurrency: positiveInt(env, "DELETE_CONCURRENCY", DEFAULT_DELETE_CONCURRENCY),
    cookieSecret: env.COOKIE_SECRET ?? "change-me",
    bodyLimitBytes: positiveInt(env, "BODY_LIMIT_BYTES", 1024 * 16), // 16KB
    rateLimitEnabled: (env.RATE_LIMIT_ENABLED ?? "true") === "true",
    rateLimitMax: positiveInt(env, "RATE_LIMIT_MAX", 60),
    rateLimitTimeWindowMs: positiveInt(env, "RATE_LIMIT_WINDOW_MS", 60000)
  };
}
