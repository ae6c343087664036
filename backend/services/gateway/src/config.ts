// backend/services/gateway/src/config.ts

/**
 * Gateway configuration.
 *
 * Purpose:
 * - Parse env once at startup into a typed, frozen `GatewayConfig`.
 * - Load and validate the static route table file.
 *
 * Invariants:
 * - Nothing here is re-read after startup (no hot reload).
 * - Every problem is reported at once in a single `ConfigError`, keyed by the
 *   env var or route field that caused it.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { LevelWithSilent } from "pino";

export const SERVICE_NAME = "gateway" as const;
export const SERVICE_ROOT = path.resolve(__dirname, "..");

export const SYMMETRIC_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export const ASYMMETRIC_ALGORITHMS = [
  "RS256",
  "RS384",
  "RS512",
  "PS256",
  "PS384",
  "PS512",
  "ES256",
  "ES384",
  "ES512",
] as const;
export const TOKEN_ALGORITHMS = [
  ...SYMMETRIC_ALGORITHMS,
  ...ASYMMETRIC_ALGORITHMS,
] as const;
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export function isSymmetric(alg: TokenAlgorithm): boolean {
  return (SYMMETRIC_ALGORITHMS as readonly string[]).includes(alg);
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid gateway configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

// ── Route table file ─────────────────────────────────────────────────────────

export const zRouteEntry = z
  .object({
    name: z.string().min(1).optional(),
    prefix: z
      .string()
      .startsWith("/", { message: "prefix must start with '/'" })
      .refine((p) => !/[?#]/.test(p), { message: "prefix must be a bare path" }),
    target: z
      .string()
      .url()
      .refine((u) => /^https?:\/\//i.test(u), {
        message: "target must be an http(s) URL",
      }),
    timeoutMs: z.number().int().positive().optional(),
    forwardIdentity: z.boolean().default(false),
    forwardAuthorization: z.boolean().default(false),
  })
  .strict();

export const zRouteFile = z.object({
  routes: z.array(zRouteEntry).min(1, { message: "at least one route is required" }),
});

export type RouteSpec = z.infer<typeof zRouteEntry>;

// ── Env ──────────────────────────────────────────────────────────────────────

const zBool = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const zPositiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const zEnv = z
  .object({
    NODE_ENV: z.enum(["dev", "test", "docker", "production"]).default("dev"),
    GATEWAY_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    GATEWAY_ROUTES_FILE: z.string().min(1).default("config/routes.json"),

    TOKEN_ALGORITHM: z.enum(TOKEN_ALGORITHMS).default("HS256"),
    TOKEN_SECRET: z.string().min(1).optional(),
    TOKEN_PUBLIC_KEY_FILE: z.string().min(1).optional(),
    TOKEN_ISSUER: z.string().min(1).optional(),
    TOKEN_AUDIENCE: z.string().min(1).optional(),
    TOKEN_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).default(30),

    RATE_LIMIT_POINTS: zPositiveInt(5),
    RATE_LIMIT_WINDOW_MS: zPositiveInt(60_000),
    RATE_LIMIT_IDLE_WINDOWS: zPositiveInt(3),

    PROXY_TIMEOUT_MS: zPositiveInt(30_000),
    PROXY_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(100),
    PROXY_MAX_BODY_BYTES: zPositiveInt(1_048_576),

    TRUST_PROXY: zBool.default("false"),
    READINESS_DEEP_PING: zBool.default("false"),
    READINESS_TIMEOUT_MS: zPositiveInt(2_000),
    METRICS_DEFAULT: zBool.default("false"),
  })
  .superRefine((env, ctx) => {
    if (isSymmetric(env.TOKEN_ALGORITHM)) {
      if (!env.TOKEN_SECRET) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["TOKEN_SECRET"],
          message: `required for ${env.TOKEN_ALGORITHM}`,
        });
      }
    } else if (!env.TOKEN_PUBLIC_KEY_FILE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TOKEN_PUBLIC_KEY_FILE"],
        message: `required for ${env.TOKEN_ALGORITHM}`,
      });
    }
  });

// ── Typed config ─────────────────────────────────────────────────────────────

export type TokenConfig = {
  algorithm: TokenAlgorithm;
  /** Shared secret for HS*, PEM public key for the asymmetric families. */
  key: string;
  issuer?: string;
  audience?: string;
  clockSkewSec: number;
};

export type RateLimitConfig = {
  points: number;
  windowMs: number;
  idleWindows: number;
};

export type ProxyConfig = {
  timeoutMs: number;
  retryBackoffMs: number;
  maxBodyBytes: number;
};

export type GatewayConfig = {
  nodeEnv: string;
  port: number;
  logLevel: LevelWithSilent;
  token: TokenConfig;
  rateLimit: RateLimitConfig;
  proxy: ProxyConfig;
  routes: RouteSpec[];
  trustProxy: boolean;
  readiness: { deepPing: boolean; timeoutMs: number };
  metrics: { collectDefault: boolean };
};

function formatIssues(issues: z.ZodIssue[], prefix = ""): string[] {
  return issues.map((i) => {
    const where = [prefix, ...i.path.map(String)].filter(Boolean).join(".");
    return `${where || "(root)"}: ${i.message}`;
  });
}

function readFileOrThrow(absPath: string, what: string): string {
  try {
    return fs.readFileSync(absPath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`${what}: cannot read ${absPath} (${reason})`]);
  }
}

export function parseRouteFile(raw: string, source = "routes"): RouteSpec[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`${source}: invalid JSON (${reason})`]);
  }
  const parsed = zRouteFile.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error.issues, source));
  }
  return parsed.data.routes;
}

/**
 * Build the gateway config from an env map. Relative file paths resolve
 * against the service root.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  serviceRoot: string = SERVICE_ROOT
): GatewayConfig {
  const parsed = zEnv.safeParse(env);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error.issues));
  const e = parsed.data;

  const resolve = (p: string) =>
    path.isAbsolute(p) ? p : path.resolve(serviceRoot, p);

  const routesPath = resolve(e.GATEWAY_ROUTES_FILE);
  const routes = parseRouteFile(
    readFileOrThrow(routesPath, "GATEWAY_ROUTES_FILE"),
    "GATEWAY_ROUTES_FILE"
  );

  const key =
    isSymmetric(e.TOKEN_ALGORITHM) || !e.TOKEN_PUBLIC_KEY_FILE
      ? e.TOKEN_SECRET ?? ""
      : readFileOrThrow(resolve(e.TOKEN_PUBLIC_KEY_FILE), "TOKEN_PUBLIC_KEY_FILE");

  const config: GatewayConfig = {
    nodeEnv: e.NODE_ENV,
    port: e.GATEWAY_PORT,
    logLevel: e.LOG_LEVEL,
    token: {
      algorithm: e.TOKEN_ALGORITHM,
      key,
      issuer: e.TOKEN_ISSUER,
      audience: e.TOKEN_AUDIENCE,
      clockSkewSec: e.TOKEN_CLOCK_SKEW_SEC,
    },
    rateLimit: {
      points: e.RATE_LIMIT_POINTS,
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      idleWindows: e.RATE_LIMIT_IDLE_WINDOWS,
    },
    proxy: {
      timeoutMs: e.PROXY_TIMEOUT_MS,
      retryBackoffMs: e.PROXY_RETRY_BACKOFF_MS,
      maxBodyBytes: e.PROXY_MAX_BODY_BYTES,
    },
    routes,
    trustProxy: e.TRUST_PROXY,
    readiness: { deepPing: e.READINESS_DEEP_PING, timeoutMs: e.READINESS_TIMEOUT_MS },
    metrics: { collectDefault: e.METRICS_DEFAULT },
  };
  return Object.freeze(config);
}
