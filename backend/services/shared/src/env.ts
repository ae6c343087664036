// backend/services/shared/src/env.ts

/**
 * Env loading and assertions.
 *
 * Load env files by layer with deterministic precedence:
 *   1) repo root            → project-wide defaults
 *   2) service family dir   → e.g. backend/services
 *   3) service root         → e.g. backend/services/gateway
 * Within each layer `.env` is read first and the mode-specific file
 * (`.env.dev`, `.env.test`, ...) overrides it. Later layers override earlier
 * ones. `${VAR}` references are expanded with dotenv-expand.
 *
 * Notes:
 * - Production prefers injected env; files are optional there.
 * - Variables already present in the target env are never overwritten by a
 *   file.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function parseIfExists(absPath: string): Record<string, string> | null {
  if (!fs.existsSync(absPath)) return null;
  return dotenv.parse(fs.readFileSync(absPath));
}

export function envFileCandidates(serviceRootAbs: string, mode: string): string[] {
  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot =
    findRootWithMarkers(serviceRoot, [".git", "package.json"]) ||
    path.resolve(serviceRoot, "..", "..", "..");

  const names = mode ? [".env", `.env.${mode}`] : [".env"];
  const layers = Array.from(new Set([repoRoot, serviceFamilyDir, serviceRoot]));

  const out: string[] = [];
  for (const dir of layers) {
    for (const name of names) out.push(path.join(dir, name));
  }
  return out;
}

/**
 * Cascading loader for a service. Returns the files that were loaded.
 */
export function loadEnvCascade(
  serviceRootAbs: string,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const mode = (env.NODE_ENV || "").trim();
  const preset = new Set(Object.keys(env));

  const merged: Record<string, string> = {};
  const loaded: string[] = [];
  for (const file of envFileCandidates(serviceRootAbs, mode)) {
    const parsed = parseIfExists(file);
    if (!parsed) continue;
    Object.assign(merged, parsed);
    loaded.push(file);
  }

  const fromFiles: Record<string, string> = {};
  for (const [k, v] of Object.entries(merged)) {
    if (!preset.has(k)) fromFiles[k] = v;
  }

  const base: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined) base[k] = v;
  }
  const expanded = dotenvExpand.expand({ parsed: fromFiles, processEnv: base });
  for (const [k, v] of Object.entries(expanded.parsed ?? fromFiles)) {
    env[k] = v;
  }
  return loaded;
}

/** Assertions / getters */
export function assertEnv(keys: string[], env: NodeJS.ProcessEnv = process.env): void {
  const missing = keys.filter((k) => !env[k] || !String(env[k]).trim());
  if (missing.length)
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
}

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

export function requireEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: NodeJS.ProcessEnv = process.env
): T {
  const v = requireEnv(name, env);
  const hit = allowed.find((a) => a === v);
  if (hit === undefined) {
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  }
  return hit;
}

export function requireNumber(name: string, env: NodeJS.ProcessEnv = process.env): number {
  const v = requireEnv(name, env);
  if (!/^\d+$/.test(v))
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  return Number(v);
}

/** Redact helper for logging maps of envs (never dump real values to logs). */
export function redactEnv(obj: Record<string, unknown>): Record<string, string> {
  return Object.fromEntries(Object.keys(obj).map((k) => [k, "***redacted***"]));
}
