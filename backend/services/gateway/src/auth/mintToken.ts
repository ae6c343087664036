// backend/services/gateway/src/auth/mintToken.ts
/**
 * Mints HS* access tokens the gateway accepts. Used by the CLI in
 * `scripts/mintToken.ts` and by tests.
 */

import jwt from "jsonwebtoken";
import { SYMMETRIC_ALGORITHMS } from "../config";

export type SymmetricAlgorithm = (typeof SYMMETRIC_ALGORITHMS)[number];

export type MintOptions = {
  subject: string;
  secret: string;
  algorithm?: SymmetricAlgorithm;
  scopes?: string[];
  ttlSec?: number;
  issuer?: string;
  audience?: string;
  /** Epoch ms; defaults to Date.now(). */
  nowMs?: number;
  /** Extra claims merged last (tests use this to forge edge cases). */
  extra?: Record<string, unknown>;
};

export const DEFAULT_TTL_SEC = 3600;

export function mintAccessToken(opts: MintOptions): string {
  if (!opts.subject.trim()) throw new Error("subject is required");
  if (!opts.secret) throw new Error("secret is required");

  const iat = Math.floor((opts.nowMs ?? Date.now()) / 1000);
  const payload: Record<string, unknown> = {
    sub: opts.subject,
    iat,
    exp: iat + (opts.ttlSec ?? DEFAULT_TTL_SEC),
  };
  if (opts.scopes?.length) payload.scope = opts.scopes.join(" ");
  if (opts.issuer) payload.iss = opts.issuer;
  if (opts.audience) payload.aud = opts.audience;

  return jwt.sign({ ...payload, ...opts.extra }, opts.secret, {
    algorithm: opts.algorithm ?? "HS256",
  });
}

export type MintArgs = {
  subject: string;
  scopes: string[];
  ttlSec: number;
  issuer?: string;
  audience?: string;
};

export const MINT_USAGE =
  "usage: mintToken <subject> [--scope a,b] [--ttl seconds] [--iss issuer] [--aud audience]";

/** argv (after the script path) → mint options; throws with usage on bad input. */
export function parseMintArgs(argv: string[]): MintArgs {
  const out: MintArgs = { subject: "", scopes: [], ttlSec: DEFAULT_TTL_SEC };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = () => {
      const v = argv[++i];
      if (v === undefined || v.startsWith("--")) throw new Error(`${arg} needs a value\n${MINT_USAGE}`);
      return v;
    };
    switch (arg) {
      case "--scope":
        out.scopes.push(...value().split(",").map((s) => s.trim()).filter(Boolean));
        break;
      case "--ttl": {
        const ttl = Number(value());
        if (!Number.isInteger(ttl) || ttl <= 0) throw new Error(`--ttl must be a positive integer\n${MINT_USAGE}`);
        out.ttlSec = ttl;
        break;
      }
      case "--iss":
        out.issuer = value();
        break;
      case "--aud":
        out.audience = value();
        break;
      default:
        if (arg.startsWith("--")) throw new Error(`unknown option ${arg}\n${MINT_USAGE}`);
        if (out.subject) throw new Error(`unexpected argument ${arg}\n${MINT_USAGE}`);
        out.subject = arg;
    }
  }
  if (!out.subject) throw new Error(MINT_USAGE);
  return out;
}
