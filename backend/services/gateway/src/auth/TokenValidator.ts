// backend/services/gateway/src/auth/TokenValidator.ts
/**
 * Bearer token validation.
 *
 * Purpose:
 * - Turn a raw `Authorization` header into verified `TokenClaims`, or a
 *   tagged failure the pipeline maps to a 401.
 *
 * Order (first failure wins):
 *   1) header present and shaped `Bearer <token>`
 *   2) three base64url segments whose header/payload decode to JSON
 *   3) header `alg` equals the configured algorithm exactly, then the
 *      signature verifies against the configured key
 *   4) `exp` present and in the future
 *   5) `iat` / `nbf` not beyond the clock-skew tolerance in the future;
 *      issuer / audience when configured
 *
 * Invariants:
 * - Claims are only built from a signature-valid token.
 * - Nothing is cached; every call re-checks time.
 */

import jwt, {
  JsonWebTokenError,
  NotBeforeError,
  TokenExpiredError,
  type JwtPayload,
} from "jsonwebtoken";
import type { TokenConfig } from "../config";

export type TokenErrorKind =
  | "MissingCredential"
  | "MalformedCredential"
  | "InvalidSignature"
  | "Expired"
  | "NotYetValid"
  | "InvalidClaims";

export type TokenClaims = Readonly<{
  subject: string;
  /** Epoch seconds. */
  expiresAt: number;
  issuedAt?: number;
  notBefore?: number;
  issuer?: string;
  scopes: readonly string[];
}>;

export type TokenValidation =
  | { ok: true; claims: TokenClaims }
  | { ok: false; error: TokenErrorKind; detail: string };

const BEARER = /^bearer$/i;
const B64URL = /^[A-Za-z0-9_-]+$/;

function fail(error: TokenErrorKind, detail: string): TokenValidation {
  return { ok: false, error, detail };
}

function stringList(v: unknown): string[] {
  if (typeof v === "string") return v.split(/\s+/).filter(Boolean);
  if (Array.isArray(v)) {
    return v.filter((x): x is string => typeof x === "string" && x.length > 0);
  }
  return [];
}

export function scopesOf(payload: JwtPayload): string[] {
  const all = [
    ...stringList(payload.scope),
    ...stringList(payload.scopes),
    ...stringList(payload.roles),
  ];
  return Array.from(new Set(all));
}

function classifyVerifyError(err: unknown): TokenValidation {
  if (err instanceof TokenExpiredError) return fail("Expired", err.message);
  if (err instanceof NotBeforeError) return fail("NotYetValid", err.message);
  if (err instanceof JsonWebTokenError) {
    const msg = err.message;
    if (/issuer invalid|audience invalid/.test(msg)) return fail("InvalidClaims", msg);
    if (/^jwt malformed|^invalid token|invalid (exp|nbf|iat) value/.test(msg)) {
      return fail("MalformedCredential", msg);
    }
    return fail("InvalidSignature", msg);
  }
  // Key/crypto failures: fail closed as a signature failure.
  return fail(
    "InvalidSignature",
    err instanceof Error ? err.message : "verification failed"
  );
}

export class TokenValidator {
  constructor(private readonly cfg: TokenConfig) {}

  get algorithm(): string {
    return this.cfg.algorithm;
  }

  validate(authorization: string | undefined, nowMs: number): TokenValidation {
    if (authorization === undefined || !authorization.trim()) {
      return fail("MissingCredential", "no Authorization header");
    }

    const parts = authorization.trim().split(/\s+/);
    if (parts.length !== 2 || !BEARER.test(parts[0])) {
      return fail("MalformedCredential", "expected 'Bearer <token>'");
    }
    const token = parts[1];

    const segments = token.split(".");
    if (
      segments.length !== 3 ||
      !B64URL.test(segments[0]) ||
      !B64URL.test(segments[1]) ||
      (segments[2] !== "" && !B64URL.test(segments[2]))
    ) {
      return fail("MalformedCredential", "token is not a compact JWS");
    }

    const decoded = jwt.decode(token, { complete: true });
    if (!decoded || typeof decoded.payload === "string") {
      return fail("MalformedCredential", "token header or payload is not JSON");
    }

    const alg = decoded.header.alg;
    if (alg !== this.cfg.algorithm) {
      return fail("InvalidSignature", `algorithm "${alg}" not accepted`);
    }

    const nowSec = Math.floor(nowMs / 1000);
    let payload: JwtPayload | string;
    try {
      payload = jwt.verify(token, this.cfg.key, {
        algorithms: [this.cfg.algorithm],
        clockTimestamp: nowSec,
        ignoreNotBefore: true,
        issuer: this.cfg.issuer,
        audience: this.cfg.audience,
      });
    } catch (err) {
      return classifyVerifyError(err);
    }

    if (typeof payload === "string") {
      return fail("MalformedCredential", "payload is not a claims object");
    }
    if (typeof payload.exp !== "number") {
      return fail("MalformedCredential", "exp claim is required");
    }
    if (nowSec >= payload.exp) {
      return fail("Expired", "jwt expired");
    }
    if (typeof payload.sub !== "string" || !payload.sub.trim()) {
      return fail("MalformedCredential", "sub claim is required");
    }

    const skew = this.cfg.clockSkewSec;
    if (payload.iat !== undefined) {
      if (typeof payload.iat !== "number") {
        return fail("MalformedCredential", "invalid iat value");
      }
      if (payload.iat > nowSec + skew) {
        return fail("NotYetValid", "iat is in the future");
      }
    }
    if (payload.nbf !== undefined) {
      if (typeof payload.nbf !== "number") {
        return fail("MalformedCredential", "invalid nbf value");
      }
      if (payload.nbf > nowSec + skew) {
        return fail("NotYetValid", "jwt not active");
      }
    }

    return {
      ok: true,
      claims: Object.freeze({
        subject: payload.sub,
        expiresAt: payload.exp,
        issuedAt: payload.iat,
        notBefore: payload.nbf,
        issuer: payload.iss,
        scopes: Object.freeze(scopesOf(payload)),
      }),
    };
  }
}
