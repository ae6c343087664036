// backend/services/gateway/src/pipeline/stages/authenticate.stage.ts
/**
 * Bearer authentication. Fails closed.
 *
 * - Success binds the request to `sub:<subject>` and attaches the claims.
 * - Failure is charged to the caller's address window in the limiter and
 *   rejects with 401; once that window is full it rejects with 429.
 */

import type { Clock } from "../../clock";
import type { TokenErrorKind, TokenValidator } from "../../auth/TokenValidator";
import type { SlidingWindowLimiter } from "../../ratelimit/SlidingWindowLimiter";
import {
  CONTINUE,
  subjectIdentity,
  type RequestOutcome,
  type Stage,
} from "../types";
import { rateLimitRejection } from "./rateLimit.stage";

const OUTCOME_FOR: Record<TokenErrorKind, RequestOutcome> = {
  MissingCredential: "missing_credential",
  MalformedCredential: "malformed_credential",
  InvalidSignature: "invalid_signature",
  Expired: "expired",
  NotYetValid: "not_yet_valid",
  InvalidClaims: "invalid_claims",
};

export function outcomeForTokenError(kind: TokenErrorKind): RequestOutcome {
  return OUTCOME_FOR[kind];
}

/** RFC 6750 §3 challenge; no error code when no credential was offered. */
export function bearerChallenge(kind: TokenErrorKind): string {
  return kind === "MissingCredential"
    ? 'Bearer realm="gateway"'
    : 'Bearer realm="gateway", error="invalid_token"';
}

export type AuthenticateStageDeps = {
  validator: TokenValidator;
  limiter: SlidingWindowLimiter;
  clock: Clock;
};

export function createAuthenticateStage(deps: AuthenticateStageDeps): Stage {
  return {
    name: "authenticate",
    reaches: "TokenValidated",
    evaluate(ctx) {
      const now = deps.clock.now();
      const header = ctx.headers.authorization;
      const result = deps.validator.validate(header, now);
      if (result.ok) {
        ctx.claims = result.claims;
        ctx.identity = subjectIdentity(result.claims.subject);
        return CONTINUE;
      }

      const charged = deps.limiter.check(ctx.identity.key, now);
      if (!charged.allowed) {
        return rateLimitRejection(
          deps.limiter,
          charged.retryAfterMs,
          `${result.error}: ${result.detail}`
        );
      }
      return {
        kind: "reject",
        status: 401,
        outcome: outcomeForTokenError(result.error),
        detail:
          result.error === "MissingCredential"
            ? "Authentication required"
            : "Invalid or expired credentials",
        reason: `${result.error}: ${result.detail}`,
        headers: { "WWW-Authenticate": bearerChallenge(result.error) },
      };
    },
  };
}
