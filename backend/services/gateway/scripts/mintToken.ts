// backend/services/gateway/scripts/mintToken.ts
/**
 * Mint a gateway access token for local testing.
 *
 * Usage:
 *   TOKEN_SECRET=... tsx backend/services/gateway/scripts/mintToken.ts alice --scope read,write --ttl 600
 *
 * Reads TOKEN_SECRET / TOKEN_ALGORITHM / TOKEN_ISSUER / TOKEN_AUDIENCE from the
 * same env cascade the gateway uses. Prints the token on stdout.
 */

import "../src/bootstrap";
import { requireEnv } from "../../shared/src/env";
import { SYMMETRIC_ALGORITHMS } from "../src/config";
import { mintAccessToken, parseMintArgs, type SymmetricAlgorithm } from "../src/auth/mintToken";

function algorithmFromEnv(): SymmetricAlgorithm {
  const raw = (process.env.TOKEN_ALGORITHM || "HS256").trim();
  const alg = SYMMETRIC_ALGORITHMS.find((a) => a === raw);
  if (!alg) throw new Error(`TOKEN_ALGORITHM ${raw} is not a shared-secret algorithm`);
  return alg;
}

function main(): void {
  const args = parseMintArgs(process.argv.slice(2));
  const token = mintAccessToken({
    subject: args.subject,
    scopes: args.scopes,
    ttlSec: args.ttlSec,
    secret: requireEnv("TOKEN_SECRET"),
    algorithm: algorithmFromEnv(),
    issuer: args.issuer ?? process.env.TOKEN_ISSUER,
    audience: args.audience ?? process.env.TOKEN_AUDIENCE,
  });
  process.stdout.write(`${token}\n`);
}

try {
  main();
} catch (err) {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
}
