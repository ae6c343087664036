// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Request-scoped logging via pino-http.
 *
 * - Generates or propagates `x-request-id` (also accepts `x-correlation-id`)
 *   and echoes it on the response.
 * - Binds `req.log` to a child logger carrying `{ service, reqId }`.
 * - Automatic access lines are off by default: the caller decides whether
 *   pino-http or its own sink owns the per-request line.
 */

import pinoHttp, { type HttpLogger } from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "pino";

const REQUEST_ID_HEADERS = ["x-request-id", "x-correlation-id"] as const;
const MAX_REQUEST_ID_LENGTH = 128;

export function inboundRequestId(req: IncomingMessage): string | undefined {
  for (const name of REQUEST_ID_HEADERS) {
    const hdr = req.headers[name];
    const v = (Array.isArray(hdr) ? hdr[0] : hdr)?.trim();
    if (v && v.length <= MAX_REQUEST_ID_LENGTH) return v;
  }
  return undefined;
}

export type HttpLoggerOptions = {
  logger: Logger;
  serviceName: string;
  autoLogging?: boolean;
};

export function makeHttpLogger(opts: HttpLoggerOptions): HttpLogger {
  return pinoHttp({
    logger: opts.logger,
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = inboundRequestId(req) || randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: opts.serviceName }),
    autoLogging: opts.autoLogging ?? false,
    serializers: {
      req(req: IncomingMessage & { id?: unknown }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
