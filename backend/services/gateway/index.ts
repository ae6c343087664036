// backend/services/gateway/index.ts
/**
 * Gateway entry.
 *
 * Boot order: env files → logger → config → app → listen.
 * A bad config logs every issue and exits 1 before the port is bound.
 */

import "./src/bootstrap";
import "./src/log.init";
import type { Server } from "node:http";
import { logger } from "../shared/src/utils/logger";
import {
  ConfigError,
  SERVICE_NAME,
  loadConfig,
  type GatewayConfig,
} from "./src/config";
import { createGatewayApp } from "./src/app";

function start(): void {
  let cfg: GatewayConfig;
  try {
    cfg = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, `[${SERVICE_NAME}] invalid configuration`);
    } else {
      logger.fatal({ err }, `[${SERVICE_NAME}] failed to load configuration`);
    }
    process.exit(1);
  }

  logger.level = cfg.logLevel;
  const { app, limiter, clock } = createGatewayApp(cfg, {
    version: process.env.npm_package_version,
  });
  limiter.start(clock);

  const server: Server = app.listen(cfg.port, () => {
    logger.info({ port: cfg.port, env: cfg.nodeEnv }, `[${SERVICE_NAME}] listening`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`[${SERVICE_NAME}] ${signal} received, shutting down…`);
    limiter.stop();
    server.close(() => process.exit(0));
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  server.on("error", (err) => {
    logger.error({ err }, `[${SERVICE_NAME}] server error`);
    process.exit(1);
  });
}

start();
