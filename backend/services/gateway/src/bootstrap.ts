// backend/services/gateway/src/bootstrap.ts

/**
 * Side-effect env load for the gateway process. Imported first by index.ts so
 * `.env` files (repo root → backend/services → gateway) are in `process.env`
 * before the logger or config read it.
 */

import { loadEnvCascade } from "../../shared/src/env";
import { SERVICE_ROOT } from "./config";

export const loadedEnvFiles = loadEnvCascade(SERVICE_ROOT);
