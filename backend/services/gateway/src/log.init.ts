// backend/services/gateway/src/log.init.ts

/** Side-effect init so every log line carries `{ service: "gateway" }`. */

import { initLogger } from "../../shared/src/utils/logger";
import { SERVICE_NAME } from "./config";

initLogger(SERVICE_NAME);
