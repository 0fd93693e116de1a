/**
 * Global test setup: a silent process-wide logger
 */

import { EventBus } from "../src/core/eventBus";
import { initializeLogger } from "../src/core/logger";

initializeLogger(new EventBus(), { level: "silent" });
