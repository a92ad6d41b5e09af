import { createLogger } from "@ptz-exposure/utils";

/**
 * Camera module logger
 * Transport, watchdog and session operations
 */
export const cameraLogger = createLogger("camera");

/**
 * Control loop logger (gate, cost model, engine, concurrency)
 */
export const controlLogger = createLogger("control");

export const syncLogger = createLogger("sync");
