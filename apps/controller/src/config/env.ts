import dotenv from "dotenv";
import { ENV_KEYS, PORTS } from "@ptz-exposure/config";
import { PATHS } from "@ptz-exposure/config/node";
import { MOCK_FAILURE_MODES } from "../camera/transports/mock";
import type { MockFailureMode } from "../camera/transports/mock";

// Load environment variables
dotenv.config();

function parseFailureMode(value: string | undefined): MockFailureMode {
  const mode = MOCK_FAILURE_MODES.find((m) => m === value);
  if (value && !mode) {
    console.warn(`⚠️  Unknown ${ENV_KEYS.MOCK_FAILURE_MODE} "${value}", using "none"`);
  }
  return mode ?? "none";
}

export const env: {
  nodeEnv: string;
  port: number;
  host: string;
  controlConfigPath: string;
  camera: {
    username: string;
    password: string;
  };
  /** Relay URL for cross-process sync; empty means in-process only */
  syncUrl: string;
  mockFailureMode: MockFailureMode;
} = {
  nodeEnv: process.env[ENV_KEYS.NODE_ENV] || "development",
  port: parseInt(process.env[ENV_KEYS.CONTROL_PORT] || String(PORTS.CONTROLLER), 10),
  host: process.env[ENV_KEYS.CONTROL_HOST] || "0.0.0.0",
  controlConfigPath: process.env[ENV_KEYS.CONTROL_CONFIG_PATH] || PATHS.CONTROL_CONFIG,

  // Default credentials for cameras that do not carry their own
  camera: {
    username: process.env[ENV_KEYS.CAMERA_USERNAME] || "",
    password: process.env[ENV_KEYS.CAMERA_PASSWORD] || "",
  },

  syncUrl: process.env[ENV_KEYS.SYNC_URL] || "",

  // Mock transport failure simulation mode
  mockFailureMode: parseFailureMode(process.env[ENV_KEYS.MOCK_FAILURE_MODE]),
};
