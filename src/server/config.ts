import { fileURLToPath } from "url";
import path from "path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const LOG_LEVEL =
  process.env.LOG_LEVEL ??
  (process.env.NODE_ENV === "production" ? "info" : "verbose");
export const APP_HTTPS = process.env.NODE_ENV === "production";
export const APP_SERVER_PORT =
  process.env.NODE_ENV === "production" ? (APP_HTTPS ? 443 : 80) : 3000;
export const LONGPOLL_TIMEOUT = 30000;
export const MAX_LONGPOLL_TIMEOUT = 60000;

export const HOMEKIT_PORT = 51826;
export const HOMEKIT_USERNAME = "1A:2B:3C:4D:5F:E1";
export const HOMEKIT_PINCODE = "031-45-154";
export const MANUFACTURER = "covertime";
export const MODEL = "Timed Cover";

export const PERSIST_DIR =
  process.env.PERSIST_DIR ?? path.join(__dirname, "../../persist");
export const COVERS_FILE =
  process.env.COVERS_FILE ?? path.join(__dirname, "../../covers.json");

// travel times, in seconds
export const DEFAULT_OPEN_TIME = 30;
export const DEFAULT_CLOSE_TIME = 25;
// legacy single travel time only: close is assumed 15% faster
export const LEGACY_CLOSE_FACTOR = 0.85;
export const MIN_MANUAL_TRAVEL_TIME = 5;
export const MAX_MANUAL_TRAVEL_TIME = 300;
export const MIN_MEASURED_TRAVEL_TIME = 2;
export const MAX_MEASURED_TRAVEL_TIME = 600;

// below this, a position request is published without moving the cover
export const MIN_MOVEMENT_SECONDS = 0.5;
export const TRACKING_TICK_MS = 200;
export const TRACKING_PUBLISH_MS = 500;
export const CLOSED_THRESHOLD = 5;
export const SNAPSHOT_GRACE_MS = 30000;

export const POLL_INTERVAL_MS = envNumber("POLL_INTERVAL_MS", 60000);
export const REFRESH_DELAY_MS = envNumber("REFRESH_DELAY_MS", 1000);
export const CALIBRATION_SETTLE_MS = envNumber("CALIBRATION_SETTLE_MS", 3000);
// homing before a measurement waits for the slower of these, whatever the
// travel time in effect says, so a slow uncalibrated cover reaches its end
export const HOMING_TRAVEL_FACTOR = 1.5;
export const MIN_HOMING_SECONDS = envNumber("MIN_HOMING_SECONDS", 120);

// simulated backend only
export const SIMULATION_TICK_MS = 250;
export const SIMULATION_POSITION_STEP = 10;

export const SSL_KEY = path.join(__dirname, "../../ssl/server.key");
export const SSL_CERT = path.join(__dirname, "../../ssl/server.crt");
