import path from "path";
import dotenv from "dotenv";

dotenv.config();

/**
 * Runtime configuration, read once from the environment (.env supported)
 */
export interface AppConfig {
  apiPort: number;
  dataDir: string;
  corsOrigins: string[];
  studentPollIntervalMs: number;
  assignmentLockTimeoutMs: number;
}

const DEFAULTS = {
  API_PORT: 3001,
  DATA_DIR: path.join(__dirname, "../data"),
  CORS_ORIGINS: ["http://localhost:5173", "http://localhost:3000"],
  STUDENT_POLL_INTERVAL_MS: 5000,
  ASSIGNMENT_LOCK_TIMEOUT_MS: 10000,
};

// Students poll; keep the interval short but not hammering
const POLL_INTERVAL_BOUNDS = { min: 1000, max: 60000 };

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const pollInterval = readInt(env.STUDENT_POLL_INTERVAL_MS, DEFAULTS.STUDENT_POLL_INTERVAL_MS);

  return {
    apiPort: readInt(env.API_PORT, DEFAULTS.API_PORT),
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULTS.DATA_DIR,
    corsOrigins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean)
      : DEFAULTS.CORS_ORIGINS,
    studentPollIntervalMs: Math.min(
      POLL_INTERVAL_BOUNDS.max,
      Math.max(POLL_INTERVAL_BOUNDS.min, pollInterval)
    ),
    assignmentLockTimeoutMs: readInt(env.ASSIGNMENT_LOCK_TIMEOUT_MS, DEFAULTS.ASSIGNMENT_LOCK_TIMEOUT_MS),
  };
}

export const config = loadConfig();
