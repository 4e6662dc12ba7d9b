import "dotenv/config";
import {
  DatabaseType,
  EnvConfig,
  TrailErrorPolicy,
} from "../utils/types/config.types";

const databaseType = (value: string | undefined): DatabaseType =>
  value === "better-sqlite3" || value === "sqlite"
    ? "better-sqlite3"
    : "postgres";

const trailErrorPolicy = (value: string | undefined): TrailErrorPolicy =>
  value === "log" ? "log" : "fatal";

const nodeEnv = process.env.NODE_ENV || "development";

const config: EnvConfig = {
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || "info",
  api: {
    port: parseInt(process.env.API_PORT || "8080", 10),
    host: process.env.API_HOST || "localhost",
    allowRawSql: process.env.API_RAW_SQL !== "false",
  },
  node: {
    rpcUrl: process.env.RPC_URL || "",
    wsUrl: process.env.WS_URL || "",
  },
  tracker: {
    trailDepth: parseInt(process.env.TRAIL_DEPTH || "10", 10),
    trailErrors: trailErrorPolicy(process.env.TRAIL_ERRORS),
    queueCapacity: parseInt(process.env.QUEUE_CAPACITY || "10000", 10),
  },
  healthCheckCron: process.env.HEALTH_CHECK_CRON || "* * * * *",
  retryDelay: parseInt(process.env.RETRY_DELAY || "5000", 10),
  maxRetries: parseInt(process.env.MAX_RETRIES || "5", 10),
  database: {
    type: databaseType(process.env.DB_TYPE),
    host: process.env.DB_HOST || "localhost",
    port: parseInt(process.env.DB_PORT || "5432", 10),
    username: process.env.DB_USERNAME || "postgres",
    password: process.env.DB_PASSWORD || "postgres",
    name: process.env.DB_NAME || "orphan_tracker",
    path: process.env.DB_PATH || "orphan-tracker.sqlite",
    logging: process.env.DB_LOGGING === "true",
    ssl: process.env.DB_SSL === "true",
    synchronize: process.env.DB_SYNCHRONIZE
      ? process.env.DB_SYNCHRONIZE === "true"
      : nodeEnv === "development",
  },
};

export default config;
