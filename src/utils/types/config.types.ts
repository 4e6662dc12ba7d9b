export type DatabaseType = "postgres" | "better-sqlite3";

export type TrailErrorPolicy = "fatal" | "log";

export interface NodeConfig {
  rpcUrl: string;
  wsUrl: string;
}

export interface TrackerConfig {
  trailDepth: number;
  trailErrors: TrailErrorPolicy;
  queueCapacity: number;
}

export interface ApiConfig {
  port: number;
  host: string;
  allowRawSql: boolean;
}

export interface EnvConfig {
  nodeEnv: string;
  logLevel: string;
  api: ApiConfig;
  node: NodeConfig;
  tracker: TrackerConfig;
  healthCheckCron: string;
  retryDelay: number; // in milliseconds
  maxRetries: number;
  database: DatabaseConfig;
}

export interface DatabaseConfig {
  type: DatabaseType;
  host: string;
  port: number;
  username: string;
  password: string;
  name: string;
  path: string; // sqlite file, used when type is better-sqlite3
  logging: boolean;
  ssl: boolean;
  synchronize: boolean;
}
