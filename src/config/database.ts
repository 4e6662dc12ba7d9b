import { DataSource, DataSourceOptions } from "typeorm";
import config from "./env";
import logger from "../utils/logger";
import { DatabaseConfig } from "../utils/types/config.types";
import { HeaderEntity } from "../entities/header.entity";
import { TransactionEntity } from "../entities/transaction.entity";

export const entities = [HeaderEntity, TransactionEntity];

export function buildDataSourceOptions(
  database: DatabaseConfig
): DataSourceOptions {
  if (database.type === "better-sqlite3") {
    return {
      type: "better-sqlite3",
      database: database.path,
      synchronize: database.synchronize,
      logging: database.logging,
      entities,
    };
  }

  return {
    type: "postgres",
    host: database.host,
    port: database.port,
    username: database.username,
    password: database.password,
    database: database.name,
    synchronize: database.synchronize,
    logging: database.logging,
    entities,
    ssl: database.ssl ? { rejectUnauthorized: false } : false,
  };
}

export const AppDataSource = new DataSource(
  buildDataSourceOptions(config.database)
);

export const initializeDatabase = async () => {
  try {
    await AppDataSource.initialize();
    logger.info("Database connection initialized successfully", {
      type: config.database.type,
      synchronize: config.database.synchronize,
    });
  } catch (error) {
    logger.error("Error initializing database connection", { error });
    throw error;
  }
};
