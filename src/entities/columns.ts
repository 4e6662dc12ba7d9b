import { ValueTransformer } from "typeorm";
import { DatabaseType } from "../utils/types/config.types";

/**
 * Postgres hands `bigint` columns back as strings, SQLite as numbers.
 * Stored values are checked to fit a JS number on the way in.
 */
export const integerTransformer: ValueTransformer = {
  to: (value: number | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? value : Number(value),
};

export const binaryColumnType = (type: DatabaseType): "bytea" | "blob" =>
  type === "postgres" ? "bytea" : "blob";
