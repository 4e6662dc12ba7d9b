import {
  Between,
  DataSource,
  FindOperator,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  QueryFailedError,
  QueryRunner,
  Repository,
} from "typeorm";
import { HeaderEntity } from "../entities/header.entity";
import { TransactionEntity } from "../entities/transaction.entity";
import { RawQueryError } from "../utils/errors";
import { StoreLock, storeLockFor } from "../utils/lock";
import logger from "../utils/logger";

export const DEFAULT_LIMIT = 1000;

export interface HeaderQuery {
  limit?: number;
  offset?: number;
  orphan?: boolean;
  numberMin?: number;
  numberMax?: number;
  timestampMin?: number;
  timestampMax?: number;
  includeTransactions?: boolean;
}

export interface TransactionQuery {
  limit?: number;
  offset?: number;
  includeHeaders?: boolean;
}

function range(min?: number, max?: number): FindOperator<number> | undefined {
  if (min !== undefined && max !== undefined) {
    return Between(min, max);
  }
  if (min !== undefined) {
    return MoreThanOrEqual(min);
  }
  if (max !== undefined) {
    return LessThanOrEqual(max);
  }
  return undefined;
}

/**
 * True when `sql` holds one statement. Semicolons inside quoted strings,
 * quoted identifiers and comments do not count; a trailing one is allowed.
 */
export function isSingleStatement(sql: string): boolean {
  const body = sql
    .replace(/'(?:[^']|'')*'/g, "''")
    .replace(/"(?:[^"]|"")*"/g, '""')
    .replace(/--[^\n]*/g, "")
    .replace(/\/\*[\s\S]*?\*\//g, "")
    .trim()
    .replace(/;\s*$/, "");

  return body !== "" && !body.includes(";");
}

/**
 * Read side of the store used by the HTTP API.
 */
export class QueryService {
  private headers: Repository<HeaderEntity>;
  private transactions: Repository<TransactionEntity>;
  private lock: StoreLock;

  constructor(private dataSource: DataSource) {
    this.lock = storeLockFor(dataSource);
    this.headers = dataSource.getRepository(HeaderEntity);
    this.transactions = dataSource.getRepository(TransactionEntity);
  }

  async listHeaders(query: HeaderQuery = {}): Promise<HeaderEntity[]> {
    const where: FindOptionsWhere<HeaderEntity> = {};

    if (query.orphan !== undefined) {
      where.orphan = query.orphan;
    }

    const number = range(query.numberMin, query.numberMax);
    if (number) {
      where.number = number;
    }

    const timestamp = range(query.timestampMin, query.timestampMax);
    if (timestamp) {
      where.timestamp = timestamp;
    }

    return this.headers.find({
      where,
      relations: { transactions: query.includeTransactions ?? true },
      order: { number: "DESC", orphan: "DESC" },
      take: query.limit ?? DEFAULT_LIMIT,
      skip: query.offset ?? 0,
    });
  }

  async listTransactions(
    query: TransactionQuery = {}
  ): Promise<TransactionEntity[]> {
    return this.transactions.find({
      relations: { headers: query.includeHeaders ?? true },
      order: { createdAt: "DESC", hash: "ASC" },
      take: query.limit ?? DEFAULT_LIMIT,
      skip: query.offset ?? 0,
    });
  }

  /**
   * Run one caller-supplied statement read-only, inside a transaction that
   * is always rolled back.
   */
  async rawQuery(sql: string): Promise<unknown> {
    if (!isSingleStatement(sql)) {
      throw new RawQueryError("raw_sql must be a single statement");
    }

    // SQLite query runners share one connection with the tracker's writes
    if (this.dataSource.options.type === "better-sqlite3") {
      return this.lock.run(() => this.readOnly(sql, true));
    }
    return this.readOnly(sql, false);
  }

  private async readOnly(sql: string, sqlite: boolean): Promise<unknown> {
    const queryRunner = this.dataSource.createQueryRunner();

    try {
      await queryRunner.connect();
      if (sqlite) {
        await queryRunner.query("PRAGMA query_only = ON");
      }

      try {
        return await this.inRolledBackTransaction(queryRunner, sql, sqlite);
      } finally {
        if (sqlite) {
          await queryRunner.query("PRAGMA query_only = OFF");
        }
      }
    } finally {
      await queryRunner.release();
    }
  }

  private async inRolledBackTransaction(
    queryRunner: QueryRunner,
    sql: string,
    sqlite: boolean
  ): Promise<unknown> {
    await queryRunner.startTransaction();

    try {
      if (!sqlite) {
        await queryRunner.query("SET TRANSACTION READ ONLY");
      }

      const rows: unknown = await queryRunner.query(sql);
      logger.debug("Executed raw query", { sql });
      return rows;
    } catch (error) {
      if (error instanceof QueryFailedError) {
        throw new RawQueryError(`raw_sql failed: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      await queryRunner.rollbackTransaction();
    }
  }
}

export default QueryService;
