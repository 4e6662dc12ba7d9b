import { DataSource } from "typeorm";
import config from "../../src/config/env";
import { buildDataSourceOptions } from "../../src/config/database";
import { HeaderEntity } from "../../src/entities/header.entity";
import { TransactionEntity } from "../../src/entities/transaction.entity";
import { HeadersService } from "../../src/services/headers.service";

export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource(
    buildDataSourceOptions({
      ...config.database,
      type: "better-sqlite3",
      path: ":memory:",
      synchronize: true,
      logging: false,
    })
  );
  await dataSource.initialize();
  return dataSource;
}

export function createHeadersService(dataSource: DataSource): HeadersService {
  return new HeadersService(
    dataSource.getRepository(HeaderEntity),
    dataSource.getRepository(TransactionEntity)
  );
}

export async function findHeader(
  dataSource: DataSource,
  hash: string
): Promise<HeaderEntity | null> {
  return dataSource.getRepository(HeaderEntity).findOneBy({ hash });
}

export async function countLinks(dataSource: DataSource): Promise<number> {
  const rows: unknown = await dataSource.query(
    "SELECT COUNT(*) AS count FROM header_transactions"
  );
  if (!Array.isArray(rows) || rows.length !== 1) {
    throw new Error("Unexpected link count result");
  }
  return Number(rows[0].count);
}
