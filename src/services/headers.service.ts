import { Not, Repository } from "typeorm";
import { HeaderEntity } from "../entities/header.entity";
import { TransactionEntity } from "../entities/transaction.entity";
import {
  HeaderRecord,
  MutableHeaderColumn,
  TransactionRecord,
} from "../utils/types/tracker.types";
import { StoreLock, storeLockFor } from "../utils/lock";
import logger from "../utils/logger";

export const HEADER_TRANSACTIONS_TABLE = "header_transactions";

// every content column; the hash is the conflict target
const TRANSACTION_COLUMNS = [
  "from",
  "to",
  "data",
  "gasPrice",
  "gasLimit",
  "value",
  "nonce",
  "error",
];

const CHUNK_SIZE = 200;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Writes header and transaction rows keyed by hash.
 *
 * Every call holds the store lock, so raw queries from the API never
 * interleave with a write.
 */
export class HeadersService {
  private lock: StoreLock;

  constructor(
    private headers: Repository<HeaderEntity>,
    private transactions: Repository<TransactionEntity>
  ) {
    this.lock = storeLockFor(headers.manager.connection);
  }

  /**
   * Insert the header, or update only `mutableColumns` when its hash is
   * already stored, then upsert its transactions and link them to it.
   * Storing a canonical header demotes every other header at its height.
   * All of it commits as one transaction.
   */
  async upsertHeader(
    header: HeaderRecord,
    mutableColumns: MutableHeaderColumn[],
    transactions: TransactionRecord[] = []
  ): Promise<void> {
    await this.lock.run(() =>
      this.headers.manager.transaction(async (manager) => {
        const headers = manager.withRepository(this.headers);
        const txes = manager.withRepository(this.transactions);

        await headers
          .createQueryBuilder()
          .insert()
          .into(HeaderEntity)
          .values(header)
          .orUpdate(mutableColumns, ["hash"])
          .updateEntity(false)
          .execute();

        if (!header.orphan) {
          await this.demote(headers, header.number, header.hash);
        }

        for (const rows of chunk(transactions, CHUNK_SIZE)) {
          await txes
            .createQueryBuilder()
            .insert()
            .into(TransactionEntity)
            .values(rows)
            .orUpdate(TRANSACTION_COLUMNS, ["hash"])
            .updateEntity(false)
            .execute();

          await manager
            .createQueryBuilder()
            .insert()
            .into(HEADER_TRANSACTIONS_TABLE, ["headerHash", "transactionHash"])
            .values(
              rows.map((tx) => ({
                headerHash: header.hash,
                transactionHash: tx.hash,
              }))
            )
            .orIgnore()
            .updateEntity(false)
            .execute();
        }
      })
    );

    logger.debug("Upserted header", {
      hash: header.hash,
      number: header.number,
      orphan: header.orphan,
      uncleBy: header.uncleBy || undefined,
      mutableColumns,
      transactions: transactions.length,
    });
  }

  /**
   * Mark every stored header at `blockNumber` other than `hash` as orphan.
   * @returns the number of rows that flipped
   */
  async demoteSiblings(blockNumber: number, hash: string): Promise<number> {
    return this.lock.run(() => this.demote(this.headers, blockNumber, hash));
  }

  async countCanonical(blockNumber: number): Promise<number> {
    return this.lock.run(() =>
      this.headers.count({
        where: { number: blockNumber, orphan: false },
      })
    );
  }

  async findByHash(hash: string): Promise<HeaderEntity | null> {
    return this.lock.run(() =>
      this.headers.findOne({
        where: { hash: hash.toLowerCase() },
        relations: { transactions: true },
      })
    );
  }

  private async demote(
    headers: Repository<HeaderEntity>,
    blockNumber: number,
    hash: string
  ): Promise<number> {
    const result = await headers.update(
      { number: blockNumber, hash: Not(hash), orphan: false },
      { orphan: true }
    );
    const affected = result.affected ?? 0;

    if (affected > 0) {
      logger.info("Demoted headers to orphan", {
        number: blockNumber,
        canonical: hash,
        affected,
      });
    }

    return affected;
  }
}
