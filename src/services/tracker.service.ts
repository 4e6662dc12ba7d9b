import { HeadersService } from "./headers.service";
import { StatusService } from "./status.service";
import { EventQueue } from "../utils/queue";
import { BlockNotFoundError, toError } from "../utils/errors";
import { citesUncles, normalizeHeader, toSafeInteger } from "../utils/headers";
import { normalizeTransaction } from "../utils/transactions";
import { RpcHeader } from "../utils/types/rpc.types";
import { TrailErrorPolicy } from "../utils/types/config.types";
import {
  FullBlock,
  HeaderRecord,
  MutableHeaderColumn,
  NodeProvider,
  TrackerEvent,
  TrackerStatus,
} from "../utils/types/tracker.types";
import logger from "../utils/logger";

export interface TrackerOptions {
  trailDepth: number;
  trailErrors: TrailErrorPolicy;
  queueCapacity: number;
}

/** Unit of work produced while handling a single event. */
type Task =
  | { kind: "fetch"; hash: string; orphan: boolean; expandUncles: boolean }
  | { kind: "canonical"; blockNumber: number; expandUncles: boolean }
  | { kind: "uncle"; header: RpcHeader; citedBy: string };

interface StoreOptions {
  orphan: boolean;
  uncleBy: string;
  expandUncles: boolean;
}

/**
 * Consumes head and side-head events one at a time and records which
 * blocks are canonical, orphaned or uncled.
 *
 * Every event is fully handled, including the fetches it triggers, before
 * the next one is taken from the queue; conflict detection compares each
 * head against the one before it.
 */
export default class OrphanTracker {
  private queue: EventQueue<TrackerEvent>;
  private chainId: bigint = 0n;
  private isRunning: boolean = false;
  private busy: boolean = false;
  private failure: Error | null = null;
  private eventsProcessed: number = 0;
  private trailCorrections: number = 0;
  private lastUpdated: Date = new Date();

  constructor(
    private provider: NodeProvider,
    private headersService: HeadersService,
    private status: StatusService,
    private options: TrackerOptions
  ) {
    this.queue = new EventQueue(options.queueCapacity);
  }

  /**
   * Fetch the chain id used for sender recovery and seed the status with
   * the node's current head.
   */
  async initialize(): Promise<void> {
    this.chainId = await this.provider.getChainId();
    this.status.setChainId(this.chainId);

    const latest = normalizeHeader(await this.provider.getLatestHeader());
    this.status.update(latest);

    logger.info("Orphan tracker initialized", {
      chainId: this.chainId,
      latestNumber: latest.number,
      latestHash: latest.hash,
    });
  }

  /**
   * Queue an event. Overflowing the queue stops the tracker, since the
   * dropped event could never be recovered.
   */
  push(event: TrackerEvent): void {
    try {
      this.queue.push(event);
    } catch (error) {
      this.fail(toError(error));
    }
  }

  /**
   * Process queued events until `stop()` is called.
   * Rejects with the first fatal error.
   */
  async run(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Orphan tracker is already running");
    }

    this.isRunning = true;
    logger.info("Orphan tracker started", {
      trailDepth: this.options.trailDepth,
      queueCapacity: this.options.queueCapacity,
    });

    try {
      for (
        let event = await this.queue.next();
        event !== undefined;
        event = await this.queue.next()
      ) {
        this.busy = true;
        try {
          await this.handle(event);
        } finally {
          this.busy = false;
        }
      }
    } catch (error) {
      this.fail(toError(error));
    } finally {
      this.isRunning = false;
    }

    if (this.failure) {
      throw this.failure;
    }

    logger.info("Orphan tracker stopped", {
      eventsProcessed: this.eventsProcessed,
    });
  }

  /** Stop after the event in flight; queued events are dropped. */
  stop(): void {
    this.queue.close();
  }

  getStatus(): TrackerStatus {
    return {
      isRunning: this.isRunning,
      isProcessing: this.busy,
      queueDepth: this.queue.size,
      eventsProcessed: this.eventsProcessed,
      trailCorrections: this.trailCorrections,
      lastUpdated: this.lastUpdated,
    };
  }

  async handle(event: TrackerEvent): Promise<void> {
    switch (event.kind) {
      case "side":
        await this.handleSideHead(event.header);
        break;
      case "head":
        await this.handleHead(event.header);
        break;
      case "trail":
        await this.handleTrail(event.blockNumber);
        break;
    }

    this.eventsProcessed++;
    this.lastUpdated = new Date();
  }

  /**
   * A side head is stored as an orphan next to the canonical block at its
   * height.
   */
  private async handleSideHead(header: RpcHeader): Promise<void> {
    const blockNumber = toSafeInteger(header.number, "number");

    logger.info("New side head", {
      number: blockNumber,
      hash: header.hash,
      parentHash: header.parentHash,
    });

    await this.drain([
      { kind: "fetch", hash: header.hash, orphan: true, expandUncles: true },
      { kind: "canonical", blockNumber, expandUncles: true },
    ]);
  }

  private async handleHead(header: RpcHeader): Promise<void> {
    const latest = normalizeHeader(header);

    await this.headersService.demoteSiblings(latest.number, latest.hash);

    const previous = this.status.getLatestHeader();
    const conflict = this.isConflict(latest, previous);

    this.status.update(latest);

    if (latest.number >= this.options.trailDepth) {
      this.push({
        kind: "trail",
        blockNumber: latest.number - this.options.trailDepth,
      });
    }

    const hasUncles = citesUncles(header);

    logger.info("New head", {
      number: latest.number,
      hash: latest.hash,
      parentHash: latest.parentHash,
      hasUncles,
      conflict,
    });

    if (!hasUncles && !conflict) {
      return;
    }

    await this.drain([
      { kind: "fetch", hash: latest.hash, orphan: false, expandUncles: true },
    ]);
  }

  private isConflict(
    latest: HeaderRecord,
    previous: Readonly<HeaderRecord> | null
  ): boolean {
    if (!previous) {
      return true;
    }

    const competing =
      latest.number === previous.number && latest.hash !== previous.hash;
    const rewound = latest.number <= previous.number;
    const discontinuous = latest.parentHash !== previous.hash;

    return competing || rewound || discontinuous;
  }

  /**
   * A height trailing the head should hold exactly one canonical row; any
   * other count is corrected from the node.
   */
  private async handleTrail(blockNumber: number): Promise<void> {
    try {
      const canonical = await this.headersService.countCanonical(blockNumber);
      if (canonical === 1) {
        return;
      }

      logger.info("Trailing check correcting height", {
        number: blockNumber,
        canonicalRows: canonical,
      });

      await this.drain([{ kind: "canonical", blockNumber, expandUncles: true }]);
      this.trailCorrections++;
    } catch (error) {
      if (this.options.trailErrors === "fatal") {
        throw error;
      }

      logger.error("Trailing check failed, continuing", {
        number: blockNumber,
        error,
      });
    }
  }

  private async drain(initial: Task[]): Promise<void> {
    const pending = [...initial];

    for (let task = pending.shift(); task; task = pending.shift()) {
      pending.push(...(await this.runTask(task)));
    }
  }

  private async runTask(task: Task): Promise<Task[]> {
    switch (task.kind) {
      case "fetch": {
        const block = await this.provider.getBlockByHash(task.hash);
        if (!block) {
          throw new BlockNotFoundError(task.hash);
        }
        return this.storeBlock(block, {
          orphan: task.orphan,
          uncleBy: "",
          expandUncles: task.expandUncles,
        });
      }

      case "canonical": {
        const block = await this.provider.getBlockByNumber(task.blockNumber);
        if (!block) {
          throw new BlockNotFoundError(task.blockNumber);
        }
        return this.storeBlock(block, {
          orphan: false,
          uncleBy: "",
          expandUncles: task.expandUncles,
        });
      }

      case "uncle":
        return this.storeUncle(task.header, task.citedBy);
    }
  }

  private async storeUncle(header: RpcHeader, citedBy: string): Promise<Task[]> {
    const block = await this.provider.getBlockByHash(header.hash);

    if (block) {
      await this.storeBlock(block, {
        orphan: true,
        uncleBy: citedBy,
        expandUncles: false,
      });
    } else {
      // Nodes often drop side-chain bodies; the header from the citing
      // block is all that is left.
      const record = normalizeHeader(header);
      record.orphan = true;
      record.uncleBy = citedBy;
      record.error = "Uncle block body unavailable from node";

      logger.warn("Storing uncle without transactions", {
        hash: record.hash,
        number: record.number,
        citedBy,
      });

      await this.headersService.upsertHeader(record, ["orphan", "uncleBy"]);
    }

    // the uncle's canonical sibling is stored without its own uncles
    return [
      {
        kind: "canonical",
        blockNumber: toSafeInteger(header.number, "number"),
        expandUncles: false,
      },
    ];
  }

  private async storeBlock(
    block: FullBlock,
    options: StoreOptions
  ): Promise<Task[]> {
    const header = normalizeHeader(block.header);
    header.orphan = options.orphan;
    header.uncleBy = options.uncleBy;
    header.uncle1 = block.uncles[0]?.hash.toLowerCase() ?? "";
    header.uncle2 = block.uncles[1]?.hash.toLowerCase() ?? "";

    const transactions = block.transactions.map((tx) =>
      normalizeTransaction(tx, { chainId: this.chainId })
    );

    const unrecovered = transactions.filter((tx) => tx.error !== "");
    if (unrecovered.length > 0) {
      logger.warn("Stored transactions without a recovered sender", {
        block: header.hash,
        count: unrecovered.length,
        first: unrecovered[0].error,
      });
    }

    const columns: MutableHeaderColumn[] = options.uncleBy
      ? ["orphan", "uncleBy"]
      : ["orphan"];

    await this.headersService.upsertHeader(header, columns, transactions);

    logger.info("Stored block", {
      number: header.number,
      hash: header.hash,
      orphan: header.orphan,
      uncleBy: header.uncleBy || undefined,
      transactions: transactions.length,
      uncles: block.uncles.length,
    });

    if (!options.expandUncles) {
      return [];
    }

    return block.uncles.map(
      (uncle): Task => ({ kind: "uncle", header: uncle, citedBy: header.hash })
    );
  }

  private fail(error: Error): void {
    if (this.failure) {
      return;
    }

    this.failure = error;
    this.queue.close();

    logger.error("Orphan tracker failed", { error });
  }
}
