import { DataSource } from "typeorm";
import { HeaderEntity } from "../src/entities/header.entity";
import { TransactionEntity } from "../src/entities/transaction.entity";
import { HeadersService } from "../src/services/headers.service";
import { StatusService } from "../src/services/status.service";
import OrphanTracker, { TrackerOptions } from "../src/services/tracker.service";
import { BlockNotFoundError, QueueOverflowError } from "../src/utils/errors";
import { normalizeHeader } from "../src/utils/headers";
import { TrackerEvent } from "../src/utils/types/tracker.types";
import { makeBlock, makeHeader, makeTransaction } from "./helpers/blocks";
import {
  createHeadersService,
  createTestDataSource,
  findHeader,
} from "./helpers/database";
import { FakeNodeProvider } from "./helpers/node";
import { whenIdle } from "./helpers/tracker";

describe("OrphanTracker", () => {
  let dataSource: DataSource;
  let headers: HeadersService;
  let provider: FakeNodeProvider;
  let status: StatusService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    headers = createHeadersService(dataSource);
    provider = new FakeNodeProvider();
    status = new StatusService();
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  function createTracker(options: Partial<TrackerOptions> = {}): OrphanTracker {
    return new OrphanTracker(provider, headers, status, {
      trailDepth: 1000,
      trailErrors: "fatal",
      queueCapacity: 100,
      ...options,
    });
  }

  /** Runs the loop over `events`; resolves with its failure, or null. */
  async function drive(
    tracker: OrphanTracker,
    events: TrackerEvent[]
  ): Promise<unknown> {
    const outcome = tracker.run().then(
      () => null,
      (error: unknown) => error
    );

    for (const event of events) {
      tracker.push(event);
    }

    await whenIdle(tracker);
    tracker.stop();
    return outcome;
  }

  async function canonicalRowsPerHeight(): Promise<Map<number, number>> {
    const rows = await dataSource.getRepository(HeaderEntity).find();
    const counts = new Map<number, number>();
    for (const row of rows) {
      if (!row.orphan) {
        counts.set(row.number, (counts.get(row.number) ?? 0) + 1);
      }
    }
    return counts;
  }

  describe("initialize", () => {
    it("seeds the status with the node's latest header and chain id", async () => {
      provider.latest = makeHeader("latest", 77);
      await createTracker().initialize();

      expect(status.getLatestHeader()?.number).toBe(77);
      expect(status.getChainId()).toBe(1337n);
    });
  });

  describe("side heads", () => {
    it("stores the side block as orphan and its canonical sibling", async () => {
      const canonical = provider.addBlock(makeBlock("c100", 100));
      const side = provider.addBlock(makeBlock("s100", 100), false);
      provider.latest = makeHeader("c99", 99);

      const tracker = createTracker();
      await tracker.initialize();

      expect(await drive(tracker, [{ kind: "side", header: side.header }])).toBeNull();

      expect((await findHeader(dataSource, side.header.hash))?.orphan).toBe(true);
      expect((await findHeader(dataSource, canonical.header.hash))?.orphan).toBe(
        false
      );
      expect(provider.fetchedByNumber).toEqual([100]);
    });

    it("records the uncles cited by the canonical sibling", async () => {
      const u99 = provider.addBlock(makeBlock("u99", 99), false);
      const c99 = provider.addBlock(makeBlock("c99", 99));
      const canonical = provider.addBlock(
        makeBlock("c100", 100, { uncles: [u99.header] })
      );
      const side = provider.addBlock(makeBlock("s100", 100), false);
      provider.latest = c99.header;

      const tracker = createTracker();
      await tracker.initialize();
      expect(await drive(tracker, [{ kind: "side", header: side.header }])).toBeNull();

      const uncle = await findHeader(dataSource, u99.header.hash);
      expect(uncle?.orphan).toBe(true);
      expect(uncle?.uncleBy).toBe(canonical.header.hash);
      expect((await findHeader(dataSource, c99.header.hash))?.orphan).toBe(false);
      expect(provider.fetchedByNumber).toEqual([100, 99]);
    });

    it("keeps transactions whose sender cannot be recovered", async () => {
      const tx = makeTransaction("unrecoverable");
      provider.addBlock(makeBlock("c200", 200));
      const side = provider.addBlock(
        makeBlock("s200", 200, { transactions: [tx] }),
        false
      );
      provider.latest = makeHeader("c199", 199);

      const tracker = createTracker();
      await tracker.initialize();
      await drive(tracker, [{ kind: "side", header: side.header }]);

      const stored = await headers.findByHash(side.header.hash);
      expect(stored?.transactions).toHaveLength(1);

      const row = await dataSource
        .getRepository(TransactionEntity)
        .findOneBy({ hash: tx.hash });
      expect(row?.from).toBe("");
      expect(row?.error).not.toBe("");
    });

    it("stops when the side block cannot be fetched", async () => {
      provider.latest = makeHeader("c299", 299);
      const tracker = createTracker();
      await tracker.initialize();

      const failure = await drive(tracker, [
        { kind: "side", header: makeHeader("missing", 300) },
      ]);

      expect(failure).toBeInstanceOf(BlockNotFoundError);
      expect(tracker.getStatus().isRunning).toBe(false);
    });
  });

  describe("canonical heads", () => {
    it("stores a head citing uncles together with the uncles and their canonical siblings", async () => {
      const c100 = provider.addBlock(makeBlock("c100", 100));
      const c99 = provider.addBlock(makeBlock("c99", 99));
      const u1 = provider.addBlock(makeBlock("u1", 100), false);
      const u2 = provider.addBlock(makeBlock("u2", 99), false);
      const head = provider.addBlock(
        makeBlock("c101", 101, {
          parentHash: c100.header.hash,
          uncles: [u1.header, u2.header],
        })
      );
      provider.latest = c100.header;

      const tracker = createTracker();
      await tracker.initialize();
      await drive(tracker, [{ kind: "head", header: head.header }]);

      const stored = await findHeader(dataSource, head.header.hash);
      expect(stored?.orphan).toBe(false);
      expect(stored?.uncle1).toBe(u1.header.hash);
      expect(stored?.uncle2).toBe(u2.header.hash);

      for (const uncle of [u1, u2]) {
        const row = await findHeader(dataSource, uncle.header.hash);
        expect(row?.orphan).toBe(true);
        expect(row?.uncleBy).toBe(head.header.hash);
      }

      expect((await findHeader(dataSource, c100.header.hash))?.orphan).toBe(false);
      expect((await findHeader(dataSource, c99.header.hash))?.orphan).toBe(false);
      expect(provider.fetchedByNumber).toEqual([100, 99]);
    });

    it("stores an uncle header when the node no longer serves its body", async () => {
      const c100 = provider.addBlock(makeBlock("c100", 100));
      const uncle = makeHeader("pruned-uncle", 100);
      const head = provider.addBlock(
        makeBlock("c101", 101, { parentHash: c100.header.hash, uncles: [uncle] })
      );
      provider.latest = c100.header;

      const tracker = createTracker();
      await tracker.initialize();
      expect(await drive(tracker, [{ kind: "head", header: head.header }])).toBeNull();

      const row = await findHeader(dataSource, uncle.hash);
      expect(row?.orphan).toBe(true);
      expect(row?.uncleBy).toBe(head.header.hash);
      expect(row?.error).toBe("Uncle block body unavailable from node");
      expect((await findHeader(dataSource, c100.header.hash))?.orphan).toBe(false);
    });

    it("fully stores a head whose parent is not the previous head", async () => {
      provider.latest = makeHeader("c49", 49);
      const head = provider.addBlock(makeBlock("c50", 50));

      const tracker = createTracker();
      await tracker.initialize();
      await drive(tracker, [{ kind: "head", header: head.header }]);

      expect((await findHeader(dataSource, head.header.hash))?.orphan).toBe(false);
      expect(provider.fetchedByHash).toEqual([head.header.hash]);
    });

    it("only updates the status for a continuous head without uncles", async () => {
      const parent = makeHeader("c49", 49);
      provider.latest = parent;
      const head = provider.addBlock(
        makeBlock("c50", 50, { parentHash: parent.hash })
      );

      const tracker = createTracker();
      await tracker.initialize();
      await drive(tracker, [{ kind: "head", header: head.header }]);

      expect(await findHeader(dataSource, head.header.hash)).toBeNull();
      expect(provider.fetchedByHash).toEqual([]);
      expect(status.getLatestHeader()?.hash).toBe(head.header.hash);
    });

    it("demotes stored siblings when a competing head arrives", async () => {
      const a10 = provider.addBlock(makeBlock("a10", 10), false);
      await headers.upsertHeader(normalizeHeader(a10.header), ["orphan"]);
      provider.latest = a10.header;
      const b10 = provider.addBlock(makeBlock("b10", 10));

      const tracker = createTracker();
      await tracker.initialize();
      await drive(tracker, [{ kind: "head", header: b10.header }]);

      expect((await findHeader(dataSource, a10.header.hash))?.orphan).toBe(true);
      expect((await findHeader(dataSource, b10.header.hash))?.orphan).toBe(false);
    });
  });

  describe("trailing check", () => {
    it("stores the canonical block at a height with no canonical row", async () => {
      const c10 = provider.addBlock(makeBlock("c10", 10));
      const parent = makeHeader("c19", 19);
      provider.latest = parent;
      const head = makeHeader("c20", 20, { parentHash: parent.hash });

      const tracker = createTracker({ trailDepth: 10 });
      await tracker.initialize();
      await drive(tracker, [{ kind: "head", header: head }]);

      expect((await findHeader(dataSource, c10.header.hash))?.orphan).toBe(false);
      expect(provider.fetchedByNumber).toEqual([10]);
      expect(tracker.getStatus().trailCorrections).toBe(1);
      expect(tracker.getStatus().eventsProcessed).toBe(2);
    });

    it("records the uncles of the canonical block it fetches", async () => {
      const u8 = makeHeader("u8", 8);
      const c9 = provider.addBlock(makeBlock("c9", 9, { uncles: [u8] }));
      const u9 = provider.addBlock(makeBlock("u9", 9), false);
      const c10 = provider.addBlock(makeBlock("c10", 10, { uncles: [u9.header] }));
      const parent = makeHeader("c19", 19);
      provider.latest = parent;

      const tracker = createTracker({ trailDepth: 10 });
      await tracker.initialize();
      const failure = await drive(tracker, [
        { kind: "head", header: makeHeader("c20", 20, { parentHash: parent.hash }) },
      ]);

      expect(failure).toBeNull();
      expect((await findHeader(dataSource, c10.header.hash))?.uncle1).toBe(
        u9.header.hash
      );

      const uncle = await findHeader(dataSource, u9.header.hash);
      expect(uncle?.orphan).toBe(true);
      expect(uncle?.uncleBy).toBe(c10.header.hash);

      // the uncle's sibling is stored, its own uncles are not followed
      const sibling = await findHeader(dataSource, c9.header.hash);
      expect(sibling?.orphan).toBe(false);
      expect(sibling?.uncle1).toBe(u8.hash);
      expect(await findHeader(dataSource, u8.hash)).toBeNull();
      expect(provider.fetchedByNumber).toEqual([10, 9]);
      expect(provider.fetchedByHash).toEqual([u9.header.hash]);
    });

    it("leaves a height with exactly one canonical row alone", async () => {
      const c10 = provider.addBlock(makeBlock("c10", 10));
      await headers.upsertHeader(normalizeHeader(c10.header), ["orphan"]);
      const parent = makeHeader("c19", 19);
      provider.latest = parent;

      const tracker = createTracker({ trailDepth: 10 });
      await tracker.initialize();
      await drive(tracker, [
        { kind: "head", header: makeHeader("c20", 20, { parentHash: parent.hash }) },
      ]);

      expect(provider.fetchedByNumber).toEqual([]);
      expect(tracker.getStatus().trailCorrections).toBe(0);
    });

    it("stops on a failed check by default", async () => {
      const parent = makeHeader("c19", 19);
      provider.latest = parent;

      const tracker = createTracker({ trailDepth: 10 });
      await tracker.initialize();
      const failure = await drive(tracker, [
        { kind: "head", header: makeHeader("c20", 20, { parentHash: parent.hash }) },
      ]);

      expect(failure).toBeInstanceOf(BlockNotFoundError);
    });

    it("logs and continues on a failed check when configured to", async () => {
      const parent = makeHeader("c19", 19);
      provider.latest = parent;

      const tracker = createTracker({ trailDepth: 10, trailErrors: "log" });
      await tracker.initialize();
      const failure = await drive(tracker, [
        { kind: "head", header: makeHeader("c20", 20, { parentHash: parent.hash }) },
      ]);

      expect(failure).toBeNull();
      expect(tracker.getStatus().eventsProcessed).toBe(2);
    });
  });

  it("never keeps two canonical rows at one height across a reorg", async () => {
    const a9 = makeHeader("a9", 9);
    const a10 = provider.addBlock(makeBlock("a10", 10, { parentHash: a9.hash }));
    const b10 = provider.addBlock(makeBlock("b10", 10, { parentHash: a9.hash }), false);
    provider.latest = a9;

    const tracker = createTracker();
    await tracker.initialize();
    const outcome = tracker.run().then(
      () => null,
      (error: unknown) => error
    );

    tracker.push({ kind: "head", header: a10.header });
    tracker.push({ kind: "side", header: b10.header });
    await whenIdle(tracker);

    // the node switches to b10 and builds on it, citing a10 as an uncle
    provider.addBlock(b10);
    const b11 = provider.addBlock(
      makeBlock("b11", 11, { parentHash: b10.header.hash, uncles: [a10.header] })
    );
    const c11 = provider.addBlock(makeBlock("c11", 11), false);

    tracker.push({ kind: "head", header: b10.header });
    tracker.push({ kind: "head", header: b11.header });
    tracker.push({ kind: "side", header: c11.header });
    await whenIdle(tracker);

    tracker.stop();
    expect(await outcome).toBeNull();

    const counts = await canonicalRowsPerHeight();
    for (const count of counts.values()) {
      expect(count).toBeLessThanOrEqual(1);
    }
    expect(counts.get(10)).toBe(1);
    expect(counts.get(11)).toBe(1);

    const a10Row = await findHeader(dataSource, a10.header.hash);
    expect(a10Row?.orphan).toBe(true);
    expect(a10Row?.uncleBy).toBe(b11.header.hash);
    expect((await findHeader(dataSource, b10.header.hash))?.orphan).toBe(false);
    expect((await findHeader(dataSource, b11.header.hash))?.orphan).toBe(false);
    expect((await findHeader(dataSource, c11.header.hash))?.orphan).toBe(true);
  });

  it("stops when the event queue overflows", async () => {
    const tracker = createTracker({ queueCapacity: 1 });
    tracker.push({ kind: "trail", blockNumber: 1 });
    tracker.push({ kind: "trail", blockNumber: 2 });

    await expect(tracker.run()).rejects.toBeInstanceOf(QueueOverflowError);
  });
});
