import { HeadKind, SubscriptionError } from "../../src/utils/errors";
import { RpcHeader } from "../../src/utils/types/rpc.types";
import {
  FullBlock,
  HeadListener,
  HeadSubscription,
  NodeProvider,
} from "../../src/utils/types/tracker.types";
import { toSafeInteger } from "../../src/utils/headers";

/**
 * In-process node: blocks are served from maps and head notifications are
 * emitted by the test.
 */
export class FakeNodeProvider implements NodeProvider {
  chainId: bigint = 1337n;
  latest: RpcHeader | null = null;

  readonly blocks: Map<string, FullBlock> = new Map();
  readonly canonical: Map<number, string> = new Map();
  readonly listeners: Map<HeadKind, HeadListener> = new Map();
  readonly subscribeCalls: HeadKind[] = [];
  readonly unsubscribeCalls: HeadKind[] = [];
  readonly subscribeFailures: SubscriptionError[] = [];
  readonly fetchedByHash: string[] = [];
  readonly fetchedByNumber: number[] = [];
  destroyed: boolean = false;

  /** Serve a block by hash; canonical blocks are served by number too. */
  addBlock(block: FullBlock, canonical: boolean = true): FullBlock {
    this.blocks.set(block.header.hash, block);
    if (canonical) {
      this.canonical.set(toSafeInteger(block.header.number, "number"), block.header.hash);
    }
    return block;
  }

  async getChainId(): Promise<bigint> {
    return this.chainId;
  }

  async getLatestHeader(): Promise<RpcHeader> {
    if (!this.latest) {
      throw new Error("No latest header configured");
    }
    return this.latest;
  }

  async getBlockByHash(hash: string): Promise<FullBlock | null> {
    this.fetchedByHash.push(hash);
    return this.blocks.get(hash) ?? null;
  }

  async getBlockByNumber(blockNumber: number): Promise<FullBlock | null> {
    this.fetchedByNumber.push(blockNumber);
    const hash = this.canonical.get(blockNumber);
    return hash ? this.blocks.get(hash) ?? null : null;
  }

  async subscribe(
    kind: HeadKind,
    listener: HeadListener
  ): Promise<HeadSubscription> {
    this.subscribeCalls.push(kind);

    const failure = this.subscribeFailures.shift();
    if (failure) {
      throw failure;
    }

    this.listeners.set(kind, listener);
    return {
      kind,
      unsubscribe: async () => {
        this.unsubscribeCalls.push(kind);
        if (this.listeners.get(kind) === listener) {
          this.listeners.delete(kind);
        }
      },
    };
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
  }

  emitHeader(kind: HeadKind, header: RpcHeader): void {
    this.listener(kind).onHeader(header);
  }

  emitError(kind: HeadKind, error: SubscriptionError): void {
    this.listener(kind).onError(error);
  }

  private listener(kind: HeadKind): HeadListener {
    const listener = this.listeners.get(kind);
    if (!listener) {
      throw new Error(`No ${kind} subscription`);
    }
    return listener;
  }
}
