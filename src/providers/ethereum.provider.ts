import { JsonRpcProvider, WebSocketProvider, toQuantity } from "ethers";
import { z } from "zod";
import HeadsSocketProvider from "./heads.provider";
import { HeadKind } from "../utils/errors";
import {
  ChainIdSchema,
  RpcBlock,
  RpcBlockSchema,
  RpcHeader,
  RpcHeaderSchema,
} from "../utils/types/rpc.types";
import {
  FullBlock,
  HeadListener,
  HeadSubscription,
  NodeProvider,
} from "../utils/types/tracker.types";
import logger from "../utils/logger";

/**
 * NodeProvider for Ethereum style JSON-RPC nodes.
 *
 * Fetches go through a single request provider (HTTP when `rpcUrl` is set,
 * otherwise the WebSocket endpoint); every head subscription opens its own
 * WebSocket so a dropped stream can be replaced on its own.
 */
export default class EthereumProvider implements NodeProvider {
  private rpcProvider: JsonRpcProvider | WebSocketProvider;
  private sockets: Set<HeadsSocketProvider> = new Set();

  /**
   * @param rpcUrl - HTTP RPC URL, may be empty
   * @param wsUrl - WebSocket URL used for subscriptions
   */
  constructor(private rpcUrl: string, private wsUrl: string) {
    if (!wsUrl) {
      throw new Error("A WebSocket URL is required for head subscriptions");
    }

    this.rpcProvider = rpcUrl
      ? new JsonRpcProvider(rpcUrl)
      : new WebSocketProvider(wsUrl);
  }

  async getChainId(): Promise<bigint> {
    const result = await this.request("eth_chainId", [], ChainIdSchema);
    const chainId = BigInt(result);
    logger.debug("Retrieved chain id", { chainId });
    return chainId;
  }

  async getLatestHeader(): Promise<RpcHeader> {
    const header = await this.request(
      "eth_getBlockByNumber",
      ["latest", false],
      RpcHeaderSchema.nullable()
    );
    if (!header) {
      throw new Error("Node returned no latest block");
    }

    logger.debug("Retrieved latest header", {
      number: header.number,
      hash: header.hash,
    });
    return header;
  }

  /**
   * Get a block with full transactions and uncle headers by its hash
   * @param hash - The block hash to retrieve
   */
  async getBlockByHash(hash: string): Promise<FullBlock | null> {
    const block = await this.request(
      "eth_getBlockByHash",
      [hash, true],
      RpcBlockSchema.nullable()
    );
    return block ? this.withUncles(block) : null;
  }

  /**
   * Get the node's canonical block at a height
   * @param blockNumber - The block number to retrieve
   */
  async getBlockByNumber(blockNumber: number): Promise<FullBlock | null> {
    const block = await this.request(
      "eth_getBlockByNumber",
      [toQuantity(blockNumber), true],
      RpcBlockSchema.nullable()
    );
    return block ? this.withUncles(block) : null;
  }

  async subscribe(
    kind: HeadKind,
    listener: HeadListener
  ): Promise<HeadSubscription> {
    const socket = new HeadsSocketProvider(this.wsUrl, kind, listener);
    this.sockets.add(socket);

    const close = async () => {
      this.sockets.delete(socket);
      await socket.close();
    };

    try {
      await socket.subscribeHeads();
    } catch (error) {
      await close();
      throw error;
    }

    return { kind, unsubscribe: close };
  }

  async destroy(): Promise<void> {
    const sockets = [...this.sockets];
    this.sockets.clear();

    await Promise.all(sockets.map((socket) => socket.close()));
    await this.rpcProvider.destroy();

    logger.info("Node provider destroyed", {
      rpcUrl: this.rpcUrl || undefined,
      wsUrl: this.wsUrl,
    });
  }

  private async withUncles(block: RpcBlock): Promise<FullBlock> {
    const { transactions, uncles: uncleHashes, ...header } = block;

    const uncles: RpcHeader[] = [];
    for (let index = 0; index < uncleHashes.length; index++) {
      const uncle = await this.request(
        "eth_getUncleByBlockHashAndIndex",
        [block.hash, toQuantity(index)],
        RpcHeaderSchema.nullable()
      );
      if (!uncle) {
        throw new Error(
          `Uncle ${index} of block ${block.hash} not returned by node`
        );
      }
      uncles.push(uncle);
    }

    logger.debug("Retrieved block", {
      number: header.number,
      hash: header.hash,
      transactionCount: transactions.length,
      uncleCount: uncles.length,
    });

    return { header, transactions, uncles };
  }

  private async request<T extends z.ZodTypeAny>(
    method: string,
    params: unknown[],
    schema: T
  ): Promise<z.infer<T>> {
    try {
      const result: unknown = await this.rpcProvider.send(method, params);
      return schema.parse(result);
    } catch (error) {
      logger.error("Node request failed", { method, params, error });
      throw error;
    }
  }
}
