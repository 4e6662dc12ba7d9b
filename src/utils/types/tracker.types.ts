import { HeadKind, SubscriptionError } from "../errors";
import { RpcHeader, RpcTransaction } from "./rpc.types";

export interface HeaderRecord {
  hash: string;
  parentHash: string;
  uncleHash: string;
  miner: string;
  stateRoot: string;
  txRoot: string;
  receiptRoot: string;
  logsBloom: string;
  difficulty: string;
  number: number;
  gasLimit: number;
  gasUsed: number;
  timestamp: number;
  extraData: Buffer;
  mixDigest: string;
  nonce: string;
  baseFee: string;
  withdrawalsRoot: string;
  blobGasUsed: string;
  excessBlobGas: string;
  parentBeaconBlockRoot: string;
  requestsHash: string;
  uncle1: string;
  uncle2: string;
  orphan: boolean;
  uncleBy: string;
  error: string;
}

export interface TransactionRecord {
  hash: string;
  from: string;
  to: string | null;
  data: string;
  gasPrice: string;
  gasLimit: string;
  value: string;
  nonce: number;
  error: string;
}

/** Header columns that may change after a row exists. */
export type MutableHeaderColumn = "orphan" | "uncleBy";

export interface FullBlock {
  header: RpcHeader;
  transactions: RpcTransaction[];
  uncles: RpcHeader[];
}

export interface HeadListener {
  onHeader(header: RpcHeader): void;
  onError(error: SubscriptionError): void;
}

export interface HeadSubscription {
  readonly kind: HeadKind;
  unsubscribe(): Promise<void>;
}

/**
 * Node capability the tracker depends on.
 */
export interface NodeProvider {
  getChainId(): Promise<bigint>;
  getLatestHeader(): Promise<RpcHeader>;
  getBlockByHash(hash: string): Promise<FullBlock | null>;
  getBlockByNumber(blockNumber: number): Promise<FullBlock | null>;
  subscribe(kind: HeadKind, listener: HeadListener): Promise<HeadSubscription>;
  destroy(): Promise<void>;
}

export type TrackerEvent =
  | { kind: "head"; header: RpcHeader }
  | { kind: "side"; header: RpcHeader }
  | { kind: "trail"; blockNumber: number };

export interface StatusSnapshot {
  latestHeader: Readonly<HeaderRecord> | null;
  chainId: string;
  startedAt: Date;
  uptime: number; // in seconds
}

export interface SubscriptionStatus {
  kind: HeadKind;
  active: boolean;
  reconnects: number;
  lastError?: string;
}

export interface TrackerStatus {
  isRunning: boolean;
  /** An event is being handled right now */
  isProcessing: boolean;
  queueDepth: number;
  eventsProcessed: number;
  trailCorrections: number;
  lastUpdated: Date;
}
