import { encodeRlp, getBytes, hexlify, keccak256, toBeArray, toBeHex } from "ethers";
import { RpcHeader } from "./types/rpc.types";
import { HeaderRecord } from "./types/tracker.types";

/** keccak256(rlp([])), the uncle digest of a block citing no uncles. */
export const EMPTY_UNCLE_HASH =
  "0x1dcc4de8dec75d7aab85b567b6ccd41ad312451b948a7413f0a142fd40d49347";

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

export const toDecimal = (quantity: string): string =>
  quantity === "0x" ? "0" : BigInt(quantity).toString();

export function toSafeInteger(quantity: string, field: string): number {
  const value = quantity === "0x" ? 0n : BigInt(quantity);
  if (value > MAX_SAFE) {
    throw new RangeError(`${field} ${value} exceeds the safe integer range`);
  }
  return Number(value);
}

const optionalHex = (value?: string): string =>
  value ? value.toLowerCase() : "";

const optionalDecimal = (value?: string): string =>
  value ? toDecimal(value) : "";

/**
 * Converts a wire header into its storage shape. Classification columns
 * (`orphan`, `uncleBy`, `error`) and uncle citations start empty; the
 * tracker fills them in.
 */
export function normalizeHeader(header: RpcHeader): HeaderRecord {
  return {
    hash: header.hash.toLowerCase(),
    parentHash: header.parentHash.toLowerCase(),
    uncleHash: header.sha3Uncles.toLowerCase(),
    miner: header.miner.toLowerCase(),
    stateRoot: header.stateRoot.toLowerCase(),
    txRoot: header.transactionsRoot.toLowerCase(),
    receiptRoot: header.receiptsRoot.toLowerCase(),
    logsBloom: header.logsBloom.toLowerCase(),
    difficulty: toDecimal(header.difficulty),
    number: toSafeInteger(header.number, "number"),
    gasLimit: toSafeInteger(header.gasLimit, "gasLimit"),
    gasUsed: toSafeInteger(header.gasUsed, "gasUsed"),
    timestamp: toSafeInteger(header.timestamp, "timestamp"),
    extraData: Buffer.from(getBytes(header.extraData)),
    mixDigest: header.mixHash.toLowerCase(),
    nonce: toDecimal(header.nonce),
    baseFee: optionalDecimal(header.baseFeePerGas),
    withdrawalsRoot: optionalHex(header.withdrawalsRoot),
    blobGasUsed: optionalDecimal(header.blobGasUsed),
    excessBlobGas: optionalDecimal(header.excessBlobGas),
    parentBeaconBlockRoot: optionalHex(header.parentBeaconBlockRoot),
    requestsHash: optionalHex(header.requestsHash),
    uncle1: "",
    uncle2: "",
    orphan: false,
    uncleBy: "",
    error: "",
  };
}

type IdentityFields = Omit<
  HeaderRecord,
  "hash" | "uncle1" | "uncle2" | "orphan" | "uncleBy" | "error"
>;

const integer = (value: string | number): Uint8Array =>
  toBeArray(BigInt(value));

/**
 * Re-derives the block hash from stored header fields. Optional trailing
 * fields are appended in fork order for as long as they are present.
 */
export function computeHeaderHash(record: IdentityFields): string {
  const fields: Array<string | Uint8Array> = [
    record.parentHash,
    record.uncleHash,
    record.miner,
    record.stateRoot,
    record.txRoot,
    record.receiptRoot,
    record.logsBloom,
    integer(record.difficulty),
    integer(record.number),
    integer(record.gasLimit),
    integer(record.gasUsed),
    integer(record.timestamp),
    hexlify(record.extraData),
    record.mixDigest,
    toBeHex(BigInt(record.nonce), 8),
  ];

  const forkFields: Array<[string, (value: string) => string | Uint8Array]> = [
    [record.baseFee, integer],
    [record.withdrawalsRoot, (value) => value],
    [record.blobGasUsed, integer],
    [record.excessBlobGas, integer],
    [record.parentBeaconBlockRoot, (value) => value],
    [record.requestsHash, (value) => value],
  ];

  for (const [value, encode] of forkFields) {
    if (value === "") {
      break;
    }
    fields.push(encode(value));
  }

  return keccak256(encodeRlp(fields));
}

export function citesUncles(header: RpcHeader): boolean {
  return header.sha3Uncles.toLowerCase() !== EMPTY_UNCLE_HASH;
}
