import { z } from "zod";

const hex = z.string().regex(/^0x[0-9a-fA-F]*$/, "expected 0x-prefixed hex");
const quantity = z.string().regex(/^0x[0-9a-fA-F]+$/, "expected hex quantity");
const hash = z.string().regex(/^0x[0-9a-fA-F]{64}$/, "expected 32-byte hash");
const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "expected address");

/**
 * Header object as returned by `eth_subscribe` notifications,
 * `eth_getBlockBy*` and `eth_getUncleByBlockHashAndIndex`.
 */
export const RpcHeaderSchema = z.object({
  hash,
  parentHash: hash,
  sha3Uncles: hash,
  miner: address,
  stateRoot: hash,
  transactionsRoot: hash,
  receiptsRoot: hash,
  logsBloom: hex,
  difficulty: quantity,
  number: quantity,
  gasLimit: quantity,
  gasUsed: quantity,
  timestamp: quantity,
  extraData: hex,
  mixHash: hash,
  nonce: hex,
  baseFeePerGas: quantity.optional(),
  withdrawalsRoot: hash.optional(),
  blobGasUsed: quantity.optional(),
  excessBlobGas: quantity.optional(),
  parentBeaconBlockRoot: hash.optional(),
  requestsHash: hash.optional(),
});

export type RpcHeader = z.infer<typeof RpcHeaderSchema>;

export const RpcAccessListSchema = z.array(
  z.object({
    address,
    storageKeys: z.array(hash),
  })
);

export const RpcTransactionSchema = z.object({
  hash,
  type: quantity.optional(),
  from: address.optional(),
  to: address.nullable().optional(),
  input: hex,
  nonce: quantity,
  gas: quantity,
  gasPrice: quantity.optional(),
  maxFeePerGas: quantity.optional(),
  maxPriorityFeePerGas: quantity.optional(),
  maxFeePerBlobGas: quantity.optional(),
  blobVersionedHashes: z.array(hash).optional(),
  accessList: RpcAccessListSchema.optional(),
  value: quantity,
  chainId: quantity.optional(),
  v: quantity,
  r: quantity,
  s: quantity,
  yParity: quantity.optional(),
});

export type RpcTransaction = z.infer<typeof RpcTransactionSchema>;

export const RpcBlockSchema = RpcHeaderSchema.extend({
  transactions: z.array(RpcTransactionSchema),
  uncles: z.array(hash),
});

export type RpcBlock = z.infer<typeof RpcBlockSchema>;

export const ChainIdSchema = quantity;
