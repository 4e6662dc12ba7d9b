import { Signature, toBeHex, Transaction, TransactionLike } from "ethers";
import { describeError } from "./errors";
import { toDecimal, toSafeInteger } from "./headers";
import { RpcTransaction } from "./types/rpc.types";
import { TransactionRecord } from "./types/tracker.types";

// legacy, EIP-2930, EIP-1559, EIP-4844
const SUPPORTED_TYPES = new Set([0, 1, 2, 3]);

export interface SignerContext {
  chainId: bigint;
}

/**
 * Recovers the sender of a wire transaction by rebuilding it with the
 * tracker's chain ID and running signature recovery.
 */
export function recoverSender(
  tx: RpcTransaction,
  context: SignerContext
): string {
  const type = tx.type === undefined ? 0 : Number(BigInt(tx.type));
  if (!SUPPORTED_TYPES.has(type)) {
    throw new Error(`Unsupported transaction type ${type}`);
  }

  if (tx.chainId !== undefined && type !== 0) {
    const txChainId = BigInt(tx.chainId);
    if (txChainId !== context.chainId) {
      throw new Error(
        `Transaction chain id ${txChainId} does not match ${context.chainId}`
      );
    }
  }

  const signature = Signature.from({
    r: toBeHex(BigInt(tx.r), 32),
    s: toBeHex(BigInt(tx.s), 32),
    v: type === 0 ? tx.v : tx.yParity ?? tx.v,
  });

  const legacyChainId = signature.legacyChainId;
  if (type === 0 && legacyChainId != null && legacyChainId !== context.chainId) {
    throw new Error(
      `Transaction chain id ${legacyChainId} does not match ${context.chainId}`
    );
  }

  // Pre-EIP-155 signatures commit to no chain id.
  const unprotected = type === 0 && legacyChainId == null;

  const like: TransactionLike<string> = {
    type,
    to: tx.to ?? null,
    nonce: toSafeInteger(tx.nonce, "nonce"),
    gasLimit: BigInt(tx.gas),
    data: tx.input,
    value: BigInt(tx.value),
    chainId: unprotected ? 0n : context.chainId,
    signature,
  };

  if (type < 2) {
    like.gasPrice = BigInt(tx.gasPrice ?? "0x0");
  } else {
    like.maxFeePerGas = BigInt(tx.maxFeePerGas ?? "0x0");
    like.maxPriorityFeePerGas = BigInt(tx.maxPriorityFeePerGas ?? "0x0");
  }
  if (type >= 1) {
    like.accessList = tx.accessList ?? [];
  }
  if (type === 3) {
    like.maxFeePerBlobGas = BigInt(tx.maxFeePerBlobGas ?? "0x0");
    like.blobVersionedHashes = tx.blobVersionedHashes ?? [];
  }

  const sender = Transaction.from(like).from;
  if (!sender) {
    throw new Error("Signature recovery produced no sender");
  }
  return sender.toLowerCase();
}

/**
 * Converts a wire transaction into its storage shape. A sender that cannot
 * be recovered leaves `from` empty and records why in `error`.
 */
export function normalizeTransaction(
  tx: RpcTransaction,
  context: SignerContext
): TransactionRecord {
  const record: TransactionRecord = {
    hash: tx.hash.toLowerCase(),
    from: "",
    to: tx.to ? tx.to.toLowerCase() : null,
    data: tx.input.toLowerCase(),
    gasPrice: toDecimal(tx.gasPrice ?? tx.maxFeePerGas ?? "0x0"),
    gasLimit: toDecimal(tx.gas),
    value: toDecimal(tx.value),
    nonce: toSafeInteger(tx.nonce, "nonce"),
    error: "",
  };

  try {
    record.from = recoverSender(tx, context);
  } catch (error) {
    record.error = describeError(error);
  }

  return record;
}
