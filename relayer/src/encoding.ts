import { ethers } from "ethers";
import { EncodingError } from "./errors.js";
import type { BlockHeader, BridgeMessage } from "./types.js";

const coder = ethers.AbiCoder.defaultAbiCoder();

// Field order and widths must match the verifier's BlockHeader struct.
export const BLOCK_HEADER_TYPE =
  "tuple(bytes32 parentHash, bytes32 ommersHash, address beneficiary, bytes32 stateRoot, bytes32 transactionsRoot, bytes32 receiptsRoot, bytes32[8] logsBloom, uint256 difficulty, uint128 height, uint64 gasLimit, uint64 gasUsed, uint64 timestamp, bytes extraData, bytes32 mixHash, uint64 nonce, uint256 baseFeePerGas)";

export const SIGNAL_PROOF_TYPE = "tuple(uint256 height, bytes proof)";

export const MESSAGE_TYPE =
  "tuple(uint256 id, address sender, uint256 srcChainId, uint256 destChainId, address owner, address to, address refundAddress, uint256 depositValue, uint256 callValue, uint256 processingFee, uint256 gasLimit, bytes data, string memo)";

const BLOOM_WORDS = 8;
const BLOOM_BYTES = BLOOM_WORDS * 32;

/** Block as returned by eth_getBlockByHash / eth_getBlockByNumber. */
export interface RpcBlock {
  hash: string;
  parentHash: string;
  sha3Uncles: string;
  miner: string;
  stateRoot: string;
  transactionsRoot: string;
  receiptsRoot: string;
  logsBloom: string;
  difficulty: string;
  number: string;
  gasLimit: string;
  gasUsed: string;
  timestamp: string;
  extraData: string;
  mixHash?: string;
  nonce?: string;
  baseFeePerGas?: string;
}

export function emptyHeader(): BlockHeader {
  return {
    parentHash: ethers.ZeroHash,
    ommersHash: ethers.ZeroHash,
    beneficiary: ethers.ZeroAddress,
    stateRoot: ethers.ZeroHash,
    transactionsRoot: ethers.ZeroHash,
    receiptsRoot: ethers.ZeroHash,
    logsBloom: new Array<string>(BLOOM_WORDS).fill(ethers.ZeroHash),
    difficulty: 0n,
    height: 0n,
    gasLimit: 0n,
    gasUsed: 0n,
    timestamp: 0n,
    extraData: "0x",
    mixHash: ethers.ZeroHash,
    nonce: 0n,
    baseFeePerGas: 0n,
  };
}

export function encodeHeader(header: BlockHeader): string {
  if (header.logsBloom.length !== BLOOM_WORDS) {
    throw new EncodingError(
      `logsBloom must have ${BLOOM_WORDS} words, got ${header.logsBloom.length}`,
    );
  }
  try {
    return coder.encode([BLOCK_HEADER_TYPE], [header]);
  } catch (err) {
    throw new EncodingError(
      `header ${header.height} could not be encoded: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

export function decodeHeader(encoded: string): BlockHeader {
  let h: ethers.Result;
  try {
    [h] = coder.decode([BLOCK_HEADER_TYPE], encoded);
  } catch (err) {
    throw new EncodingError("malformed header encoding", { cause: err });
  }
  return {
    parentHash: h.parentHash,
    ommersHash: h.ommersHash,
    beneficiary: h.beneficiary,
    stateRoot: h.stateRoot,
    transactionsRoot: h.transactionsRoot,
    receiptsRoot: h.receiptsRoot,
    logsBloom: h.logsBloom.toArray(),
    difficulty: h.difficulty,
    height: h.height,
    gasLimit: h.gasLimit,
    gasUsed: h.gasUsed,
    timestamp: h.timestamp,
    extraData: h.extraData,
    mixHash: h.mixHash,
    nonce: h.nonce,
    baseFeePerGas: h.baseFeePerGas,
  };
}

/**
 * Encodes the proof handed to the destination bridge. The verifier looks up
 * the signal root it synced for `header.height` and checks `storageProof`
 * against it.
 */
export function encodeSignalProof(header: BlockHeader, storageProof: string): string {
  if (!ethers.isHexString(storageProof)) {
    throw new EncodingError("storage proof is not a hex string");
  }
  try {
    return coder.encode([SIGNAL_PROOF_TYPE], [
      { height: header.height, proof: storageProof },
    ]);
  } catch (err) {
    throw new EncodingError(
      `signal proof at height ${header.height} could not be encoded`,
      { cause: err },
    );
  }
}

export function decodeSignalProof(encoded: string): { height: bigint; proof: string } {
  try {
    const [p] = coder.decode([SIGNAL_PROOF_TYPE], encoded);
    return { height: p.height, proof: p.proof };
  } catch (err) {
    throw new EncodingError("malformed signal proof encoding", { cause: err });
  }
}

/** RLP list of the account-storage trie nodes from eth_getProof. */
export function encodeStorageProof(nodes: string[]): string {
  try {
    return ethers.encodeRlp(nodes);
  } catch (err) {
    throw new EncodingError("storage proof nodes are not valid bytes", { cause: err });
  }
}

function splitBloom(bloom: string): string[] {
  const bytes = ethers.getBytes(bloom);
  if (bytes.length !== BLOOM_BYTES) {
    throw new EncodingError(`logsBloom must be ${BLOOM_BYTES} bytes, got ${bytes.length}`);
  }
  const words: string[] = [];
  for (let i = 0; i < BLOOM_WORDS; i++) {
    words.push(ethers.hexlify(bytes.slice(i * 32, (i + 1) * 32)));
  }
  return words;
}

function quantity(value: string | undefined): bigint {
  return value === undefined || value === "0x" ? 0n : BigInt(value);
}

export function blockToHeader(block: RpcBlock): BlockHeader {
  try {
    return {
      parentHash: block.parentHash,
      ommersHash: block.sha3Uncles,
      beneficiary: ethers.getAddress(block.miner),
      stateRoot: block.stateRoot,
      transactionsRoot: block.transactionsRoot,
      receiptsRoot: block.receiptsRoot,
      logsBloom: splitBloom(block.logsBloom),
      difficulty: quantity(block.difficulty),
      height: quantity(block.number),
      gasLimit: quantity(block.gasLimit),
      gasUsed: quantity(block.gasUsed),
      timestamp: quantity(block.timestamp),
      extraData: block.extraData,
      mixHash: block.mixHash ?? ethers.ZeroHash,
      nonce: quantity(block.nonce),
      // pre-London blocks have no base fee
      baseFeePerGas: quantity(block.baseFeePerGas),
    };
  } catch (err) {
    if (err instanceof EncodingError) throw err;
    throw new EncodingError(`block ${block.hash} has malformed fields`, { cause: err });
  }
}

export function hashMessage(message: BridgeMessage): string {
  return ethers.keccak256(coder.encode([MESSAGE_TYPE], [message]));
}

/** Storage slot the signal service writes for `signal` sent by `app`. */
export function signalSlot(app: string, signal: string): string {
  return ethers.solidityPackedKeccak256(["address", "bytes32"], [app, signal]);
}
