import { ethers } from "ethers";
import type { ChainConfig } from "./config.js";
import { blockToHeader, type RpcBlock } from "./encoding.js";
import {
  HeaderNotFoundError,
  RelayError,
  TimeoutError,
  classifyError,
} from "./errors.js";
import { ChainRateLimiter } from "./ratelimit.js";
import type { BlockHeader, LogEntry, LogFilter } from "./types.js";

export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ChainHeader extends BlockHeader {
  hash: string;
}

export interface StorageProof {
  storageHash: string;
  storageProof: { key: string; value: bigint; proof: string[] }[];
}

export interface ReceiptSummary {
  transactionHash: string;
  blockNumber: number;
  blockHash: string;
  // 1 success, 0 reverted
  status: number | null;
  logs: LogEntry[];
}

/**
 * Read access to a set of chains. Every call names its chain; there is no
 * default. Failures are thrown as classified RelayErrors.
 */
export interface ChainReader {
  getHeader(chainId: number, block: string | number | bigint, opts?: CallOptions): Promise<ChainHeader>;
  getBlockNumber(chainId: number, opts?: CallOptions): Promise<number>;
  getLogs(chainId: number, filter: LogFilter, opts?: CallOptions): Promise<LogEntry[]>;
  call(chainId: number, to: string, data: string, blockTag?: number, opts?: CallOptions): Promise<string>;
  getProof(chainId: number, address: string, slots: string[], blockNumber: number, opts?: CallOptions): Promise<StorageProof>;
  getTransactionReceipt(chainId: number, txHash: string, opts?: CallOptions): Promise<ReceiptSummary | null>;
}

export interface TransactionRequest {
  to: string;
  data: string;
}

export interface SignedTransaction {
  hash: string;
  // RLP-serialized, ready for eth_sendRawTransaction
  raw: string;
}

/**
 * Sending is split in two so the hash can be recorded before anything
 * leaves the process.
 */
export interface ChainWriter {
  /** Estimates gas and signs with the next pending nonce. Sends nothing. */
  sign(chainId: number, tx: TransactionRequest, opts?: CallOptions): Promise<SignedTransaction>;
  /**
   * Sends a signed transaction and resolves with its hash. A transaction the
   * node already holds counts as sent.
   */
  broadcast(chainId: number, raw: string, opts?: CallOptions): Promise<string>;
}

export async function withTimeout<T>(
  operation: string,
  run: () => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    throw new RelayError("retryable", `${operation} aborted`);
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
    const onAbort = (): void => {
      cleanup();
      reject(new RelayError("retryable", `${operation} aborted`));
    };
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    run().then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(classifyError(err));
      },
    );
  });
}

function isRpcBlock(value: unknown): value is RpcBlock {
  if (!value || typeof value !== "object") return false;
  const fields = new Map(Object.entries(value));
  return ["hash", "parentHash", "stateRoot", "logsBloom", "number", "miner"].every(
    (field) => typeof fields.get(field) === "string",
  );
}

function isStorageProofResponse(value: unknown): value is {
  storageHash: string;
  storageProof: { key: string; value: string; proof: string[] }[];
} {
  if (!value || typeof value !== "object") return false;
  return (
    "storageHash" in value &&
    typeof value.storageHash === "string" &&
    "storageProof" in value &&
    Array.isArray(value.storageProof)
  );
}

function toLogEntry(log: ethers.Log): LogEntry {
  return {
    address: log.address,
    topics: [...log.topics],
    data: log.data,
    blockNumber: log.blockNumber,
    blockHash: log.blockHash,
    transactionHash: log.transactionHash.toLowerCase(),
    logIndex: log.index,
  };
}

export interface RpcChainReaderOptions {
  timeoutMs: number;
  requestsPerSecond: number;
}

export function createProviders(
  chains: Pick<ChainConfig, "chainId" | "rpcUrl">[],
): Map<number, ethers.JsonRpcProvider> {
  const providers = new Map<number, ethers.JsonRpcProvider>();
  for (const chain of chains) {
    providers.set(
      chain.chainId,
      new ethers.JsonRpcProvider(chain.rpcUrl, chain.chainId, {
        staticNetwork: true,
      }),
    );
  }
  return providers;
}

export class RpcChainReader implements ChainReader {
  private readonly limiter: ChainRateLimiter;

  constructor(
    private readonly providers: Map<number, ethers.JsonRpcProvider>,
    private readonly options: RpcChainReaderOptions,
  ) {
    this.limiter = new ChainRateLimiter(options.requestsPerSecond);
  }

  private provider(chainId: number): ethers.JsonRpcProvider {
    const provider = this.providers.get(chainId);
    if (!provider) {
      throw new RelayError("fatal", `no RPC endpoint configured for chain ${chainId}`);
    }
    return provider;
  }

  private async request<T>(
    chainId: number,
    operation: string,
    run: (provider: ethers.JsonRpcProvider) => Promise<T>,
    opts: CallOptions = {},
  ): Promise<T> {
    const provider = this.provider(chainId);
    await this.limiter.acquire(chainId);
    return withTimeout(
      `${operation} on chain ${chainId}`,
      () => run(provider),
      opts.timeoutMs ?? this.options.timeoutMs,
      opts.signal,
    );
  }

  async getHeader(
    chainId: number,
    block: string | number | bigint,
    opts?: CallOptions,
  ): Promise<ChainHeader> {
    const byHash = typeof block === "string" && ethers.isHexString(block, 32);
    const raw = await this.request(
      chainId,
      "getHeader",
      (provider) =>
        byHash
          ? provider.send("eth_getBlockByHash", [block, false])
          : provider.send("eth_getBlockByNumber", [ethers.toQuantity(block), false]),
      opts,
    );
    if (!isRpcBlock(raw)) {
      throw new HeaderNotFoundError(chainId, block.toString());
    }
    return { ...blockToHeader(raw), hash: raw.hash };
  }

  getBlockNumber(chainId: number, opts?: CallOptions): Promise<number> {
    return this.request(chainId, "getBlockNumber", (provider) => provider.getBlockNumber(), opts);
  }

  async getLogs(chainId: number, filter: LogFilter, opts?: CallOptions): Promise<LogEntry[]> {
    const logs = await this.request(
      chainId,
      "getLogs",
      (provider) =>
        provider.getLogs({
          address: filter.addresses,
          topics: filter.topics,
          fromBlock: filter.fromBlock,
          toBlock: filter.toBlock,
        }),
      opts,
    );
    return logs.map(toLogEntry);
  }

  call(
    chainId: number,
    to: string,
    data: string,
    blockTag?: number,
    opts?: CallOptions,
  ): Promise<string> {
    return this.request(
      chainId,
      "call",
      (provider) => provider.call({ to, data, blockTag }),
      opts,
    );
  }

  async getProof(
    chainId: number,
    address: string,
    slots: string[],
    blockNumber: number,
    opts?: CallOptions,
  ): Promise<StorageProof> {
    const raw: unknown = await this.request(
      chainId,
      "getProof",
      (provider) =>
        provider.send("eth_getProof", [address, slots, ethers.toQuantity(blockNumber)]),
      opts,
    );
    if (!isStorageProofResponse(raw)) {
      throw new RelayError("retryable", `malformed eth_getProof response from chain ${chainId}`);
    }
    return {
      storageHash: raw.storageHash,
      storageProof: raw.storageProof.map((entry) => ({
        key: entry.key,
        value: BigInt(entry.value),
        proof: entry.proof,
      })),
    };
  }

  async getTransactionReceipt(
    chainId: number,
    txHash: string,
    opts?: CallOptions,
  ): Promise<ReceiptSummary | null> {
    const receipt = await this.request(
      chainId,
      "getTransactionReceipt",
      (provider) => provider.getTransactionReceipt(txHash),
      opts,
    );
    if (!receipt) return null;
    return {
      transactionHash: receipt.hash.toLowerCase(),
      blockNumber: receipt.blockNumber,
      blockHash: receipt.blockHash,
      status: receipt.status,
      logs: receipt.logs.map(toLogEntry),
    };
  }
}

const ALREADY_KNOWN = /already known|known transaction|already imported/i;

export class WalletChainWriter implements ChainWriter {
  private readonly wallets = new Map<number, ethers.Wallet>();

  constructor(
    private readonly providers: Map<number, ethers.JsonRpcProvider>,
    privateKey: string,
    private readonly timeoutMs: number,
  ) {
    for (const [chainId, provider] of providers) {
      this.wallets.set(chainId, new ethers.Wallet(privateKey, provider));
    }
  }

  async sign(
    chainId: number,
    tx: TransactionRequest,
    opts: CallOptions = {},
  ): Promise<SignedTransaction> {
    const wallet = this.wallets.get(chainId);
    if (!wallet) {
      throw new RelayError("fatal", `no signer configured for chain ${chainId}`);
    }
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs;

    // Estimate first to catch reverts cheaply
    const gasEstimate = await withTimeout(
      `estimateGas on chain ${chainId}`,
      () => wallet.estimateGas(tx),
      timeoutMs,
      opts.signal,
    );

    // 20% gas buffer
    const populated = await withTimeout(
      `populateTransaction on chain ${chainId}`,
      () => wallet.populateTransaction({ ...tx, gasLimit: (gasEstimate * 120n) / 100n }),
      timeoutMs,
      opts.signal,
    );
    const raw = await wallet.signTransaction(populated);
    // A transaction's hash is the keccak of its signed serialization
    return { hash: ethers.keccak256(raw), raw };
  }

  async broadcast(chainId: number, raw: string, opts: CallOptions = {}): Promise<string> {
    const provider = this.providers.get(chainId);
    if (!provider) {
      throw new RelayError("fatal", `no RPC endpoint configured for chain ${chainId}`);
    }
    const hash = ethers.keccak256(raw);

    return withTimeout(
      `sendRawTransaction on chain ${chainId}`,
      () =>
        provider.broadcastTransaction(raw).then(
          (sent) => sent.hash.toLowerCase(),
          (err: unknown) => {
            if (err instanceof Error && ALREADY_KNOWN.test(err.message)) {
              return hash;
            }
            throw err;
          },
        ),
      opts.timeoutMs ?? this.timeoutMs,
      opts.signal,
    );
  }
}
