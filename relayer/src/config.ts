import { ethers } from "ethers";

export interface ChainConfig {
  name: "L1" | "L2";
  chainId: number;
  rpcUrl: string;

  bridgeAddress: string;
  signalServiceAddress: string;
  // Contract on this chain that stores the counterpart's synced block
  // hashes and signal roots.
  crossChainSyncAddress: string;
  // Emitter of BlockProposed / BlockVerified; L1 only.
  rollupAddress: string | null;

  startBlock: number;
  confirmations: number;
}

export interface Config {
  chains: ChainConfig[];

  relayerPrivateKey: string;

  apiPort: number;

  pollIntervalMs: number;
  maxLogRange: number;
  rpcTimeoutMs: number;
  rpcRequestsPerSecond: number;

  maxRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;

  proofConcurrency: number;
  submitConcurrency: number;
  batchSize: number;

  dbPath: string;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function address(env: Env, name: string): string {
  const value = required(env, name);
  if (!ethers.isAddress(value)) {
    throw new Error(`Invalid address in env var ${name}: ${value}`);
  }
  return ethers.getAddress(value);
}

function int(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`Invalid number in env var ${name}: ${raw}`);
  }
  return value;
}

function requiredInt(env: Env, name: string): number {
  required(env, name);
  return int(env, name, 0);
}

function loadChain(env: Env, name: "L1" | "L2"): ChainConfig {
  const crossChainSyncAddress = address(env, `${name}_CROSS_CHAIN_SYNC_ADDRESS`);
  let rollupAddress: string | null = null;
  if (name === "L1") {
    rollupAddress = env.L1_ROLLUP_ADDRESS
      ? address(env, "L1_ROLLUP_ADDRESS")
      : crossChainSyncAddress;
  }

  return {
    name,
    chainId: requiredInt(env, `${name}_CHAIN_ID`),
    rpcUrl: required(env, `${name}_RPC_URL`),
    bridgeAddress: address(env, `${name}_BRIDGE_ADDRESS`),
    signalServiceAddress: address(env, `${name}_SIGNAL_SERVICE_ADDRESS`),
    crossChainSyncAddress,
    rollupAddress,
    startBlock: int(env, `${name}_START_BLOCK`, 0),
    confirmations: int(env, `${name}_CONFIRMATIONS`, 1),
  };
}

export function loadConfig(env: Env = process.env): Config {
  const l1 = loadChain(env, "L1");
  const l2 = loadChain(env, "L2");
  if (l1.chainId === l2.chainId) {
    throw new Error(`L1_CHAIN_ID and L2_CHAIN_ID must differ (both ${l1.chainId})`);
  }

  return {
    chains: [l1, l2],

    relayerPrivateKey: required(env, "RELAYER_PRIVATE_KEY"),

    apiPort: int(env, "API_PORT", 3000),

    pollIntervalMs: int(env, "POLL_INTERVAL_MS", 2000),
    maxLogRange: int(env, "MAX_LOG_RANGE", 2000),
    rpcTimeoutMs: int(env, "RPC_TIMEOUT_MS", 15_000),
    rpcRequestsPerSecond: int(env, "RPC_REQUESTS_PER_SECOND", 25),

    maxRetries: int(env, "MAX_RETRIES", 5),
    backoffBaseMs: int(env, "BACKOFF_BASE_MS", 5000),
    backoffMaxMs: int(env, "BACKOFF_MAX_MS", 300_000),

    proofConcurrency: int(env, "PROOF_CONCURRENCY", 4),
    submitConcurrency: int(env, "SUBMIT_CONCURRENCY", 2),
    batchSize: int(env, "BATCH_SIZE", 20),

    dbPath: env.DB_PATH ?? "./data/relayer.db",
  };
}

export function chainById(config: Pick<Config, "chains">, chainId: number): ChainConfig | undefined {
  return config.chains.find((chain) => chain.chainId === chainId);
}
