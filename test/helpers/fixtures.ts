import { ethers } from "ethers";
import { bridgeInterface } from "../../relayer/src/abis.js";
import { KeyedMutex } from "../../relayer/src/concurrency.js";
import type { ChainConfig } from "../../relayer/src/config.js";
import type { PipelineContext, PipelineSettings } from "../../relayer/src/context.js";
import { hashMessage, signalSlot } from "../../relayer/src/encoding.js";
import { ProofBuilder } from "../../relayer/src/proof.js";
import { createStore, type Store } from "../../relayer/src/store.js";
import { RelaySubmitter } from "../../relayer/src/submitter.js";
import type { BridgeMessage, LogEntry } from "../../relayer/src/types.js";
import { blockHash, FakeChainReader, FakeChainWriter, ManualClock } from "./fakes.js";

export const L1_ID = 5;
export const L2_ID = 167;

export const l1Chain: ChainConfig = {
  name: "L1",
  chainId: L1_ID,
  rpcUrl: "http://127.0.0.1:8545",
  bridgeAddress: "0x1000000000000000000000000000000000000001",
  signalServiceAddress: "0x1000000000000000000000000000000000000002",
  crossChainSyncAddress: "0x1000000000000000000000000000000000000003",
  rollupAddress: "0x1000000000000000000000000000000000000003",
  startBlock: 0,
  confirmations: 1,
};

export const l2Chain: ChainConfig = {
  name: "L2",
  chainId: L2_ID,
  rpcUrl: "http://127.0.0.1:9545",
  bridgeAddress: "0x2000000000000000000000000000000000000001",
  signalServiceAddress: "0x2000000000000000000000000000000000000002",
  crossChainSyncAddress: "0x2000000000000000000000000000000000000003",
  rollupAddress: null,
  startBlock: 0,
  confirmations: 2,
};

export const OWNER = "0x3000000000000000000000000000000000000001";

export function makeMessage(overrides: Partial<BridgeMessage> = {}): BridgeMessage {
  return {
    id: 1n,
    sender: "0x3000000000000000000000000000000000000002",
    srcChainId: BigInt(L1_ID),
    destChainId: BigInt(L2_ID),
    owner: OWNER,
    to: "0x3000000000000000000000000000000000000003",
    refundAddress: OWNER,
    depositValue: 1000n,
    callValue: 0n,
    processingFee: 10n,
    gasLimit: 100_000n,
    data: "0x",
    memo: "",
    ...overrides,
  };
}

export function txHashOf(label: string): string {
  return ethers.id(`tx:${label}`);
}

export interface LogPosition {
  txHash?: string;
  logIndex?: number;
  blockNumber?: number;
  blockHash?: string;
  msgHash?: string;
}

export function messageLog(
  chain: ChainConfig,
  message: BridgeMessage,
  position: LogPosition = {},
): LogEntry {
  const blockNumber = position.blockNumber ?? 10;
  const { data, topics } = bridgeInterface.encodeEventLog("MessageSent", [
    position.msgHash ?? hashMessage(message),
    message,
  ]);
  return {
    address: chain.bridgeAddress,
    topics,
    data,
    blockNumber,
    blockHash: position.blockHash ?? blockHash(chain.chainId, blockNumber),
    transactionHash: position.txHash ?? txHashOf(`msg-${message.id}`),
    logIndex: position.logIndex ?? 0,
  };
}

export const SIGNAL_ROOT = ethers.id("signal-root");

/**
 * Makes `log` provable on the counterpart: the source header exists, the
 * destination synced it, and the signal service holds the signal.
 */
export function makeRelayable(
  reader: FakeChainReader,
  source: ChainConfig,
  destination: ChainConfig,
  log: LogEntry,
  syncedHeight = log.blockNumber,
): void {
  const msgHash = log.topics[1];
  reader.addHeader(source.chainId, log.blockNumber, log.blockHash);
  const synced =
    syncedHeight === log.blockNumber
      ? reader.headers.get(`${source.chainId}:${log.blockNumber}`)
      : reader.addHeader(source.chainId, syncedHeight);
  reader.latestSynced.set(destination.chainId, syncedHeight);
  reader.syncedHashes.set(`${destination.chainId}:${syncedHeight}`, synced?.hash ?? ethers.ZeroHash);
  reader.setProof(source.chainId, source.signalServiceAddress, syncedHeight, {
    storageHash: SIGNAL_ROOT,
    storageProof: [
      { key: signalSlot(source.bridgeAddress, msgHash), value: 1n, proof: [] },
    ],
  });
}

export const DEFAULT_SETTINGS: PipelineSettings = {
  maxRetries: 5,
  baseMs: 1000,
  maxMs: 60_000,
  batchSize: 20,
  proofConcurrency: 2,
  submitConcurrency: 2,
};

export interface TestPipeline {
  ctx: PipelineContext;
  store: Store;
  reader: FakeChainReader;
  writer: FakeChainWriter;
  clock: ManualClock;
}

export function makePipeline(settings: Partial<PipelineSettings> = {}): TestPipeline {
  const store = createStore(":memory:");
  const reader = new FakeChainReader();
  const writer = new FakeChainWriter();
  const clock = new ManualClock();
  const ctx: PipelineContext = {
    chains: [l1Chain, l2Chain],
    settings: { ...DEFAULT_SETTINGS, ...settings },
    store,
    reader,
    proofs: new ProofBuilder(reader, store),
    submitter: new RelaySubmitter(writer),
    locks: new KeyedMutex(),
    clock,
  };
  return { ctx, store, reader, writer, clock };
}
