import type { ChainReader } from "./chain.js";
import type { KeyedMutex } from "./concurrency.js";
import type { ChainConfig } from "./config.js";
import type { ProofBuilder } from "./proof.js";
import type { Store } from "./store.js";
import type { RelaySubmitter } from "./submitter.js";
import type { BackoffPolicy, Clock } from "./time.js";
import type { EventRecord } from "./types.js";

export interface PipelineSettings extends BackoffPolicy {
  maxRetries: number;
  batchSize: number;
  proofConcurrency: number;
  submitConcurrency: number;
}

/**
 * Everything a worker step needs. Workers share no state beyond the store;
 * the lock map only keeps two steps of this process off the same record.
 */
export interface PipelineContext {
  chains: ChainConfig[];
  settings: PipelineSettings;
  store: Store;
  reader: ChainReader;
  proofs: ProofBuilder;
  submitter: RelaySubmitter;
  locks: KeyedMutex;
  clock: Clock;
  signal?: AbortSignal;
}

export function recordKey(event: Pick<EventRecord, "chainId" | "txHash" | "logIndex">): string {
  return `${event.chainId}:${event.txHash}:${event.logIndex}`;
}
