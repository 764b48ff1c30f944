import { ethers } from "ethers";
import type { CallOptions, ChainReader } from "./chain.js";
import type { ChainConfig } from "./config.js";
import { recordKey } from "./context.js";
import { decodeBridgeEvent, toEventRecord, WATCHED_TOPICS } from "./events.js";
import type { Store } from "./store.js";
import type { BridgeEvent, EventRecord, EventType, LogEntry } from "./types.js";

export type IngestResult =
  | { outcome: "inserted"; record: EventRecord }
  | { outcome: "duplicate"; record: EventRecord }
  | { outcome: "reanchored"; record: EventRecord }
  | { outcome: "ignored"; reason: string };

function expectedEmitter(chain: ChainConfig, type: EventType): string | null {
  return type === "MessageSent" ? chain.bridgeAddress : chain.rollupAddress;
}

/**
 * Stores one log. Safe to call any number of times for the same log: the
 * (chain, tx, log index) key is inserted at most once.
 */
export function ingestLog(store: Store, chain: ChainConfig, log: LogEntry): IngestResult {
  let event: BridgeEvent | null;
  try {
    event = decodeBridgeEvent(log);
  } catch (err) {
    console.error(`Undecodable log ${log.transactionHash}:${log.logIndex} on chain ${chain.chainId}:`, err);
    return { outcome: "ignored", reason: "undecodable" };
  }
  if (!event) {
    return { outcome: "ignored", reason: "not a watched event" };
  }

  const emitter = expectedEmitter(chain, event.type);
  if (!emitter || ethers.getAddress(log.address) !== emitter) {
    return { outcome: "ignored", reason: `unexpected emitter ${log.address}` };
  }

  const { inserted, record } = store.insertEventIfAbsent(
    toEventRecord(chain.chainId, log, event),
  );
  if (inserted) {
    return { outcome: "inserted", record };
  }

  // Same log re-delivered from a block that replaced the one we saw
  if (record.blockHash.toLowerCase() !== log.blockHash.toLowerCase()) {
    if (store.reanchorEvent(record.id, log.blockNumber, log.blockHash)) {
      console.warn(
        `Re-anchored ${recordKey(record)} from block ${record.blockHash} to ${log.blockHash}`,
      );
      const updated = store.getEvent(record.id) ?? record;
      return { outcome: "reanchored", record: updated };
    }
  }
  return { outcome: "duplicate", record };
}

export interface IndexerOptions extends CallOptions {
  maxLogRange: number;
}

/**
 * Ingests the next range of confirmed blocks for one chain and advances its
 * cursor. Returns the number of blocks still behind the safe head.
 */
export async function indexChainOnce(
  store: Store,
  reader: ChainReader,
  chain: ChainConfig,
  opts: IndexerOptions,
): Promise<number> {
  const callOpts: CallOptions = { signal: opts.signal, timeoutMs: opts.timeoutMs };
  const cursor = store.getCursor(chain.chainId) ?? chain.startBlock - 1;
  const head = await reader.getBlockNumber(chain.chainId, callOpts);
  const safeHead = head - chain.confirmations + 1;
  if (safeHead <= cursor) {
    return 0;
  }

  const fromBlock = cursor + 1;
  const toBlock = Math.min(safeHead, fromBlock + opts.maxLogRange - 1);
  const addresses = [chain.bridgeAddress];
  if (chain.rollupAddress) {
    addresses.push(chain.rollupAddress);
  }

  const logs = await reader.getLogs(
    chain.chainId,
    { addresses, topics: [WATCHED_TOPICS], fromBlock, toBlock },
    callOpts,
  );

  let inserted = 0;
  for (const log of logs) {
    if (ingestLog(store, chain, log).outcome === "inserted") {
      inserted++;
    }
  }
  store.setCursor(chain.chainId, toBlock);

  if (inserted > 0) {
    console.log(
      `Indexed ${inserted} new events on ${chain.name} (chain ${chain.chainId}) blocks ${fromBlock}-${toBlock}`,
    );
  }
  return safeHead - toBlock;
}
