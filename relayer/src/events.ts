import { ethers } from "ethers";
import {
  BLOCK_PROPOSED_TOPIC0,
  BLOCK_VERIFIED_TOPIC0,
  MESSAGE_SENT_TOPIC0,
  bridgeInterface,
  rollupInterface,
} from "./abis.js";
import { EncodingError } from "./errors.js";
import type {
  BridgeEvent,
  BridgeMessage,
  EventType,
  LogEntry,
  NewEventRecord,
} from "./types.js";

export const WATCHED_TOPICS = [
  MESSAGE_SENT_TOPIC0,
  BLOCK_PROPOSED_TOPIC0,
  BLOCK_VERIFIED_TOPIC0,
];

const TOPIC_TYPES = new Map<string, EventType>([
  [MESSAGE_SENT_TOPIC0, "MessageSent"],
  [BLOCK_PROPOSED_TOPIC0, "BlockProposed"],
  [BLOCK_VERIFIED_TOPIC0, "BlockVerified"],
]);

export interface RawLog {
  topics: string[];
  data: string;
}

function toMessage(m: ethers.Result): BridgeMessage {
  return {
    id: m.id,
    sender: m.sender,
    srcChainId: m.srcChainId,
    destChainId: m.destChainId,
    owner: m.owner,
    to: m.to,
    refundAddress: m.refundAddress,
    depositValue: m.depositValue,
    callValue: m.callValue,
    processingFee: m.processingFee,
    gasLimit: m.gasLimit,
    data: m.data,
    memo: m.memo,
  };
}

export function eventTypeOf(log: RawLog): EventType | undefined {
  return log.topics.length > 0 ? TOPIC_TYPES.get(log.topics[0]) : undefined;
}

/** Decodes a watched log; returns null for anything else. */
export function decodeBridgeEvent(log: RawLog): BridgeEvent | null {
  const type = eventTypeOf(log);
  if (!type) return null;

  try {
    if (type === "MessageSent") {
      const parsed = bridgeInterface.parseLog(log);
      if (!parsed) return null;
      return {
        type,
        msgHash: parsed.args.msgHash,
        message: toMessage(parsed.args.message),
      };
    }

    const parsed = rollupInterface.parseLog(log);
    if (!parsed) return null;
    if (type === "BlockProposed") {
      return {
        type,
        id: parsed.args.id,
        txListHash: parsed.args.meta.txListHash,
        beneficiary: parsed.args.meta.beneficiary,
        gasLimit: parsed.args.meta.gasLimit,
        timestamp: parsed.args.meta.timestamp,
      };
    }
    return { type, id: parsed.args.id, blockHash: parsed.args.blockHash };
  } catch (err) {
    throw new EncodingError(`malformed ${type} log`, { cause: err });
  }
}

export function serializeRawLog(log: RawLog): string {
  return JSON.stringify({ topics: log.topics, data: log.data });
}

export function parseRawLog(rawData: string): RawLog {
  const parsed: unknown = JSON.parse(rawData);
  if (
    !parsed ||
    typeof parsed !== "object" ||
    !("topics" in parsed) ||
    !("data" in parsed) ||
    !Array.isArray(parsed.topics) ||
    typeof parsed.data !== "string"
  ) {
    throw new EncodingError("stored raw_data is not a log");
  }
  return { topics: parsed.topics.map(String), data: parsed.data };
}

/** Builds the record stored for a decoded log. */
export function toEventRecord(
  chainId: number,
  log: LogEntry,
  event: BridgeEvent,
): NewEventRecord {
  const isMessage = event.type === "MessageSent";
  return {
    chainId,
    eventType: event.type,
    emitter: ethers.getAddress(log.address),
    txHash: log.transactionHash.toLowerCase(),
    logIndex: log.logIndex,
    blockNumber: log.blockNumber,
    blockHash: log.blockHash,
    messageOwner: isMessage ? event.message.owner.toLowerCase() : null,
    signalKey: isMessage ? event.msgHash : null,
    destinationChainId: isMessage ? Number(event.message.destChainId) : null,
    rawData: serializeRawLog(log),
  };
}
