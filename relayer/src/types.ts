export type EventType = "MessageSent" | "BlockProposed" | "BlockVerified";

export const EVENT_TYPES: readonly EventType[] = [
  "MessageSent",
  "BlockProposed",
  "BlockVerified",
];

export type EventStatus =
  | "new"
  | "proof_pending"
  | "relayed"
  | "confirmed"
  | "failed"
  | "invalidated";

export interface EventRecord {
  id: number;
  chainId: number;
  eventType: EventType;
  emitter: string;
  txHash: string; // 0x-prefixed lowercase
  logIndex: number;
  blockNumber: number;
  blockHash: string;

  // MessageSent only
  messageOwner: string | null;
  signalKey: string | null;
  destinationChainId: number | null;

  rawData: string; // JSON of the decoded event
  status: EventStatus;
  error: string | null;

  // Proof-stage retries; not_ready re-checks do not count
  attempts: number;
  nextAttemptAt: number; // epoch ms

  createdAt: string;
  updatedAt: string;
}

export type NewEventRecord = Omit<
  EventRecord,
  "id" | "status" | "error" | "attempts" | "nextAttemptAt" | "createdAt" | "updatedAt"
>;

export interface RelayTransaction {
  eventId: number;
  destinationChainId: number;
  proof: string | null;
  proofHeight: number | null;
  txHash: string | null;
  // Signed before broadcast; resent as-is until it lands or its nonce is taken
  signedTx: string | null;
  attemptCount: number;
  // Confirmation rounds that found no receipt
  receiptChecks: number;
  lastError: string | null;
  inFlight: boolean;
  nextAttemptAt: number;
  submittedAt: string | null;
  confirmedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface BlockHeader {
  parentHash: string;
  ommersHash: string;
  beneficiary: string;
  stateRoot: string;
  transactionsRoot: string;
  receiptsRoot: string;
  logsBloom: string[]; // 8 × bytes32
  difficulty: bigint;
  height: bigint;
  gasLimit: bigint;
  gasUsed: bigint;
  timestamp: bigint;
  extraData: string;
  mixHash: string;
  nonce: bigint;
  baseFeePerGas: bigint;
}

export interface SignalProof {
  encodedHeader: string;
  storageProof: string;
  signalRoot: string;
  encodedProof: string;
}

export interface LogEntry {
  address: string;
  topics: string[];
  data: string;
  blockNumber: number;
  blockHash: string;
  transactionHash: string;
  logIndex: number;
}

export interface LogFilter {
  addresses: string[];
  topics: (string | string[] | null)[];
  fromBlock: number;
  toBlock: number;
}

/** Bridge message as emitted in MessageSent and consumed by processMessage. */
export interface BridgeMessage {
  id: bigint;
  sender: string;
  srcChainId: bigint;
  destChainId: bigint;
  owner: string;
  to: string;
  refundAddress: string;
  depositValue: bigint;
  callValue: bigint;
  processingFee: bigint;
  gasLimit: bigint;
  data: string;
  memo: string;
}

export type BridgeEvent =
  | { type: "MessageSent"; msgHash: string; message: BridgeMessage }
  | {
      type: "BlockProposed";
      id: bigint;
      txListHash: string;
      beneficiary: string;
      gasLimit: bigint;
      timestamp: bigint;
    }
  | { type: "BlockVerified"; id: bigint; blockHash: string };
