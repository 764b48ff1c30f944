import Database from "better-sqlite3";
import { IllegalTransitionError, canTransition } from "./state.js";
import type {
  EventRecord,
  EventStatus,
  EventType,
  NewEventRecord,
  RelayTransaction,
  SignalProof,
} from "./types.js";

export type RelayStage = "needs_proof" | "needs_submit" | "awaiting_confirmation";

export interface DueRelay {
  event: EventRecord;
  relay: RelayTransaction;
}

export type RelayUpdate = Partial<
  Omit<RelayTransaction, "eventId" | "destinationChainId" | "createdAt" | "updatedAt">
>;

export interface EventSchedule {
  attempts?: number;
  nextAttemptAt: number;
  error?: string | null;
}

export interface TransitionPatch {
  error?: string | null;
  relay?: RelayUpdate;
}

export interface Store {
  insertEventIfAbsent(event: NewEventRecord): { inserted: boolean; record: EventRecord };
  getEvent(id: number): EventRecord | undefined;
  getEventByKey(chainId: number, txHash: string, logIndex: number): EventRecord | undefined;
  listEventsByTx(chainId: number, txHash: string): EventRecord[];
  listEventsByOwner(owner: string, eventType: EventType, limit: number): EventRecord[];
  listDueEvents(statuses: EventStatus[], eventType: EventType, now: number, limit: number): EventRecord[];
  transition(id: number, from: EventStatus, to: EventStatus, patch?: TransitionPatch): boolean;
  startRelay(id: number, destinationChainId: number): boolean;
  scheduleEvent(id: number, schedule: EventSchedule): void;
  reanchorEvent(id: number, blockNumber: number, blockHash: string): boolean;

  getRelay(eventId: number): RelayTransaction | undefined;
  updateRelay(eventId: number, updates: RelayUpdate): void;
  claimRelay(eventId: number): boolean;
  releaseRelay(eventId: number): void;
  resetInFlight(): number;
  listDueRelays(stage: RelayStage, now: number, limit: number): DueRelay[];

  getCachedProof(chainId: number, height: number, signalKey: string): SignalProof | undefined;
  putCachedProof(chainId: number, height: number, signalKey: string, proof: SignalProof): void;

  getCursor(chainId: number): number | undefined;
  setCursor(chainId: number, lastBlock: number): void;

  countByStatus(): Record<string, number>;
  close(): void;
}

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS events (
  id                    INTEGER PRIMARY KEY AUTOINCREMENT,
  chain_id              INTEGER NOT NULL,
  event_type            TEXT NOT NULL,
  emitter               TEXT NOT NULL,
  tx_hash               TEXT NOT NULL,
  log_index             INTEGER NOT NULL,
  block_number          INTEGER NOT NULL,
  block_hash            TEXT NOT NULL,

  message_owner         TEXT,
  signal_key            TEXT,
  destination_chain_id  INTEGER,

  raw_data              TEXT NOT NULL,
  status                TEXT NOT NULL DEFAULT 'new',
  error                 TEXT,
  attempts              INTEGER NOT NULL DEFAULT 0,
  next_attempt_at       INTEGER NOT NULL DEFAULT 0,

  created_at            TEXT NOT NULL,
  updated_at            TEXT NOT NULL,

  UNIQUE (chain_id, tx_hash, log_index)
);

CREATE INDEX IF NOT EXISTS idx_events_owner_type ON events(message_owner, event_type);
CREATE INDEX IF NOT EXISTS idx_events_status_due ON events(status, next_attempt_at);

CREATE TABLE IF NOT EXISTS relay_transactions (
  event_id              INTEGER PRIMARY KEY REFERENCES events(id),
  destination_chain_id  INTEGER NOT NULL,
  proof                 TEXT,
  proof_height          INTEGER,
  tx_hash               TEXT,
  signed_tx             TEXT,
  attempt_count         INTEGER NOT NULL DEFAULT 0,
  receipt_checks        INTEGER NOT NULL DEFAULT 0,
  last_error            TEXT,
  in_flight             INTEGER NOT NULL DEFAULT 0,
  next_attempt_at       INTEGER NOT NULL DEFAULT 0,
  submitted_at          TEXT,
  confirmed_at          TEXT,
  created_at            TEXT NOT NULL,
  updated_at            TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS signal_proofs (
  chain_id        INTEGER NOT NULL,
  height          INTEGER NOT NULL,
  signal_key      TEXT NOT NULL,
  encoded_header  TEXT NOT NULL,
  storage_proof   TEXT NOT NULL,
  signal_root     TEXT NOT NULL,
  encoded_proof   TEXT NOT NULL,
  created_at      TEXT NOT NULL,
  PRIMARY KEY (chain_id, height, signal_key)
);

CREATE TABLE IF NOT EXISTS cursors (
  chain_id    INTEGER PRIMARY KEY,
  last_block  INTEGER NOT NULL,
  updated_at  TEXT NOT NULL
);
`;

interface EventRow {
  id: number;
  chain_id: number;
  event_type: EventType;
  emitter: string;
  tx_hash: string;
  log_index: number;
  block_number: number;
  block_hash: string;
  message_owner: string | null;
  signal_key: string | null;
  destination_chain_id: number | null;
  raw_data: string;
  status: EventStatus;
  error: string | null;
  attempts: number;
  next_attempt_at: number;
  created_at: string;
  updated_at: string;
}

interface RelayRow {
  event_id: number;
  destination_chain_id: number;
  proof: string | null;
  proof_height: number | null;
  tx_hash: string | null;
  signed_tx: string | null;
  attempt_count: number;
  receipt_checks: number;
  last_error: string | null;
  in_flight: number;
  next_attempt_at: number;
  submitted_at: string | null;
  confirmed_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ProofRow {
  encoded_header: string;
  storage_proof: string;
  signal_root: string;
  encoded_proof: string;
}

function rowToEvent(row: EventRow): EventRecord {
  return {
    id: row.id,
    chainId: row.chain_id,
    eventType: row.event_type,
    emitter: row.emitter,
    txHash: row.tx_hash,
    logIndex: row.log_index,
    blockNumber: row.block_number,
    blockHash: row.block_hash,
    messageOwner: row.message_owner,
    signalKey: row.signal_key,
    destinationChainId: row.destination_chain_id,
    rawData: row.raw_data,
    status: row.status,
    error: row.error,
    attempts: row.attempts,
    nextAttemptAt: row.next_attempt_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToRelay(row: RelayRow): RelayTransaction {
  return {
    eventId: row.event_id,
    destinationChainId: row.destination_chain_id,
    proof: row.proof,
    proofHeight: row.proof_height,
    txHash: row.tx_hash,
    signedTx: row.signed_tx,
    attemptCount: row.attempt_count,
    receiptChecks: row.receipt_checks,
    lastError: row.last_error,
    inFlight: row.in_flight === 1,
    nextAttemptAt: row.next_attempt_at,
    submittedAt: row.submitted_at,
    confirmedAt: row.confirmed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const RELAY_COLUMNS: [keyof RelayUpdate, string][] = [
  ["proof", "proof"],
  ["proofHeight", "proof_height"],
  ["txHash", "tx_hash"],
  ["signedTx", "signed_tx"],
  ["attemptCount", "attempt_count"],
  ["receiptChecks", "receipt_checks"],
  ["lastError", "last_error"],
  ["inFlight", "in_flight"],
  ["nextAttemptAt", "next_attempt_at"],
  ["submittedAt", "submitted_at"],
  ["confirmedAt", "confirmed_at"],
];

// Proof retries are scheduled on the event, submission and confirmation
// re-checks on the relay transaction.
const STAGE_FILTERS: Record<RelayStage, { status: EventStatus; condition: string; due: string }> = {
  needs_proof: {
    status: "proof_pending",
    condition: "r.proof IS NULL",
    due: "e.next_attempt_at",
  },
  needs_submit: {
    status: "proof_pending",
    condition: "r.proof IS NOT NULL AND r.in_flight = 0",
    due: "r.next_attempt_at",
  },
  awaiting_confirmation: {
    status: "relayed",
    condition: "r.tx_hash IS NOT NULL",
    due: "r.next_attempt_at",
  },
};

export function createStore(dbPath: string): Store {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(CREATE_TABLES);

  const insertEventStmt = db.prepare(`
    INSERT INTO events (
      chain_id, event_type, emitter, tx_hash, log_index, block_number, block_hash,
      message_owner, signal_key, destination_chain_id,
      raw_data, status, created_at, updated_at
    ) VALUES (
      @chainId, @eventType, @emitter, @txHash, @logIndex, @blockNumber, @blockHash,
      @messageOwner, @signalKey, @destinationChainId,
      @rawData, 'new', @now, @now
    )
    ON CONFLICT (chain_id, tx_hash, log_index) DO NOTHING
  `);

  const getEventStmt = db.prepare("SELECT * FROM events WHERE id = ?");
  const getEventByKeyStmt = db.prepare(
    "SELECT * FROM events WHERE chain_id = ? AND tx_hash = ? AND log_index = ?",
  );
  const getRelayStmt = db.prepare("SELECT * FROM relay_transactions WHERE event_id = ?");

  const countStmt = db.prepare(
    "SELECT status, COUNT(*) as cnt FROM events GROUP BY status",
  );

  function getEvent(id: number): EventRecord | undefined {
    const row = getEventStmt.get(id) as EventRow | undefined;
    return row ? rowToEvent(row) : undefined;
  }

  function updateRelay(eventId: number, updates: RelayUpdate): void {
    const sets: string[] = ["updated_at = @updated_at"];
    const params: Record<string, unknown> = {
      updated_at: new Date().toISOString(),
      event_id: eventId,
    };

    for (const [key, col] of RELAY_COLUMNS) {
      const value = updates[key];
      if (value !== undefined) {
        sets.push(`${col} = @${key}`);
        params[key] = typeof value === "boolean" ? Number(value) : value;
      }
    }

    const sql = `UPDATE relay_transactions SET ${sets.join(", ")} WHERE event_id = @event_id`;
    db.prepare(sql).run(params);
  }

  const transition = db.transaction(
    (id: number, from: EventStatus, to: EventStatus, patch: TransitionPatch): boolean => {
      if (!canTransition(from, to)) {
        throw new IllegalTransitionError(id, from, to);
      }
      const result = db
        .prepare(
          `UPDATE events SET status = @to, error = COALESCE(@error, error), updated_at = @now
           WHERE id = @id AND status = @from`,
        )
        .run({
          id,
          from,
          to,
          error: patch.error ?? null,
          now: new Date().toISOString(),
        });
      if (result.changes !== 1) {
        return false;
      }
      if (patch.relay) {
        updateRelay(id, patch.relay);
      }
      return true;
    },
  );

  const startRelay = db.transaction((id: number, destinationChainId: number): boolean => {
    if (!transition(id, "new", "proof_pending", {})) {
      return false;
    }
    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO relay_transactions (event_id, destination_chain_id, created_at, updated_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT (event_id) DO NOTHING`,
    ).run(id, destinationChainId, now, now);
    return true;
  });

  return {
    insertEventIfAbsent(event: NewEventRecord): { inserted: boolean; record: EventRecord } {
      const result = insertEventStmt.run({
        ...event,
        now: new Date().toISOString(),
      });
      const row = getEventByKeyStmt.get(event.chainId, event.txHash, event.logIndex) as EventRow;
      return { inserted: result.changes === 1, record: rowToEvent(row) };
    },

    getEvent,

    getEventByKey(chainId: number, txHash: string, logIndex: number): EventRecord | undefined {
      const row = getEventByKeyStmt.get(chainId, txHash, logIndex) as EventRow | undefined;
      return row ? rowToEvent(row) : undefined;
    },

    listEventsByTx(chainId: number, txHash: string): EventRecord[] {
      const rows = db
        .prepare("SELECT * FROM events WHERE chain_id = ? AND tx_hash = ? ORDER BY log_index ASC")
        .all(chainId, txHash) as EventRow[];
      return rows.map(rowToEvent);
    },

    listEventsByOwner(owner: string, eventType: EventType, limit: number): EventRecord[] {
      const rows = db
        .prepare(
          "SELECT * FROM events WHERE message_owner = ? AND event_type = ? ORDER BY id DESC LIMIT ?",
        )
        .all(owner, eventType, limit) as EventRow[];
      return rows.map(rowToEvent);
    },

    listDueEvents(
      statuses: EventStatus[],
      eventType: EventType,
      now: number,
      limit: number,
    ): EventRecord[] {
      const placeholders = statuses.map(() => "?").join(", ");
      const sql = `SELECT * FROM events
        WHERE status IN (${placeholders}) AND event_type = ? AND next_attempt_at <= ?
        ORDER BY id ASC LIMIT ?`;
      const rows = db.prepare(sql).all(...statuses, eventType, now, limit) as EventRow[];
      return rows.map(rowToEvent);
    },

    transition(id: number, from: EventStatus, to: EventStatus, patch: TransitionPatch = {}): boolean {
      return transition(id, from, to, patch);
    },

    startRelay(id: number, destinationChainId: number): boolean {
      return startRelay(id, destinationChainId);
    },

    scheduleEvent(id: number, schedule: EventSchedule): void {
      db.prepare(
        `UPDATE events SET
           attempts = COALESCE(@attempts, attempts),
           next_attempt_at = @nextAttemptAt,
           error = COALESCE(@error, error),
           updated_at = @now
         WHERE id = @id`,
      ).run({
        id,
        attempts: schedule.attempts ?? null,
        nextAttemptAt: schedule.nextAttemptAt,
        error: schedule.error ?? null,
        now: new Date().toISOString(),
      });
    },

    reanchorEvent(id: number, blockNumber: number, blockHash: string): boolean {
      const result = db
        .prepare(
          `UPDATE events SET block_number = ?, block_hash = ?, updated_at = ?
           WHERE id = ? AND status IN ('new', 'proof_pending')`,
        )
        .run(blockNumber, blockHash, new Date().toISOString(), id);
      return result.changes === 1;
    },

    getRelay(eventId: number): RelayTransaction | undefined {
      const row = getRelayStmt.get(eventId) as RelayRow | undefined;
      return row ? rowToRelay(row) : undefined;
    },

    updateRelay,

    claimRelay(eventId: number): boolean {
      const result = db
        .prepare(
          "UPDATE relay_transactions SET in_flight = 1, updated_at = ? WHERE event_id = ? AND in_flight = 0",
        )
        .run(new Date().toISOString(), eventId);
      return result.changes === 1;
    },

    releaseRelay(eventId: number): void {
      db.prepare(
        "UPDATE relay_transactions SET in_flight = 0, updated_at = ? WHERE event_id = ?",
      ).run(new Date().toISOString(), eventId);
    },

    resetInFlight(): number {
      return db
        .prepare("UPDATE relay_transactions SET in_flight = 0 WHERE in_flight = 1")
        .run().changes;
    },

    listDueRelays(stage: RelayStage, now: number, limit: number): DueRelay[] {
      const { status, condition, due: dueColumn } = STAGE_FILTERS[stage];
      const rows = db
        .prepare(
          `SELECT r.event_id FROM relay_transactions r
           JOIN events e ON e.id = r.event_id
           WHERE e.status = ? AND ${condition} AND ${dueColumn} <= ?
           ORDER BY r.event_id ASC LIMIT ?`,
        )
        .all(status, now, limit) as { event_id: number }[];

      const due: DueRelay[] = [];
      for (const { event_id } of rows) {
        const eventRow = getEventStmt.get(event_id) as EventRow | undefined;
        const relayRow = getRelayStmt.get(event_id) as RelayRow | undefined;
        if (eventRow && relayRow) {
          due.push({ event: rowToEvent(eventRow), relay: rowToRelay(relayRow) });
        }
      }
      return due;
    },

    getCachedProof(chainId: number, height: number, signalKey: string): SignalProof | undefined {
      const row = db
        .prepare(
          "SELECT * FROM signal_proofs WHERE chain_id = ? AND height = ? AND signal_key = ?",
        )
        .get(chainId, height, signalKey) as ProofRow | undefined;
      if (!row) return undefined;
      return {
        encodedHeader: row.encoded_header,
        storageProof: row.storage_proof,
        signalRoot: row.signal_root,
        encodedProof: row.encoded_proof,
      };
    },

    putCachedProof(chainId: number, height: number, signalKey: string, proof: SignalProof): void {
      db.prepare(
        `INSERT INTO signal_proofs (
           chain_id, height, signal_key, encoded_header, storage_proof, signal_root, encoded_proof, created_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (chain_id, height, signal_key) DO NOTHING`,
      ).run(
        chainId,
        height,
        signalKey,
        proof.encodedHeader,
        proof.storageProof,
        proof.signalRoot,
        proof.encodedProof,
        new Date().toISOString(),
      );
    },

    getCursor(chainId: number): number | undefined {
      const row = db
        .prepare("SELECT last_block FROM cursors WHERE chain_id = ?")
        .get(chainId) as { last_block: number } | undefined;
      return row?.last_block;
    },

    setCursor(chainId: number, lastBlock: number): void {
      db.prepare(
        `INSERT INTO cursors (chain_id, last_block, updated_at) VALUES (?, ?, ?)
         ON CONFLICT (chain_id) DO UPDATE SET last_block = excluded.last_block, updated_at = excluded.updated_at`,
      ).run(chainId, lastBlock, new Date().toISOString());
    },

    countByStatus(): Record<string, number> {
      const rows = countStmt.all() as { status: string; cnt: number }[];
      const result: Record<string, number> = {};
      for (const row of rows) {
        result[row.status] = row.cnt;
      }
      return result;
    },

    close(): void {
      db.close();
    },
  };
}
