import express, { type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { ethers } from "ethers";
import type { ChainReader } from "./chain.js";
import { chainById, type ChainConfig } from "./config.js";
import { ingestLog } from "./indexer.js";
import type { Store } from "./store.js";
import { EVENT_TYPES, type EventRecord, type EventType } from "./types.js";

const TX_HASH_REGEX = /^0x[a-fA-F0-9]{64}$/;
const LIST_LIMIT = 100;

export interface ApiDeps {
  chains: ChainConfig[];
  store: Store;
  reader: ChainReader;
}

function isEventType(value: unknown): value is EventType {
  return typeof value === "string" && EVENT_TYPES.some((type) => type === value);
}

function param(req: Request, name: string): string {
  const raw: unknown = req.params[name];
  return Array.isArray(raw) ? String(raw[0]) : String(raw);
}

function present(store: Store, event: EventRecord) {
  const relay = store.getRelay(event.id);
  return {
    chainId: event.chainId,
    eventType: event.eventType,
    emitter: event.emitter,
    txHash: event.txHash,
    logIndex: event.logIndex,
    blockNumber: event.blockNumber,
    messageOwner: event.messageOwner,
    signalKey: event.signalKey,
    destinationChainId: event.destinationChainId,
    status: event.status,
    error: event.error,
    createdAt: event.createdAt,
    updatedAt: event.updatedAt,
    relay: relay
      ? {
          destinationChainId: relay.destinationChainId,
          txHash: relay.txHash,
          attemptCount: relay.attemptCount,
          lastError: relay.lastError,
          proofHeight: relay.proofHeight,
          submittedAt: relay.submittedAt,
          confirmedAt: relay.confirmedAt,
        }
      : null,
  };
}

export function createApiServer({ chains, store, reader }: ApiDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use(
    rateLimit({
      windowMs: 1000,
      limit: 10,
      standardHeaders: "draft-7",
      legacyHeaders: false,
    }),
  );

  app.post("/relay", async (req: Request, res: Response) => {
    try {
      const { chainId, txHash } = req.body ?? {};

      const chain = typeof chainId === "number" ? chainById({ chains }, chainId) : undefined;
      if (!chain) {
        res.status(400).json({ error: "Invalid chainId" });
        return;
      }

      if (typeof txHash !== "string" || !TX_HASH_REGEX.test(txHash)) {
        res.status(400).json({ error: "Invalid txHash format" });
        return;
      }

      const normalizedTxHash = txHash.toLowerCase();
      const receipt = await reader.getTransactionReceipt(chain.chainId, normalizedTxHash);
      if (!receipt) {
        res.status(404).json({ error: "Transaction not found" });
        return;
      }

      // Same idempotent path as the indexer
      let created = 0;
      const events: ReturnType<typeof present>[] = [];
      for (const log of receipt.logs) {
        const result = ingestLog(store, chain, log);
        if (result.outcome === "ignored") continue;
        if (result.outcome === "inserted") created++;
        events.push(present(store, result.record));
      }

      if (events.length === 0) {
        res.status(404).json({ error: "No bridge events in transaction" });
        return;
      }

      res.status(created > 0 ? 201 : 200).json({ txHash: normalizedTxHash, events });
    } catch (err) {
      console.error("POST /relay error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/events", (req: Request, res: Response) => {
    const { owner, eventType = "MessageSent" } = req.query;

    if (typeof owner !== "string" || !ethers.isAddress(owner)) {
      res.status(400).json({ error: "Invalid owner" });
      return;
    }
    if (!isEventType(eventType)) {
      res.status(400).json({ error: "Invalid eventType" });
      return;
    }

    const events = store.listEventsByOwner(owner.toLowerCase(), eventType, LIST_LIMIT);
    res.status(200).json({ events: events.map((event) => present(store, event)) });
  });

  app.get("/events/:chainId/:txHash", (req: Request, res: Response) => {
    const chainId = Number(param(req, "chainId"));
    const txHash = param(req, "txHash").toLowerCase();
    if (!Number.isSafeInteger(chainId) || !TX_HASH_REGEX.test(txHash)) {
      res.status(400).json({ error: "Invalid chainId or txHash" });
      return;
    }

    const events = store.listEventsByTx(chainId, txHash);
    if (events.length === 0) {
      res.status(404).json({ error: "Events not found" });
      return;
    }
    res.status(200).json({ events: events.map((event) => present(store, event)) });
  });

  app.get("/health", (_req: Request, res: Response) => {
    try {
      const counts = store.countByStatus();
      res.status(200).json({
        status: "healthy",
        events: counts,
      });
    } catch (err) {
      console.error("GET /health error:", err);
      res.status(500).json({ status: "unhealthy" });
    }
  });

  return app;
}
