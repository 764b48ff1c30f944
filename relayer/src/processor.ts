import {
  MESSAGE_STATUS_NEW,
  bridgeInterface,
} from "./abis.js";
import { runWithConcurrency } from "./concurrency.js";
import { chainById, type ChainConfig } from "./config.js";
import { recordKey, type PipelineContext } from "./context.js";
import { hashMessage } from "./encoding.js";
import {
  BlockNotSyncedError,
  EncodingError,
  RelayError,
  classifyError,
} from "./errors.js";
import { decodeBridgeEvent, parseRawLog } from "./events.js";
import { backoffDelay } from "./time.js";
import type { BridgeMessage, EventRecord } from "./types.js";

export function decodeMessage(event: EventRecord): BridgeMessage {
  const decoded = decodeBridgeEvent(parseRawLog(event.rawData));
  if (!decoded || decoded.type !== "MessageSent") {
    throw new EncodingError(`event ${event.id} does not hold a MessageSent log`);
  }
  return decoded.message;
}

/**
 * Applies a classified failure to a record that has not been relayed yet.
 * not_ready waits without spending the budget; retryable spends one attempt.
 */
export function handleEventError(ctx: PipelineContext, event: EventRecord, err: unknown): void {
  const { store, clock, settings } = ctx;
  const error = classifyError(err);
  const key = recordKey(event);

  switch (error.kind) {
    case "not_ready":
      store.scheduleEvent(event.id, {
        nextAttemptAt: clock.now() + settings.baseMs,
        error: error.message,
      });
      console.log(`Not ready ${key}: ${error.message}`);
      return;

    case "retryable": {
      const attempts = event.attempts + 1;
      if (attempts < settings.maxRetries) {
        store.scheduleEvent(event.id, {
          attempts,
          nextAttemptAt: clock.now() + backoffDelay(attempts, settings),
          error: error.message,
        });
        console.warn(`Retrying ${key} (attempt ${attempts}): ${error.message}`);
        return;
      }
      store.scheduleEvent(event.id, { attempts, nextAttemptAt: clock.now() });
      store.transition(event.id, event.status, "failed", {
        error: `retry budget exhausted: ${error.message}`,
      });
      console.error(`Giving up on ${key} after ${attempts} attempts: ${error.message}`);
      return;
    }

    case "permanent":
      store.transition(event.id, event.status, "failed", { error: error.message });
      console.error(`Permanent failure for ${key}: ${error.message}`);
      return;

    case "fatal":
      store.transition(event.id, event.status, "failed", { error: error.message });
      console.error(`Fatal error for ${key}:`, error, error.cause);
      return;
  }
}

/** False when the block the event was seen in is no longer canonical. */
export async function isCanonical(ctx: PipelineContext, event: EventRecord): Promise<boolean> {
  const header = await ctx.reader.getHeader(event.chainId, event.blockNumber, {
    signal: ctx.signal,
  });
  return header.hash.toLowerCase() === event.blockHash.toLowerCase();
}

function invalidate(ctx: PipelineContext, event: EventRecord): void {
  ctx.store.transition(event.id, event.status, "invalidated", {
    error: `block ${event.blockHash} at height ${event.blockNumber} is no longer canonical`,
  });
  console.warn(`Invalidated ${recordKey(event)}: source block reorged out`);
}

/** Bridge.getMessageStatus for `msgHash` on the destination chain. */
export async function destinationStatus(
  ctx: PipelineContext,
  destination: ChainConfig,
  msgHash: string,
): Promise<bigint> {
  const data = await ctx.reader.call(
    destination.chainId,
    destination.bridgeAddress,
    bridgeInterface.encodeFunctionData("getMessageStatus", [msgHash]),
    undefined,
    { signal: ctx.signal },
  );
  const [status] = bridgeInterface.decodeFunctionResult("getMessageStatus", data);
  return BigInt(status);
}

/** new -> proof_pending for a message that should be relayed. */
async function admitOne(ctx: PipelineContext, eventId: number): Promise<void> {
  const event = ctx.store.getEvent(eventId);
  if (!event || event.status !== "new") {
    return;
  }
  const key = recordKey(event);

  try {
    if (!(await isCanonical(ctx, event))) {
      invalidate(ctx, event);
      return;
    }

    const message = decodeMessage(event);
    if (!event.signalKey || hashMessage(message).toLowerCase() !== event.signalKey.toLowerCase()) {
      throw new RelayError("permanent", `message hash mismatch for ${key}`);
    }

    const destination = chainById(ctx, Number(message.destChainId));
    if (!destination || destination.chainId === event.chainId) {
      throw new RelayError("permanent", `unsupported destination chain ${message.destChainId}`);
    }

    const status = await destinationStatus(ctx, destination, event.signalKey);
    if (status !== MESSAGE_STATUS_NEW) {
      throw new RelayError(
        "permanent",
        `already relayed: message status ${status} on chain ${destination.chainId}`,
      );
    }

    if (ctx.store.startRelay(event.id, destination.chainId)) {
      console.log(`Relay started for ${key} -> chain ${destination.chainId}`);
    }
  } catch (err) {
    handleEventError(ctx, event, err);
  }
}

/** Builds the proof for a proof_pending record and stores it on its relay. */
async function proveOne(ctx: PipelineContext, eventId: number): Promise<void> {
  const event = ctx.store.getEvent(eventId);
  const relay = ctx.store.getRelay(eventId);
  if (!event || !relay || event.status !== "proof_pending" || relay.proof) {
    return;
  }
  const key = recordKey(event);

  try {
    if (!(await isCanonical(ctx, event))) {
      invalidate(ctx, event);
      return;
    }

    const source = chainById(ctx, event.chainId);
    const destination = chainById(ctx, relay.destinationChainId);
    if (!source || !destination || !event.signalKey) {
      throw new RelayError("fatal", `relay for ${key} references an unknown chain or signal`);
    }

    const opts = { signal: ctx.signal };
    const synced = await ctx.proofs.latestSyncedHeight(opts, destination);
    if (synced < event.blockNumber) {
      throw new BlockNotSyncedError(destination.chainId, BigInt(event.blockNumber));
    }

    const proof = await ctx.proofs.buildSignalProof(
      opts,
      {
        chainId: source.chainId,
        signalServiceAddress: source.signalServiceAddress,
        appAddress: source.bridgeAddress,
      },
      destination,
      event.signalKey,
      { height: synced },
    );

    ctx.store.updateRelay(event.id, {
      proof: proof.encodedProof,
      proofHeight: synced,
      nextAttemptAt: 0,
    });
    console.log(`Proof built for ${key} at height ${synced}`);
  } catch (err) {
    handleEventError(ctx, event, err);
  }
}

export async function processNewEvents(ctx: PipelineContext): Promise<number> {
  const due = ctx.store.listDueEvents(
    ["new"],
    "MessageSent",
    ctx.clock.now(),
    ctx.settings.batchSize,
  );
  await runWithConcurrency(due, ctx.settings.proofConcurrency, (event) =>
    ctx.locks.runExclusive(recordKey(event), () => admitOne(ctx, event.id)),
  );
  return due.length;
}

export async function processProofs(ctx: PipelineContext): Promise<number> {
  const due = ctx.store.listDueRelays("needs_proof", ctx.clock.now(), ctx.settings.batchSize);
  await runWithConcurrency(due, ctx.settings.proofConcurrency, ({ event }) =>
    ctx.locks.runExclusive(recordKey(event), () => proveOne(ctx, event.id)),
  );
  return due.length;
}
