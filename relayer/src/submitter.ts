import { bridgeInterface, MESSAGE_STATUS_DONE } from "./abis.js";
import type { CallOptions, ChainWriter, SignedTransaction } from "./chain.js";
import { KeyedMutex, runWithConcurrency } from "./concurrency.js";
import { chainById } from "./config.js";
import { recordKey, type PipelineContext } from "./context.js";
import { RelayError, RevertError, classifyError, isNonceExpired } from "./errors.js";
import { decodeMessage, destinationStatus } from "./processor.js";
import { backoffDelay } from "./time.js";
import type { RelayUpdate } from "./store.js";
import type { BridgeMessage, EventRecord } from "./types.js";

export interface RelayRequest {
  destinationChainId: number;
  // Bridge on the destination chain
  target: string;
  message: BridgeMessage;
  encodedProof: string;
}

// Rejections that no amount of retrying will fix. Some nodes return these
// as plain errors instead of call exceptions.
const PERMANENT_REJECTIONS =
  /already relayed|B_STATUS_MISMATCH|B_SIGNAL_NOT_RECEIVED|invalid proof|B_FORBIDDEN|B_WRONG_CHAIN_ID/i;

export function classifySubmitError(err: unknown): RelayError {
  const classified = classifyError(err);
  if (classified instanceof RevertError) {
    return classified;
  }
  if (PERMANENT_REJECTIONS.test(classified.message)) {
    return new RevertError(null, classified.message, { cause: err });
  }
  return classified;
}

export class RelaySubmitter {
  // One sign-then-broadcast per chain at a time: each signs over the
  // pending nonce the previous one left.
  private readonly nonceLocks = new KeyedMutex();

  constructor(private readonly writer: ChainWriter) {}

  /**
   * Signs processMessage(message, proof) for the destination bridge and
   * broadcasts it. `onSigned` sees the signed transaction before it is sent.
   */
  submit(
    ctx: CallOptions,
    request: RelayRequest,
    onSigned?: (signed: SignedTransaction) => void,
  ): Promise<string> {
    const data = bridgeInterface.encodeFunctionData("processMessage", [
      request.message,
      request.encodedProof,
    ]);
    return this.nonceLocks.runExclusive(String(request.destinationChainId), async () => {
      let signed: SignedTransaction;
      try {
        signed = await this.writer.sign(
          request.destinationChainId,
          { to: request.target, data },
          ctx,
        );
      } catch (err) {
        throw classifySubmitError(err);
      }
      onSigned?.(signed);
      return this.resend(ctx, request.destinationChainId, signed.raw);
    });
  }

  /** Broadcasts an already signed transaction again. */
  async resend(ctx: CallOptions, destinationChainId: number, signedTx: string): Promise<string> {
    try {
      return await this.writer.broadcast(destinationChainId, signedTx, ctx);
    } catch (err) {
      throw classifySubmitError(err);
    }
  }
}

function failRelay(
  ctx: PipelineContext,
  event: EventRecord,
  update: RelayUpdate,
  error: string,
): void {
  ctx.store.transition(event.id, event.status, "failed", {
    error,
    relay: { ...update, lastError: error },
  });
}

/**
 * Settles a transaction signed in an earlier round whose broadcast went
 * unanswered. It is resent unchanged, so a record never has two
 * transactions in flight.
 */
async function resumeSigned(
  ctx: PipelineContext,
  eventId: number,
  chainId: number,
  txHash: string,
  signedTx: string,
): Promise<string> {
  const opts = { signal: ctx.signal };
  if (await ctx.reader.getTransactionReceipt(chainId, txHash, opts)) {
    return txHash;
  }
  try {
    return await ctx.submitter.resend(opts, chainId, signedTx);
  } catch (err) {
    if (!isNonceExpired(err)) {
      throw err;
    }
    // Its nonce is used: either it was mined just now or another transaction took it
    if (await ctx.reader.getTransactionReceipt(chainId, txHash, opts)) {
      return txHash;
    }
    ctx.store.updateRelay(eventId, { txHash: null, signedTx: null });
    throw new RelayError("retryable", `relay transaction ${txHash} was replaced before it was mined`, {
      cause: err,
    });
  }
}

async function submitOne(ctx: PipelineContext, eventId: number): Promise<void> {
  const { store, clock, settings } = ctx;

  // At most one submission per record in flight, across every worker
  if (!store.claimRelay(eventId)) {
    return;
  }

  try {
    const event = store.getEvent(eventId);
    const relay = store.getRelay(eventId);
    if (!event || !relay || event.status !== "proof_pending" || !relay.proof) {
      return;
    }
    const key = recordKey(event);
    const destination = chainById(ctx, relay.destinationChainId);
    if (!destination) {
      failRelay(ctx, event, {}, `unsupported destination chain ${relay.destinationChainId}`);
      return;
    }

    const attempt = relay.attemptCount + 1;
    try {
      const txHash =
        relay.txHash && relay.signedTx
          ? await resumeSigned(ctx, event.id, destination.chainId, relay.txHash, relay.signedTx)
          : await ctx.submitter.submit(
              { signal: ctx.signal },
              {
                destinationChainId: destination.chainId,
                target: destination.bridgeAddress,
                message: decodeMessage(event),
                encodedProof: relay.proof,
              },
              (signed) => store.updateRelay(event.id, { txHash: signed.hash, signedTx: signed.raw }),
            );

      store.transition(event.id, "proof_pending", "relayed", {
        relay: {
          txHash,
          attemptCount: attempt,
          lastError: null,
          nextAttemptAt: 0,
          submittedAt: new Date(clock.now()).toISOString(),
        },
      });
      console.log(`Submitted tx ${txHash} for ${key} (attempt ${attempt})`);
    } catch (err) {
      const error = classifySubmitError(err);
      console.error(`Submission failed for ${key} (attempt ${attempt}):`, error.message);

      if (error.kind === "not_ready") {
        store.updateRelay(event.id, {
          lastError: error.message,
          nextAttemptAt: clock.now() + settings.baseMs,
        });
      } else if (error.kind === "retryable" && attempt < settings.maxRetries) {
        store.updateRelay(event.id, {
          attemptCount: attempt,
          lastError: error.message,
          nextAttemptAt: clock.now() + backoffDelay(attempt, settings),
        });
      } else {
        failRelay(ctx, event, { attemptCount: attempt }, error.message);
        console.error(`Relay failed for ${key}: ${error.message}`);
      }
    }
  } finally {
    store.releaseRelay(eventId);
  }
}

/** Submits every proof_pending record whose proof is built and retry is due. */
export async function processSubmissions(ctx: PipelineContext): Promise<number> {
  const due = ctx.store.listDueRelays("needs_submit", ctx.clock.now(), ctx.settings.batchSize);
  await runWithConcurrency(due, ctx.settings.submitConcurrency, ({ event }) =>
    ctx.locks.runExclusive(recordKey(event), () => submitOne(ctx, event.id)),
  );
  return due.length;
}

async function confirmOne(ctx: PipelineContext, eventId: number): Promise<void> {
  const { store, reader, clock, settings } = ctx;
  const event = store.getEvent(eventId);
  const relay = store.getRelay(eventId);
  if (!event || !relay || event.status !== "relayed" || !relay.txHash) {
    return;
  }
  const key = recordKey(event);
  const destination = chainById(ctx, relay.destinationChainId);
  if (!destination) {
    failRelay(ctx, event, {}, `unsupported destination chain ${relay.destinationChainId}`);
    return;
  }

  const recheck = (reason: string): void => {
    store.updateRelay(event.id, {
      lastError: reason,
      nextAttemptAt: clock.now() + settings.baseMs,
    });
  };

  try {
    const receipt = await reader.getTransactionReceipt(destination.chainId, relay.txHash, {
      signal: ctx.signal,
    });
    if (!receipt) {
      const checks = relay.receiptChecks + 1;
      if (checks < settings.maxRetries) {
        store.updateRelay(event.id, {
          receiptChecks: checks,
          lastError: `receipt for ${relay.txHash} not yet available`,
          nextAttemptAt: clock.now() + backoffDelay(checks, settings),
        });
        return;
      }

      // Dropped or replaced; the destination bridge knows whether the message landed
      const status = event.signalKey
        ? await destinationStatus(ctx, destination, event.signalKey)
        : null;
      if (status === MESSAGE_STATUS_DONE) {
        store.transition(event.id, "relayed", "confirmed", {
          relay: {
            receiptChecks: checks,
            confirmedAt: new Date(clock.now()).toISOString(),
            lastError: null,
          },
        });
        console.log(`Relay confirmed by message status: ${key}`);
        return;
      }
      failRelay(
        ctx,
        event,
        { receiptChecks: checks },
        `no receipt for relay transaction ${relay.txHash} after ${checks} checks; message status ${status ?? "unknown"} on chain ${destination.chainId}`,
      );
      console.error(`Relay tx ${relay.txHash} never mined for ${key}`);
      return;
    }
    if (receipt.status === 0) {
      failRelay(ctx, event, {}, `relay transaction ${relay.txHash} reverted`);
      console.error(`Relay tx ${relay.txHash} reverted for ${key}`);
      return;
    }

    const head = await reader.getBlockNumber(destination.chainId, { signal: ctx.signal });
    const confirmations = head - receipt.blockNumber + 1;
    if (confirmations < destination.confirmations) {
      store.updateRelay(event.id, { nextAttemptAt: clock.now() + settings.baseMs });
      return;
    }

    store.transition(event.id, "relayed", "confirmed", {
      relay: { confirmedAt: new Date(clock.now()).toISOString(), lastError: null },
    });
    console.log(`Relay confirmed: ${key} -> ${relay.txHash}`);
  } catch (err) {
    const error = classifyError(err);
    if (error.kind === "retryable" || error.kind === "not_ready") {
      recheck(error.message);
      return;
    }
    failRelay(ctx, event, {}, error.message);
    console.error(`Confirmation failed for ${key}:`, error);
  }
}

/** Moves relayed records to confirmed once their tx is deep enough. */
export async function processConfirmations(ctx: PipelineContext): Promise<number> {
  const due = ctx.store.listDueRelays(
    "awaiting_confirmation",
    ctx.clock.now(),
    ctx.settings.batchSize,
  );
  await runWithConcurrency(due, ctx.settings.submitConcurrency, ({ event }) =>
    ctx.locks.runExclusive(recordKey(event), () => confirmOne(ctx, event.id)),
  );
  return due.length;
}
