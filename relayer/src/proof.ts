import { ethers } from "ethers";
import { crossChainSyncInterface } from "./abis.js";
import type { CallOptions, ChainHeader, ChainReader } from "./chain.js";
import {
  encodeHeader,
  encodeSignalProof,
  encodeStorageProof,
  signalSlot,
} from "./encoding.js";
import {
  BlockNotSyncedError,
  HeaderNotFoundError,
  RelayError,
  SignalNotFoundInStateError,
} from "./errors.js";
import type { Store } from "./store.js";
import type { SignalProof } from "./types.js";

/** The source side of a proof: where the signal was written. */
export interface SignalSource {
  chainId: number;
  signalServiceAddress: string;
  // App that sent the signal (the bridge)
  appAddress: string;
}

/** The destination side: where the proof will be verified. */
export interface SignalDestination {
  chainId: number;
  crossChainSyncAddress: string;
}

export type SourceBlock = { height: number } | { txHash: string };

export type BuildContext = CallOptions;

export class ProofBuilder {
  constructor(
    private readonly reader: ChainReader,
    private readonly store?: Store,
  ) {}

  /**
   * Builds the encoded storage proof that the signal was sent on the source
   * chain, anchored at a block the destination has already synced. With a
   * store, proofs are cached there and rebuilt only on a miss.
   */
  async buildSignalProof(
    ctx: BuildContext,
    source: SignalSource,
    destination: SignalDestination,
    rawSignalKey: string,
    block: SourceBlock,
  ): Promise<SignalProof> {
    const signalKey = rawSignalKey.toLowerCase();
    const header = await this.resolveHeader(ctx, source.chainId, block);
    const height = Number(header.height);

    const cached = this.store?.getCachedProof(source.chainId, height, signalKey);
    if (cached) {
      return cached;
    }

    await this.assertSynced(ctx, destination, header);

    const slot = signalSlot(source.appAddress, signalKey);
    const result = await this.reader.getProof(
      source.chainId,
      source.signalServiceAddress,
      [slot],
      height,
      ctx,
    );
    const entry = result.storageProof[0];
    if (!entry || entry.value === 0n) {
      throw new SignalNotFoundInStateError(signalKey, header.height);
    }

    const storageProof = encodeStorageProof(entry.proof);
    const proof: SignalProof = {
      encodedHeader: encodeHeader(header),
      storageProof,
      signalRoot: result.storageHash,
      encodedProof: encodeSignalProof(header, storageProof),
    };

    this.store?.putCachedProof(source.chainId, height, signalKey, proof);
    return proof;
  }

  /** Highest source height the destination's cross-chain sync has recorded. */
  async latestSyncedHeight(ctx: BuildContext, destination: SignalDestination): Promise<number> {
    const data = await this.reader.call(
      destination.chainId,
      destination.crossChainSyncAddress,
      crossChainSyncInterface.encodeFunctionData("getLatestSyncedHeight"),
      undefined,
      ctx,
    );
    const [height] = crossChainSyncInterface.decodeFunctionResult("getLatestSyncedHeight", data);
    return Number(height);
  }

  private async resolveHeader(
    ctx: BuildContext,
    chainId: number,
    block: SourceBlock,
  ): Promise<ChainHeader> {
    if ("height" in block) {
      return this.reader.getHeader(chainId, block.height, ctx);
    }
    const receipt = await this.reader.getTransactionReceipt(chainId, block.txHash, ctx);
    if (!receipt) {
      throw new HeaderNotFoundError(chainId, block.txHash);
    }
    return this.reader.getHeader(chainId, receipt.blockHash, ctx);
  }

  private async assertSynced(
    ctx: BuildContext,
    destination: SignalDestination,
    header: ChainHeader,
  ): Promise<void> {
    const data = await this.reader.call(
      destination.chainId,
      destination.crossChainSyncAddress,
      crossChainSyncInterface.encodeFunctionData("getCrossChainBlockHash", [header.height]),
      undefined,
      ctx,
    );
    const [syncedHash] = crossChainSyncInterface.decodeFunctionResult("getCrossChainBlockHash", data);
    if (syncedHash === ethers.ZeroHash) {
      throw new BlockNotSyncedError(destination.chainId, header.height);
    }
    if (String(syncedHash).toLowerCase() !== header.hash.toLowerCase()) {
      // Source reorged after the destination synced, or the other way round
      throw new RelayError(
        "retryable",
        `chain ${destination.chainId} synced ${syncedHash} at height ${header.height}, source has ${header.hash}`,
      );
    }
  }
}
