import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createApiServer } from "./api.js";
import { createProviders, RpcChainReader, WalletChainWriter } from "./chain.js";
import { KeyedMutex } from "./concurrency.js";
import { loadConfig } from "./config.js";
import type { PipelineContext } from "./context.js";
import { indexChainOnce } from "./indexer.js";
import { startLoop } from "./loop.js";
import { processNewEvents, processProofs } from "./processor.js";
import { ProofBuilder } from "./proof.js";
import { createStore } from "./store.js";
import { processConfirmations, processSubmissions, RelaySubmitter } from "./submitter.js";
import { systemClock } from "./time.js";

const config = loadConfig();

// Ensure DB directory exists
mkdirSync(dirname(config.dbPath), { recursive: true });

const store = createStore(config.dbPath);

// Submissions interrupted by a crash are retried from their persisted state
const released = store.resetInFlight();
if (released > 0) {
  console.warn(`Released ${released} in-flight submissions left by a previous run`);
}

const providers = createProviders(config.chains);
const reader = new RpcChainReader(providers, {
  timeoutMs: config.rpcTimeoutMs,
  requestsPerSecond: config.rpcRequestsPerSecond,
});
const writer = new WalletChainWriter(providers, config.relayerPrivateKey, config.rpcTimeoutMs);

const shutdownController = new AbortController();
const { signal } = shutdownController;

const ctx: PipelineContext = {
  chains: config.chains,
  settings: {
    maxRetries: config.maxRetries,
    baseMs: config.backoffBaseMs,
    maxMs: config.backoffMaxMs,
    batchSize: config.batchSize,
    proofConcurrency: config.proofConcurrency,
    submitConcurrency: config.submitConcurrency,
  },
  store,
  reader,
  proofs: new ProofBuilder(reader, store),
  submitter: new RelaySubmitter(writer),
  locks: new KeyedMutex(),
  clock: systemClock,
  signal,
};

// Start HTTP API
const app = createApiServer({ chains: config.chains, store, reader });
const server = app.listen(config.apiPort, () => {
  console.log(`HTTP API listening on port ${config.apiPort}`);
});

// Start background loops
const loops: Promise<void>[] = [];
for (const chain of config.chains) {
  loops.push(
    startLoop(`Indexer ${chain.name}`, config.pollIntervalMs, signal, () =>
      indexChainOnce(store, reader, chain, { maxLogRange: config.maxLogRange, signal }),
    ),
  );
}
loops.push(
  startLoop("Processor", config.pollIntervalMs, signal, () => processNewEvents(ctx)),
  startLoop("Prover", config.pollIntervalMs, signal, () => processProofs(ctx)),
  startLoop("Submitter", config.pollIntervalMs, signal, () => processSubmissions(ctx)),
  startLoop("Confirmer", config.pollIntervalMs, signal, () => processConfirmations(ctx)),
);

console.log(
  `Signal relayer started for chains ${config.chains.map((c) => `${c.name}=${c.chainId}`).join(", ")}`,
);

// Graceful shutdown
function shutdown() {
  console.log("Shutting down...");
  shutdownController.abort();
  // Force exit after 10s
  setTimeout(() => process.exit(1), 10_000).unref();

  Promise.all(loops)
    .then(
      () =>
        new Promise<void>((resolve) => {
          server.close(() => resolve());
        }),
    )
    .then(() => {
      store.close();
      for (const provider of providers.values()) {
        provider.destroy();
      }
      console.log("Relayer stopped");
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error("Shutdown error:", err);
      process.exit(1);
    });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
