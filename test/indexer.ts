import { expect } from "chai";
import { ethers } from "ethers";
import { MESSAGE_SENT_TOPIC0, rollupInterface } from "../relayer/src/abis.js";
import { indexChainOnce, ingestLog } from "../relayer/src/indexer.js";
import { createStore, type Store } from "../relayer/src/store.js";
import type { LogEntry } from "../relayer/src/types.js";
import { blockHash, FakeChainReader } from "./helpers/fakes.js";
import {
  L1_ID,
  L2_ID,
  l1Chain,
  l2Chain,
  makeMessage,
  messageLog,
  OWNER,
  txHashOf,
} from "./helpers/fixtures.js";

// ── Helpers ──────────────────────────────────────────────────────

function verifiedLog(address: string, blockNumber: number, logIndex = 0): LogEntry {
  const { data, topics } = rollupInterface.encodeEventLog("BlockVerified", [
    BigInt(blockNumber),
    ethers.id(`verified:${blockNumber}`),
  ]);
  return {
    address,
    topics,
    data,
    blockNumber,
    blockHash: blockHash(L1_ID, blockNumber),
    transactionHash: txHashOf(`verify-${blockNumber}`),
    logIndex,
  };
}

// ── Tests ────────────────────────────────────────────────────────

describe("indexer", function () {
  let store: Store;

  beforeEach(function () {
    store = createStore(":memory:");
  });

  afterEach(function () {
    store.close();
  });

  describe("ingestLog()", function () {
    it("should store a MessageSent log with its owner and destination", function () {
      const log = messageLog(l1Chain, makeMessage());

      const result = ingestLog(store, l1Chain, log);

      expect(result.outcome).to.equal("inserted");
      if (result.outcome !== "inserted") return;
      expect(result.record.eventType).to.equal("MessageSent");
      expect(result.record.messageOwner).to.equal(OWNER.toLowerCase());
      expect(result.record.destinationChainId).to.equal(L2_ID);
      expect(result.record.signalKey).to.equal(log.topics[1]);
      expect(result.record.status).to.equal("new");
    });

    it("should report a re-delivered log as a duplicate", function () {
      const log = messageLog(l1Chain, makeMessage());
      const first = ingestLog(store, l1Chain, log);
      const upper = { ...log, transactionHash: "0x" + log.transactionHash.slice(2).toUpperCase() };

      const second = ingestLog(store, l1Chain, log);
      const third = ingestLog(store, l1Chain, upper);

      expect(second.outcome).to.equal("duplicate");
      expect(third.outcome).to.equal("duplicate");
      if (first.outcome !== "inserted" || second.outcome !== "duplicate") return;
      expect(second.record.id).to.equal(first.record.id);
      expect(store.countByStatus()).to.deep.equal({ new: 1 });
    });

    it("should store the two messages of one transaction separately", function () {
      const txHash = txHashOf("batch");
      ingestLog(store, l1Chain, messageLog(l1Chain, makeMessage({ id: 1n }), { txHash, logIndex: 0 }));
      ingestLog(store, l1Chain, messageLog(l1Chain, makeMessage({ id: 2n }), { txHash, logIndex: 3 }));

      expect(store.listEventsByTx(L1_ID, txHash).map((e) => e.logIndex)).to.deep.equal([0, 3]);
    });

    it("should move an unrelayed record to the block that replaced its own", function () {
      const message = makeMessage();
      ingestLog(store, l1Chain, messageLog(l1Chain, message));
      const moved = messageLog(l1Chain, message, {
        blockNumber: 11,
        blockHash: blockHash(L1_ID, 11, 1),
      });

      const result = ingestLog(store, l1Chain, moved);

      expect(result.outcome).to.equal("reanchored");
      if (result.outcome !== "reanchored") return;
      expect(result.record.blockNumber).to.equal(11);
      expect(result.record.blockHash).to.equal(blockHash(L1_ID, 11, 1));
    });

    it("should keep the first block of a record already relayed", function () {
      const message = makeMessage();
      const first = ingestLog(store, l1Chain, messageLog(l1Chain, message));
      if (first.outcome !== "inserted") throw new Error("not inserted");
      store.startRelay(first.record.id, L2_ID);
      store.transition(first.record.id, "proof_pending", "relayed");

      const result = ingestLog(
        store,
        l1Chain,
        messageLog(l1Chain, message, { blockNumber: 11, blockHash: blockHash(L1_ID, 11, 1) }),
      );

      expect(result.outcome).to.equal("duplicate");
      expect(store.getEvent(first.record.id)?.blockNumber).to.equal(10);
    });

    it("should store block events from the rollup", function () {
      const result = ingestLog(store, l1Chain, verifiedLog(l1Chain.rollupAddress ?? "", 12));

      expect(result.outcome).to.equal("inserted");
      if (result.outcome !== "inserted") return;
      expect(result.record.eventType).to.equal("BlockVerified");
      expect(result.record.messageOwner).to.equal(null);
      expect(result.record.destinationChainId).to.equal(null);
    });

    it("should ignore events from the wrong contract", function () {
      const wrongEmitter = { ...messageLog(l1Chain, makeMessage()), address: l1Chain.signalServiceAddress };
      const onL2 = verifiedLog(l2Chain.bridgeAddress, 12);

      expect(ingestLog(store, l1Chain, wrongEmitter)).to.deep.equal({
        outcome: "ignored",
        reason: `unexpected emitter ${l1Chain.signalServiceAddress}`,
      });
      expect(ingestLog(store, l2Chain, onL2).outcome).to.equal("ignored");
      expect(store.countByStatus()).to.deep.equal({});
    });

    it("should ignore logs it does not watch or cannot decode", function () {
      const base = messageLog(l1Chain, makeMessage());

      expect(
        ingestLog(store, l1Chain, { ...base, topics: [ethers.id("Transfer(address,address,uint256)")] }),
      ).to.deep.equal({ outcome: "ignored", reason: "not a watched event" });
      expect(
        ingestLog(store, l1Chain, { ...base, topics: [MESSAGE_SENT_TOPIC0, base.topics[1]], data: "0x" })
          .outcome,
      ).to.equal("ignored");
    });
  });

  describe("indexChainOnce()", function () {
    it("should index confirmed blocks in bounded ranges", async function () {
      const reader = new FakeChainReader();
      reader.setHead(L1_ID, 100);
      reader.logs.set(L1_ID, [
        messageLog(l1Chain, makeMessage({ id: 1n }), { blockNumber: 10 }),
        messageLog(l1Chain, makeMessage({ id: 2n }), { blockNumber: 60 }),
        messageLog(l1Chain, makeMessage({ id: 3n }), { blockNumber: 100 }),
      ]);
      const opts = { maxLogRange: 50 };

      expect(await indexChainOnce(store, reader, l1Chain, opts)).to.equal(51);
      expect(store.getCursor(L1_ID)).to.equal(49);
      expect(store.countByStatus()).to.deep.equal({ new: 1 });

      expect(await indexChainOnce(store, reader, l1Chain, opts)).to.equal(1);
      expect(store.getCursor(L1_ID)).to.equal(99);

      expect(await indexChainOnce(store, reader, l1Chain, opts)).to.equal(0);
      expect(store.getCursor(L1_ID)).to.equal(100);
      expect(store.countByStatus()).to.deep.equal({ new: 3 });

      expect(await indexChainOnce(store, reader, l1Chain, opts)).to.equal(0);
      expect(reader.calls.getLogs).to.equal(3);
    });

    it("should stay behind the head by the configured confirmations", async function () {
      const reader = new FakeChainReader();
      reader.setHead(L2_ID, 10);
      const l2Message = makeMessage({ srcChainId: BigInt(L2_ID), destChainId: BigInt(L1_ID) });
      reader.logs.set(L2_ID, [
        messageLog(l2Chain, l2Message, { blockNumber: 10, blockHash: blockHash(L2_ID, 10) }),
      ]);

      await indexChainOnce(store, reader, l2Chain, { maxLogRange: 1000 });

      expect(store.getCursor(L2_ID)).to.equal(9);
      expect(store.countByStatus()).to.deep.equal({});

      reader.setHead(L2_ID, 11);
      await indexChainOnce(store, reader, l2Chain, { maxLogRange: 1000 });

      expect(store.getCursor(L2_ID)).to.equal(10);
      expect(store.listEventsByOwner(OWNER.toLowerCase(), "MessageSent", 10)).to.have.length(1);
    });

    it("should keep one record per log when two pollers race", async function () {
      const reader = new FakeChainReader();
      reader.setHead(L1_ID, 20);
      const log = messageLog(l1Chain, makeMessage());
      reader.logs.set(L1_ID, [log, { ...log }]);

      await Promise.all([
        indexChainOnce(store, reader, l1Chain, { maxLogRange: 100 }),
        indexChainOnce(store, reader, l1Chain, { maxLogRange: 100 }),
        Promise.resolve(ingestLog(store, l1Chain, log)),
      ]);

      expect(store.listEventsByTx(L1_ID, log.transactionHash)).to.have.length(1);
      expect(store.countByStatus()).to.deep.equal({ new: 1 });
    });

    it("should resume from the stored cursor", async function () {
      const reader = new FakeChainReader();
      reader.setHead(L1_ID, 30);
      store.setCursor(L1_ID, 20);
      reader.logs.set(L1_ID, [
        messageLog(l1Chain, makeMessage({ id: 1n }), { blockNumber: 15 }),
        messageLog(l1Chain, makeMessage({ id: 2n }), { blockNumber: 25 }),
      ]);

      await indexChainOnce(store, reader, l1Chain, { maxLogRange: 100 });

      const events = store.listEventsByOwner(OWNER.toLowerCase(), "MessageSent", 10);
      expect(events.map((e) => e.blockNumber)).to.deep.equal([25]);
    });
  });
});
