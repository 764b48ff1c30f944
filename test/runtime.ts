import { expect } from "chai";
import { withTimeout } from "../relayer/src/chain.js";
import { KeyedMutex, runWithConcurrency } from "../relayer/src/concurrency.js";
import { RelayError, TimeoutError } from "../relayer/src/errors.js";
import { runLoop } from "../relayer/src/loop.js";
import { ChainRateLimiter } from "../relayer/src/ratelimit.js";
import { canTransition, isTerminal } from "../relayer/src/state.js";
import { backoffDelay, sleep } from "../relayer/src/time.js";

describe("backoffDelay()", function () {
  const policy = { baseMs: 1000, maxMs: 10_000 };

  it("should double with each attempt", function () {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, policy))).to.deep.equal([
      1000, 2000, 4000, 8000,
    ]);
  });

  it("should stop at the cap", function () {
    expect(backoffDelay(5, policy)).to.equal(10_000);
    expect(backoffDelay(30, policy)).to.equal(10_000);
  });

  it("should treat attempt 0 as the first", function () {
    expect(backoffDelay(0, policy)).to.equal(1000);
  });
});

describe("state machine", function () {
  it("should only move forward", function () {
    expect(canTransition("new", "proof_pending")).to.equal(true);
    expect(canTransition("proof_pending", "relayed")).to.equal(true);
    expect(canTransition("relayed", "confirmed")).to.equal(true);
    expect(canTransition("relayed", "invalidated")).to.equal(false);
    expect(canTransition("proof_pending", "new")).to.equal(false);
    expect(canTransition("new", "relayed")).to.equal(false);
  });

  it("should have three terminal statuses", function () {
    expect(isTerminal("confirmed")).to.equal(true);
    expect(isTerminal("failed")).to.equal(true);
    expect(isTerminal("invalidated")).to.equal(true);
    expect(isTerminal("relayed")).to.equal(false);
  });
});

describe("KeyedMutex", function () {
  it("should run work for one key in order", async function () {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive("a", async () => {
        order.push("first:start");
        await sleep(20);
        order.push("first:end");
      }),
      mutex.runExclusive("a", async () => {
        order.push("second");
      }),
    ]);

    expect(order).to.deep.equal(["first:start", "first:end", "second"]);
  });

  it("should not hold up other keys", async function () {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive("a", async () => {
        await sleep(20);
        order.push("a");
      }),
      mutex.runExclusive("b", async () => {
        order.push("b");
      }),
    ]);

    expect(order).to.deep.equal(["b", "a"]);
  });

  it("should release the key when the work throws", async function () {
    const mutex = new KeyedMutex();

    const err = await mutex
      .runExclusive("a", async () => {
        throw new Error("boom");
      })
      .catch((e: unknown) => e);

    expect(err).to.have.property("message", "boom");
    expect(await mutex.runExclusive("a", async () => 42)).to.equal(42);
  });
});

describe("runWithConcurrency()", function () {
  it("should process every item with bounded parallelism", async function () {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      seen.push(item);
      active--;
    });

    expect(peak).to.equal(2);
    expect([...seen].sort()).to.deep.equal([1, 2, 3, 4, 5]);
  });

  it("should accept an empty list", async function () {
    let calls = 0;
    await runWithConcurrency([], 4, async () => {
      calls++;
    });
    expect(calls).to.equal(0);
  });
});

describe("withTimeout()", function () {
  it("should resolve with the operation's result", async function () {
    expect(await withTimeout("op", async () => 7, 1000)).to.equal(7);
  });

  it("should reject slow operations with a retryable timeout", async function () {
    const err = await withTimeout("getLogs on chain 5", () => sleep(200), 10).catch(
      (e: unknown) => e,
    );

    expect(err).to.be.instanceOf(TimeoutError);
    expect(err).to.have.property("kind", "retryable");
    expect(err).to.have.property("message", "getLogs on chain 5 timed out after 10ms");
  });

  it("should classify the operation's own failure", async function () {
    const err = await withTimeout(
      "call",
      async () => {
        throw new Error("429 Too Many Requests");
      },
      1000,
    ).catch((e: unknown) => e);

    expect(err).to.be.instanceOf(RelayError);
    expect(err).to.have.property("kind", "retryable");
  });

  it("should stop waiting when aborted", async function () {
    const controller = new AbortController();
    const pending = withTimeout("op", () => sleep(200), 1000, controller.signal).catch(
      (e: unknown) => e,
    );
    controller.abort();

    const err = await pending;
    expect(err).to.be.instanceOf(RelayError);
    expect(err).to.have.property("message", "op aborted");
  });
});

describe("runLoop()", function () {
  it("should re-run at once while there is a backlog and stop on abort", async function () {
    const controller = new AbortController();
    let calls = 0;

    await runLoop("test", 60_000, controller.signal, async () => {
      calls++;
      if (calls === 3) {
        controller.abort();
        return 0;
      }
      return 1;
    });

    expect(calls).to.equal(3);
  });

  it("should keep running after a failed round", async function () {
    const controller = new AbortController();
    let calls = 0;

    await runLoop("test", 1, controller.signal, async () => {
      calls++;
      if (calls === 1) {
        throw new Error("transient");
      }
      controller.abort();
      return 0;
    });

    expect(calls).to.equal(2);
  });
});

describe("ChainRateLimiter", function () {
  it("should keep separate budgets per chain", async function () {
    const limiter = new ChainRateLimiter(2);
    const started = Date.now();

    await limiter.acquire(5);
    await limiter.acquire(5);
    await limiter.acquire(167);
    await limiter.acquire(167);
    expect(Date.now() - started).to.be.lessThan(100);

    await limiter.acquire(5);
    expect(Date.now() - started).to.be.at.least(450);
  });
});
