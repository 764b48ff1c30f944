import { sleep } from "./time.js";

/**
 * Runs `step` until the signal aborts, sleeping `intervalMs` between rounds.
 * A step that reports remaining work (> 0) is re-run without sleeping.
 */
export async function runLoop(
  name: string,
  intervalMs: number,
  signal: AbortSignal,
  step: () => Promise<number>,
): Promise<void> {
  while (!signal.aborted) {
    let backlog = 0;
    try {
      backlog = await step();
    } catch (err) {
      console.error(`${name} loop error:`, err);
    }
    if (backlog === 0) {
      await sleep(intervalMs, signal);
    }
  }
}

export function startLoop(
  name: string,
  intervalMs: number,
  signal: AbortSignal,
  step: () => Promise<number>,
): Promise<void> {
  return runLoop(name, intervalMs, signal, step).catch((err: unknown) => {
    console.error(`${name} fatal error:`, err);
    process.exit(1);
  });
}
