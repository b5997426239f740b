/**
 * Demo 02 — BackoffPolicy: ceilings, jitter spread, seeded reproducibility
 */
import { BackoffPolicy } from "../../src/index.js";
import { c, loadSettings, pass, runTest, step } from "./utils.js";

async function test() {
  const { backoff } = loadSettings();

  step("Ceilings per attempt");
  {
    const policy = new BackoffPolicy(backoff);
    const ceilings = [1, 2, 3, 4, 5, 6, 7, 8].map((attempt) => policy.getCeiling(attempt));
    for (let i = 1; i < ceilings.length; i++) {
      if ((ceilings[i] ?? 0) < (ceilings[i - 1] ?? 0)) throw new Error("Ceilings must not decrease");
    }
    pass(`[${ceilings.map((ms) => c.info(`${ms}ms`)).join(", ")}]`);
  }

  step("Full jitter spread");
  {
    const policy = new BackoffPolicy(backoff);
    const samples = Array.from({ length: 1_000 }, () => policy.getDelay(3));
    const ceiling = policy.getCeiling(3);
    const min = Math.min(...samples);
    const max = Math.max(...samples);
    if (min < 0 || max > ceiling) throw new Error(`Delay escaped [0, ${ceiling}]`);
    const mean = samples.reduce((sum, d) => sum + d, 0) / samples.length;
    pass(`attempt 3: min=${min} max=${max} mean=${c.info(mean.toFixed(1))} ceiling=${ceiling}`);
  }

  step("Same seed, same delays");
  {
    const a = new BackoffPolicy({ ...backoff, seed: 2024 });
    const b = new BackoffPolicy({ ...backoff, seed: 2024 });
    const seqA = [1, 2, 3, 4].map((n) => a.getDelay(n));
    const seqB = [1, 2, 3, 4].map((n) => b.getDelay(n));
    if (seqA.join() !== seqB.join()) throw new Error("Seeded sequences differ");
    pass(`[${seqA.join(", ")}]`);
  }
}

export const run = () => runTest("02 — BackoffPolicy", test);

const isMain = process.argv[1]?.includes("02-backoff");
if (isMain) void run();
