/**
 * Run all playground demos sequentially.
 *
 * Usage: npm run playground
 */
import { c, section } from "./utils.js";

interface DemoEntry {
  name: string;
  load: () => Promise<{ run: () => Promise<boolean> }>;
}

const allDemos: DemoEntry[] = [
  { name: "01 — retry()", load: () => import("./01-retry.js") },
  { name: "02 — BackoffPolicy", load: () => import("./02-backoff.js") },
  { name: "03 — Cancellation", load: () => import("./03-cancellation.js") },
];

async function main() {
  console.log("\n" + c.bold("  retry-kit — Playground"));
  console.log(c.dim("  ══════════════════════\n"));

  const results: Array<{ name: string; ok: boolean; timeMs: number }> = [];

  for (const demo of allDemos) {
    const start = performance.now();
    try {
      const mod = await demo.load();
      const ok = await mod.run();
      results.push({ name: demo.name, ok, timeMs: Math.round(performance.now() - start) });
    } catch (err) {
      results.push({ name: demo.name, ok: false, timeMs: Math.round(performance.now() - start) });
      console.error(`\n  ${c.fail("FATAL:")} ${demo.name}`, err);
    }
  }

  // ── Summary ───────────────────────────────────────────────────
  section("Summary");
  const passed = results.filter((r) => r.ok).length;
  const failed = results.length - passed;
  const totalTime = results.reduce((sum, r) => sum + r.timeMs, 0);

  for (const r of results) {
    console.log(`  ${r.ok ? c.ok("PASS") : c.fail("FAIL")}  ${r.name}  ${c.dim(`(${r.timeMs}ms)`)}`);
  }

  const parts = [`${c.bold(`${passed} passed`)}`];
  if (failed > 0) parts.push(c.fail(`${failed} failed`));
  console.log(`\n  ${parts.join(", ")} — ${c.dim(`${totalTime}ms total`)}\n`);

  if (failed > 0) process.exit(1);
}

void main();
