import { fileURLToPath } from "node:url";
import { config } from "dotenv";
import type { BackoffPolicyOptions, Logger } from "../../src/index.js";

config({ path: fileURLToPath(new URL("../.env", import.meta.url)) });

// ── Output ──────────────────────────────────────────────────────────
const paint = (code: number) => (s: string) => `\x1b[${code}m${s}\x1b[0m`;

export const c = {
  ok: paint(32),
  fail: paint(31),
  warn: paint(33),
  info: paint(36),
  accent: paint(35),
  dim: paint(2),
  bold: paint(1),
  blue: paint(34),
};

const rule = c.blue("─".repeat(60));

export function section(title: string) {
  console.log(`\n${rule}\n  ${c.bold(title)}\n${rule}\n`);
}

const line = (marker: string) => (label: string) => console.log(`  ${marker} ${label}`);
export const step = line(c.accent("▸"));
export const pass = line(c.ok("✓"));

function fail(label: string, err?: unknown) {
  line(c.fail("✗"))(label);
  if (!(err instanceof Error)) {
    if (err) console.log(`    ${c.dim(String(err))}`);
    return;
  }
  const frames = err.stack?.split("\n").slice(1, 4) ?? [];
  console.log(`    ${c.dim([err.message, ...frames].join("\n    "))}`);
}

// ── Settings from .env ──────────────────────────────────────────────
function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export interface PlaygroundSettings {
  maxAttempts: number;
  backoff: BackoffPolicyOptions;
}

/** Demo-sized defaults; override with RETRY_* variables in playground/.env */
export function loadSettings(): PlaygroundSettings {
  return {
    maxAttempts: numberFromEnv("RETRY_MAX_ATTEMPTS", 4),
    backoff: {
      initialDelayMs: numberFromEnv("RETRY_INITIAL_DELAY_MS", 50),
      multiplier: numberFromEnv("RETRY_MULTIPLIER", 2),
      maxDelayMs: numberFromEnv("RETRY_MAX_DELAY_MS", 500),
    },
  };
}

// ── Pretty logger ───────────────────────────────────────────────────
const levelTag = { debug: c.dim("[debug]"), info: c.info("[info] "), warn: c.warn("[warn] "), error: c.fail("[error]") };

function logAt(level: keyof typeof levelTag) {
  return (msg: string, data?: Record<string, unknown>) =>
    console.log(`    ${levelTag[level]} ${msg}`, data ? c.dim(JSON.stringify(data)) : "");
}

export const prettyLogger: Logger = {
  debug: logAt("debug"),
  info: logAt("info"),
  warn: logAt("warn"),
  error: logAt("error"),
};

export function timer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}

/** Print a titled block for `fn`; resolves false instead of throwing when it fails */
export async function runTest(name: string, fn: () => Promise<void>): Promise<boolean> {
  section(name);
  const ok = await fn().then(
    () => true,
    (err: unknown) => {
      fail("Demo failed", err);
      return false;
    },
  );
  console.log(`\n  ${ok ? c.ok("PASSED") : c.fail("FAILED")}\n`);
  return ok;
}
