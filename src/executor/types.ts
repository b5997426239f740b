import type { RetryOptions } from "../retry/types.js";

/** Preset options for every run of a RetryExecutor */
export type RetryExecutorConfig<T> = Omit<RetryOptions<T>, "onRetry" | "onStateChange">;

/** Per-run overrides; predicates default to the executor's */
export type RunOptions<T> = Partial<RetryExecutorConfig<T>>;
