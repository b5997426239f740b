export { RetryExecutor } from "./retry-executor.js";
export { RetryExecutorBuilder } from "./builder.js";
export type { RetryExecutorConfig, RunOptions } from "./types.js";
