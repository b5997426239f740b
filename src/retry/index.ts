export { retry } from "./retry.js";
export { RetryState } from "./types.js";
export type { AttemptOutcome, Operation, RetryInfo, RetryOptions } from "./types.js";
