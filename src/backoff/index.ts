export { BackoffPolicy } from "./backoff-policy.js";
export type { BackoffConfig, BackoffPolicyOptions } from "./types.js";
