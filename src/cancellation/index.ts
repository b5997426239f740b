export { CancellationSource, CancellationToken } from "./cancellation.js";
export { interruptibleSleep } from "./interruptible-sleep.js";
