import { EventEmitter } from "node:events";
import type { RetryFailure } from "./errors.js";

/** Retry lifecycle events emitted by a RetryExecutor */
export enum RetryEvent {
  ATTEMPT = "attempt",
  RETRYING = "retrying",
  SUCCEEDED = "succeeded",
  FAILED = "failed",
}

export interface RetryEventMap {
  [RetryEvent.ATTEMPT]: { attempt: number; maxAttempts: number };
  [RetryEvent.RETRYING]: { attempt: number; maxAttempts: number; delayMs: number; error?: Error | undefined };
  [RetryEvent.SUCCEEDED]: { attempts: number };
  [RetryEvent.FAILED]: { failure: RetryFailure };
}

/** Type-safe event emitter for retry lifecycle events. Subscribe via `.on(RetryEvent.*, handler)`. */
export class TypedEventEmitter extends EventEmitter {
  override emit<K extends RetryEvent>(event: K, data: RetryEventMap[K]): boolean {
    return super.emit(event, data);
  }

  override on<K extends RetryEvent>(event: K, listener: (data: RetryEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  override once<K extends RetryEvent>(event: K, listener: (data: RetryEventMap[K]) => void): this {
    return super.once(event, listener);
  }
}
