/**
 * Abstraction for timer operations.
 * Request timeouts are armed through this so tests can drive them.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}

/**
 * Promise-based delay function type.
 * Used for retry backoff and the cooldown between rounds.
 */
export type DelayFn = (ms: number) => Promise<void>;

/** Source of jitter in [0, 1) */
export type RandomFn = () => number;
