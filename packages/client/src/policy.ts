// packages/client/src/policy.ts

/**
 * The two limits that force a flush.
 */
export interface FlushThresholds {
  readonly bufferSizeBytes: number;
  readonly flushIntervalMs: number;
}

/**
 * What forced a flush.
 */
export type FlushTrigger = "size" | "interval";

/**
 * Decide whether the buffer must be drained.
 *
 * Both limits are inclusive. Size wins when both are reached.
 * Returns null when neither limit is reached.
 */
export function flushTrigger(
  buffer: { readonly sizeInBytes: number; readonly lastFlushTime: number },
  now: number,
  thresholds: FlushThresholds,
): FlushTrigger | null {
  if (buffer.sizeInBytes >= thresholds.bufferSizeBytes) {
    return "size";
  }
  if (now - buffer.lastFlushTime >= thresholds.flushIntervalMs) {
    return "interval";
  }
  return null;
}

/**
 * True when either limit has been reached.
 */
export const shouldFlush = (
  buffer: { readonly sizeInBytes: number; readonly lastFlushTime: number },
  now: number,
  thresholds: FlushThresholds,
): boolean => flushTrigger(buffer, now, thresholds) !== null;
