/**
 * Change debouncer
 *
 * Editors rarely save with a single write: a save can produce several change
 * notifications, sometimes interleaved with an unlink/add pair. Writes to the
 * same path are coalesced with a trailing quiet window: one event is emitted
 * once `windowMs` has passed without another write to that path.
 */

import { ChangeEvent, ChangeKind } from "../interfaces/IChangeSource";

/**
 * Default debounce window in milliseconds
 */
export const DEFAULT_DEBOUNCE_MS = 1000;

/**
 * Coalesce a stream of raw event timestamps into emission timestamps
 *
 * Timestamps closer together than `windowMs` belong to the same burst. Each
 * burst produces one emission at `lastTimestamp + windowMs`, so successive
 * emissions are always at least `windowMs` apart. Two events exactly
 * `windowMs` apart fall into separate bursts.
 *
 * @param timestamps - Raw event times in milliseconds (any order)
 * @param windowMs - Quiet window in milliseconds
 * @returns Emission times in ascending order
 *
 * @example
 * ```typescript
 * coalesceTimestamps([0, 100, 250, 5000], 1000); // [1250, 6000]
 * ```
 */
export function coalesceTimestamps(
  timestamps: readonly number[],
  windowMs: number
): number[] {
  const sorted = [...timestamps].sort((a, b) => a - b);
  const emissions: number[] = [];

  for (let i = 0; i < sorted.length; i++) {
    const isLast = i === sorted.length - 1;
    // Burst ends at the last event or where the gap reaches the window
    if (isLast || sorted[i + 1] - sorted[i] >= windowMs) {
      emissions.push(sorted[i] + windowMs);
    }
  }

  return emissions;
}

/**
 * Timer-driven debouncer for live change notifications
 *
 * `write` notifications are debounced per path; every other kind is emitted
 * immediately and unchanged.
 *
 * @example
 * ```typescript
 * const debouncer = new ChangeDebouncer(1000, (event) => channel.send({ type: "event", event }));
 * debouncer.push("write", "/tmp/notes.txt");
 * debouncer.push("write", "/tmp/notes.txt"); // coalesced with the first
 * ```
 */
export class ChangeDebouncer {
  private readonly windowMs: number;
  private readonly emit: (event: ChangeEvent) => void;
  private readonly timers: Map<string, ReturnType<typeof setTimeout>> =
    new Map();

  constructor(windowMs: number, emit: (event: ChangeEvent) => void) {
    this.windowMs = windowMs;
    this.emit = emit;
  }

  /** Number of paths with a write waiting for its window to elapse */
  get pendingCount(): number {
    return this.timers.size;
  }

  /**
   * Feed one raw notification into the debouncer
   */
  push(kind: ChangeKind, filePath: string): void {
    if (kind !== "write") {
      this.emit({ kind, path: filePath, timestamp: Date.now() });
      return;
    }

    const existing = this.timers.get(filePath);
    if (existing) {
      clearTimeout(existing);
    }

    const timer = setTimeout(() => {
      this.timers.delete(filePath);
      this.emit({ kind: "write", path: filePath, timestamp: Date.now() });
    }, this.windowMs);

    this.timers.set(filePath, timer);
  }

  /**
   * Drop every pending write without emitting it
   */
  cancel(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
