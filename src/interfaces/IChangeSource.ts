/**
 * Change source interface
 *
 * Provides debounced change notifications for a single file. Raw
 * notifications arrive through Chokidar; the watch loop only ever sees the
 * coalesced events, delivered through an `EventChannel`.
 */

import type { EventChannel } from "../lib/EventChannel";

/**
 * Kind of change reported for the watched path
 *
 * - write: file contents changed (including atomic saves that replace the file)
 * - create: file appeared at the watched path
 * - remove: file was deleted or moved away from the watched path
 */
export type ChangeKind = "write" | "create" | "remove";

/**
 * Represents a logical change of the watched file
 */
export interface ChangeEvent {
  /** Kind of change */
  kind: ChangeKind;
  /** Path reported by the notification subsystem */
  path: string;
  /** Time the event was emitted (ms since epoch) */
  timestamp: number;
}

/**
 * Message delivered to the watch loop
 *
 * Errors reported by the notification subsystem after the subscription is
 * established travel through the same channel as events, so the loop sees
 * them in order.
 */
export type ChannelMessage =
  | { type: "event"; event: ChangeEvent }
  | { type: "error"; error: Error };

/**
 * Options for subscribing to a file
 */
export interface SubscribeOptions {
  /** Debounce window in milliseconds */
  debounceMs: number;
  /** Maximum time to wait for the watcher to become ready */
  readyTimeoutMs: number;
}

/**
 * Change source interface
 *
 * Subscribes to non-recursive change notifications for exactly one file.
 * Implementations must debounce `write` notifications and pass every other
 * kind through unmodified.
 */
export interface IChangeSource {
  /**
   * Start watching a file
   *
   * Resolves once the underlying watcher is ready. Events and delivery errors
   * are pushed to `channel` from then on.
   *
   * @param filePath - File to watch
   * @param channel - Channel receiving events and delivery errors
   * @param options - Debounce and readiness settings
   * @throws WatchSetupError if the subscription cannot be established
   *
   * @example
   * ```typescript
   * const channel = new EventChannel<ChannelMessage>();
   * await source.subscribe("notes.txt", channel, {
   *   debounceMs: 1000,
   *   readyTimeoutMs: 5000,
   * });
   * ```
   */
  subscribe(
    filePath: string,
    channel: EventChannel<ChannelMessage>,
    options: SubscribeOptions
  ): Promise<void>;

  /**
   * Stop watching and drop any pending debounced events
   */
  close(): Promise<void>;
}
