/**
 * Core interfaces for file-watcher-backup
 */

export * from "./IWatchTarget";
export * from "./IChangeSource";
export * from "./ICopyExecutor";
export * from "./ILogger";
