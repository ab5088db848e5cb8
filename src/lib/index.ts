/**
 * Core library exports for file-watcher-backup
 */

export * from "./EventChannel";
export * from "./ChangeDebouncer";
export * from "./FileChangeSource";
export * from "./CopyExecutor";
export * from "./TargetValidator";
export * from "./WatchLoop";
export * from "./BackupService";
export * from "./CommandLine";
export * from "./ConfigLoader";
export * from "./Logger";
export * from "./ErrorHandler";
