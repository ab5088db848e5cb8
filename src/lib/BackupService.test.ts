/**
 * Integration tests for BackupService
 *
 * Real validator and copy executor on a temp directory; change notifications
 * come from a fake change source so every event is under test control.
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
  ChangeKind,
  ChannelMessage,
  IChangeSource,
  SubscribeOptions,
} from "../interfaces/IChangeSource";
import { CopyOutcome, ICopyExecutor } from "../interfaces/ICopyExecutor";
import { RecordingLogger } from "../test-utils/RecordingLogger";
import { ExitCode, StartupError, WatchSetupError } from "../types";
import { BackupService } from "./BackupService";
import { BackupConfig } from "./ConfigLoader";
import { CopyExecutor } from "./CopyExecutor";
import { EventChannel } from "./EventChannel";

class FakeChangeSource implements IChangeSource {
  subscriptions: Array<{ filePath: string; options: SubscribeOptions }> = [];
  closed = false;
  failWith: Error | null = null;
  private channel: EventChannel<ChannelMessage> | null = null;

  async subscribe(
    filePath: string,
    channel: EventChannel<ChannelMessage>,
    options: SubscribeOptions
  ): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.subscriptions.push({ filePath, options });
    this.channel = channel;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  emit(kind: ChangeKind, filePath: string): void {
    this.channel?.send({
      type: "event",
      event: { kind, path: filePath, timestamp: Date.now() },
    });
  }
}

/** Copy executor that records calls and delegates to the real one */
class CountingExecutor implements ICopyExecutor {
  calls = 0;
  private readonly inner = new CopyExecutor();

  copy(sourcePath: string, destinationFilePath: string): Promise<CopyOutcome> {
    this.calls++;
    return this.inner.copy(sourcePath, destinationFilePath);
  }
}

/** Poll until `condition` holds, failing after `timeoutMs` */
async function waitFor(
  condition: () => boolean,
  timeoutMs = 2000
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe("BackupService", () => {
  const config: BackupConfig = {
    debounceMs: 1000,
    readyTimeoutMs: 5000,
    logDir: os.tmpdir(),
    logLevel: "trace",
  };

  let testDir: string;
  let sourcePath: string;
  let destinationDir: string;
  let logger: RecordingLogger;
  let changeSource: FakeChangeSource;
  let executor: CountingExecutor;
  let service: BackupService;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "backup-service-test-"));
    sourcePath = path.join(testDir, "notes.txt");
    destinationDir = path.join(testDir, "backup");
    logger = new RecordingLogger();
    changeSource = new FakeChangeSource();
    executor = new CountingExecutor();
    service = new BackupService(config, logger, { changeSource, executor });
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("should mirror the source at startup and after each write", async () => {
    fs.writeFileSync(sourcePath, "a");

    const target = await service.start(sourcePath, destinationDir);
    const backupPath = path.join(destinationDir, "notes.txt");

    expect(target.destinationFilePath).toBe(backupPath);
    expect(fs.readFileSync(backupPath, "utf-8")).toBe("a");

    const running = service.run();
    fs.writeFileSync(sourcePath, "ab");
    changeSource.emit("write", sourcePath);
    await waitFor(() => service.getStats()?.copiesSucceeded === 1);

    expect(fs.readFileSync(backupPath, "utf-8")).toBe("ab");

    await service.stop();
    await running;
    expect(changeSource.closed).toBe(true);
  });

  it("should subscribe to the source with the configured timings", async () => {
    fs.writeFileSync(sourcePath, "a");

    await service.start(sourcePath, destinationDir);

    expect(changeSource.subscriptions).toEqual([
      { filePath: sourcePath, options: { debounceMs: 1000, readyTimeoutMs: 5000 } },
    ]);
    expect(logger.messages("info")).toEqual([
      "Input file validated",
      `Destination dir \`${destinationDir}\` setup completed`,
      `Watch session ${service.sessionId}: mirroring \`${sourcePath}\` into \`${path.join(destinationDir, "notes.txt")}\``,
    ]);
  });

  it("should exit with the missing-input status before touching the destination", async () => {
    const error = await service
      .start(sourcePath, destinationDir)
      .catch((e) => e);

    expect(error).toBeInstanceOf(StartupError);
    expect(error.exitCode).toBe(ExitCode.NOINPUT);
    expect(fs.existsSync(destinationDir)).toBe(false);
    expect(executor.calls).toBe(0);
    expect(changeSource.subscriptions).toEqual([]);
  });

  it("should keep starting when the first copy fails", async () => {
    fs.writeFileSync(sourcePath, "a");
    // A directory where the backup file should go makes the copy fail
    fs.mkdirSync(path.join(destinationDir, "notes.txt"), { recursive: true });

    await service.start(sourcePath, destinationDir);

    expect(logger.messages("error")).toHaveLength(1);
    expect(logger.messages("error")[0]).toMatch(/^First copy failed\. Reason: /);
    expect(changeSource.subscriptions).toHaveLength(1);
  });

  it("should fail with a watch setup error when subscribing fails", async () => {
    fs.writeFileSync(sourcePath, "a");
    changeSource.failWith = new WatchSetupError(
      "Failed to watch `notes.txt`: ENOSPC"
    );

    const error = await service
      .start(sourcePath, destinationDir)
      .catch((e) => e);

    expect(error).toBe(changeSource.failWith);
    expect(logger.messages("error")).toEqual([
      "Error adding path to watcher. Failed to watch `notes.txt`: ENOSPC",
    ]);
    // The initial copy happens before the subscription
    expect(
      fs.readFileSync(path.join(destinationDir, "notes.txt"), "utf-8")
    ).toBe("a");
    await expect(service.run()).rejects.toThrow(
      "Watch session has not been started"
    );
  });

  it("should wrap other subscription errors", async () => {
    fs.writeFileSync(sourcePath, "a");
    changeSource.failWith = new Error("EMFILE");

    await expect(service.start(sourcePath, destinationDir)).rejects.toThrow(
      WatchSetupError
    );
  });

  it("should recover from a failed copy on the next write", async () => {
    fs.writeFileSync(sourcePath, "a");
    await service.start(sourcePath, destinationDir);
    const backupPath = path.join(destinationDir, "notes.txt");
    const running = service.run();

    // Replace the backup with a directory so the next copy fails
    fs.rmSync(backupPath);
    fs.mkdirSync(backupPath);
    changeSource.emit("write", sourcePath);
    await waitFor(() => service.getStats()?.copiesFailed === 1);

    fs.rmSync(backupPath, { recursive: true });
    fs.writeFileSync(sourcePath, "abc");
    changeSource.emit("write", sourcePath);
    await waitFor(() => service.getStats()?.copiesSucceeded === 1);

    expect(fs.readFileSync(backupPath, "utf-8")).toBe("abc");
    expect(logger.messages("error")).toHaveLength(1);
    expect(logger.messages("error")[0]).toMatch(/^Copy failed\. Reason: /);

    await service.stop();
    await running;
  });

  it("should keep waiting when the source is removed", async () => {
    fs.writeFileSync(sourcePath, "a");
    await service.start(sourcePath, destinationDir);
    const running = service.run();

    fs.rmSync(sourcePath);
    changeSource.emit("remove", sourcePath);
    await waitFor(() => service.getStats()?.eventsIgnored === 1);

    fs.writeFileSync(sourcePath, "back again");
    changeSource.emit("create", sourcePath);
    changeSource.emit("write", sourcePath);
    await waitFor(() => service.getStats()?.copiesSucceeded === 1);

    expect(
      fs.readFileSync(path.join(destinationDir, "notes.txt"), "utf-8")
    ).toBe("back again");

    await service.stop();
    await running;
  });

  it("should refuse to start twice", async () => {
    fs.writeFileSync(sourcePath, "a");
    await service.start(sourcePath, destinationDir);

    await expect(service.start(sourcePath, destinationDir)).rejects.toThrow(
      `Watch session ${service.sessionId} already started`
    );
  });
});
