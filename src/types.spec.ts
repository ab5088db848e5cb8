/**
 * Basic tests for the shared error types
 */

import {
  ExitCode,
  StartupError,
  ValidationError,
  WatchSetupError,
} from "./types";

describe("Error Types", () => {
  it("should create ValidationError", () => {
    const error = new ValidationError("test message");
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.name).toBe("ValidationError");
    expect(error.message).toBe("test message");
  });

  it("should create StartupError carrying an exit code", () => {
    const error = new StartupError("missing", ExitCode.NOINPUT);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("StartupError");
    expect(error.exitCode).toBe(66);
    expect(error.cause).toBeUndefined();
  });

  it("should create WatchSetupError", () => {
    const error = new WatchSetupError("test message");
    expect(error).toBeInstanceOf(WatchSetupError);
    expect(error.name).toBe("WatchSetupError");
    expect(error.message).toBe("test message");
  });

  it("should use sysexits values", () => {
    expect(ExitCode.USAGE).toBe(64);
    expect(ExitCode.NOINPUT).toBe(66);
    expect(ExitCode.SOFTWARE).toBe(70);
    expect(ExitCode.IOERR).toBe(74);
  });
});
