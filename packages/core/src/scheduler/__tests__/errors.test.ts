import { describe, it, expect } from "vitest";
import {
  isSchedulerConfigError,
  SchedulerConfigError,
  SchedulerError,
  SchedulerShutdownError,
} from "../errors.js";
import { OfflineSyncError, isOfflineSyncError } from "../../errors.js";

// =============================================================================
// SchedulerError (Base Class)
// =============================================================================

describe("SchedulerError", () => {
  it("creates error with message", () => {
    const error = new SchedulerError("test error message");

    expect(error.message).toBe("test error message");
    expect(error.name).toBe("SchedulerError");
    expect(error.code).toBe("SCHEDULER_ERROR");
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(OfflineSyncError);
    expect(isOfflineSyncError(error)).toBe(true);
  });

  it("preserves cause when provided", () => {
    const cause = new Error("original error");
    const error = new SchedulerError("wrapped error", { cause });

    expect(error.message).toBe("wrapped error");
    expect(error.cause).toBe(cause);
  });

  it("has undefined cause when not provided", () => {
    const error = new SchedulerError("no cause");

    expect(error.cause).toBeUndefined();
  });
});

// =============================================================================
// SchedulerConfigError
// =============================================================================

describe("SchedulerConfigError", () => {
  it("records the field and rejected value", () => {
    const error = new SchedulerConfigError("maxWorkers must be >= 1", "maxWorkers", 0);

    expect(error.name).toBe("SchedulerConfigError");
    expect(error.code).toBe("SCHEDULER_CONFIG");
    expect(error.field).toBe("maxWorkers");
    expect(error.value).toBe(0);
    expect(error).toBeInstanceOf(SchedulerError);
  });

  it("is recognized by its type guard", () => {
    expect(isSchedulerConfigError(new SchedulerConfigError("x", "pollWait", -1))).toBe(true);
    expect(isSchedulerConfigError(new SchedulerError("x"))).toBe(false);
    expect(isSchedulerConfigError("x")).toBe(false);
  });
});

// =============================================================================
// SchedulerShutdownError
// =============================================================================

describe("SchedulerShutdownError", () => {
  it("creates error with timeout details", () => {
    const error = new SchedulerShutdownError("shutdown timed out", {
      timedOut: true,
      runningJobCount: 3,
    });

    expect(error.message).toBe("shutdown timed out");
    expect(error.name).toBe("SchedulerShutdownError");
    expect(error.code).toBe("SCHEDULER_SHUTDOWN");
    expect(error.timedOut).toBe(true);
    expect(error.runningJobCount).toBe(3);
    expect(error).toBeInstanceOf(SchedulerError);
  });

  it("preserves cause when provided", () => {
    const cause = new Error("underlying");
    const error = new SchedulerShutdownError("failed", {
      timedOut: false,
      runningJobCount: 0,
      cause,
    });

    expect(error.cause).toBe(cause);
  });
});
