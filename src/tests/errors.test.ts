// tests/errors.test.ts

import {
  ConfigurationError,
  RemoteExecutionError,
  TransportError,
  errnoCode,
  isCellsyncError,
} from "../errors";
import { errorResult, okResult } from "../remote-channel";

describe("errors", () => {
  test("kinds and names identify each class", () => {
    const err = new ConfigurationError(["first", "second"]);
    expect(err.kind).toBe("configuration");
    expect(err.name).toBe("ConfigurationError");
    expect(err.message).toBe("first\nsecond");
    expect(isCellsyncError(err)).toBe(true);
    expect(isCellsyncError(new Error("x"))).toBe(false);
  });

  test("transport errors keep status and cause", () => {
    const cause = new Error("socket hang up");
    const err = new TransportError("POST /x failed", { status: 502, cause });
    expect(err.status).toBe(502);
    expect(err.cause).toBe(cause);
  });

  test("RemoteExecutionError.fromResult reads the first error chunk", () => {
    expect(RemoteExecutionError.fromResult(okResult())).toBeNull();
    const err = RemoteExecutionError.fromResult(
      errorResult("KeyError", "'missing'", ["Traceback (most recent call last):"]),
    );
    expect(err?.message).toBe("KeyError: 'missing'");
    expect(err?.remoteName).toBe("KeyError");
    expect(err?.traceback).toEqual(["Traceback (most recent call last):"]);

    const timedOut = RemoteExecutionError.fromResult({
      status: "timeout",
      chunks: [],
      reconnected: false,
    });
    expect(timedOut?.message).toBe("command ended with status timeout");
  });

  test("errnoCode", () => {
    const enoent = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(errnoCode(enoent)).toBe("ENOENT");
    expect(errnoCode(new Error("plain"))).toBeUndefined();
    expect(errnoCode("ENOENT")).toBeUndefined();
    expect(errnoCode({ code: "EACCES", message: "denied" })).toBe("EACCES");
    expect(errnoCode({ code: 13 })).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
  });
});
