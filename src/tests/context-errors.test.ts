// tests/context-errors.test.ts

import {
  isContextLostError,
  isContextLostMessage,
  isContextLostResult,
} from "../context-errors";
import { errorResult, okResult } from "../remote-channel";
import { TransportError } from "../errors";

describe("context loss classification", () => {
  test.each([
    "Context not found",
    "Execution context does not exist",
    "Invalid context ID provided",
    "The execution context expired",
    "Error: context_id is invalid",
    "context is invalid",
    "INVALID_PARAMETER_VALUE: Execution context abc123 was removed",
  ])("recognizes %p", (text) => {
    expect(isContextLostMessage(text)).toBe(true);
  });

  test.each([
    "Network timeout",
    "File not found: /data/input.csv",
    "NameError: name 'x' is not defined",
    "Invalid argument: value must be positive",
    "Session expired",
    "ContextManager misuse",
  ])("ignores %p", (text) => {
    expect(isContextLostMessage(text)).toBe(false);
  });

  test("transport errors are classified by message", () => {
    expect(
      isContextLostError(
        new TransportError("GET /api/1.2/commands/status (400) Context not found", {
          status: 400,
        }),
      ),
    ).toBe(true);
    expect(isContextLostError(new Error("connection reset"))).toBe(false);
    expect(isContextLostError(42)).toBe(false);
  });

  test("only error results are classified", () => {
    expect(isContextLostResult(errorResult("Error", "Context not found"))).toBe(true);
    expect(
      isContextLostResult(okResult([{ kind: "stdout", text: "context not found" }])),
    ).toBe(false);
    expect(isContextLostResult(errorResult("KeyError", "'context'"))).toBe(false);
  });

  test("results are judged by their headline only", () => {
    expect(
      isContextLostResult(errorResult("NameError", "name 'context_id' is not defined")),
    ).toBe(false);
    expect(
      isContextLostResult(
        errorResult("AttributeError", "'Spark' object has no attribute 'execution_context'"),
      ),
    ).toBe(false);
    expect(
      isContextLostResult(
        errorResult("LookupError", "cache miss", ["raise LookupError('Context not found')"]),
      ),
    ).toBe(false);
    expect(isContextLostResult(errorResult("Error", "Execution context expired"))).toBe(true);
  });

  test("transport errors keep the looser signatures", () => {
    expect(isContextLostError(new TransportError("(400) INVALID_STATE: context_id is invalid"))).toBe(
      true,
    );
    expect(
      isContextLostError(new TransportError("(500) execution context was reset")),
    ).toBe(true);
  });
});
