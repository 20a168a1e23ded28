// tests/render.test.ts

import { RECONNECT_NOTICE, renderResult, renderTable } from "../render";
import type { ExecutionResult } from "../remote-channel";

describe("renderResult", () => {
  test("stdout and errors go to separate streams", () => {
    const result: ExecutionResult = {
      status: "error",
      chunks: [
        { kind: "stdout", text: "partial" },
        { kind: "stderr", text: "warning: slow\n" },
        {
          kind: "error",
          name: "ZeroDivisionError",
          message: "division by zero",
          traceback: ["Traceback (most recent call last):", '  File "<cell>", line 2'],
        },
      ],
      reconnected: false,
    };
    expect(renderResult(result)).toEqual({
      stdout: "partial\n",
      stderr:
        "warning: slow\n" +
        "ZeroDivisionError: division by zero\n" +
        "Traceback (most recent call last):\n" +
        '  File "<cell>", line 2\n',
    });
  });

  test("a reconnected result leads with the notice", () => {
    const out = renderResult({
      status: "ok",
      chunks: [{ kind: "stdout", text: "3\n" }],
      reconnected: true,
    });
    expect(out).toEqual({ stdout: "3\n", stderr: `${RECONNECT_NOTICE}\n` });
  });

  test("images are summarized", () => {
    const out = renderResult({
      status: "ok",
      chunks: [
        { kind: "rich", payload: { type: "image", mimeType: "image/jpeg", base64: "QUJD" } },
      ],
      reconnected: false,
    });
    expect(out.stdout).toBe("[image image/jpeg, 3 B]\n");
  });

  test("tables render every column and cell", () => {
    const text = renderTable(["id", "label"], [[1, "one"], [2, null]]);
    const lines = text.split("\n");
    expect(lines.some((l) => l.includes("id") && l.includes("label"))).toBe(true);
    expect(lines.some((l) => l.includes("1") && l.includes("one"))).toBe(true);
    expect(lines.some((l) => l.includes("2") && l.includes("null"))).toBe(true);
  });
});
