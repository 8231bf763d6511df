import { describe, expect, test } from "vitest";
import { auditEventSchema } from "../../src/contracts/audit.js";

describe("audit event schema", () => {
  test("accepts a written event", () => {
    const parsed = auditEventSchema.parse({
      ts: "2026-03-04T05:06:07.000Z",
      level: "error",
      kind: "command.failed",
      message: "Key not found: port in server",
      data: { command: "/get", kind: "KeyNotFound" },
    });

    expect(parsed.data).toEqual({ command: "/get", kind: "KeyNotFound" });
  });

  test("rejects unknown kinds and malformed timestamps", () => {
    const base = { ts: "2026-03-04T05:06:07.000Z", level: "info", kind: "config.loaded", message: "ok" };

    expect(auditEventSchema.safeParse(base).success).toBe(true);
    expect(auditEventSchema.safeParse({ ...base, kind: "config.saved" }).success).toBe(false);
    expect(auditEventSchema.safeParse({ ...base, ts: "yesterday" }).success).toBe(false);
  });
});
