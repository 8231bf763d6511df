import { z } from "zod";

export const AUDIT_KINDS = ["config.loaded", "config.cleared", "command.failed", "audit.prune"] as const;

export const auditEventSchema = z.object({
  ts: z.string().datetime(),
  level: z.enum(["info", "warn", "error"]),
  kind: z.enum(AUDIT_KINDS),
  message: z.string(),
  data: z.record(z.unknown()).optional(),
});

export type AuditEvent = z.infer<typeof auditEventSchema>;
export type AuditLevel = AuditEvent["level"];
export type AuditKind = AuditEvent["kind"];
