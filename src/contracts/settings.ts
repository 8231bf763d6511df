import { z } from "zod";

export const exportSettingsSchema = z.object({
  redactSecrets: z.boolean().default(false),
});

export const auditSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  retentionDays: z.number().int().positive().default(30),
});

export const settingsSchema = z.object({
  version: z.literal("1.0").default("1.0"),
  strictBooleans: z.boolean().default(false),
  export: exportSettingsSchema.default({}),
  audit: auditSettingsSchema.default({}),
});

export type TiercfgSettings = z.infer<typeof settingsSchema>;
