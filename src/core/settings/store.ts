import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { settingsSchema, type TiercfgSettings } from "../../contracts/settings.js";

export type { TiercfgSettings };

export const SETTINGS_FILE = join(".tiercfg", "settings.json");

export function createDefaultSettings(): TiercfgSettings {
  return settingsSchema.parse({});
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function applyEnvOverrides(settings: TiercfgSettings, env: NodeJS.ProcessEnv): TiercfgSettings {
  let next = settings;
  if (env.TIERCFG_STRICT_BOOLEANS !== undefined) {
    next = { ...next, strictBooleans: env.TIERCFG_STRICT_BOOLEANS === "1" };
  }
  if (env.TIERCFG_AUDIT !== undefined) {
    next = { ...next, audit: { ...next.audit, enabled: env.TIERCFG_AUDIT !== "0" } };
  }
  return next;
}

export async function loadSettings(projectRoot: string, env: NodeJS.ProcessEnv = process.env): Promise<TiercfgSettings> {
  const filePath = join(projectRoot, SETTINGS_FILE);
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return applyEnvOverrides(createDefaultSettings(), env);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid settings file ${filePath}: ${reason}`);
  }

  const result = settingsSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new Error(`Invalid settings file ${filePath}: ${issues.join("; ")}`);
  }
  return applyEnvOverrides(result.data, env);
}

export async function saveSettings(projectRoot: string, settings: TiercfgSettings): Promise<void> {
  const filePath = join(projectRoot, SETTINGS_FILE);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(settings, null, 2), "utf8");
}
