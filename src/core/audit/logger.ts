import { appendFile, mkdir, readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { auditEventSchema, type AuditEvent, type AuditKind, type AuditLevel } from "../../contracts/audit.js";
import { redactSecrets, sanitizeData } from "../security/redaction.js";

export interface AuditLoggerOptions {
  enabled?: boolean;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const FILE_SUFFIX = ".jsonl";

function dayFileName(date: Date): string {
  return `${date.toISOString().slice(0, 10)}${FILE_SUFFIX}`;
}

export function auditDir(projectRoot: string): string {
  return join(projectRoot, ".tiercfg", "audit");
}

export type { AuditEvent, AuditKind, AuditLevel };

/** One JSONL file per UTC day under `.tiercfg/audit`. */
export class AuditLogger {
  private enabled: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly projectRoot: string,
    options: AuditLoggerOptions = {},
  ) {
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  get filePath(): string {
    return join(auditDir(this.projectRoot), dayFileName(this.now()));
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  info(kind: AuditKind, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.record("info", kind, message, data);
  }

  warn(kind: AuditKind, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.record("warn", kind, message, data);
  }

  error(kind: AuditKind, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.record("error", kind, message, data);
  }

  /** Today's events, oldest first, at most `limit` of the latest. */
  async recent(limit: number): Promise<AuditEvent[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const events: AuditEvent[] = [];
    for (const line of text.split("\n")) {
      if (line.trim()) {
        events.push(auditEventSchema.parse(JSON.parse(line)));
      }
    }
    return limit > 0 ? events.slice(-limit) : [];
  }

  async prune(days: number): Promise<number> {
    const dir = auditDir(this.projectRoot);
    await mkdir(dir, { recursive: true });
    const cutoff = this.now().getTime() - days * DAY_MS;
    let removed = 0;

    for (const file of await readdir(dir)) {
      if (!file.endsWith(FILE_SUFFIX)) {
        continue;
      }
      const ts = Date.parse(`${file.slice(0, -FILE_SUFFIX.length)}T00:00:00.000Z`);
      if (Number.isNaN(ts) || ts >= cutoff) {
        continue;
      }
      await rm(join(dir, file), { force: true });
      removed += 1;
    }

    return removed;
  }

  private async record(
    level: AuditLevel,
    kind: AuditKind,
    message: string,
    data?: Record<string, unknown>,
  ): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const event: AuditEvent = {
      ts: this.now().toISOString(),
      level,
      kind,
      message: redactSecrets(message),
      data: data ? sanitizeData(data) : undefined,
    };

    await mkdir(auditDir(this.projectRoot), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(event)}\n`, "utf8");
  }
}
