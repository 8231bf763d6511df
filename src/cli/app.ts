import { isAbsolute, join } from "node:path";
import { AuditLogger } from "../core/audit/logger.js";
import { TiercfgError } from "../core/errors.js";
import { toRecord } from "../core/export/exporter.js";
import { ConfigParser } from "../core/parser/parser.js";
import { parseSectionPath, readValue } from "../core/query/resolve.js";
import { redactConfigText } from "../core/security/redaction.js";
import { createDefaultSettings, loadSettings, type TiercfgSettings } from "../core/settings/store.js";

export const EXIT_SIGNAL = "__EXIT__";

const DEFAULT_AUDIT_LINES = 20;

export class TiercfgApp {
  private settings: TiercfgSettings = createDefaultSettings();
  private readonly audit: AuditLogger;
  private readonly parser = new ConfigParser();
  private loadedPath: string | null = null;

  constructor(private readonly projectRoot: string) {
    this.audit = new AuditLogger(projectRoot);
  }

  async init(): Promise<void> {
    this.settings = await loadSettings(this.projectRoot);
    this.audit.setEnabled(this.settings.audit.enabled);
  }

  get currentSettings(): TiercfgSettings {
    return this.settings;
  }

  async run(rawInput: string): Promise<string> {
    const input = rawInput.trim();
    if (!input) {
      return "";
    }

    const [command = "", ...args] = input.split(/\s+/);
    let result = "";

    try {
      switch (command) {
        case "/help":
          result = this.help();
          break;
        case "/load":
          result = await this.load(args);
          break;
        case "/sections":
          result = this.listSections(args);
          break;
        case "/keys":
          result = this.listKeys(args);
          break;
        case "/get":
          result = this.get(args);
          break;
        case "/export":
          result = this.exportTree(args);
          break;
        case "/clear":
          result = await this.clear();
          break;
        case "/settings":
          result = JSON.stringify(this.settings, null, 2);
          break;
        case "/audit":
          result = await this.auditCommand(args);
          break;
        case "/exit":
          result = EXIT_SIGNAL;
          break;
        default:
          result = `Unknown command: ${command}. Try /help`;
          break;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      const kind = error instanceof TiercfgError ? error.kind : undefined;
      await this.audit.error("command.failed", message, { command, args, kind });
      result = `Error: ${message}`;
    }

    return result;
  }

  private help(): string {
    return [
      "Commands:",
      "/help",
      "/load <file>",
      "/sections [path]",
      "/keys [path]",
      "/get <path|.> <key> [type]",
      "/export [--json]",
      "/clear",
      "/settings",
      "/audit prune [--days N]",
      "/audit show [N]",
      "/exit",
    ].join("\n");
  }

  private requireLoaded(): void {
    if (!this.loadedPath) {
      throw new Error("No configuration loaded. Use /load <file>");
    }
  }

  private async load(args: string[]): Promise<string> {
    const [target] = args;
    if (!target) {
      return "Usage: /load <file>";
    }

    const path = isAbsolute(target) ? target : join(this.projectRoot, target);
    this.parser.clear();
    this.loadedPath = null;
    this.parser.load(path);
    this.loadedPath = path;

    const stats = this.parser.summary;
    await this.audit.info("config.loaded", `Loaded ${target}`, { ...stats });
    return `Loaded ${target}: ${stats.sections} sections, ${stats.values} values`;
  }

  private listSections(args: string[]): string {
    this.requireLoaded();
    const section = this.parser.root.at(...parseSectionPath(args[0]));
    const names = section.sectionNames();
    return names.length > 0 ? names.join("\n") : "(no sections)";
  }

  private listKeys(args: string[]): string {
    this.requireLoaded();
    const section = this.parser.root.at(...parseSectionPath(args[0]));
    const keys = section.keys();
    return keys.length > 0 ? keys.join("\n") : "(no keys)";
  }

  private get(args: string[]): string {
    this.requireLoaded();
    const [path, key, type] = args;
    if (!path || !key) {
      return "Usage: /get <path|.> <key> [type]";
    }
    return readValue(this.parser.root, { path, key, type }, { strictBooleans: this.settings.strictBooleans });
  }

  private exportTree(args: string[]): string {
    this.requireLoaded();
    if (args.includes("--json")) {
      return JSON.stringify(toRecord(this.parser.root), null, 2);
    }
    const text = this.parser.export().trimEnd();
    return this.settings.export.redactSecrets ? redactConfigText(text) : text;
  }

  private async clear(): Promise<string> {
    this.parser.clear();
    const previous = this.loadedPath;
    this.loadedPath = null;
    await this.audit.info("config.cleared", "Configuration cleared", { path: previous });
    return "Cleared";
  }

  private async auditCommand(args: string[]): Promise<string> {
    const [action, ...rest] = args;
    switch (action) {
      case "prune":
        return this.pruneAudit(rest);
      case "show":
        return this.showAudit(rest);
      default:
        return "Usage: /audit prune [--days N] | /audit show [N]";
    }
  }

  private async pruneAudit(args: string[]): Promise<string> {
    const [maybeDaysFlag, maybeDaysValue] = args;
    let days = this.settings.audit.retentionDays;
    if (maybeDaysFlag === "--days" && maybeDaysValue) {
      days = Number.parseInt(maybeDaysValue, 10);
    }
    if (!Number.isFinite(days) || days <= 0) {
      throw new Error("--days must be a positive integer");
    }

    const removed = await this.audit.prune(days);
    await this.audit.info("audit.prune", "Audit files pruned", { days, removed });
    return `Audit prune complete. removed=${removed}`;
  }

  private async showAudit(args: string[]): Promise<string> {
    const limit = args[0] ? Number.parseInt(args[0], 10) : DEFAULT_AUDIT_LINES;
    if (!Number.isFinite(limit) || limit <= 0) {
      throw new Error("N must be a positive integer");
    }

    const events = await this.audit.recent(limit);
    if (events.length === 0) {
      return "(no audit events today)";
    }
    return events.map((event) => `${event.ts} ${event.level} ${event.kind} ${event.message}`).join("\n");
  }
}
