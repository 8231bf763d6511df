import { Command } from "commander";
import { cwd } from "node:process";
import { TiercfgError, ResourceOpenError } from "../core/errors.js";
import { toRecord } from "../core/export/exporter.js";
import { ConfigParser } from "../core/parser/parser.js";
import { readValue } from "../core/query/resolve.js";
import { redactConfigText } from "../core/security/redaction.js";
import { loadSettings } from "../core/settings/store.js";
import { EXIT_SIGNAL, TiercfgApp } from "./app.js";
import { startRepl } from "./repl.js";

export const EXIT_CODES = {
  usage: 1,
  invalid: 2,
} as const;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function exitCodeFor(error: unknown): number {
  if (error instanceof TiercfgError && !(error instanceof ResourceOpenError)) {
    return EXIT_CODES.invalid;
  }
  return EXIT_CODES.usage;
}

function withErrorHandling<A extends unknown[]>(io: CliIo, action: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.stderr(`Error: ${message}\n`);
      process.exitCode = exitCodeFor(error);
    }
  };
}

export function buildProgram(projectRoot: string, io: CliIo = defaultIo): Command {
  const program = new Command();
  program.name("tiercfg").description("Parse, query and re-export nested bracket configuration files");

  program
    .command("check")
    .description("Parse a file and report its shape")
    .argument("<file>")
    .action(
      withErrorHandling(io, async (file: string) => {
        const parser = ConfigParser.fromFile(file);
        const { sections, values } = parser.summary;
        io.stdout(`OK ${file}: ${sections} sections, ${values} values\n`);
      }),
    );

  program
    .command("export")
    .description("Print a file back in canonical form")
    .argument("<file>")
    .option("--json", "print the tree as JSON")
    .option("--redact", "mask secret-looking values")
    .action(
      withErrorHandling(io, async (file: string, options: { json?: boolean; redact?: boolean }) => {
        const settings = await loadSettings(projectRoot);
        const parser = ConfigParser.fromFile(file);
        if (options.json) {
          io.stdout(`${JSON.stringify(toRecord(parser.root), null, 2)}\n`);
          return;
        }
        const text = parser.export();
        io.stdout(options.redact || settings.export.redactSecrets ? redactConfigText(text) : text);
      }),
    );

  program
    .command("get")
    .description("Print one value, optionally cast to a type")
    .argument("<file>")
    .argument("<key>")
    .option("-s, --section <path>", "section path, names joined by /")
    .option("-t, --type <type>", "int, long, ulong, float, double, bool or an array form such as int[]")
    .action(
      withErrorHandling(io, async (file: string, key: string, options: { section?: string; type?: string }) => {
        const settings = await loadSettings(projectRoot);
        const parser = ConfigParser.fromFile(file);
        const value = readValue(
          parser.root,
          { path: options.section, key, type: options.type },
          { strictBooleans: settings.strictBooleans },
        );
        io.stdout(`${value}\n`);
      }),
    );

  program
    .command("repl")
    .description("Start interactive REPL")
    .argument("[file]")
    .action(async (file?: string) => {
      await startRepl(projectRoot, file);
    });

  return program;
}

export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<void> {
  const projectRoot = cwd();

  if (argv[2] === "run") {
    const app = new TiercfgApp(projectRoot);
    await app.init();
    for (const line of argv.slice(3).join(" ").split(";;")) {
      const output = await app.run(line);
      if (output && output !== EXIT_SIGNAL) {
        io.stdout(`${output}\n`);
      }
    }
    return;
  }

  if (argv.length <= 2) {
    await startRepl(projectRoot);
    return;
  }

  await buildProgram(projectRoot, io).parseAsync(argv);
}
