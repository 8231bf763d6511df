import { afterEach, describe, expect, test } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildProgram, EXIT_CODES, type CliIo } from "../../src/cli/main.js";
import { SAMPLE_CONFIG } from "../helpers/capture.js";

interface Captured extends CliIo {
  out: string[];
  err: string[];
}

function captureIo(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

async function runCommand(root: string, args: string[]): Promise<Captured> {
  const io = captureIo();
  await buildProgram(root, io).parseAsync(["node", "tiercfg", ...args]);
  return io;
}

async function fixture(prefix: string, config = SAMPLE_CONFIG): Promise<{ root: string; file: string }> {
  const root = await mkdtemp(join(tmpdir(), prefix));
  const file = join(root, "app.cfg");
  await writeFile(file, config, "utf8");
  return { root, file };
}

describe("cli", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  test("check reports the shape of a file", async () => {
    const { root, file } = await fixture("tiercfg-cli-check-");
    const io = await runCommand(root, ["check", file]);
    expect(io.out).toEqual([`OK ${file}: 2 sections, 4 values\n`]);
  });

  test("get prints raw and cast values", async () => {
    const { root, file } = await fixture("tiercfg-cli-get-");

    expect((await runCommand(root, ["get", file, "a"])).out).toEqual(["1\n"]);
    expect((await runCommand(root, ["get", file, "db", "-s", "e/d", "-t", "int[]"])).out).toEqual(["{3, 4, 5}\n"]);
    expect((await runCommand(root, ["get", file, "da", "--section", "e/d", "--type", "float"])).out).toEqual(["3\n"]);
  });

  test("export prints canonical text, JSON or redacted text", async () => {
    const { root, file } = await fixture("tiercfg-cli-export-", "token=test-token\n[s]\nk=v\n");

    expect((await runCommand(root, ["export", file])).out).toEqual(["token=test-token\n\n[s]\nk=v\n"]);
    expect((await runCommand(root, ["export", file, "--redact"])).out).toEqual(["token=<redacted>\n\n[s]\nk=v\n"]);

    const json = (await runCommand(root, ["export", file, "--json"])).out.join("");
    expect(JSON.parse(json)).toEqual({
      name: "",
      depth: 0,
      values: [{ key: "token", value: "test-token" }],
      sections: [{ name: "s", depth: 1, values: [{ key: "k", value: "v" }], sections: [] }],
    });
  });

  test("parse errors exit with the invalid code", async () => {
    const { root, file } = await fixture("tiercfg-cli-invalid-", "[a]\n[a]\n");
    const io = await runCommand(root, ["check", file]);

    expect(io.err).toEqual(["Error: duplicate section name at this level: a on line #2\n"]);
    expect(process.exitCode).toBe(EXIT_CODES.invalid);
  });

  test("missing files exit with the usage code", async () => {
    const root = await mkdtemp(join(tmpdir(), "tiercfg-cli-missing-"));
    const file = join(root, "missing.cfg");
    const io = await runCommand(root, ["check", file]);

    expect(io.out).toEqual([]);
    expect(io.err[0]?.startsWith(`Error: failed to open file: ${file}`)).toBe(true);
    expect(process.exitCode).toBe(EXIT_CODES.usage);
  });
});
