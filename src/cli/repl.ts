import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { EXIT_SIGNAL, TiercfgApp } from "./app.js";

function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const withCode = error as Error & { code?: string };
  return error.name === "AbortError" || withCode.code === "ABORT_ERR";
}

export async function startRepl(projectRoot: string, initialFile?: string): Promise<void> {
  const app = new TiercfgApp(projectRoot);
  await app.init();

  const rl = createInterface({ input, output });
  output.write("tiercfg> Type /help for commands\n");

  if (initialFile) {
    output.write(`${await app.run(`/load ${initialFile}`)}\n`);
  }

  try {
    while (true) {
      let line = "";
      try {
        line = await rl.question("tiercfg> ");
      } catch (error) {
        if (isAbortError(error)) {
          output.write("\n");
          break;
        }
        throw error;
      }

      const result = await app.run(line);

      if (result === EXIT_SIGNAL) {
        break;
      }

      if (result) {
        output.write(`${result}\n`);
      }
    }
  } finally {
    rl.close();
  }
}
