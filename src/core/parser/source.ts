import { closeSync, openSync, readSync } from "node:fs";
import { StringDecoder } from "node:string_decoder";
import { ResourceOpenError } from "../errors.js";

export interface LineSource {
  readonly name: string;
  /** Next line without its terminator, or null once the input is exhausted. */
  next(): string | null;
  close(): void;
}

/** LF, CRLF and a lone CR all end a line. */
const LINE_BREAK = /\r\n|\n|\r/;

export class TextLineSource implements LineSource {
  private readonly lines: string[];
  private index = 0;

  constructor(
    text: string,
    readonly name = "<text>",
  ) {
    this.lines = text.split(LINE_BREAK);
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] === "") {
      this.lines.pop();
    }
  }

  next(): string | null {
    if (this.index >= this.lines.length) {
      return null;
    }
    const line = this.lines[this.index] ?? "";
    this.index += 1;
    return line;
  }

  close(): void {
    this.index = this.lines.length;
  }
}

export interface FileLineSourceOptions {
  chunkSize?: number;
}

const DEFAULT_CHUNK_SIZE = 64 * 1024;

function openForReading(path: string): number {
  try {
    return openSync(path, "r");
  } catch (error) {
    throw new ResourceOpenError(path, error);
  }
}

export class FileLineSource implements LineSource {
  private fd: number | null;
  private readonly decoder = new StringDecoder("utf8");
  private readonly chunk: Buffer;
  private pending = "";
  private queue: string[] = [];
  private exhausted = false;

  constructor(
    readonly name: string,
    options: FileLineSourceOptions = {},
  ) {
    this.fd = openForReading(name);
    this.chunk = Buffer.alloc(Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE));
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  next(): string | null {
    while (this.queue.length === 0) {
      if (this.exhausted) {
        return null;
      }
      this.fill();
    }
    return this.queue.shift() ?? null;
  }

  close(): void {
    this.release();
    this.queue = [];
    this.pending = "";
  }

  private release(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
    this.exhausted = true;
  }

  private fill(): void {
    if (this.fd === null) {
      this.exhausted = true;
      return;
    }

    const bytesRead = this.read(this.fd);
    if (bytesRead === 0) {
      const parts = (this.pending + this.decoder.end()).split(LINE_BREAK);
      this.pending = "";
      if (parts[parts.length - 1] === "") {
        parts.pop();
      }
      this.queue.push(...parts);
      this.release();
      return;
    }

    const text = this.pending + this.decoder.write(this.chunk.subarray(0, bytesRead));
    // A CR at the end of a chunk may be the first half of a CRLF.
    const cut = text.endsWith("\r") ? text.length - 1 : text.length;
    const parts = text.slice(0, cut).split(LINE_BREAK);
    this.pending = (parts.pop() ?? "") + text.slice(cut);
    this.queue.push(...parts);
  }

  /** Read failures (a directory opened by path, for one) surface as open failures of the named file. */
  private read(fd: number): number {
    try {
      return readSync(fd, this.chunk, 0, this.chunk.length, null);
    } catch (error) {
      this.release();
      throw new ResourceOpenError(this.name, error);
    }
  }
}
