import { closeSync, openSync, writeSync } from "node:fs";
import { SECTION_CLOSE, SECTION_OPEN } from "../parser/header.js";
import type { Section } from "../tree/section.js";

export interface TextSink {
  write(chunk: string): void;
}

export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

export function exportTree(root: Section, sink: TextSink): void {
  const pending: Section[] = [root];

  while (pending.length > 0) {
    const section = pending.pop();
    if (!section) {
      break;
    }

    if (!section.isRoot) {
      sink.write(`\n${SECTION_OPEN.repeat(section.depth)}${section.name}${SECTION_CLOSE.repeat(section.depth)}\n`);
    }
    for (const [key, value] of section.entries()) {
      sink.write(`${key}=${value}\n`);
    }

    const children = [...section.sections()];
    for (let i = children.length - 1; i >= 0; i -= 1) {
      const child = children[i];
      if (child) {
        pending.push(child);
      }
    }
  }
}

export function exportToString(root: Section): string {
  const sink = new StringSink();
  exportTree(root, sink);
  return sink.toString();
}

export function exportToFile(root: Section, path: string): void {
  const fd = openSync(path, "w");
  try {
    exportTree(root, {
      write(chunk: string) {
        writeSync(fd, chunk, null, "utf8");
      },
    });
  } finally {
    closeSync(fd);
  }
}

export interface ValueRecord {
  key: string;
  value: string;
}

/** JSON view of a section; arrays keep insertion order and allow any key text. */
export interface SectionRecord {
  name: string;
  depth: number;
  values: ValueRecord[];
  sections: SectionRecord[];
}

export function toRecord(section: Section): SectionRecord {
  return {
    name: section.name,
    depth: section.depth,
    values: [...section.entries()].map(([key, value]) => ({ key, value })),
    sections: [...section.sections()].map((child) => toRecord(child)),
  };
}
