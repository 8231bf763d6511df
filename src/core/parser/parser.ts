import { ParseError, ParserStateError } from "../errors.js";
import { exportToString, exportTree, type TextSink } from "../export/exporter.js";
import { isCommentLine, stripComment, trim } from "../text/normalizer.js";
import { Section } from "../tree/section.js";
import { parseSectionHeader, SECTION_OPEN } from "./header.js";
import { FileLineSource, TextLineSource, type LineSource } from "./source.js";

const ASSIGNMENT = "=";

export interface ParseStats {
  lines: number;
  sections: number;
  values: number;
}

/**
 * Builds a section tree from a line source in one pass.
 *
 * Parsing is eager: the constructor reads the whole source. A string argument
 * is a file path.
 */
export class ConfigParser {
  private readonly rootSection = Section.createRoot();
  private source: LineSource | null = null;
  private lineNumber = 0;
  private stats: ParseStats = { lines: 0, sections: 0, values: 0 };

  constructor(input?: string | LineSource) {
    if (input !== undefined) {
      this.load(input);
    }
  }

  static fromText(text: string, name?: string): ConfigParser {
    return new ConfigParser(new TextLineSource(text, name));
  }

  static fromFile(path: string): ConfigParser {
    return new ConfigParser(path);
  }

  get root(): Section {
    return this.rootSection;
  }

  get summary(): ParseStats {
    return { ...this.stats };
  }

  get isEmpty(): boolean {
    return this.rootSection.valueCount === 0 && this.rootSection.sectionCount === 0;
  }

  load(input: string | LineSource): Section {
    if (!this.isEmpty || this.lineNumber > 0) {
      throw new ParserStateError();
    }

    this.source = typeof input === "string" ? new FileLineSource(input) : input;
    try {
      this.parse(this.source);
    } finally {
      this.releaseSource();
    }
    return this.rootSection;
  }

  clear(): void {
    this.releaseSource();
    this.rootSection.reset();
    this.lineNumber = 0;
    this.stats = { lines: 0, sections: 0, values: 0 };
  }

  export(sink?: TextSink): string {
    if (sink) {
      exportTree(this.rootSection, sink);
      return "";
    }
    return exportToString(this.rootSection);
  }

  private releaseSource(): void {
    const source = this.source;
    this.source = null;
    source?.close();
  }

  private parse(source: LineSource): void {
    let current = this.rootSection;

    for (let raw = source.next(); raw !== null; raw = source.next()) {
      this.lineNumber += 1;

      if (isCommentLine(raw)) {
        continue;
      }
      const line = trim(raw);
      if (!line || isCommentLine(line)) {
        continue;
      }

      if (line.startsWith(SECTION_OPEN)) {
        current = this.openSection(current, line, source.name);
      } else {
        this.assign(current, line, source.name);
      }
    }

    this.stats.lines = this.lineNumber;
  }

  private openSection(current: Section, line: string, sourceName: string): Section {
    const header = parseSectionHeader(line);
    if (!header) {
      throw new ParseError("MalformedSectionHeader", this.lineNumber, sourceName, line);
    }

    if (header.depth > current.depth + 1) {
      throw new ParseError(
        "SectionTooDeep",
        this.lineNumber,
        sourceName,
        `depth ${header.depth} under depth ${current.depth}`,
      );
    }

    let parent = current;
    if (header.depth <= current.depth) {
      const steps = current.depth - header.depth + 1;
      for (let i = 0; i < steps; i += 1) {
        if (!parent.parent) {
          break;
        }
        parent = parent.parent;
      }
    }

    const child = parent.addSection(header.name);
    if (!child) {
      throw new ParseError("DuplicateSectionName", this.lineNumber, sourceName, header.name);
    }
    this.stats.sections += 1;
    return child;
  }

  private assign(current: Section, line: string, sourceName: string): void {
    const index = line.indexOf(ASSIGNMENT);
    if (index === -1) {
      throw new ParseError("MissingAssignment", this.lineNumber, sourceName);
    }

    const key = trim(line.slice(0, index));
    const value = trim(stripComment(trim(line.slice(index + 1))));
    if (!current.insertValue(key, value)) {
      throw new ParseError("DuplicateKey", this.lineNumber, sourceName, key);
    }
    this.stats.values += 1;
  }
}
