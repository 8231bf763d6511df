export type ParseErrorKind =
  | "SectionTooDeep"
  | "DuplicateSectionName"
  | "DuplicateKey"
  | "MissingAssignment"
  | "MalformedSectionHeader";

export type CastErrorKind = "NotANumber" | "NotABoolean" | "MalformedArray";

export type LookupErrorKind = "KeyNotFound" | "SectionNotFound";

export type TiercfgErrorKind =
  | "ResourceOpenFailed"
  | "ParserNotEmpty"
  | ParseErrorKind
  | CastErrorKind
  | LookupErrorKind;

export class TiercfgError extends Error {
  constructor(
    readonly kind: TiercfgErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "TiercfgError";
  }
}

export class ResourceOpenError extends TiercfgError {
  constructor(
    readonly resource: string,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super("ResourceOpenFailed", `failed to open file: ${resource}${reason}`);
    this.name = "ResourceOpenError";
  }
}

export class ParserStateError extends TiercfgError {
  constructor() {
    super("ParserNotEmpty", "Parser already holds a configuration; call clear() first.");
    this.name = "ParserStateError";
  }
}

const PARSE_MESSAGES: Record<ParseErrorKind, string> = {
  SectionTooDeep: "section depth too deep",
  DuplicateSectionName: "duplicate section name at this level",
  DuplicateKey: "duplicate key",
  MissingAssignment: "missing assignment operator '='",
  MalformedSectionHeader: "malformed section header",
};

export class ParseError extends TiercfgError {
  constructor(
    override readonly kind: ParseErrorKind,
    readonly line: number,
    readonly source: string,
    detail?: string,
  ) {
    const label = detail ? `${PARSE_MESSAGES[kind]}: ${detail}` : PARSE_MESSAGES[kind];
    super(kind, `${label} on line #${line}`);
    this.name = "ParseError";
  }
}

export class CastError extends TiercfgError {
  constructor(
    override readonly kind: CastErrorKind,
    readonly value: string,
    readonly type: string,
  ) {
    const label = kind === "MalformedArray" ? "malformed array" : kind === "NotABoolean" ? "not a boolean" : "not a number";
    super(kind, `Cannot cast "${value}" to ${type}: ${label}`);
    this.name = "CastError";
  }
}

export class LookupError extends TiercfgError {
  constructor(
    override readonly kind: LookupErrorKind,
    readonly target: string,
    readonly section: string,
  ) {
    const what = kind === "KeyNotFound" ? "Key" : "Section";
    super(kind, `${what} not found: ${target} in ${section}`);
    this.name = "LookupError";
  }
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}
