export { ConfigParser, type ParseStats } from "./core/parser/parser.js";
export { parseSectionHeader, SECTION_CLOSE, SECTION_OPEN, type SectionHeader } from "./core/parser/header.js";
export { FileLineSource, TextLineSource, type FileLineSourceOptions, type LineSource } from "./core/parser/source.js";
export { Section } from "./core/tree/section.js";
export { isCommentLine, stripComment, trim } from "./core/text/normalizer.js";
export {
  exportToFile,
  exportToString,
  exportTree,
  StringSink,
  toRecord,
  type SectionRecord,
  type ValueRecord,
  type TextSink,
} from "./core/export/exporter.js";
export {
  CAST_TYPES,
  SCALAR_TYPES,
  cast,
  formatCastValue,
  isCastType,
  isScalarType,
  splitArray,
  toBool,
  toDouble,
  toFloat,
  toInt,
  toLong,
  toUlong,
  type ArrayType,
  type CastOptions,
  type CastResult,
  type CastType,
  type CastValue,
  type ScalarType,
} from "./core/cast/caster.js";
export {
  CastError,
  isParseError,
  LookupError,
  ParseError,
  ParserStateError,
  ResourceOpenError,
  TiercfgError,
  type CastErrorKind,
  type LookupErrorKind,
  type ParseErrorKind,
  type TiercfgErrorKind,
} from "./core/errors.js";
export { parseSectionPath, readValue, type ReadValueRequest } from "./core/query/resolve.js";
