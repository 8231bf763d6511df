import { CastError } from "../errors.js";

export const SCALAR_TYPES = ["int", "long", "ulong", "float", "double", "bool"] as const;
export type ScalarType = (typeof SCALAR_TYPES)[number];
export type ArrayType = `${ScalarType}[]`;
export type CastType = ScalarType | ArrayType;

export const CAST_TYPES: readonly CastType[] = [...SCALAR_TYPES, ...SCALAR_TYPES.map((type): ArrayType => `${type}[]`)];

interface ScalarResults {
  int: number;
  long: bigint;
  ulong: bigint;
  float: number;
  double: number;
  bool: boolean;
}

export type CastResult<T extends CastType> = T extends ScalarType
  ? ScalarResults[T]
  : T extends `${infer S extends ScalarType}[]`
    ? ScalarResults[S][]
    : never;

export type CastValue = number | bigint | boolean | Array<number | bigint | boolean>;

export interface CastOptions {
  /** Reject boolean tokens other than `true` and `false` instead of reading them as false. */
  strictBooleans?: boolean;
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

const SIGNED_INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\+?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const ARRAY_OPEN = "{";
const ARRAY_CLOSE = "}";
const ARRAY_SEPARATOR = ",";

export function stripWhitespace(value: string): string {
  return value.replace(/\s+/g, "");
}

export function isCastType(value: string): value is CastType {
  return CAST_TYPES.some((type) => type === value);
}

export function isScalarType(value: string): value is ScalarType {
  return SCALAR_TYPES.some((type) => type === value);
}

export function toInt(value: string): number {
  const text = stripWhitespace(value);
  if (!SIGNED_INTEGER.test(text)) {
    throw new CastError("NotANumber", value, "int");
  }
  const parsed = Number.parseInt(text, 10);
  if (parsed < INT32_MIN || parsed > INT32_MAX) {
    throw new CastError("NotANumber", value, "int");
  }
  // "-0" reads as 0
  return parsed + 0;
}

export function toLong(value: string): bigint {
  const text = stripWhitespace(value);
  if (!SIGNED_INTEGER.test(text)) {
    throw new CastError("NotANumber", value, "long");
  }
  const parsed = BigInt(text);
  if (parsed < INT64_MIN || parsed > INT64_MAX) {
    throw new CastError("NotANumber", value, "long");
  }
  return parsed;
}

/** Negative input is rejected rather than wrapped. */
export function toUlong(value: string): bigint {
  const text = stripWhitespace(value);
  if (!UNSIGNED_INTEGER.test(text)) {
    throw new CastError("NotANumber", value, "ulong");
  }
  const parsed = BigInt(text);
  if (parsed > UINT64_MAX) {
    throw new CastError("NotANumber", value, "ulong");
  }
  return parsed;
}

export function toDouble(value: string): number {
  const text = stripWhitespace(value);
  const parsed = DECIMAL.test(text) ? Number(text) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new CastError("NotANumber", value, "double");
  }
  return parsed;
}

export function toFloat(value: string): number {
  const text = stripWhitespace(value);
  const parsed = DECIMAL.test(text) ? Math.fround(Number(text)) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new CastError("NotANumber", value, "float");
  }
  return parsed;
}

export function toBool(value: string, options: CastOptions = {}): boolean {
  const text = stripWhitespace(value);
  if (text === "true") {
    return true;
  }
  if (options.strictBooleans && text !== "false") {
    throw new CastError("NotABoolean", value, "bool");
  }
  return false;
}

/** Splits `{a, b, c}` into its tokens; whitespace and empty tokens are dropped. */
export function splitArray(value: string, type: ArrayType): string[] {
  const text = value.trim();
  if (text.length < 2 || !text.startsWith(ARRAY_OPEN) || !text.endsWith(ARRAY_CLOSE)) {
    throw new CastError("MalformedArray", value, type);
  }

  const body = stripWhitespace(text.slice(1, -1));
  return body.split(ARRAY_SEPARATOR).filter((token) => token.length > 0);
}

function castScalar<S extends ScalarType>(value: string, type: S, options: CastOptions): ScalarResults[S];
function castScalar(value: string, type: ScalarType, options: CastOptions): ScalarResults[ScalarType] {
  switch (type) {
    case "int":
      return toInt(value);
    case "long":
      return toLong(value);
    case "ulong":
      return toUlong(value);
    case "float":
      return toFloat(value);
    case "double":
      return toDouble(value);
    case "bool":
      return toBool(value, options);
  }
}

function castArray<S extends ScalarType>(value: string, type: S, options: CastOptions): ScalarResults[S][] {
  return splitArray(value, `${type}[]`).map((token) => castScalar(token, type, options));
}

export function cast<T extends CastType>(value: string, type: T, options?: CastOptions): CastResult<T>;
export function cast(value: string, type: CastType, options: CastOptions = {}): CastValue {
  if (isScalarType(type)) {
    return castScalar(value, type, options);
  }
  const scalar = type.slice(0, -2);
  if (!isScalarType(scalar)) {
    throw new CastError("MalformedArray", value, type);
  }
  return castArray(value, scalar, options);
}

export function formatCastValue(value: CastValue): string {
  if (Array.isArray(value)) {
    return `{${value.map((item) => String(item)).join(", ")}}`;
  }
  return String(value);
}
