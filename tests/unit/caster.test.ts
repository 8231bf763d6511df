import { describe, expect, test } from "vitest";
import {
  CAST_TYPES,
  cast,
  formatCastValue,
  isCastType,
  splitArray,
  toBool,
  toDouble,
  toFloat,
  toInt,
  toLong,
  toUlong,
} from "../../src/core/cast/caster.js";
import { CastError } from "../../src/core/errors.js";
import { ConfigParser } from "../../src/core/parser/parser.js";
import { captureError, SAMPLE_CONFIG } from "../helpers/capture.js";

describe("scalar casts", () => {
  test("integers ignore whitespace and reject other content", () => {
    expect(toInt(" 4 2 ")).toBe(42);
    expect(toInt("-17")).toBe(-17);
    expect(toInt("+8")).toBe(8);
    expect(toInt("-2147483648")).toBe(-2147483648);
    expect(toInt("-0")).toBe(0);
    expect(() => toInt("12abc")).toThrow(CastError);
    expect(() => toInt("2147483648")).toThrow(CastError);
    expect(() => toInt("")).toThrow(CastError);
    expect(captureError(() => toInt("1.5"))).toMatchObject({ kind: "NotANumber", value: "1.5", type: "int" });
  });

  test("wide integers use bigint", () => {
    expect(toLong("9223372036854775807")).toBe(9223372036854775807n);
    expect(toLong("-5")).toBe(-5n);
    expect(() => toLong("9223372036854775808")).toThrow(CastError);
  });

  test("unsigned integers reject a leading minus instead of wrapping", () => {
    expect(toUlong("18446744073709551615")).toBe(18446744073709551615n);
    expect(toUlong("+3")).toBe(3n);
    expect(captureError(() => toUlong("-1"))).toMatchObject({ kind: "NotANumber", type: "ulong" });
    expect(() => toUlong("18446744073709551616")).toThrow(CastError);
  });

  test("floating point accepts decimal literals with sign and exponent", () => {
    expect(toDouble("  3.0  ")).toBe(3.0);
    expect(toDouble("-1.5e2")).toBe(-150);
    expect(toDouble(".5")).toBe(0.5);
    expect(toDouble("5.")).toBe(5);
    expect(toFloat("  3.0  ")).toBe(3.0);
    expect(toFloat("0.1")).toBe(Math.fround(0.1));
    expect(() => toDouble("abc")).toThrow(CastError);
    expect(() => toDouble("inf")).toThrow(CastError);
    expect(() => toDouble("1e999")).toThrow(CastError);
    expect(() => toFloat("1e39")).toThrow(CastError);
  });

  test("booleans match the exact literal true only", () => {
    expect(toBool("true")).toBe(true);
    expect(toBool("True")).toBe(false);
    expect(toBool("false")).toBe(false);
    expect(toBool(" tr ue ")).toBe(true);
    expect(toBool("yes")).toBe(false);
  });

  test("strict booleans reject tokens other than true and false", () => {
    expect(toBool("false", { strictBooleans: true })).toBe(false);
    expect(toBool("true", { strictBooleans: true })).toBe(true);
    expect(captureError(() => toBool("True", { strictBooleans: true }))).toMatchObject({
      kind: "NotABoolean",
      value: "True",
    });
  });
});

describe("array casts", () => {
  test("splits brace-delimited values", () => {
    expect(splitArray("{3, 4, 5}", "int[]")).toEqual(["3", "4", "5"]);
    expect(splitArray(" { a , b , } ", "bool[]")).toEqual(["a", "b"]);
    expect(splitArray("{}", "int[]")).toEqual([]);
  });

  test("drops empty tokens wherever they appear", () => {
    expect(splitArray("{,1}", "int[]")).toEqual(["1"]);
    expect(splitArray("{1,,2}", "int[]")).toEqual(["1", "2"]);
    expect(splitArray("{ , ,}", "int[]")).toEqual([]);
    expect(cast("{,1}", "int[]")).toEqual([1]);
    expect(cast("{1, , 2}", "int[]")).toEqual([1, 2]);
  });

  test("casts each element in order", () => {
    expect(cast("{3, 4, 5}", "int[]")).toEqual([3, 4, 5]);
    expect(cast("{1, 2,}", "long[]")).toEqual([1n, 2n]);
    expect(cast("{1.5, -2e2}", "double[]")).toEqual([1.5, -200]);
    expect(cast("{true, false, True}", "bool[]")).toEqual([true, false, false]);
    expect(cast("{0.1}", "float[]")).toEqual([Math.fround(0.1)]);
  });

  test("rejects values that are not wrapped in braces", () => {
    for (const value of ["", "{", "}", "1,2", "{1,2", "1,2}", "[1,2]"]) {
      expect(captureError(() => cast(value, "int[]"))).toMatchObject({ kind: "MalformedArray", type: "int[]" });
    }
  });

  test("rejects elements that fail the scalar cast", () => {
    expect(captureError(() => cast("{1, x}", "double[]"))).toMatchObject({ kind: "NotANumber", value: "x" });
    expect(captureError(() => cast("{-1}", "ulong[]"))).toMatchObject({ kind: "NotANumber", type: "ulong" });
  });
});

describe("cast", () => {
  test("dispatches on the requested type", () => {
    const ints: number[] = cast("{1, 2}", "int[]");
    const flag: boolean = cast("true", "bool");
    const big: bigint = cast("7", "ulong");

    expect(ints).toEqual([1, 2]);
    expect(flag).toBe(true);
    expect(big).toBe(7n);
  });

  test("reads typed values out of a parsed tree", () => {
    const d = ConfigParser.fromText(SAMPLE_CONFIG).root.at("e", "d");

    expect(cast(d.get("da"), "double")).toBe(3.0);
    expect(cast(d.get("db"), "int[]")).toEqual([3, 4, 5]);
  });

  test("knows every scalar and array type", () => {
    expect(CAST_TYPES).toEqual([
      "int",
      "long",
      "ulong",
      "float",
      "double",
      "bool",
      "int[]",
      "long[]",
      "ulong[]",
      "float[]",
      "double[]",
      "bool[]",
    ]);
    expect(isCastType("double[]")).toBe(true);
    expect(isCastType("string")).toBe(false);
  });

  test("formats results for display", () => {
    expect(formatCastValue([3, 4, 5])).toBe("{3, 4, 5}");
    expect(formatCastValue([1n, 2n])).toBe("{1, 2}");
    expect(formatCastValue(true)).toBe("true");
    expect(formatCastValue(2.5)).toBe("2.5");
  });
});
