/**
 * Test suite for utility functions
 */

import { describe, it, expect } from "@jest/globals";
import {
  formatInputs,
  formatValue,
  isCallable,
  isClassDeclaration,
  isConstructor,
  isPlainObject,
  normalize,
  snapshotValue,
} from "../tooling/lib/utils";

describe("Utility Functions", () => {
  describe("normalize", () => {
    it("should trim whitespace", () => {
      expect(normalize("  test  ")).toBe("test");
    });

    it("should collapse multiple spaces", () => {
      expect(normalize("test   string")).toBe("test string");
    });

    it("should handle tabs and newlines", () => {
      expect(normalize("test\t\nstring")).toBe("test string");
    });
  });

  describe("isPlainObject", () => {
    it("should accept object literals and null-prototype objects", () => {
      expect(isPlainObject({ a: 1 })).toBe(true);
      expect(isPlainObject(Object.create(null))).toBe(true);
    });

    it("should reject arrays, class instances and primitives", () => {
      expect(isPlainObject([1])).toBe(false);
      expect(isPlainObject(new Map())).toBe(false);
      expect(isPlainObject(new (class Point {})())).toBe(false);
      expect(isPlainObject(null)).toBe(false);
      expect(isPlainObject("text")).toBe(false);
    });
  });

  describe("formatValue", () => {
    it("should print strings quoted and numbers plainly", () => {
      expect(formatValue("abc")).toBe("'abc'");
      expect(formatValue(-100)).toBe("-100");
      expect(formatValue(null)).toBe("null");
    });

    it("should print inputs as a bracketed list", () => {
      expect(formatInputs([1, "a", true])).toBe("[1, 'a', true]");
      expect(formatInputs([])).toBe("[]");
    });
  });

  describe("snapshotValue", () => {
    it("should copy nested arrays and objects", () => {
      const original = { list: [1, 2], nested: { flag: true } };
      const copy = snapshotValue(original);
      original.list.push(3);
      original.nested.flag = false;

      expect(copy).toEqual({ list: [1, 2], nested: { flag: true } });
    });

    it("should copy maps", () => {
      const original = new Map([["k", [1]]]);
      const copy = snapshotValue(original);
      original.get("k")?.push(2);

      expect(copy).toEqual(new Map([["k", [1]]]));
    });

    it("should copy sets", () => {
      const original = new Set([1, 2]);
      const copy = snapshotValue(original);
      original.add(3);

      expect(copy).toEqual(new Set([1, 2]));
    });

    it("should keep class instances by reference", () => {
      const date = new Date(0);
      expect(snapshotValue(date)).toBe(date);
    });
  });

  describe("callable guards", () => {
    class Shape {}
    function legacy(this: unknown): void {}
    const arrow = (): number => 1;

    it("should tell classes from other functions", () => {
      expect(isClassDeclaration(Shape)).toBe(true);
      expect(isClassDeclaration(legacy)).toBe(false);
      expect(isClassDeclaration(arrow)).toBe(false);
    });

    it("should treat functions with a prototype as constructors", () => {
      expect(isConstructor(Shape)).toBe(true);
      expect(isConstructor(legacy)).toBe(true);
      expect(isConstructor(arrow)).toBe(false);
      expect(isCallable(arrow)).toBe(true);
      expect(isCallable({})).toBe(false);
    });
  });
});
