/**
 * Test suite for ValueSynthesizer
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { t } from "../tooling/lib/descriptors";
import { Logger } from "../tooling/lib/logger";
import {
  ClassScope,
  MAX_RANDOM_COLLECTION_SIZE,
  MAX_RANDOM_TEXT_LENGTH,
  RANDOM_RANGE,
  ValueSynthesizer,
} from "../tooling/lib/value-synthesizer";

function draws(synthesizer: ValueSynthesizer, count: number, produce: (s: ValueSynthesizer) => unknown): unknown[] {
  const values: unknown[] = [];
  for (let index = 0; index < count; index += 1) {
    values.push(produce(synthesizer));
  }
  return values;
}

describe("ValueSynthesizer", () => {
  let logger: Logger;
  let synthesizer: ValueSynthesizer;

  beforeEach(() => {
    logger = new Logger("debug", false);
    synthesizer = new ValueSynthesizer({ seed: 42, logger });
  });

  describe("boundaryValues", () => {
    it("should give the canonical integer boundaries in order", () => {
      expect(synthesizer.boundaryValues(t.integer())).toEqual([0, 1, -1, 100, -100]);
      expect(synthesizer.boundaryValues(t.float())).toEqual([0, 1, -1, 100, -100]);
    });

    it("should give text and boolean boundaries", () => {
      expect(synthesizer.boundaryValues(t.text())).toEqual(["", "a", " ", "abc", "A".repeat(100)]);
      expect(synthesizer.boundaryValues(t.boolean())).toEqual([true, false]);
    });

    it("should size collections zero, one and three", () => {
      expect(synthesizer.boundaryValues(t.list(t.text()))).toEqual([[], ["a"], ["a", "b", "c"]]);
      expect(synthesizer.boundaryValues(t.list(t.integer()))).toEqual([[], [1], [1, 2, 3]]);
    });

    it("should give empty, single and double mappings", () => {
      expect(synthesizer.boundaryValues(t.record(t.text(), t.boolean()))).toEqual([
        {},
        { key: true },
        { a: true, b: false },
      ]);
    });

    it("should build sets and maps for Set and Map types", () => {
      expect(synthesizer.boundaryValues(t.set(t.integer()))).toEqual([new Set(), new Set([1]), new Set([1, 2, 3])]);
      expect(synthesizer.boundaryValues(t.map(t.text(), t.integer()))).toEqual([
        new Map(),
        new Map([["a", 1]]),
        new Map([
          ["a", 1],
          ["b", 2],
        ]),
      ]);
    });

    it("should combine tuple element boundaries position by position", () => {
      expect(synthesizer.boundaryValues(t.tuple(t.integer(), t.boolean()))).toEqual([
        [0, true],
        [1, false],
        [-1, false],
      ]);
      expect(synthesizer.boundaryValues(t.tuple())).toEqual([[]]);
    });

    it("should give null for class and unknown types", () => {
      expect(synthesizer.boundaryValues(t.instanceOf("Shape"))).toEqual([null]);
      expect(synthesizer.boundaryValues(t.unknown())).toEqual([null]);
    });

    it("should return a fresh sequence on every call", () => {
      const first = synthesizer.boundaryValues(t.list(t.integer()));
      const second = synthesizer.boundaryValues(t.list(t.integer()));

      expect(first).not.toBe(second);
      expect(first[1]).not.toBe(second[1]);
    });
  });

  describe("randomValue", () => {
    it("should draw integers within the random range", () => {
      for (const value of draws(synthesizer, 200, (s) => s.randomValue(t.integer()))) {
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(RANDOM_RANGE.min);
        expect(value).toBeLessThanOrEqual(RANDOM_RANGE.max);
      }
    });

    it("should draw floats within the random range", () => {
      for (const value of draws(synthesizer, 100, (s) => s.randomValue(t.float()))) {
        expect(typeof value).toBe("number");
        expect(value).toBeGreaterThanOrEqual(RANDOM_RANGE.min);
        expect(value).toBeLessThanOrEqual(RANDOM_RANGE.max);
      }
    });

    it("should draw short alphanumeric text", () => {
      for (const value of draws(synthesizer, 100, (s) => s.randomValue(t.text()))) {
        expect(typeof value).toBe("string");
        expect(String(value)).toMatch(/^[A-Za-z0-9]*$/);
        expect(String(value).length).toBeLessThanOrEqual(MAX_RANDOM_TEXT_LENGTH);
      }
    });

    it("should draw small collections of small elements", () => {
      for (const value of draws(synthesizer, 100, (s) => s.randomValue(t.list(t.integer())))) {
        expect(Array.isArray(value)).toBe(true);
        const list: unknown[] = Array.isArray(value) ? value : [];
        expect(list.length).toBeLessThanOrEqual(MAX_RANDOM_COLLECTION_SIZE);
        for (const element of list) {
          expect(element).toBeGreaterThanOrEqual(-100);
          expect(element).toBeLessThanOrEqual(100);
        }
      }
    });

    it("should draw mappings with short lowercase keys", () => {
      for (const value of draws(synthesizer, 50, (s) => s.randomValue(t.record(t.text(), t.integer())))) {
        expect(typeof value).toBe("object");
        const keys = Object.keys(Object(value));
        expect(keys.length).toBeLessThanOrEqual(MAX_RANDOM_COLLECTION_SIZE);
        for (const key of keys) {
          expect(key).toMatch(/^[a-z]{1,5}$/);
        }
      }
    });

    it("should draw Set and Map instances for Set and Map types", () => {
      for (const value of draws(synthesizer, 30, (s) => s.randomValue(t.set(t.integer())))) {
        expect(value).toBeInstanceOf(Set);
      }
      for (const value of draws(synthesizer, 30, (s) => s.randomValue(t.map(t.text(), t.integer())))) {
        expect(value).toBeInstanceOf(Map);
        const entries = value instanceof Map ? Array.from(value.entries()) : [];
        expect(entries.length).toBeLessThanOrEqual(MAX_RANDOM_COLLECTION_SIZE);
        for (const [key, item] of entries) {
          expect(typeof key).toBe("string");
          expect(typeof item).toBe("number");
        }
      }
    });

    it("should repeat the same sequence for the same seed", () => {
      const other = new ValueSynthesizer({ seed: 42, logger });
      const produce = (s: ValueSynthesizer): unknown => s.randomValue(t.tuple(t.integer(), t.text(), t.boolean()));

      expect(draws(synthesizer, 10, produce)).toEqual(draws(other, 10, produce));
    });

    it("should give null and log a gap for types it cannot generate", () => {
      expect(synthesizer.randomValue(t.unknown("Date"))).toBeNull();
      expect(synthesizer.randomValue(t.instanceOf("Shape"))).toBeNull();

      const gaps = logger.getEntriesAtLevel("debug").filter((entry) => entry.data?.code === "VALUE_SYNTHESIS_GAP");
      expect(gaps.map((entry) => entry.message)).toEqual([
        "No value generator for type Date",
        "No value generator for type Shape",
      ]);
    });
  });

  describe("self-referential parameters", () => {
    it("should construct an instance of the class in scope", () => {
      const built: unknown[][] = [];
      const scope: ClassScope = {
        name: "Node",
        parameters: [{ name: "size", type: t.integer(), optional: false }],
        construct: (args) => {
          built.push(args);
          return { node: args[0] };
        },
      };

      const value = synthesizer.randomValue(t.instanceOf("Node"), scope);

      expect(built).toHaveLength(1);
      expect(value).toEqual({ node: built[0][0] });
      expect(Number.isInteger(built[0][0])).toBe(true);
    });

    it("should give null when that construction throws", () => {
      const scope: ClassScope = {
        name: "Node",
        parameters: [],
        construct: () => {
          throw new Error("refused");
        },
      };

      expect(synthesizer.randomValue(t.instanceOf("Node"), scope)).toBeNull();
      expect(logger.getEntriesAtLevel("warn").map((entry) => entry.message)).toEqual([
        "Could not construct Node for a self-referential parameter",
      ]);
    });
  });
});
