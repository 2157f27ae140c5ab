/**
 * Typed value synthesis: canonical boundary values and seeded random values
 * for a TypeDescriptor.
 */

import * as fc from "fast-check";
import { xoroshiro128plus } from "pure-rand";
import { describeType } from "./descriptors";
import { describeThrown, ValueSynthesisGap } from "./errors";
import { globalLogger, Logger } from "./logger";
import { ParameterDescriptor, ScalarKind, TypeDescriptor } from "./types";

export const INTEGER_BOUNDARIES: readonly number[] = [0, 1, -1, 100, -100];
export const TEXT_BOUNDARIES: readonly string[] = ["", "a", " ", "abc", "A".repeat(100)];
export const RANDOM_RANGE = { min: -1000, max: 1000 } as const;
export const ELEMENT_RANGE = { min: -100, max: 100 } as const;
export const MAX_RANDOM_TEXT_LENGTH = 20;
export const MAX_RANDOM_COLLECTION_SIZE = 5;

const ALPHANUMERIC = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789".split("");
const LOWERCASE = "abcdefghijklmnopqrstuvwxyz".split("");
const FLOAT_SCALE = 1_000_000;

const SAMPLE_ELEMENTS: Record<ScalarKind, readonly unknown[]> = {
  integer: [1, 2, 3],
  float: [1.5, 2.5, 3.5],
  text: ["a", "b", "c"],
  boolean: [true, false, true],
};

/**
 * The class currently under analysis. A parameter typed as this class is
 * filled by constructing an instance from its own constructor descriptor.
 */
export type ClassScope = {
  name: string;
  parameters: ParameterDescriptor[];
  construct: (args: unknown[]) => unknown;
};

export type ValueSynthesizerOptions = {
  seed?: number;
  logger?: Logger;
};

export class ValueSynthesizer {
  private random: fc.Random;
  private logger: Logger;
  private arbitraries = new Map<string, fc.Arbitrary<unknown>>();

  constructor(options: ValueSynthesizerOptions = {}) {
    const seed = options.seed ?? Date.now() ^ (Math.random() * 0x100000000);
    this.random = new fc.Random(xoroshiro128plus(seed));
    this.logger = options.logger ?? globalLogger;
  }

  /**
   * Canonical boundary values; a fresh sequence on every call
   */
  boundaryValues(type: TypeDescriptor): unknown[] {
    switch (type.kind) {
      case "scalar":
        return scalarBoundaries(type.scalar);
      case "collection": {
        const samples = sampleElements(type.element);
        const lists = [[], [samples[0]], [samples[0], samples[1], samples[2]]];
        return type.container === "set" ? lists.map((items) => new Set(items)) : lists;
      }
      case "mapping": {
        const values = sampleElements(type.value);
        if (type.container === "map") {
          const keys = sampleElements(type.key);
          return [
            new Map(),
            new Map([[keys[0], values[0]]]),
            new Map([
              [keys[0], values[0]],
              [keys[1], values[1]],
            ]),
          ];
        }
        return [{}, { key: values[0] }, { a: values[0], b: values[1] }];
      }
      case "tuple": {
        if (type.elements.length === 0) {
          return [[]];
        }
        const perElement = type.elements.map((element) => this.boundaryValues(element));
        const width = Math.min(3, Math.max(...perElement.map((values) => values.length)));
        const tuples: unknown[] = [];
        for (let index = 0; index < width; index += 1) {
          tuples.push(perElement.map((values) => values[Math.min(index, values.length - 1)]));
        }
        return tuples;
      }
      case "userClass":
      case "unknown":
        return [null];
    }
  }

  /**
   * One random value of the type. Unsupported types give null.
   */
  randomValue(type: TypeDescriptor, scope?: ClassScope): unknown {
    if (type.kind === "userClass") {
      if (scope && scope.name === type.name) {
        return this.constructWithinScope(scope);
      }
      this.reportGap(type);
      return null;
    }
    if (type.kind === "unknown") {
      this.reportGap(type);
      return null;
    }
    return this.arbitraryFor(type).generate(this.random, undefined).value;
  }

  randomInputs(parameters: ParameterDescriptor[], scope?: ClassScope): unknown[] {
    return parameters.map((parameter) => this.randomValue(parameter.type, scope));
  }

  private constructWithinScope(scope: ClassScope): unknown {
    // no scope on the inner draw: one level of self-reference only
    const args = this.randomInputs(scope.parameters);
    try {
      return scope.construct(args);
    } catch (error) {
      this.logger.warn(`Could not construct ${scope.name} for a self-referential parameter`, {
        error: describeThrown(error),
      });
      return null;
    }
  }

  private reportGap(type: TypeDescriptor): void {
    const gap = new ValueSynthesisGap(describeType(type));
    this.logger.debug(gap.message, { code: gap.code });
  }

  private arbitraryFor(type: TypeDescriptor): fc.Arbitrary<unknown> {
    const key = `${type.kind}:${describeType(type)}`;
    const cached = this.arbitraries.get(key);
    if (cached) {
      return cached;
    }
    const built = buildArbitrary(type);
    this.arbitraries.set(key, built);
    return built;
  }
}

function scalarBoundaries(kind: ScalarKind): unknown[] {
  switch (kind) {
    case "integer":
    case "float":
      return [...INTEGER_BOUNDARIES];
    case "text":
      return [...TEXT_BOUNDARIES];
    case "boolean":
      return [true, false];
  }
}

function sampleElements(type: TypeDescriptor): readonly unknown[] {
  return type.kind === "scalar" ? SAMPLE_ELEMENTS[type.scalar] : SAMPLE_ELEMENTS.integer;
}

function buildArbitrary(type: TypeDescriptor, nested = false): fc.Arbitrary<unknown> {
  switch (type.kind) {
    case "scalar":
      return scalarArbitrary(type.scalar, nested);
    case "collection": {
      const items = fc.array(buildArbitrary(type.element, true), { maxLength: MAX_RANDOM_COLLECTION_SIZE });
      return type.container === "set" ? items.map((drawn) => new Set(drawn)) : items;
    }
    case "tuple":
      return fc.tuple(...type.elements.map((element) => buildArbitrary(element, true)));
    case "mapping":
      if (type.container === "map") {
        return fc
          .array(fc.tuple(buildArbitrary(type.key, true), buildArbitrary(type.value, true)), {
            maxLength: MAX_RANDOM_COLLECTION_SIZE,
          })
          .map((entries) => new Map(entries));
      }
      return fc.dictionary(
        fc.array(fc.constantFrom(...LOWERCASE), { minLength: 1, maxLength: 5 }).map((chars) => chars.join("")),
        buildArbitrary(type.value, true),
        { maxKeys: MAX_RANDOM_COLLECTION_SIZE }
      );
    case "userClass":
    case "unknown":
      // element positions without a usable type hold small integers
      return fc.integer(ELEMENT_RANGE);
  }
}

function scalarArbitrary(kind: ScalarKind, nested: boolean): fc.Arbitrary<unknown> {
  const range = nested ? ELEMENT_RANGE : RANDOM_RANGE;
  switch (kind) {
    case "integer":
      return fc.integer(range);
    case "float":
      return fc
        .integer({ min: range.min * FLOAT_SCALE, max: range.max * FLOAT_SCALE })
        .map((scaled) => scaled / FLOAT_SCALE);
    case "text":
      return fc
        .array(fc.constantFrom(...ALPHANUMERIC), { maxLength: MAX_RANDOM_TEXT_LENGTH })
        .map((chars) => chars.join(""));
    case "boolean":
      return fc.boolean();
  }
}
