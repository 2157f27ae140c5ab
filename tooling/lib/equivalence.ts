/**
 * Value equivalence of candidate input tuples
 */

import { inspect } from "util";
import { isPlainObject } from "./utils";

type Scalar = string | number | boolean | bigint | null | undefined;

function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  );
}

const CANONICAL_INSPECT_OPTIONS = {
  depth: Infinity,
  sorted: true,
  breakLength: Infinity,
  maxArrayLength: Infinity,
  maxStringLength: Infinity,
  getters: false,
} as const;

/**
 * Constructor name plus an inspected form, which shows Map and Set state
 * that JSON drops. Undefined for an instance with no visible state: its
 * fields may be private.
 */
function canonicalForm(value: object): string | undefined {
  const proto: unknown = Object.getPrototypeOf(value);
  const typeName =
    typeof proto === "object" && proto !== null && "constructor" in proto && typeof proto.constructor === "function"
      ? proto.constructor.name
      : "Object";
  const printed = inspect(value, CANONICAL_INSPECT_OPTIONS);
  if (printed.endsWith("{}")) {
    return undefined;
  }
  return `${typeName}:${printed}`;
}

export function areValuesEquivalent(left: unknown, right: unknown): boolean {
  if (isScalar(left) || isScalar(right)) {
    return left === right;
  }

  if (Array.isArray(left) && Array.isArray(right)) {
    if (left.length !== right.length) {
      return false;
    }
    return left.every((item, index) => areValuesEquivalent(item, right[index]));
  }

  if (left instanceof Map && right instanceof Map) {
    if (left.size !== right.size) {
      return false;
    }
    for (const [key, item] of left) {
      if (!right.has(key) || !areValuesEquivalent(item, right.get(key))) {
        return false;
      }
    }
    return true;
  }

  if (left instanceof Set && right instanceof Set) {
    if (left.size !== right.size) {
      return false;
    }
    const rightItems = Array.from(right);
    return Array.from(left).every((item) => rightItems.some((other) => areValuesEquivalent(item, other)));
  }

  if (isPlainObject(left) && isPlainObject(right)) {
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }
    return leftKeys.every((key) => Object.prototype.hasOwnProperty.call(right, key) && areValuesEquivalent(left[key], right[key]));
  }

  if (typeof left === "function" || typeof right === "function" || typeof left === "symbol" || typeof right === "symbol") {
    return left === right;
  }

  if (typeof left !== "object" || typeof right !== "object" || left === null || right === null) {
    return false;
  }
  const leftForm = canonicalForm(left);
  const rightForm = canonicalForm(right);
  if (leftForm === undefined || rightForm === undefined) {
    return false;
  }
  return leftForm === rightForm;
}

/**
 * True iff both tuples have the same length and every position is equivalent
 */
export function areInputsEquivalent(left: readonly unknown[], right: readonly unknown[]): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((value, index) => areValuesEquivalent(value, right[index]));
}

/**
 * The input tuples already used for one callable. Tuples kept here are
 * pairwise non-equivalent.
 */
export class InputLedger {
  private used: unknown[][] = [];

  has(inputs: readonly unknown[]): boolean {
    return this.used.some((existing) => areInputsEquivalent(existing, inputs));
  }

  /**
   * Add the tuple unless an equivalent one is present; returns whether it was added
   */
  add(inputs: readonly unknown[]): boolean {
    if (this.has(inputs)) {
      return false;
    }
    this.used.push([...inputs]);
    return true;
  }

  size(): number {
    return this.used.length;
  }
}
