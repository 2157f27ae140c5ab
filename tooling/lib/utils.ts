/**
 * Utility functions used across the case generator
 */

import { inspect } from "util";
import { AnyCallable, ClassConstructor } from "./types";

/**
 * Normalize whitespace in a string
 */
export function normalize(key: string): string {
  return key.replace(/\s+/g, " ").trim();
}

/**
 * Check if value is a plain object (not null, not array, no class prototype)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Short printable form of a value for case descriptions and log lines
 */
export function formatValue(value: unknown): string {
  return inspect(value, { depth: 3, breakLength: Infinity, maxArrayLength: 20, maxStringLength: 60 });
}

export function formatInputs(inputs: readonly unknown[]): string {
  return `[${inputs.map((input) => formatValue(input)).join(", ")}]`;
}

/**
 * Copy arrays, plain objects, maps and sets so later mutation by target code
 * cannot rewrite a recorded input. Other values are kept by reference.
 */
export function snapshotValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => snapshotValue(item));
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    for (const [key, item] of value) {
      copy.set(key, snapshotValue(item));
    }
    return copy;
  }
  if (value instanceof Set) {
    return new Set(Array.from(value, (item) => snapshotValue(item)));
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = snapshotValue(item);
    }
    return copy;
  }
  return value;
}

export function isCallable(value: unknown): value is AnyCallable {
  return typeof value === "function";
}

export function isConstructor(value: unknown): value is ClassConstructor {
  return typeof value === "function" && typeof value.prototype === "object" && value.prototype !== null;
}

/**
 * True for functions written with the class keyword
 */
export function isClassDeclaration(value: unknown): value is ClassConstructor {
  if (!isConstructor(value)) {
    return false;
  }
  try {
    return /^class[\s{]/.test(Function.prototype.toString.call(value));
  } catch {
    return false;
  }
}

export function sourceOf(fn: AnyCallable): string {
  try {
    return Function.prototype.toString.call(fn);
  } catch {
    return "";
  }
}
