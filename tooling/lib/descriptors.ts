/**
 * TypeDescriptor builders and the runtime annotation registry.
 *
 * Annotations cover callables whose source cannot be read (compiled
 * libraries, code built at run time). They take precedence over a
 * signature catalog.
 */

import { CallableSignature, ClassConstructor, ParameterDescriptor, TypeDescriptor } from "./types";

export const t = {
  integer: (): TypeDescriptor => ({ kind: "scalar", scalar: "integer" }),
  float: (): TypeDescriptor => ({ kind: "scalar", scalar: "float" }),
  text: (): TypeDescriptor => ({ kind: "scalar", scalar: "text" }),
  boolean: (): TypeDescriptor => ({ kind: "scalar", scalar: "boolean" }),
  list: (element: TypeDescriptor = t.unknown()): TypeDescriptor => ({ kind: "collection", container: "array", element }),
  set: (element: TypeDescriptor = t.unknown()): TypeDescriptor => ({ kind: "collection", container: "set", element }),
  tuple: (...elements: TypeDescriptor[]): TypeDescriptor => ({ kind: "tuple", elements }),
  record: (key: TypeDescriptor = t.text(), value: TypeDescriptor = t.unknown()): TypeDescriptor => ({
    kind: "mapping",
    container: "record",
    key,
    value,
  }),
  map: (key: TypeDescriptor = t.unknown(), value: TypeDescriptor = t.unknown()): TypeDescriptor => ({
    kind: "mapping",
    container: "map",
    key,
    value,
  }),
  instanceOf: (target: ClassConstructor | string): TypeDescriptor => ({
    kind: "userClass",
    name: typeof target === "string" ? target : target.name,
  }),
  unknown: (text?: string): TypeDescriptor => (text === undefined ? { kind: "unknown" } : { kind: "unknown", text }),
};

export type ParameterAnnotation = TypeDescriptor | { name: string; type: TypeDescriptor; optional?: boolean };

export type CallableAnnotation = {
  parameters: ParameterAnnotation[];
  returns?: TypeDescriptor;
};

const annotations = new WeakMap<object, CallableSignature>();

function isTypeDescriptor(value: ParameterAnnotation): value is TypeDescriptor {
  return "kind" in value;
}

/**
 * Attach parameter types to a function, method or class constructor.
 * Returns the target so it can wrap a declaration inline.
 */
export function annotate<T extends object>(target: T, annotation: CallableAnnotation): T {
  const parameters: ParameterDescriptor[] = annotation.parameters.map((parameter, index) =>
    isTypeDescriptor(parameter)
      ? { name: `arg${index}`, type: parameter, optional: false }
      : { name: parameter.name, type: parameter.type, optional: parameter.optional ?? false }
  );
  const subject: unknown = target;
  const name = typeof subject === "function" ? subject.name : "";
  annotations.set(target, { name, parameters, returnType: annotation.returns ?? t.unknown() });
  return target;
}

export function getAnnotation(target: unknown): CallableSignature | undefined {
  if ((typeof target !== "object" && typeof target !== "function") || target === null) {
    return undefined;
  }
  return annotations.get(target);
}

/**
 * Signature derived from arity alone: every parameter unknown
 */
export function aritySignature(name: string, arity: number): CallableSignature {
  const parameters: ParameterDescriptor[] = [];
  for (let index = 0; index < arity; index += 1) {
    parameters.push({ name: `arg${index}`, type: t.unknown(), optional: false });
  }
  return { name, parameters, returnType: t.unknown() };
}

export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case "scalar":
      return type.scalar;
    case "collection":
      return type.container === "set" ? `Set<${describeType(type.element)}>` : `${describeType(type.element)}[]`;
    case "tuple":
      return `[${type.elements.map(describeType).join(", ")}]`;
    case "mapping":
      return `${type.container === "map" ? "Map" : "Record"}<${describeType(type.key)}, ${describeType(type.value)}>`;
    case "userClass":
      return type.name;
    case "unknown":
      return type.text ?? "unknown";
  }
}

export function sameType(left: TypeDescriptor, right: TypeDescriptor): boolean {
  return describeType(left) === describeType(right) && left.kind === right.kind;
}
