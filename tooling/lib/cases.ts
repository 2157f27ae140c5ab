/**
 * Case records produced by the synthesizer. Records are frozen on creation.
 */

import { ClassConstructor } from "./types";

/** Member key of constructor cases */
export const CONSTRUCTOR_KEY = "constructor";

export type AccessorKind = "get" | "set";

export type TestCase = Readonly<{
  inputs: readonly unknown[];
  /** Ignored when errorKind is set */
  expectedOutput: unknown;
  description: string;
  errorKind?: string;
  errorMessage?: string;
}>;

export type ClassMethodTestCase = Readonly<{
  classType: ClassConstructor;
  className: string;
  constructorInputs: readonly unknown[];
  memberName: string;
  memberInputs: readonly unknown[];
  /** Ignored when errorKind is set */
  expectedOutput: unknown;
  description: string;
  errorKind?: string;
  errorMessage?: string;
  accessor?: AccessorKind;
}>;

export type CaseResult = { value: unknown } | { errorKind: string; errorMessage?: string };

function resultFields(result: CaseResult): { expectedOutput: unknown; errorKind?: string; errorMessage?: string } {
  if ("errorKind" in result) {
    return result.errorMessage === undefined
      ? { expectedOutput: null, errorKind: result.errorKind }
      : { expectedOutput: null, errorKind: result.errorKind, errorMessage: result.errorMessage };
  }
  return { expectedOutput: result.value };
}

export function createTestCase(inputs: readonly unknown[], result: CaseResult, description: string): TestCase {
  return Object.freeze({
    inputs: Object.freeze([...inputs]),
    ...resultFields(result),
    description,
  });
}

export function createClassMethodTestCase(fields: {
  classType: ClassConstructor;
  constructorInputs: readonly unknown[];
  memberName: string;
  memberInputs: readonly unknown[];
  result: CaseResult;
  description: string;
  accessor?: AccessorKind;
}): ClassMethodTestCase {
  return Object.freeze({
    classType: fields.classType,
    className: fields.classType.name,
    constructorInputs: Object.freeze([...fields.constructorInputs]),
    memberName: fields.memberName,
    memberInputs: Object.freeze([...fields.memberInputs]),
    ...resultFields(fields.result),
    description: fields.description,
    ...(fields.accessor ? { accessor: fields.accessor } : {}),
  });
}

/**
 * True when the case expects an error; its expectedOutput carries nothing
 */
export function expectsError(testCase: TestCase | ClassMethodTestCase): boolean {
  return testCase.errorKind !== undefined;
}

export function getterKey(name: string): string {
  return `get:${name}`;
}

export function setterKey(name: string): string {
  return `set:${name}`;
}
