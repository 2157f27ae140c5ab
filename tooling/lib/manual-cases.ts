/**
 * User-supplied cases. Rows carry their values as literal text and go
 * through the restricted literal parser; they are appended to the
 * synthesized cases of their target.
 */

import { existsSync, readFileSync } from "fs";
import { ModuleCases } from "./case-synthesizer";
import {
  CaseResult,
  ClassMethodTestCase,
  CONSTRUCTOR_KEY,
  createClassMethodTestCase,
  createTestCase,
  TestCase,
} from "./cases";
import { CaseGenError, describeThrown } from "./errors";
import { parseLiteral, parseLiteralOr } from "./literals";
import { globalLogger, Logger } from "./logger";
import { formatInputs, isClassDeclaration, isPlainObject } from "./utils";

const ERROR_KIND = /^[A-Za-z_$][\w$]*$/;

export type ManualCaseRow = {
  /** Function name, `Class.member` or `Class.constructor` */
  target: string;
  inputs: string[];
  constructorInputs?: string[];
  expected?: string;
  raises?: string;
  description?: string;
};

export class ManualCaseError extends CaseGenError {
  constructor(message: string, row?: number, cause?: unknown) {
    super(row === undefined ? message : `Manual case ${row}: ${message}`, {
      code: "MANUAL_CASE_INVALID",
      context: { component: "ManualCases", metadata: row === undefined ? {} : { row } },
      cause,
    });
    this.name = "ManualCaseError";
  }
}

function stringList(value: unknown, field: string, row: number): string[] {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new ManualCaseError(`${field} must be a list of strings`, row);
  }
  return value;
}

function optionalString(value: unknown, field: string, row: number): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ManualCaseError(`${field} must be a string`, row);
  }
  return value;
}

/**
 * Validate the rows of a manual case file: `{ "cases": [...] }` or a bare list
 */
export function parseManualCaseRows(raw: unknown): ManualCaseRow[] {
  const list = isPlainObject(raw) ? raw.cases : raw;
  if (!Array.isArray(list)) {
    throw new ManualCaseError("expected a list of cases");
  }

  return list.map((entry: unknown, row) => {
    if (!isPlainObject(entry)) {
      throw new ManualCaseError("each case must be an object", row);
    }
    const target = optionalString(entry.target, "target", row);
    if (!target) {
      throw new ManualCaseError("target is required", row);
    }
    const parsed: ManualCaseRow = { target, inputs: stringList(entry.inputs ?? [], "inputs", row) };
    if (entry.constructorInputs !== undefined) {
      parsed.constructorInputs = stringList(entry.constructorInputs, "constructorInputs", row);
    }
    const expected = optionalString(entry.expected, "expected", row);
    const raises = optionalString(entry.raises, "raises", row);
    const description = optionalString(entry.description, "description", row);
    if (expected !== undefined) parsed.expected = expected;
    if (raises !== undefined) parsed.raises = raises;
    if (description !== undefined) parsed.description = description;
    if (raises !== undefined && !ERROR_KIND.test(raises)) {
      throw new ManualCaseError(`raises must name an error kind, got ${JSON.stringify(raises)}`, row);
    }
    return parsed;
  });
}

export function loadManualCaseFile(path: string): ManualCaseRow[] {
  if (!existsSync(path)) {
    throw new ManualCaseError(`file not found: ${path}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ManualCaseError(`invalid JSON in ${path}: ${describeThrown(error)}`, undefined, error);
  }
  return parseManualCaseRows(raw);
}

function resultOf(row: ManualCaseRow): CaseResult {
  if (row.raises !== undefined) {
    return { errorKind: row.raises };
  }
  return { value: parseLiteralOr(row.expected, undefined) };
}

function describeRow(row: ManualCaseRow, inputs: unknown[]): string {
  const base = row.description ?? `Manual case with inputs: ${formatInputs(inputs)}`;
  return row.raises === undefined ? base : `${base} (raises ${row.raises})`;
}

export function toTestCase(row: ManualCaseRow): TestCase {
  const inputs = row.inputs.map((text) => parseLiteral(text));
  return createTestCase(inputs, resultOf(row), describeRow(row, inputs));
}

/**
 * Append manual rows to the cases of their targets. Rows naming an unknown
 * target, or holding text outside the literal grammar, are logged and
 * skipped.
 */
export function mergeManualCases(
  cases: ModuleCases,
  rows: ManualCaseRow[],
  namespace: Record<string, unknown>,
  logger: Logger = globalLogger
): number {
  let merged = 0;
  rows.forEach((row, index) => {
    try {
      const separator = row.target.indexOf(".");
      if (separator < 0) {
        if (typeof namespace[row.target] !== "function") {
          throw new ManualCaseError(`unknown function ${row.target}`, index);
        }
        const list = cases.functions[row.target] ?? [];
        list.push(toTestCase(row));
        cases.functions[row.target] = list;
      } else {
        const className = row.target.slice(0, separator);
        const memberName = row.target.slice(separator + 1);
        const cls = namespace[className];
        if (!isClassDeclaration(cls)) {
          throw new ManualCaseError(`unknown class ${className}`, index);
        }
        const isConstructor = memberName === CONSTRUCTOR_KEY;
        // constructor rows may carry their arguments in `inputs`
        const constructorTexts = row.constructorInputs ?? (isConstructor ? row.inputs : []);
        const constructorInputs = constructorTexts.map((text) => parseLiteral(text));
        const memberInputs = isConstructor ? [] : row.inputs.map((text) => parseLiteral(text));
        const shown = isConstructor ? constructorInputs : memberInputs;
        const testCase: ClassMethodTestCase = createClassMethodTestCase({
          classType: cls,
          constructorInputs,
          memberName,
          memberInputs,
          result: resultOf(row),
          description: describeRow(row, shown),
        });
        const members = cases.classes[className] ?? new Map<string, ClassMethodTestCase[]>();
        members.set(memberName, [...(members.get(memberName) ?? []), testCase]);
        cases.classes[className] = members;
      }
      merged += 1;
    } catch (error) {
      logger.warn(`Skipped manual case for ${row.target}`, { error: describeThrown(error) });
    }
  });
  return merged;
}
