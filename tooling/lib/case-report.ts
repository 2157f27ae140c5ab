/**
 * JSON case report of one target module
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import { SynthesisAudit } from "./audit";
import { ModuleCases } from "./case-synthesizer";
import { ClassMethodTestCase, TestCase } from "./cases";
import { formatValue, isPlainObject } from "./utils";

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type ReportedCase = {
  description: string;
  inputs: JsonValue[];
  expectedOutput?: JsonValue;
  errorKind?: string;
  errorMessage?: string;
};

export type ReportedMemberCase = {
  description: string;
  constructorInputs: JsonValue[];
  memberInputs: JsonValue[];
  expectedOutput?: JsonValue;
  errorKind?: string;
  errorMessage?: string;
  accessor?: "get" | "set";
};

export type CaseReport = {
  source: string;
  generatedAt: string;
  functions: Record<string, ReportedCase[]>;
  classes: Record<string, Record<string, ReportedMemberCase[]>>;
  summary?: ReturnType<SynthesisAudit["getSummary"]>;
};

/**
 * JSON form of a case value. Values JSON cannot carry become tagged objects
 * with a `$type` field.
 */
export function toJsonValue(value: unknown, seen: Set<object> = new Set()): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : { $type: "number", repr: String(value) };
  }
  if (value === undefined) {
    return { $type: "undefined" };
  }
  if (typeof value === "bigint") {
    return { $type: "bigint", repr: value.toString() };
  }
  if (typeof value === "symbol") {
    return { $type: "symbol", repr: value.toString() };
  }
  if (typeof value === "function") {
    return { $type: "function", name: value.name };
  }

  if (seen.has(value)) {
    return { $type: "circular" };
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => toJsonValue(item, seen));
    }
    if (value instanceof Map) {
      return {
        $type: "Map",
        entries: Array.from(value.entries()).map(([key, item]) => [toJsonValue(key, seen), toJsonValue(item, seen)]),
      };
    }
    if (value instanceof Set) {
      return { $type: "Set", items: Array.from(value, (item) => toJsonValue(item, seen)) };
    }
    if (isPlainObject(value)) {
      const record: { [key: string]: JsonValue } = {};
      for (const [key, item] of Object.entries(value)) {
        record[key] = toJsonValue(item, seen);
      }
      return record;
    }
    const typeName = value.constructor?.name || "Object";
    return { $type: typeName, repr: formatValue(value) };
  } finally {
    seen.delete(value);
  }
}

function reportCase(testCase: TestCase): ReportedCase {
  const reported: ReportedCase = {
    description: testCase.description,
    inputs: testCase.inputs.map((input) => toJsonValue(input)),
  };
  if (testCase.errorKind === undefined) {
    reported.expectedOutput = toJsonValue(testCase.expectedOutput);
  } else {
    reported.errorKind = testCase.errorKind;
    if (testCase.errorMessage !== undefined) reported.errorMessage = testCase.errorMessage;
  }
  return reported;
}

function reportMemberCase(testCase: ClassMethodTestCase): ReportedMemberCase {
  const reported: ReportedMemberCase = {
    description: testCase.description,
    constructorInputs: testCase.constructorInputs.map((input) => toJsonValue(input)),
    memberInputs: testCase.memberInputs.map((input) => toJsonValue(input)),
  };
  if (testCase.errorKind === undefined) {
    reported.expectedOutput = toJsonValue(testCase.expectedOutput);
  } else {
    reported.errorKind = testCase.errorKind;
    if (testCase.errorMessage !== undefined) reported.errorMessage = testCase.errorMessage;
  }
  if (testCase.accessor) {
    reported.accessor = testCase.accessor;
  }
  return reported;
}

export function buildCaseReport(
  source: string,
  cases: ModuleCases,
  audit?: SynthesisAudit,
  now: Date = new Date()
): CaseReport {
  const report: CaseReport = {
    source,
    generatedAt: now.toISOString(),
    functions: {},
    classes: {},
  };
  for (const [name, list] of Object.entries(cases.functions)) {
    report.functions[name] = list.map(reportCase);
  }
  for (const [className, members] of Object.entries(cases.classes)) {
    const reportedMembers: Record<string, ReportedMemberCase[]> = {};
    for (const [member, list] of members) {
      reportedMembers[member] = list.map(reportMemberCase);
    }
    report.classes[className] = reportedMembers;
  }
  if (audit) {
    report.summary = audit.getSummary();
  }
  return report;
}

/**
 * `<outputDir>/<source name>.cases.json`
 */
export function reportPathFor(sourcePath: string, outputDir: string): string {
  const name = basename(sourcePath, extname(sourcePath));
  return join(outputDir, `${name}.cases.json`);
}

export function writeCaseReport(report: CaseReport, outputDir: string): string {
  mkdirSync(outputDir, { recursive: true });
  const path = reportPathFor(report.source, outputDir);
  writeFileSync(path, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  return path;
}
