/**
 * casegen: Main entry point
 * Exports the case synthesis engine and the runtime type builders
 */

export { t, annotate, getAnnotation } from "../tooling/lib/descriptors";
export type { CallableAnnotation, ParameterAnnotation } from "../tooling/lib/descriptors";

export { CaseSynthesizer } from "../tooling/lib/case-synthesizer";
export type { CaseSynthesizerOptions, ModuleCases } from "../tooling/lib/case-synthesizer";

export { CONSTRUCTOR_KEY, expectsError, getterKey, setterKey } from "../tooling/lib/cases";
export type { ClassMethodTestCase, TestCase } from "../tooling/lib/cases";

export { ValueSynthesizer } from "../tooling/lib/value-synthesizer";
export { StructureAnalyzer } from "../tooling/lib/structure-analyzer";
export { OracleRunner, createDeadline } from "../tooling/lib/oracle-runner";
export type { Deadline } from "../tooling/lib/oracle-runner";
export { areInputsEquivalent, areValuesEquivalent, InputLedger } from "../tooling/lib/equivalence";
export { SignatureReader } from "../tooling/lib/signatures";
export { ModuleLoader } from "../tooling/lib/module-loader";
export { parseLiteral } from "../tooling/lib/literals";
export { buildCaseReport, toJsonValue, writeCaseReport } from "../tooling/lib/case-report";
export type { CaseReport } from "../tooling/lib/case-report";
export { loadManualCaseFile, mergeManualCases } from "../tooling/lib/manual-cases";
export type { ManualCaseRow } from "../tooling/lib/manual-cases";

export type {
  ClassDescription,
  Outcome,
  SignatureCatalog,
  TypeDescriptor,
} from "../tooling/lib/types";
