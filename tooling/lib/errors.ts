/**
 * Error types for the case generator.
 *
 * Hierarchy:
 * - CaseGenError (base)
 *   - AnalysisFault (reflection on a class or member failed)
 *   - ValueSynthesisGap (no generator for a type)
 *   - OracleTimeout (a candidate ran past its deadline)
 *   - ConstructionFailure (no working instance could be built)
 *   - LiteralSyntaxError (user-entered value outside the literal grammar)
 *   - ModuleLoadError (a target module could not be transpiled or evaluated)
 *
 * Errors raised by target code are not modelled here; the oracle turns them
 * into `raised` outcomes.
 */

export interface ErrorContext {
  /** Callable or class being processed */
  target?: string;
  /** Member name, when the fault concerns one member */
  member?: string;
  /** Component where the error occurred */
  component?: string;
  metadata?: Record<string, unknown>;
}

export class CaseGenError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(message: string, options: { code: string; context?: ErrorContext; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "CaseGenError";
    this.code = options.code;
    this.context = options.context ?? {};
  }
}

export class AnalysisFault extends CaseGenError {
  constructor(message: string, context: ErrorContext, cause?: unknown) {
    super(message, { code: "ANALYSIS_FAULT", context: { component: "StructureAnalyzer", ...context }, cause });
    this.name = "AnalysisFault";
  }
}

export class ValueSynthesisGap extends CaseGenError {
  constructor(typeText: string, context: ErrorContext = {}) {
    super(`No value generator for type ${typeText}`, {
      code: "VALUE_SYNTHESIS_GAP",
      context: { component: "ValueSynthesizer", ...context },
    });
    this.name = "ValueSynthesisGap";
  }
}

export class OracleTimeout extends CaseGenError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super(`Oracle call timed out after ${timeoutMs}ms`, {
      code: "ORACLE_TIMEOUT",
      context: { component: "OracleRunner", ...context },
    });
    this.name = "OracleTimeout";
    this.timeoutMs = timeoutMs;
  }
}

export class ConstructionFailure extends CaseGenError {
  readonly errorKind: string;

  constructor(className: string, errorKind: string, message: string) {
    super(`Could not construct ${className}: ${errorKind}: ${message}`, {
      code: "CONSTRUCTION_FAILURE",
      context: { target: className, component: "CaseSynthesizer" },
    });
    this.name = "ConstructionFailure";
    this.errorKind = errorKind;
  }
}

export class LiteralSyntaxError extends CaseGenError {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Unsupported literal ${JSON.stringify(source)}: ${reason}`, {
      code: "LITERAL_SYNTAX",
      context: { component: "LiteralParser" },
    });
    this.name = "LiteralSyntaxError";
    this.source = source;
  }
}

export class ModuleLoadError extends CaseGenError {
  readonly modulePath: string;

  constructor(modulePath: string, cause: unknown) {
    super(`Failed to load ${modulePath}: ${describeThrown(cause)}`, {
      code: "MODULE_LOAD",
      context: { component: "ModuleLoader" },
      cause,
    });
    this.name = "ModuleLoadError";
    this.modulePath = modulePath;
  }
}

/**
 * Name of the kind of a thrown value: the constructor name for objects,
 * `typeof` for thrown primitives.
 */
export function errorKindOf(thrown: unknown): string {
  if (typeof thrown !== "object" || thrown === null) {
    return thrown === null ? "null" : typeof thrown;
  }
  const proto: unknown = Object.getPrototypeOf(thrown);
  if (
    typeof proto === "object" &&
    proto !== null &&
    "constructor" in proto &&
    typeof proto.constructor === "function" &&
    proto.constructor.name
  ) {
    return proto.constructor.name;
  }
  return thrown instanceof Error ? thrown.name : "Object";
}

export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.message;
  }
  // errors from loaded modules belong to another realm
  if (typeof thrown === "object" && thrown !== null && "message" in thrown && typeof thrown.message === "string") {
    return thrown.message;
  }
  return String(thrown);
}
