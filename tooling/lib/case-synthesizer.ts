/**
 * Case synthesis.
 *
 * For every callable the synthesizer proposes candidate input tuples in two
 * phases: a boundary sweep (one parameter at a time takes each of its
 * boundary values while the others take random values) followed by fully
 * random tuples. Each candidate passes through the ledger of used tuples,
 * runs against the oracle and ends up recorded or discarded.
 *
 * Class members are exercised on a fresh instance per case, built inside
 * the timed call.
 */

import { SynthesisAudit, globalSynthesisAudit, SynthesisPhase } from "./audit";
import {
  CaseResult,
  ClassMethodTestCase,
  CONSTRUCTOR_KEY,
  createClassMethodTestCase,
  createTestCase,
  getterKey,
  setterKey,
  TestCase,
  AccessorKind,
} from "./cases";
import { DEFAULT_CONSTRUCTION_ATTEMPTS, DEFAULT_DEADLINE_SECONDS, DEFAULT_NUM_RANDOM_CASES } from "./config";
import { aritySignature, getAnnotation } from "./descriptors";
import { InputLedger } from "./equivalence";
import { ConstructionFailure } from "./errors";
import { globalLogger, Logger } from "./logger";
import { OracleRunner } from "./oracle-runner";
import { emptyCatalog } from "./signatures";
import { StructureAnalyzer } from "./structure-analyzer";
import {
  AnyCallable,
  ClassConstructor,
  ClassDescription,
  MethodDescriptor,
  Outcome,
  ParameterDescriptor,
  SignatureCatalog,
} from "./types";
import { formatInputs, formatValue, isCallable, isClassDeclaration, snapshotValue } from "./utils";
import { ClassScope, ValueSynthesizer } from "./value-synthesizer";

export type CaseSynthesizerOptions = {
  numRandomCases?: number;
  perCallDeadlineSeconds?: number;
  maxConstructionAttempts?: number;
  catalog?: SignatureCatalog;
  logger?: Logger;
  audit?: SynthesisAudit;
  values?: ValueSynthesizer;
  oracle?: OracleRunner;
  analyzer?: StructureAnalyzer;
};

export type ModuleCases = {
  functions: Record<string, TestCase[]>;
  classes: Record<string, Map<string, ClassMethodTestCase[]>>;
};

type Describer = {
  boundary: (parameter: string, value: string) => string;
  random: (inputs: string) => string;
  empty: string;
};

type Sweep<R> = {
  /** Audit key of the callable */
  target: string;
  parameters: ParameterDescriptor[];
  describe: Describer;
  invoke: (inputs: unknown[]) => Promise<Outcome>;
  record: (inputs: unknown[], result: CaseResult, description: string) => R;
  ledger?: InputLedger;
  scope?: ClassScope;
};

/**
 * How building an instance went: built, failed with the target's own error,
 * or ran past the deadline on every attempt
 */
type Construction =
  | { status: "built"; args: unknown[] }
  | { status: "failed"; failure: ConstructionFailure; args: unknown[] }
  | { status: "timedOut"; args: unknown[]; elapsedMs: number };

const FUNCTION_DESCRIBER: Describer = {
  boundary: (parameter, value) => `Edge case for ${parameter}=${value}`,
  random: (inputs) => `Test with inputs: ${inputs}`,
  empty: "Test with no arguments",
};

function memberDescriber(label: string): Describer {
  return {
    boundary: (parameter, value) => `${label} with ${parameter}=${value}`,
    random: (inputs) => `${label} with inputs: ${inputs}`,
    empty: `${label} with no arguments`,
  };
}

function getterDescriber(property: string): Describer {
  const label = `Property getter for ${property}`;
  return { ...memberDescriber(label), empty: label };
}

function cloneInputs(inputs: readonly unknown[]): unknown[] {
  return inputs.map((input) => snapshotValue(input));
}

function hasRequiredParameters(parameters: ParameterDescriptor[]): boolean {
  return parameters.some((parameter) => !parameter.optional);
}

export class CaseSynthesizer {
  private numRandomCases: number;
  private deadlineSeconds: number;
  private maxConstructionAttempts: number;
  private catalog: SignatureCatalog;
  private logger: Logger;
  private audit: SynthesisAudit;
  private values: ValueSynthesizer;
  private oracle: OracleRunner;
  private analyzer: StructureAnalyzer;

  constructor(options: CaseSynthesizerOptions = {}) {
    this.numRandomCases = options.numRandomCases ?? DEFAULT_NUM_RANDOM_CASES;
    this.deadlineSeconds = options.perCallDeadlineSeconds ?? DEFAULT_DEADLINE_SECONDS;
    this.maxConstructionAttempts = options.maxConstructionAttempts ?? DEFAULT_CONSTRUCTION_ATTEMPTS;
    this.catalog = options.catalog ?? emptyCatalog();
    this.logger = options.logger ?? globalLogger;
    this.audit = options.audit ?? globalSynthesisAudit;
    this.values = options.values ?? new ValueSynthesizer({ logger: this.logger });
    this.oracle = options.oracle ?? new OracleRunner({ logger: this.logger });
    this.analyzer = options.analyzer ?? new StructureAnalyzer({ catalog: this.catalog, logger: this.logger });
  }

  /**
   * Boundary and random cases for a free function
   */
  async synthesizeFunction(fn: AnyCallable, name: string = fn.name): Promise<TestCase[]> {
    const signature = getAnnotation(fn) ?? this.catalog.functions[name] ?? aritySignature(name, fn.length);
    return this.logger.within({ target: name }, async () => {
      this.logger.startTimer(`function:${name}`);
      const cases = await this.sweep({
        target: name,
        parameters: signature.parameters,
        describe: FUNCTION_DESCRIBER,
        invoke: (inputs) => this.oracle.invoke(fn, inputs, this.deadlineSeconds),
        record: (inputs, result, description) => createTestCase(inputs, result, description),
      });
      this.logger.endTimer(`function:${name}`, `Synthesized cases for ${name}`);
      return cases;
    });
  }

  /**
   * Cases for the constructor, methods and accessors of a class, keyed by
   * member: the constructor under "constructor", accessors under
   * `get:<name>` and `set:<name>`
   */
  async synthesizeClass(cls: ClassConstructor): Promise<Map<string, ClassMethodTestCase[]>> {
    const description = this.analyzer.analyze(cls);
    const cases = new Map<string, ClassMethodTestCase[]>();
    if (description.error !== undefined) {
      this.logger.warn(`Skipping ${description.name}: analysis failed`, { error: description.error });
      return cases;
    }

    return this.logger.within({ target: description.name }, async () => {
      this.logger.startTimer(`class:${description.name}`);
      const ctorParameters = description.ctor?.parameters ?? [];
      const scope: ClassScope = {
        name: description.name,
        parameters: ctorParameters,
        construct: (args) =>
          this.oracle.deadline.runSync(() => Reflect.construct(cls, args), this.deadlineSeconds * 1000),
      };

      const construction = await this.construct(cls, description.name, ctorParameters, scope);
      cases.set(CONSTRUCTOR_KEY, await this.constructorCases(cls, description.name, ctorParameters, scope, construction));

      if (construction.status !== "timedOut") {
        for (const method of description.instanceMethods.values()) {
          cases.set(method.name, await this.instanceMethodCases(cls, description.name, method, construction, scope));
        }
      }
      for (const method of description.classBoundMethods.values()) {
        cases.set(method.name, await this.staticMethodCases(cls, description.name, method, true, scope));
      }
      for (const method of description.noInstanceMethods.values()) {
        cases.set(method.name, await this.staticMethodCases(cls, description.name, method, false, scope));
      }

      if (construction.status === "built") {
        await this.accessorCases(cls, description, construction.args, cases);
      }
      this.logger.endTimer(`class:${description.name}`, `Synthesized cases for ${description.name}`);
      return cases;
    });
  }

  /**
   * Cases for every function and class a loaded module exports
   */
  async synthesizeModule(namespace: Record<string, unknown>): Promise<ModuleCases> {
    const result: ModuleCases = { functions: {}, classes: {} };
    for (const [name, value] of Object.entries(namespace)) {
      if (name.startsWith("_")) {
        continue;
      }
      if (isClassDeclaration(value)) {
        result.classes[name] = await this.synthesizeClass(value);
      } else if (isCallable(value)) {
        result.functions[name] = await this.synthesizeFunction(value, name);
      }
    }
    this.logger.info("Synthesized module cases", {
      functions: Object.keys(result.functions).length,
      classes: Object.keys(result.classes).length,
    });
    return result;
  }

  private async sweep<R>(sweep: Sweep<R>): Promise<R[]> {
    const ledger = sweep.ledger ?? new InputLedger();
    const results: R[] = [];
    const collect = (recorded: R | undefined): void => {
      if (recorded !== undefined) {
        results.push(recorded);
      }
    };

    if (sweep.parameters.length === 0) {
      collect(await this.attempt(sweep, ledger, "boundary", [], sweep.describe.empty));
      return results;
    }

    for (let index = 0; index < sweep.parameters.length; index += 1) {
      const swept = sweep.parameters[index];
      for (const boundary of this.values.boundaryValues(swept.type)) {
        const inputs = sweep.parameters.map((parameter, position) =>
          position === index ? boundary : this.values.randomValue(parameter.type, sweep.scope)
        );
        const description = sweep.describe.boundary(swept.name, formatValue(boundary));
        collect(await this.attempt(sweep, ledger, "boundary", inputs, description));
      }
    }

    for (let draw = 0; draw < this.numRandomCases; draw += 1) {
      const inputs = this.values.randomInputs(sweep.parameters, sweep.scope);
      const description = sweep.describe.random(formatInputs(inputs));
      collect(await this.attempt(sweep, ledger, "random", inputs, description));
    }

    return results;
  }

  /**
   * One candidate: deduped, or invoked and then recorded or discarded
   */
  private async attempt<R>(
    sweep: Sweep<R>,
    ledger: InputLedger,
    phase: SynthesisPhase,
    inputs: unknown[],
    description: string
  ): Promise<R | undefined> {
    const recorded = cloneInputs(inputs);
    if (!ledger.add(recorded)) {
      this.audit.record(sweep.target, phase, "deduped", recorded);
      return undefined;
    }

    this.audit.record(sweep.target, phase, "invoked", recorded);
    const outcome = await sweep.invoke(inputs);

    switch (outcome.status) {
      case "timedOut":
        this.audit.record(sweep.target, phase, "discarded_timeout", recorded, { elapsedMs: outcome.elapsedMs });
        this.logger.warn(`Discarded candidate for ${sweep.target} after timeout`, {
          inputs: formatInputs(recorded),
          elapsedMs: outcome.elapsedMs,
        });
        return undefined;
      case "raised":
        this.audit.record(sweep.target, phase, "recorded_failure", recorded, { errorKind: outcome.errorKind });
        return sweep.record(
          recorded,
          { errorKind: outcome.errorKind, errorMessage: outcome.message },
          `${description} (raises ${outcome.errorKind})`
        );
      case "returned":
        this.audit.record(sweep.target, phase, "recorded_success", recorded);
        return sweep.record(recorded, { value: outcome.value }, description);
    }
  }

  /**
   * Find constructor arguments that produce an instance: no arguments when
   * nothing is required, then up to maxConstructionAttempts synthesized sets
   */
  private async construct(
    cls: ClassConstructor,
    className: string,
    parameters: ParameterDescriptor[],
    scope: ClassScope
  ): Promise<Construction> {
    const draws: Array<() => unknown[]> = [];
    if (!hasRequiredParameters(parameters)) {
      draws.push(() => []);
    }
    if (parameters.length > 0) {
      for (let attempt = 0; attempt < this.maxConstructionAttempts; attempt += 1) {
        draws.push(() => this.values.randomInputs(parameters, scope));
      }
    }

    let lastArgs: unknown[] = [];
    let raised: { errorKind: string; message: string; args: unknown[] } | undefined;
    let timedOutMs: number | undefined;
    for (const draw of draws) {
      const args = draw();
      lastArgs = cloneInputs(args);
      const outcome = await this.oracle.run(() => Reflect.construct(cls, args), this.deadlineSeconds);
      if (outcome.status === "returned") {
        return { status: "built", args: lastArgs };
      }
      if (outcome.status === "raised") {
        raised = { errorKind: outcome.errorKind, message: outcome.message, args: lastArgs };
      } else {
        timedOutMs = outcome.elapsedMs;
      }
    }

    if (raised === undefined && timedOutMs !== undefined) {
      this.logger.warn(`Could not construct ${className}: every attempt timed out`, { elapsedMs: timedOutMs });
      return { status: "timedOut", args: lastArgs, elapsedMs: timedOutMs };
    }

    const failure = new ConstructionFailure(
      className,
      raised?.errorKind ?? "Error",
      raised?.message ?? "no working constructor arguments"
    );
    this.logger.warn(failure.message, { code: failure.code });
    return { status: "failed", failure, args: raised?.args ?? lastArgs };
  }

  private async constructorCases(
    cls: ClassConstructor,
    className: string,
    parameters: ParameterDescriptor[],
    scope: ClassScope,
    construction: Construction
  ): Promise<ClassMethodTestCase[]> {
    const target = `${className}.${CONSTRUCTOR_KEY}`;
    const ledger = new InputLedger();
    const cases: ClassMethodTestCase[] = [];

    if (construction.status === "timedOut") {
      ledger.add(construction.args);
      this.audit.record(target, "construction", "discarded_timeout", construction.args, {
        elapsedMs: construction.elapsedMs,
      });
    } else if (construction.status === "failed") {
      ledger.add(construction.args);
      this.audit.record(target, "construction", "recorded_failure", construction.args, {
        errorKind: construction.failure.errorKind,
      });
      cases.push(
        createClassMethodTestCase({
          classType: cls,
          constructorInputs: construction.args,
          memberName: CONSTRUCTOR_KEY,
          memberInputs: [],
          result: { errorKind: construction.failure.errorKind, errorMessage: construction.failure.message },
          description: `Constructor with inputs: ${formatInputs(construction.args)} (raises ${construction.failure.errorKind})`,
        })
      );
    }

    const swept = await this.sweep({
      target,
      parameters,
      describe: memberDescriber("Constructor"),
      ledger,
      scope,
      invoke: (inputs) =>
        this.oracle.run(() => {
          Reflect.construct(cls, inputs);
          return null;
        }, this.deadlineSeconds),
      record: (inputs, result, description) =>
        createClassMethodTestCase({
          classType: cls,
          constructorInputs: inputs,
          memberName: CONSTRUCTOR_KEY,
          memberInputs: [],
          result,
          description,
        }),
    });
    return [...cases, ...swept];
  }

  private async instanceMethodCases(
    cls: ClassConstructor,
    className: string,
    method: MethodDescriptor,
    construction: Construction,
    scope: ClassScope
  ): Promise<ClassMethodTestCase[]> {
    const target = `${className}.${method.name}`;
    const label = `Instance method ${method.name}`;

    if (construction.status === "failed") {
      const { failure } = construction;
      this.audit.record(target, "construction", "recorded_failure", [], { errorKind: failure.errorKind });
      return [
        createClassMethodTestCase({
          classType: cls,
          constructorInputs: construction.args,
          memberName: method.name,
          memberInputs: [],
          result: { errorKind: failure.errorKind, errorMessage: failure.message },
          description: `${label} - constructor fails with ${failure.errorKind}`,
        }),
      ];
    }

    const ctorArgs = construction.args;
    return this.sweep({
      target,
      parameters: method.parameters,
      describe: memberDescriber(label),
      scope,
      invoke: (inputs) =>
        this.oracle.run(() => {
          const instance = Reflect.construct(cls, cloneInputs(ctorArgs));
          const member: unknown = Reflect.get(instance, method.name);
          if (!isCallable(member)) {
            throw new TypeError(`${method.name} is not a function`);
          }
          return Reflect.apply(member, instance, inputs);
        }, this.deadlineSeconds),
      record: (inputs, result, description) =>
        createClassMethodTestCase({
          classType: cls,
          constructorInputs: ctorArgs,
          memberName: method.name,
          memberInputs: inputs,
          result,
          description,
        }),
    });
  }

  /**
   * Static members run through the class itself; class-bound ones receive
   * it as `this`
   */
  private staticMethodCases(
    cls: ClassConstructor,
    className: string,
    method: MethodDescriptor,
    classBound: boolean,
    scope: ClassScope
  ): Promise<ClassMethodTestCase[]> {
    const label = `${classBound ? "Class-bound" : "No-instance"} method ${method.name}`;
    return this.sweep({
      target: `${className}.${method.name}`,
      parameters: method.parameters,
      describe: memberDescriber(label),
      scope,
      invoke: (inputs) =>
        this.oracle.run(() => {
          const member: unknown = Reflect.get(cls, method.name);
          if (!isCallable(member)) {
            throw new TypeError(`${method.name} is not a function`);
          }
          return Reflect.apply(member, classBound ? cls : undefined, inputs);
        }, this.deadlineSeconds),
      record: (inputs, result, description) =>
        createClassMethodTestCase({
          classType: cls,
          constructorInputs: [],
          memberName: method.name,
          memberInputs: inputs,
          result,
          description,
        }),
    });
  }

  /**
   * A getter yields one case; a setter sweeps values of the property type,
   * writes each one and records what the getter reads back
   */
  private async accessorCases(
    cls: ClassConstructor,
    description: ClassDescription,
    ctorArgs: unknown[],
    cases: Map<string, ClassMethodTestCase[]>
  ): Promise<void> {
    const fresh = (): unknown => Reflect.construct(cls, cloneInputs(ctorArgs));
    const recordAs =
      (memberName: string, accessor: AccessorKind) =>
      (inputs: unknown[], result: CaseResult, caseDescription: string): ClassMethodTestCase =>
        createClassMethodTestCase({
          classType: cls,
          constructorInputs: ctorArgs,
          memberName,
          memberInputs: inputs,
          result,
          description: caseDescription,
          accessor,
        });

    for (const property of description.properties.values()) {
      if (property.hasGetter) {
        const getter = await this.sweep({
          target: `${description.name}.${getterKey(property.name)}`,
          parameters: [],
          describe: getterDescriber(property.name),
          invoke: () => this.oracle.run(() => Reflect.get(Object(fresh()), property.name), this.deadlineSeconds),
          record: recordAs(property.name, "get"),
        });
        cases.set(getterKey(property.name), getter);
      }

      if (property.hasSetter) {
        const readBack = property.hasGetter;
        const setter = await this.sweep({
          target: `${description.name}.${setterKey(property.name)}`,
          parameters: [{ name: "value", type: property.type, optional: false }],
          describe: memberDescriber(`Property setter for ${property.name}`),
          invoke: (inputs) =>
            this.oracle.run(() => {
              const instance: object = Object(fresh());
              Reflect.set(instance, property.name, inputs[0]);
              return readBack ? Reflect.get(instance, property.name) : undefined;
            }, this.deadlineSeconds),
          record: recordAs(property.name, "set"),
        });
        cases.set(setterKey(property.name), setter);
      }
    }
  }
}
