/**
 * Class structure analysis.
 *
 * Walks the prototype chain of a class and sorts its members into disjoint
 * buckets. Static members of every class in the chain are collected first,
 * so a base-class pass never re-adds a name a subclass already claimed.
 */

import { Project, SyntaxKind } from "ts-morph";
import { aritySignature, getAnnotation, t } from "./descriptors";
import { AnalysisFault, describeThrown } from "./errors";
import { globalLogger, Logger } from "./logger";
import {
  AnyCallable,
  CallableSignature,
  ClassConstructor,
  ClassDescription,
  ClassSignature,
  ConstructorDescriptor,
  MethodDescriptor,
  SignatureCatalog,
  TypeDescriptor,
} from "./types";
import { emptyCatalog } from "./signatures";
import { isCallable, isClassDeclaration, isConstructor, sourceOf } from "./utils";

const STATIC_BUILTINS = new Set(["length", "name", "prototype", "caller", "arguments"]);
export const SPECIAL_MEMBER_NAMES = new Set(["toString", "valueOf", "toJSON", "toLocaleString"]);
const USES_THIS = /\b(this|super)\b/;
const MEMBER_SOURCE_FILE = "__member__.ts";

let memberProject: Project | undefined;

export type StructureAnalyzerOptions = {
  catalog?: SignatureCatalog;
  logger?: Logger;
};

export class StructureAnalyzer {
  private catalog: SignatureCatalog;
  private logger: Logger;

  constructor(options: StructureAnalyzerOptions = {}) {
    this.catalog = options.catalog ?? emptyCatalog();
    this.logger = options.logger ?? globalLogger;
  }

  /**
   * Describe a class. Never throws: a class that cannot be inspected at all
   * yields a description with only its name and `error` set.
   */
  analyze(cls: ClassConstructor): ClassDescription {
    const name = safeName(cls);
    try {
      const chain = ancestorChain(cls);
      const description = emptyDescription(name);
      description.baseClasses = chain.slice(1).map((ancestor) => safeName(ancestor));

      const processed = new Set<string>();
      for (const owner of chain) {
        this.guarded(name, safeName(owner), () => this.collectStatics(owner, description, processed));
      }
      for (const owner of chain) {
        this.guarded(name, safeName(owner), () => this.collectPrototype(owner, description, processed));
      }
      description.ctor = this.resolveConstructor(chain) ?? { parameters: [], definedIn: name };

      this.logger.debug("Analyzed class", {
        target: name,
        instanceMethods: description.instanceMethods.size,
        classBoundMethods: description.classBoundMethods.size,
        noInstanceMethods: description.noInstanceMethods.size,
        properties: description.properties.size,
      });
      return description;
    } catch (error) {
      const fault = new AnalysisFault(`Could not analyze class ${name}`, { target: name }, error);
      this.logger.error(fault.message, { error: describeThrown(error) });
      return { ...emptyDescription(name), error: describeThrown(error) };
    }
  }

  private collectStatics(owner: ClassConstructor, description: ClassDescription, processed: Set<string>): void {
    const ownerName = safeName(owner);
    const signature = this.catalog.classes[ownerName];

    for (const key of Object.getOwnPropertyNames(owner)) {
      if (STATIC_BUILTINS.has(key) || processed.has(key)) {
        continue;
      }
      this.guarded(ownerName, key, () => {
        const property = Object.getOwnPropertyDescriptor(owner, key);
        const value: unknown = property?.value;
        if (!isCallable(value) || isClassDeclaration(value)) {
          return;
        }
        processed.add(key);
        if (isHidden(key, signature)) {
          return;
        }
        const method = this.describeMethod(key, value, ownerName, signature);
        const catalogued = signature?.methods[key];
        const usesThis = catalogued?.isStatic ? catalogued.usesThis : referencesClass(sourceOf(value));
        (usesThis ? description.classBoundMethods : description.noInstanceMethods).set(key, method);
      });
    }
  }

  private collectPrototype(owner: ClassConstructor, description: ClassDescription, processed: Set<string>): void {
    const ownerName = safeName(owner);
    const signature = this.catalog.classes[ownerName];
    const prototype: unknown = owner.prototype;
    if (typeof prototype !== "object" || prototype === null) {
      return;
    }

    for (const key of Reflect.ownKeys(prototype)) {
      if (key === "constructor") {
        continue;
      }
      const memberName = typeof key === "symbol" ? key.toString() : key;
      if (processed.has(memberName)) {
        continue;
      }
      this.guarded(ownerName, memberName, () => {
        const property = Reflect.getOwnPropertyDescriptor(prototype, key);
        if (!property) {
          return;
        }
        processed.add(memberName);
        if (typeof key === "string" && isHidden(key, signature)) {
          return;
        }

        if (property.get || property.set) {
          description.properties.set(memberName, {
            name: memberName,
            type: this.accessorType(memberName, property, signature),
            hasGetter: property.get !== undefined,
            hasSetter: property.set !== undefined,
            definedIn: ownerName,
          });
          return;
        }

        const value: unknown = property.value;
        if (!isCallable(value)) {
          return;
        }
        const method = this.describeMethod(memberName, value, ownerName, signature);
        if (typeof key === "symbol" || SPECIAL_MEMBER_NAMES.has(key)) {
          description.specialMembers.set(memberName, method);
        } else {
          description.instanceMethods.set(memberName, method);
        }
      });
    }
  }

  /**
   * First class in the chain that declares a constructor. A class with a
   * catalog entry but no explicit constructor inherits its base's.
   */
  private resolveConstructor(chain: ClassConstructor[]): ConstructorDescriptor | undefined {
    for (const owner of chain) {
      const ownerName = safeName(owner);
      const annotation = getAnnotation(owner);
      if (annotation) {
        return { parameters: annotation.parameters, definedIn: ownerName };
      }
      const signature = this.catalog.classes[ownerName];
      if (signature) {
        if (signature.constructorParameters) {
          return { parameters: signature.constructorParameters, definedIn: ownerName };
        }
        continue;
      }
      return { parameters: aritySignature(ownerName, owner.length).parameters, definedIn: ownerName };
    }
    return undefined;
  }

  private describeMethod(
    name: string,
    fn: AnyCallable,
    ownerName: string,
    signature: ClassSignature | undefined
  ): MethodDescriptor {
    const resolved: CallableSignature =
      getAnnotation(fn) ?? signature?.methods[name] ?? aritySignature(name, fn.length);
    return {
      name,
      parameters: resolved.parameters,
      returnType: resolved.returnType,
      definedIn: ownerName,
    };
  }

  private accessorType(
    name: string,
    property: PropertyDescriptor,
    signature: ClassSignature | undefined
  ): TypeDescriptor {
    const setterAnnotation = getAnnotation(property.set);
    const annotatedParameter = setterAnnotation?.parameters[0];
    if (annotatedParameter) {
      return annotatedParameter.type;
    }
    const getterAnnotation = getAnnotation(property.get);
    if (getterAnnotation && getterAnnotation.returnType.kind !== "unknown") {
      return getterAnnotation.returnType;
    }
    return signature?.accessors[name]?.type ?? t.unknown();
  }

  private guarded(target: string, member: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      const fault = new AnalysisFault(`Skipped ${target}.${member}`, { target, member }, error);
      this.logger.warn(fault.message, { error: describeThrown(error), code: fault.code });
    }
  }
}

/**
 * The class followed by its ancestors, most-derived first, stopping before
 * Function.prototype
 */
export function ancestorChain(cls: ClassConstructor): ClassConstructor[] {
  const chain: ClassConstructor[] = [];
  let current: unknown = cls;
  while (isConstructor(current) && current !== Function.prototype && !chain.includes(current)) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

/**
 * Whether the source of an uncatalogued static uses `this` or `super`.
 * Method shorthand parses inside an object literal, arrows and function
 * expressions on their own. Source that parses neither way gets a word
 * match, which also sees comments and strings.
 */
export function referencesClass(source: string): boolean {
  if (!memberProject) {
    memberProject = new Project({ useInMemoryFileSystem: true, compilerOptions: { noLib: true } });
  }
  const project = memberProject;
  for (const wrapped of [`({ ${source}\n});`, `(${source}\n);`]) {
    const sourceFile = project.createSourceFile(MEMBER_SOURCE_FILE, wrapped, { overwrite: true });
    try {
      if (project.getProgram().getSyntacticDiagnostics(sourceFile).length === 0) {
        return (
          sourceFile.getDescendantsOfKind(SyntaxKind.ThisKeyword).length > 0 ||
          sourceFile.getDescendantsOfKind(SyntaxKind.SuperKeyword).length > 0
        );
      }
    } finally {
      project.removeSourceFile(sourceFile);
    }
  }
  return USES_THIS.test(source);
}

function emptyDescription(name: string): ClassDescription {
  return {
    name,
    baseClasses: [],
    instanceMethods: new Map(),
    classBoundMethods: new Map(),
    noInstanceMethods: new Map(),
    properties: new Map(),
    specialMembers: new Map(),
  };
}

function isHidden(name: string, signature: ClassSignature | undefined): boolean {
  if (name.startsWith("_")) {
    return true;
  }
  const visibility = signature?.methods[name]?.visibility ?? signature?.accessors[name]?.visibility;
  return visibility !== undefined && visibility !== "public";
}

function safeName(cls: ClassConstructor): string {
  try {
    return cls.name || "<anonymous>";
  } catch {
    return "<anonymous>";
  }
}
