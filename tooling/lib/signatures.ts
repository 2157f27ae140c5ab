/**
 * Reads declared signatures from TypeScript sources into a SignatureCatalog.
 *
 * Type nodes are mapped onto TypeDescriptor; unannotated parameters fall back
 * to the type checker.
 */

import {
  ClassDeclaration,
  Node,
  ParameterDeclaration,
  Project,
  Scope,
  SourceFile,
  SyntaxKind,
  Type,
  TypeNode,
  TypeReferenceNode,
  UnionTypeNode,
} from "ts-morph";
import { sameType, t } from "./descriptors";
import { AnalysisFault, describeThrown } from "./errors";
import { globalLogger, Logger } from "./logger";
import {
  AccessorSignature,
  ClassSignature,
  MethodSignature,
  ParameterDescriptor,
  SignatureCatalog,
  TypeDescriptor,
  Visibility,
} from "./types";
import { normalize } from "./utils";

const INTEGER_ALIASES = new Set(["int", "Int", "integer", "Integer"]);
const FLOAT_ALIASES = new Set(["float", "Float", "double", "Double"]);
const ARRAY_NAMES = new Set(["Array", "ReadonlyArray"]);
const SET_NAMES = new Set(["Set", "ReadonlySet"]);
const MAP_NAMES = new Set(["Map", "ReadonlyMap"]);

export type SignatureReaderOptions = {
  project?: Project;
  numberKind?: "integer" | "float";
  logger?: Logger;
};

export class SignatureReader {
  private project: Project;
  private numberKind: "integer" | "float";
  private logger: Logger;

  constructor(options: SignatureReaderOptions = {}) {
    this.project =
      options.project ??
      new Project({
        skipAddingFilesFromTsConfig: true,
        compilerOptions: { strict: true },
      });
    this.numberKind = options.numberKind ?? "integer";
    this.logger = options.logger ?? globalLogger;
  }

  readFile(path: string): SignatureCatalog {
    const sourceFile = this.project.getSourceFile(path) ?? this.project.addSourceFileAtPath(path);
    return this.readSourceFile(sourceFile);
  }

  /**
   * Read signatures from source text that need not exist on disk
   */
  readSource(fileName: string, text: string): SignatureCatalog {
    const sourceFile = this.project.createSourceFile(fileName, text, { overwrite: true });
    return this.readSourceFile(sourceFile);
  }

  readSourceFile(sourceFile: SourceFile): SignatureCatalog {
    const catalog = emptyCatalog();
    const mapper = new TypeNodeMapper(sourceFile, this.numberKind);

    for (const fn of sourceFile.getFunctions()) {
      const name = fn.getName();
      if (!name || catalog.functions[name]) {
        continue;
      }
      catalog.functions[name] = {
        name,
        parameters: fn.getParameters().map((parameter) => mapper.parameter(parameter)),
        returnType: mapper.map(fn.getReturnTypeNode()),
      };
    }

    for (const declaration of sourceFile.getVariableDeclarations()) {
      const initializer = declaration.getInitializer();
      if (!initializer || !(Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) {
        continue;
      }
      const name = declaration.getName();
      if (catalog.functions[name]) {
        continue;
      }
      catalog.functions[name] = {
        name,
        parameters: initializer.getParameters().map((parameter) => mapper.parameter(parameter)),
        returnType: mapper.map(initializer.getReturnTypeNode()),
      };
    }

    for (const declaration of sourceFile.getClasses()) {
      const name = declaration.getName();
      if (!name) {
        continue;
      }
      try {
        catalog.classes[name] = this.readClass(name, declaration, mapper);
      } catch (error) {
        const fault = new AnalysisFault(
          `Could not read declaration of ${name}`,
          { target: name, component: "SignatureReader" },
          error
        );
        this.logger.warn(fault.message, { error: describeThrown(error) });
      }
    }

    this.logger.debug("Read signatures", {
      file: sourceFile.getBaseName(),
      functions: Object.keys(catalog.functions).length,
      classes: Object.keys(catalog.classes).length,
    });
    return catalog;
  }

  private readClass(name: string, declaration: ClassDeclaration, mapper: TypeNodeMapper): ClassSignature {
    const signature: ClassSignature = { name, methods: {}, accessors: {} };

    const base = declaration.getExtends();
    if (base) {
      signature.baseName = normalize(base.getExpression().getText());
    }

    const ctor = declaration.getConstructors()[0];
    if (ctor) {
      signature.constructorParameters = ctor.getParameters().map((parameter) => mapper.parameter(parameter));
    }

    for (const method of declaration.getMethods()) {
      const methodName = method.getName();
      if (signature.methods[methodName]) {
        continue;
      }
      const entry: MethodSignature = {
        name: methodName,
        parameters: method.getParameters().map((parameter) => mapper.parameter(parameter)),
        returnType: mapper.map(method.getReturnTypeNode()),
        isStatic: method.isStatic(),
        usesThis: method.getDescendantsOfKind(SyntaxKind.ThisKeyword).length > 0,
        visibility: visibilityOf(methodName, method.getScope()),
      };
      signature.methods[methodName] = entry;
    }

    for (const getter of declaration.getGetAccessors()) {
      const accessor = accessorEntry(signature.accessors, getter.getName(), getter.isStatic(), getter.getScope());
      accessor.hasGetter = true;
      const returnType = getter.getReturnTypeNode();
      if (returnType && accessor.type.kind === "unknown") {
        accessor.type = mapper.map(returnType);
      }
    }

    for (const setter of declaration.getSetAccessors()) {
      const accessor = accessorEntry(signature.accessors, setter.getName(), setter.isStatic(), setter.getScope());
      accessor.hasSetter = true;
      const parameter = setter.getParameters()[0];
      if (parameter && accessor.type.kind === "unknown") {
        accessor.type = mapper.parameter(parameter).type;
      }
    }

    return signature;
  }
}

function accessorEntry(
  accessors: Record<string, AccessorSignature>,
  name: string,
  isStatic: boolean,
  scope: Scope
): AccessorSignature {
  const existing = accessors[name];
  if (existing) {
    return existing;
  }
  const created: AccessorSignature = {
    name,
    type: t.unknown(),
    hasGetter: false,
    hasSetter: false,
    isStatic,
    visibility: visibilityOf(name, scope),
  };
  accessors[name] = created;
  return created;
}

function visibilityOf(name: string, scope: Scope): Visibility {
  if (name.startsWith("#") || scope === Scope.Private) {
    return "private";
  }
  return scope === Scope.Protected ? "protected" : "public";
}

/**
 * Maps type nodes of one source file onto TypeDescriptor
 */
class TypeNodeMapper {
  constructor(private sourceFile: SourceFile, private numberKind: "integer" | "float") {}

  parameter(parameter: ParameterDeclaration): ParameterDescriptor {
    const typeNode = parameter.getTypeNode();
    const type = typeNode ? this.map(typeNode) : this.fromType(parameter.getType());
    return {
      name: parameter.getName(),
      type,
      optional: parameter.isOptional() || parameter.hasInitializer() || parameter.isRestParameter(),
    };
  }

  map(node: TypeNode | undefined, seen: Set<string> = new Set()): TypeDescriptor {
    if (!node) {
      return t.unknown();
    }

    switch (node.getKind()) {
      case SyntaxKind.NumberKeyword:
        return this.numberType();
      case SyntaxKind.StringKeyword:
        return t.text();
      case SyntaxKind.BooleanKeyword:
        return t.boolean();
      default:
        break;
    }

    if (Node.isParenthesizedTypeNode(node) || Node.isTypeOperatorTypeNode(node)) {
      return this.map(node.getTypeNode(), seen);
    }

    if (Node.isLiteralTypeNode(node)) {
      const literal = node.getLiteral();
      if (Node.isStringLiteral(literal) || Node.isNoSubstitutionTemplateLiteral(literal)) {
        return t.text();
      }
      if (Node.isNumericLiteral(literal)) {
        return Number.isInteger(literal.getLiteralValue()) ? t.integer() : t.float();
      }
      if (literal.getKind() === SyntaxKind.TrueKeyword || literal.getKind() === SyntaxKind.FalseKeyword) {
        return t.boolean();
      }
      return t.unknown(normalize(node.getText()));
    }

    if (Node.isArrayTypeNode(node)) {
      return t.list(this.map(node.getElementTypeNode(), seen));
    }

    if (Node.isTupleTypeNode(node)) {
      return t.tuple(
        ...node.getElements().map((element) =>
          this.map(Node.isNamedTupleMember(element) ? element.getTypeNode() : element, seen)
        )
      );
    }

    if (Node.isUnionTypeNode(node)) {
      return this.union(node, seen);
    }

    if (Node.isTypeLiteral(node)) {
      const index = node.getIndexSignatures()[0];
      if (index && node.getMembers().length === 1) {
        return t.record(this.map(index.getKeyTypeNode(), seen), this.map(index.getReturnTypeNode(), seen));
      }
      return t.unknown(normalize(node.getText()));
    }

    if (Node.isTypeReference(node)) {
      return this.reference(node, seen);
    }

    return t.unknown(normalize(node.getText()));
  }

  private union(node: UnionTypeNode, seen: Set<string>): TypeDescriptor {
    const members = node
      .getTypeNodes()
      .filter((member) => !isNullish(member))
      .map((member) => this.map(member, seen));
    const first = members[0];
    if (first && members.every((member) => sameType(member, first))) {
      return first;
    }
    return t.unknown(normalize(node.getText()));
  }

  private reference(node: TypeReferenceNode, seen: Set<string>): TypeDescriptor {
    const name = node.getTypeName().getText();
    const args = node.getTypeArguments();

    if (INTEGER_ALIASES.has(name)) return t.integer();
    if (FLOAT_ALIASES.has(name)) return t.float();

    if (ARRAY_NAMES.has(name)) {
      return t.list(this.map(args[0], seen));
    }
    if (SET_NAMES.has(name)) {
      return t.set(this.map(args[0], seen));
    }
    if (MAP_NAMES.has(name)) {
      return t.map(this.map(args[0], seen), this.map(args[1], seen));
    }
    if (name === "Record") {
      return t.record(this.map(args[0], seen), this.map(args[1], seen));
    }

    const alias = this.sourceFile.getTypeAlias(name);
    if (alias && !seen.has(name)) {
      const next = new Set(seen);
      next.add(name);
      return this.map(alias.getTypeNode(), next);
    }

    if (this.sourceFile.getClass(name) || node.getType().isClass()) {
      return t.instanceOf(name);
    }

    return t.unknown(normalize(node.getText()));
  }

  /**
   * Descriptor for a checker type, used when a parameter carries no annotation
   */
  fromType(type: Type): TypeDescriptor {
    if (type.isNumber() || type.isNumberLiteral()) return this.numberType();
    if (type.isString() || type.isStringLiteral()) return t.text();
    if (type.isBoolean() || type.isBooleanLiteral()) return t.boolean();

    const elementType = type.getArrayElementType();
    if (elementType) {
      return t.list(this.fromType(elementType));
    }
    if (type.isTuple()) {
      return t.tuple(...type.getTupleElements().map((element) => this.fromType(element)));
    }
    if (type.isClass()) {
      const symbol = type.getSymbol();
      return symbol ? t.instanceOf(symbol.getName()) : t.unknown(type.getText());
    }
    return type.isAny() ? t.unknown() : t.unknown(type.getText());
  }

  private numberType(): TypeDescriptor {
    return this.numberKind === "float" ? t.float() : t.integer();
  }
}

function isNullish(node: TypeNode): boolean {
  if (node.getKind() === SyntaxKind.UndefinedKeyword || node.getKind() === SyntaxKind.NullKeyword) {
    return true;
  }
  return Node.isLiteralTypeNode(node) && node.getLiteral().getKind() === SyntaxKind.NullKeyword;
}

export function emptyCatalog(): SignatureCatalog {
  return { functions: {}, classes: {} };
}
