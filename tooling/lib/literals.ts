/**
 * Restricted literal parser for user-entered values.
 *
 * Accepts numbers (optionally signed), true/false/null/undefined/NaN/Infinity,
 * quoted strings, template strings without substitutions, array literals and
 * object literals with plain keys. Nothing is evaluated.
 */

import { Node, Project, SourceFile, SyntaxKind } from "ts-morph";
import { LiteralSyntaxError } from "./errors";

const LITERAL_FILE = "__literal__.ts";
const FORBIDDEN_KEYS = new Set(["__proto__", "constructor", "prototype"]);

let sharedProject: Project | undefined;

function literalProject(): Project {
  if (!sharedProject) {
    sharedProject = new Project({ useInMemoryFileSystem: true, compilerOptions: { noLib: true } });
  }
  return sharedProject;
}

export function parseLiteral(text: string): unknown {
  const source = text.trim();
  if (source === "") {
    throw new LiteralSyntaxError(text, "empty input");
  }

  const project = literalProject();
  const sourceFile = project.createSourceFile(LITERAL_FILE, `(${source}\n);`, { overwrite: true });
  try {
    const expression = singleExpression(sourceFile, text);
    return convert(expression, text);
  } finally {
    project.removeSourceFile(sourceFile);
  }
}

/**
 * Like parseLiteral, but gives `fallback` for blank input
 */
export function parseLiteralOr(text: string | undefined, fallback: unknown): unknown {
  return text === undefined || text.trim() === "" ? fallback : parseLiteral(text);
}

function singleExpression(sourceFile: SourceFile, original: string): Node {
  const diagnostics = sourceFile.getProject().getProgram().getSyntacticDiagnostics(sourceFile);
  if (diagnostics.length > 0) {
    const first = diagnostics[0].getMessageText();
    throw new LiteralSyntaxError(original, typeof first === "string" ? first : first.getMessageText());
  }

  const statements = sourceFile.getStatements();
  const statement = statements[0];
  if (statements.length !== 1 || !Node.isExpressionStatement(statement)) {
    throw new LiteralSyntaxError(original, "expected a single value");
  }
  const wrapper = statement.getExpression();
  if (!Node.isParenthesizedExpression(wrapper)) {
    throw new LiteralSyntaxError(original, "expected a single value");
  }
  return wrapper.getExpression();
}

function convert(node: Node, original: string): unknown {
  if (Node.isParenthesizedExpression(node)) {
    return convert(node.getExpression(), original);
  }

  if (Node.isNumericLiteral(node)) {
    return node.getLiteralValue();
  }

  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return node.getLiteralValue();
  }

  if (Node.isPrefixUnaryExpression(node)) {
    const operator = node.getOperatorToken();
    if (operator !== SyntaxKind.MinusToken && operator !== SyntaxKind.PlusToken) {
      throw new LiteralSyntaxError(original, `operator ${node.getText()} is not allowed`);
    }
    const operand = convert(node.getOperand(), original);
    if (typeof operand !== "number") {
      throw new LiteralSyntaxError(original, "a sign must precede a number");
    }
    return operator === SyntaxKind.MinusToken ? -operand : operand;
  }

  switch (node.getKind()) {
    case SyntaxKind.TrueKeyword:
      return true;
    case SyntaxKind.FalseKeyword:
      return false;
    case SyntaxKind.NullKeyword:
      return null;
    default:
      break;
  }

  if (Node.isIdentifier(node)) {
    switch (node.getText()) {
      case "undefined":
        return undefined;
      case "NaN":
        return NaN;
      case "Infinity":
        return Infinity;
      default:
        throw new LiteralSyntaxError(original, `identifier ${node.getText()} is not a value`);
    }
  }

  if (Node.isArrayLiteralExpression(node)) {
    return node.getElements().map((element) => {
      if (Node.isSpreadElement(element) || Node.isOmittedExpression(element)) {
        throw new LiteralSyntaxError(original, "array holes and spreads are not allowed");
      }
      return convert(element, original);
    });
  }

  if (Node.isObjectLiteralExpression(node)) {
    const record: Record<string, unknown> = {};
    for (const property of node.getProperties()) {
      if (!Node.isPropertyAssignment(property)) {
        throw new LiteralSyntaxError(original, `object member ${property.getText()} is not a plain property`);
      }
      const key = propertyKey(property.getNameNode(), original);
      const initializer = property.getInitializer();
      if (!initializer) {
        throw new LiteralSyntaxError(original, `property ${key} has no value`);
      }
      record[key] = convert(initializer, original);
    }
    return record;
  }

  throw new LiteralSyntaxError(original, `${node.getKindName()} is not a literal`);
}

function propertyKey(nameNode: Node, original: string): string {
  let key: string | undefined;
  if (Node.isIdentifier(nameNode)) {
    key = nameNode.getText();
  } else if (Node.isStringLiteral(nameNode) || Node.isNoSubstitutionTemplateLiteral(nameNode)) {
    key = nameNode.getLiteralText();
  } else if (Node.isNumericLiteral(nameNode)) {
    key = String(nameNode.getLiteralValue());
  }
  if (key === undefined) {
    throw new LiteralSyntaxError(original, `computed key ${nameNode.getText()} is not allowed`);
  }
  if (FORBIDDEN_KEYS.has(key)) {
    throw new LiteralSyntaxError(original, `key ${key} is not allowed`);
  }
  return key;
}
