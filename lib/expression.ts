/**
 * TypeScript type expressions as forward references, e.g. `"Tree[] | null"`
 *
 * The text is parsed with ts-morph into the raw hint vocabulary. Names that
 * are not keywords or builtin generics stay as name strings and are resolved
 * later like any other forward reference.
 */

import {
  Node,
  Project,
  SyntaxKind,
  type BigIntLiteral,
  type SourceFile,
  type TypeLiteralNode,
  type TypeNode,
  type TypeReferenceNode,
} from "ts-morph";
import { UnsupportedSpecificationError } from "./errors";
import { Forms, subscript } from "./forms";
import type { LiteralValue } from "./types";
import { isIdentifier } from "./utils";

/**
 * Hints for the keyword types a forward name may spell
 */
export const KEYWORD_HINTS: ReadonlyMap<string, unknown> = new Map<string, unknown>([
  ["number", Number],
  ["string", String],
  ["boolean", Boolean],
  ["bigint", BigInt],
  ["symbol", Symbol],
  ["object", Object],
  ["unknown", Forms.Unknown],
  ["any", Forms.Any],
  ["never", Forms.Never],
  ["undefined", undefined],
  ["void", undefined],
  ["null", null],
]);

const KEYWORD_KINDS: ReadonlyMap<SyntaxKind, string> = new Map([
  [SyntaxKind.NumberKeyword, "number"],
  [SyntaxKind.StringKeyword, "string"],
  [SyntaxKind.BooleanKeyword, "boolean"],
  [SyntaxKind.BigIntKeyword, "bigint"],
  [SyntaxKind.SymbolKeyword, "symbol"],
  [SyntaxKind.ObjectKeyword, "object"],
  [SyntaxKind.UnknownKeyword, "unknown"],
  [SyntaxKind.AnyKeyword, "any"],
  [SyntaxKind.NeverKeyword, "never"],
  [SyntaxKind.UndefinedKeyword, "undefined"],
  [SyntaxKind.VoidKeyword, "void"],
]);

const GENERIC_ORIGINS: ReadonlyMap<string, { origin: unknown; arity: number }> = new Map<string, { origin: unknown; arity: number }>([
  ["Array", { origin: Array, arity: 1 }],
  ["ReadonlyArray", { origin: Array, arity: 1 }],
  ["Set", { origin: Set, arity: 1 }],
  ["ReadonlySet", { origin: Set, arity: 1 }],
  ["Map", { origin: Map, arity: 2 }],
  ["ReadonlyMap", { origin: Map, arity: 2 }],
  ["Record", { origin: Forms.Record, arity: 2 }],
]);

const ALIAS_NAME = "__Hint";

let project: Project | undefined;
let fileCounter = 0;
const parsed = new Map<string, unknown>();

function getProject(): Project {
  if (!project) {
    project = new Project({ useInMemoryFileSystem: true });
  }
  return project;
}

/**
 * Parse a type expression into a raw hint. Results are memoized per text so
 * the same expression always yields the same hint objects.
 */
export function parseTypeExpression(text: string, hintPath: string = "hint"): unknown {
  const source = text.trim();
  if (parsed.has(source)) {
    return parsed.get(source);
  }

  const morph = getProject();
  const tempSource = morph.createSourceFile(`__spotcheck_expr_${fileCounter++}.ts`, `type ${ALIAS_NAME} = ${source};`, {
    overwrite: true,
  });
  try {
    assertParses(morph, tempSource, source, hintPath);
    const typeNode = tempSource.getTypeAlias(ALIAS_NAME)?.getTypeNode();
    if (!typeNode || tempSource.getStatements().length !== 1) {
      throw new UnsupportedSpecificationError(source, hintPath, "not a single type expression");
    }
    const hint = new ExpressionLowering(source, hintPath).lower(typeNode);
    parsed.set(source, hint);
    return hint;
  } finally {
    tempSource.delete();
  }
}

function assertParses(morph: Project, sourceFile: SourceFile, source: string, hintPath: string): void {
  const diagnostics = morph.getProgram().getSyntacticDiagnostics(sourceFile);
  if (diagnostics.length === 0) {
    return;
  }
  const first = diagnostics[0].getMessageText();
  const message = typeof first === "string" ? first : first.getMessageText();
  throw new UnsupportedSpecificationError(source, hintPath, `invalid type expression: ${message}`);
}

/** Compiler text is base ten with separators removed, e.g. `1000n` for `1_000n` */
function bigIntValue(literal: BigIntLiteral): bigint {
  return BigInt(literal.compilerNode.text.slice(0, -1));
}

class ExpressionLowering {
  constructor(
    private readonly source: string,
    private readonly hintPath: string
  ) {}

  lower(node: TypeNode): unknown {
    if (Node.isParenthesizedTypeNode(node)) {
      return this.lower(node.getTypeNode());
    }

    if (Node.isUnionTypeNode(node)) {
      const members = node.getTypeNodes().map((member) => this.lower(member));
      return subscript(Forms.Union, members);
    }

    if (Node.isArrayTypeNode(node)) {
      return subscript(Array, [this.lower(node.getElementTypeNode())]);
    }

    if (Node.isTypeOperatorTypeNode(node) && node.getOperator() === SyntaxKind.ReadonlyKeyword) {
      return this.lower(node.getTypeNode());
    }

    if (Node.isTupleTypeNode(node)) {
      return subscript(
        Forms.Tuple,
        node.getElements().map((element) => {
          const kind = element.getKind();
          if (kind === SyntaxKind.OptionalType || kind === SyntaxKind.RestType) {
            throw this.unsupported("optional and rest tuple elements are not supported");
          }
          if (!Node.isNamedTupleMember(element)) {
            return this.lower(element);
          }
          const inner = element.getTypeNode();
          if (!inner || element.hasQuestionToken() || element.getDotDotDotToken()) {
            throw this.unsupported("optional and rest tuple elements are not supported");
          }
          return this.lower(inner);
        })
      );
    }

    if (Node.isLiteralTypeNode(node)) {
      return subscript(Forms.Literal, [this.literalValue(node.getLiteral())]);
    }

    if (Node.isTypeLiteral(node)) {
      return this.lowerTypeLiteral(node);
    }

    if (Node.isFunctionTypeNode(node)) {
      return subscript(Forms.Callable, []);
    }

    if (Node.isTypeReference(node)) {
      return this.lowerReference(node);
    }

    const keyword = KEYWORD_KINDS.get(node.getKind());
    if (keyword !== undefined) {
      return KEYWORD_HINTS.get(keyword);
    }

    throw this.unsupported(`unsupported type syntax ${JSON.stringify(node.getText())}`);
  }

  private literalValue(literal: Node): LiteralValue {
    if (Node.isStringLiteral(literal) || Node.isNoSubstitutionTemplateLiteral(literal)) {
      return literal.getLiteralValue();
    }
    if (Node.isNumericLiteral(literal)) {
      return literal.getLiteralValue();
    }
    if (Node.isBigIntLiteral(literal)) {
      return bigIntValue(literal);
    }
    if (Node.isPrefixUnaryExpression(literal) && literal.getOperatorToken() === SyntaxKind.MinusToken) {
      const operand = literal.getOperand();
      if (Node.isNumericLiteral(operand)) {
        return -operand.getLiteralValue();
      }
      if (Node.isBigIntLiteral(operand)) {
        return -bigIntValue(operand);
      }
    }
    switch (literal.getKind()) {
      case SyntaxKind.TrueKeyword:
        return true;
      case SyntaxKind.FalseKeyword:
        return false;
      case SyntaxKind.NullKeyword:
        return null;
      default:
        throw this.unsupported(`unsupported literal ${JSON.stringify(literal.getText())}`);
    }
  }

  private lowerTypeLiteral(node: TypeLiteralNode): unknown {
    const members = node.getMembers();
    const [only] = members;
    if (members.length === 1 && Node.isIndexSignatureDeclaration(only)) {
      const keyType = only.getKeyTypeNode();
      const valueType = only.getReturnTypeNode();
      return subscript(Forms.Record, [this.lower(keyType), valueType ? this.lower(valueType) : Forms.Unknown]);
    }

    const keys: string[] = [];
    const args: unknown[] = [];
    for (const member of members) {
      if (!Node.isPropertySignature(member)) {
        throw this.unsupported("object types may only declare properties");
      }
      const nameNode = member.getNameNode();
      const key =
        Node.isStringLiteral(nameNode) || Node.isNoSubstitutionTemplateLiteral(nameNode)
          ? nameNode.getLiteralValue()
          : nameNode.getText();
      const typeNode = member.getTypeNode();
      const hint = typeNode ? this.lower(typeNode) : Forms.Unknown;
      keys.push(key);
      args.push(member.hasQuestionToken() ? subscript(Forms.Optional, [hint]) : hint);
    }
    return subscript(Forms.Shape, args, keys);
  }

  private lowerReference(node: TypeReferenceNode): unknown {
    const name = node.getTypeName().getText();
    const typeArguments = node.getTypeArguments();
    const generic = GENERIC_ORIGINS.get(name);
    if (generic) {
      if (typeArguments.length !== generic.arity) {
        throw this.unsupported(`${name} takes ${generic.arity} type argument(s), got ${typeArguments.length}`);
      }
      return subscript(
        generic.origin,
        typeArguments.map((argument) => this.lower(argument))
      );
    }
    if (typeArguments.length > 0) {
      throw this.unsupported(`generic type ${name} is not supported`);
    }
    if (!isIdentifier(name)) {
      throw this.unsupported(`qualified name ${name} must be defined in scope`);
    }
    return name;
  }

  private unsupported(reason: string): UnsupportedSpecificationError {
    return new UnsupportedSpecificationError(this.source, this.hintPath, reason);
  }
}
