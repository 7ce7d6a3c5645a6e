import Parser from "tree-sitter";
import CSharp from "tree-sitter-c-sharp";
import {
  CallTarget,
  CatchClause,
  ClassDeclaration,
  CompilationUnit,
  Expression,
  MethodDeclaration,
  Statement,
  StatementKind,
  ConditionalStatement,
  SwitchCase,
  TryStatement,
} from "../../../ir/statementIr";
import { SourceParseError } from "../../errors";
import { getLogger } from "../../utils/Logger";

// Long strings are fed to the native parser in chunks.
const MAX_DIRECT_PARSE_LENGTH = 32 * 1024;
const PARSE_CHUNK_SIZE = 4096;

const IGNORED_NODE_TYPES = new Set(["comment", "{", "}", ";"]);

function isIgnorable(node: Parser.SyntaxNode): boolean {
  return IGNORED_NODE_TYPES.has(node.type) || node.type.startsWith("preproc");
}

/**
 * `throw_statement` -> `Throw`, `local_function_statement` -> `LocalFunction`.
 */
export function displayNameForNodeType(type: string): string {
  return type
    .replace(/_statement$/, "")
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join("");
}

/**
 * Builds the statement tree the flowchart generator consumes from C# source.
 */
export class CSharpAstParser {
  private readonly log = getLogger("CSharpAstParser");

  private constructor(private readonly parser: Parser) {}

  public static create(): CSharpAstParser {
    const parser = new Parser();
    try {
      parser.setLanguage(CSharp);
    } catch (error) {
      throw new SourceParseError(
        `C# grammar could not be loaded: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
    return new CSharpAstParser(parser);
  }

  public parse(sourceCode: string): CompilationUnit {
    const tree =
      sourceCode.length < MAX_DIRECT_PARSE_LENGTH
        ? this.parser.parse(sourceCode)
        : this.parser.parse((index: number) =>
            sourceCode.slice(index, index + PARSE_CHUNK_SIZE)
          );
    const classes = tree.rootNode
      .descendantsOfType("class_declaration")
      .map((classNode) => this.toClassDeclaration(classNode));

    this.log.debug(`Parsed ${classes.length} class declaration(s)`);
    return { classes };
  }

  public listMethods(sourceCode: string): string[] {
    const unit = this.parse(sourceCode);
    return unit.classes[0]?.methods.map((m) => m.name) ?? [];
  }

  private toClassDeclaration(classNode: Parser.SyntaxNode): ClassDeclaration {
    return {
      name: classNode.childForFieldName("name")?.text ?? "[anonymous class]",
      methods: classNode
        .descendantsOfType("method_declaration")
        .map((m) => this.toMethodDeclaration(m)),
    };
  }

  private toMethodDeclaration(methodNode: Parser.SyntaxNode): MethodDeclaration {
    const name = methodNode.childForFieldName("name")?.text ?? "[method]";
    const body =
      methodNode.childForFieldName("body") ??
      methodNode.namedChildren.find(
        (child) =>
          child.type === "block" || child.type === "arrow_expression_clause"
      );

    if (!body) {
      return { name };
    }

    if (body.type === "arrow_expression_clause") {
      const expression = body.namedChildren[0];
      return {
        name,
        body: expression
          ? [
              {
                kind: StatementKind.EXPRESSION,
                expression: this.toExpression(expression),
              },
            ]
          : [],
      };
    }

    return { name, body: this.toStatements(body.namedChildren) };
  }

  private toStatements(nodes: Parser.SyntaxNode[]): Statement[] {
    return nodes
      .filter((node) => !isIgnorable(node))
      .map((node) => this.toStatement(node));
  }

  private toStatement(node: Parser.SyntaxNode): Statement {
    switch (node.type) {
      case "block":
        return {
          kind: StatementKind.BLOCK,
          statements: this.toStatements(node.namedChildren),
        };
      case "if_statement":
        return this.toConditional(node);
      case "for_statement": {
        const body = this.bodyOf(node);
        if (!body) break;
        return {
          kind: StatementKind.FOR_LOOP,
          condition: node.childForFieldName("condition")?.text,
          body,
        };
      }
      case "foreach_statement": {
        const body = this.bodyOf(node);
        if (!body) break;
        return {
          kind: StatementKind.FOR_EACH_LOOP,
          collection: node.childForFieldName("right")?.text ?? "",
          body,
        };
      }
      case "while_statement": {
        const body = this.bodyOf(node);
        if (!body) break;
        return {
          kind: StatementKind.WHILE_LOOP,
          condition: node.childForFieldName("condition")?.text ?? "",
          body,
        };
      }
      case "switch_statement":
        return this.toSwitch(node);
      case "try_statement":
        return this.toTry(node);
      case "return_statement":
        return {
          kind: StatementKind.RETURN,
          expression: node.namedChildren.find((c) => !isIgnorable(c))?.text,
        };
      case "expression_statement": {
        const expression = node.namedChildren.find((c) => !isIgnorable(c));
        if (!expression) break;
        return {
          kind: StatementKind.EXPRESSION,
          expression: this.toExpression(expression),
        };
      }
      case "local_declaration_statement": {
        const declaration = node.namedChildren.find(
          (c) => c.type === "variable_declaration"
        );
        return {
          kind: StatementKind.VARIABLE_DECLARATION,
          text: declaration?.text ?? node.text.replace(/;\s*$/, ""),
        };
      }
      default:
        break;
    }

    return { kind: StatementKind.OTHER, syntaxKind: displayNameForNodeType(node.type) };
  }

  private bodyOf(node: Parser.SyntaxNode): Statement | undefined {
    const body = node.childForFieldName("body");
    return body ? this.toStatement(body) : undefined;
  }

  private toConditional(node: Parser.SyntaxNode): Statement {
    const condition = node.childForFieldName("condition");
    const consequence = node.childForFieldName("consequence");
    if (!condition || !consequence) {
      return { kind: StatementKind.OTHER, syntaxKind: "If" };
    }

    let alternative = node.childForFieldName("alternative");
    if (alternative?.type === "else_clause") {
      alternative = alternative.namedChildren[0] ?? null;
    }

    const statement: ConditionalStatement = {
      kind: StatementKind.CONDITIONAL,
      condition: condition.text,
      thenBranch: this.toStatement(consequence),
    };
    if (alternative) {
      statement.elseBranch = this.toStatement(alternative);
    }
    return statement;
  }

  private toSwitch(node: Parser.SyntaxNode): Statement {
    const selector = node.childForFieldName("value")?.text ?? "";
    const body =
      node.childForFieldName("body") ??
      node.namedChildren.find((c) => c.type === "switch_body");

    // Stacked labels may arrive as sections of their own with no statements;
    // they belong to the next section that has a body.
    const cases: SwitchCase[] = [];
    let pendingLabels: (string | undefined)[] = [];
    for (const section of body?.namedChildren ?? []) {
      if (section.type !== "switch_section") continue;
      const { labels, statements } = this.readSwitchSection(section);
      pendingLabels.push(...labels);
      if (statements.length === 0) continue;
      cases.push(...this.toSwitchCases(pendingLabels, statements));
      pendingLabels = [];
    }
    cases.push(...this.toSwitchCases(pendingLabels, []));

    return { kind: StatementKind.SWITCH, selector, cases };
  }

  // One case per label, all sharing the same statements.
  private toSwitchCases(
    labels: (string | undefined)[],
    statements: Statement[]
  ): SwitchCase[] {
    return labels.map((value) =>
      value === undefined ? { statements } : { value, statements }
    );
  }

  /**
   * Handles both labels wrapped in `*_switch_label` nodes and labels written
   * inline as `case <pattern> :` tokens.
   */
  private readSwitchSection(section: Parser.SyntaxNode): {
    labels: (string | undefined)[];
    statements: Statement[];
  } {
    const labels: (string | undefined)[] = [];
    const statementNodes: Parser.SyntaxNode[] = [];
    let pendingLabel: string[] | null = null;

    for (const child of section.children) {
      if (pendingLabel) {
        if (child.type === ":") {
          labels.push(pendingLabel.join(" "));
          pendingLabel = null;
        } else if (!isIgnorable(child)) {
          pendingLabel.push(child.text);
        }
        continue;
      }

      switch (child.type) {
        case "case":
          pendingLabel = [];
          break;
        case "default":
        case "default_switch_label":
          labels.push(undefined);
          break;
        case "case_switch_label":
        case "case_pattern_switch_label":
          labels.push(
            child.text
              .replace(/^case\s+/, "")
              .replace(/\s*:\s*$/, "")
          );
          break;
        case ":":
          break;
        default:
          if (!isIgnorable(child)) {
            statementNodes.push(child);
          }
      }
    }

    return { labels, statements: this.toStatements(statementNodes) };
  }

  private toTry(node: Parser.SyntaxNode): Statement {
    const block =
      node.childForFieldName("body") ??
      node.namedChildren.find((c) => c.type === "block");

    const catches: CatchClause[] = node.namedChildren
      .filter((c) => c.type === "catch_clause")
      .map((clause) => {
        const declaration = clause.namedChildren.find(
          (c) => c.type === "catch_declaration"
        );
        const handler =
          clause.childForFieldName("body") ??
          clause.namedChildren.find((c) => c.type === "block");
        const catchClause: CatchClause = {
          block: handler
            ? this.toStatement(handler)
            : { kind: StatementKind.BLOCK, statements: [] },
        };
        const exceptionType = declaration?.childForFieldName("type")?.text;
        if (exceptionType) catchClause.exceptionType = exceptionType;
        return catchClause;
      });

    const finallyBlock = node.namedChildren
      .find((c) => c.type === "finally_clause")
      ?.namedChildren.find((c) => c.type === "block");

    const statement: TryStatement = {
      kind: StatementKind.TRY,
      block: block
        ? this.toStatement(block)
        : { kind: StatementKind.BLOCK, statements: [] },
      catches,
    };
    if (finallyBlock) {
      statement.finallyBlock = this.toStatement(finallyBlock);
    }
    return statement;
  }

  private toExpression(node: Parser.SyntaxNode): Expression {
    if (node.type !== "invocation_expression") {
      return { kind: "plain", text: node.text };
    }

    const callee =
      node.childForFieldName("function") ?? node.namedChildren[0] ?? node;
    return { kind: "invocation", text: node.text, target: this.toCallTarget(callee) };
  }

  private toCallTarget(callee: Parser.SyntaxNode): CallTarget {
    if (callee.type === "member_access_expression") {
      const name = callee.childForFieldName("name");
      if (name) {
        return { kind: "member_access", text: callee.text, memberName: name.text };
      }
    }
    if (callee.type === "identifier") {
      return { kind: "identifier", text: callee.text };
    }
    return { kind: "other", text: callee.text };
  }
}
