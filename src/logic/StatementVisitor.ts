import {
  ConditionalStatement,
  ExpressionStatement,
  ForEachLoopStatement,
  ForLoopStatement,
  ReturnStatement,
  Statement,
  StatementKind,
  SwitchStatement,
  TryStatement,
  WhileLoopStatement,
} from "../ir/statementIr";
import { FlowContext } from "./common/FlowContext";
import { resolveCallName } from "./utils/ServiceCallPolicy";

export const TRUNCATED_LABEL = "...";
export const DEFAULT_LOOP_CONDITION = "condition";
export const DEFAULT_EXCEPTION_TYPE = "Exception";

interface LoopShape {
  label: string;
  enterLabel: string;
  exitLabel: string;
  body: Statement;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled statement kind: ${JSON.stringify(value)}`);
}

/**
 * Walks statements and emits their flow into a {@link FlowContext}.
 *
 * Every visit takes the frontier (the node control is at before the
 * statement) and returns the frontier after it. Branching statements close
 * over their branches with a merge node, so callers only ever thread a
 * single id.
 */
export class StatementVisitor {
  constructor(private readonly ctx: FlowContext) {}

  visitSequence(
    statements: readonly Statement[],
    parent: string,
    depth: number
  ): string {
    let current = parent;
    for (const statement of statements) {
      current = this.visit(statement, current, depth);
    }
    return current;
  }

  visit(statement: Statement, parent: string, depth: number): string {
    if (depth > this.ctx.config.maxDepth) {
      return this.ctx.connect(parent, "action", TRUNCATED_LABEL);
    }

    switch (statement.kind) {
      case StatementKind.CONDITIONAL:
        return this.visitConditional(statement, parent, depth);
      case StatementKind.FOR_LOOP:
        return this.visitForLoop(statement, parent, depth);
      case StatementKind.FOR_EACH_LOOP:
        return this.visitForEachLoop(statement, parent, depth);
      case StatementKind.WHILE_LOOP:
        return this.visitWhileLoop(statement, parent, depth);
      case StatementKind.SWITCH:
        return this.visitSwitch(statement, parent, depth);
      case StatementKind.TRY:
        return this.visitTry(statement, parent, depth);
      case StatementKind.RETURN:
        return this.visitReturn(statement, parent);
      case StatementKind.EXPRESSION:
        return this.visitExpression(statement, parent);
      case StatementKind.VARIABLE_DECLARATION:
        return this.ctx.connect(
          parent,
          "action",
          this.ctx.sanitizeLabel(statement.text)
        );
      case StatementKind.BLOCK:
        // Blocks carry no control flow of their own
        return this.visitSequence(statement.statements, parent, depth);
      case StatementKind.OTHER:
        return this.ctx.connect(
          parent,
          "action",
          this.ctx.sanitizeLabel(statement.syntaxKind)
        );
      default:
        return assertNever(statement);
    }
  }

  private visitConditional(
    statement: ConditionalStatement,
    parent: string,
    depth: number
  ): string {
    const ctx = this.ctx;
    const decision = ctx.connect(
      parent,
      "decision",
      ctx.sanitizeCondition(statement.condition),
      "decision"
    );

    const trueStart = ctx.createJunction(decision, { label: "Yes" });
    const trueEnd = this.visit(statement.thenBranch, trueStart, depth + 1);

    let falseEnd: string;
    if (statement.elseBranch) {
      const falseStart = ctx.createJunction(decision, { label: "No" });
      falseEnd = this.visit(statement.elseBranch, falseStart, depth + 1);
    } else {
      falseEnd = ctx.createJunction(decision, { label: "No" });
    }

    const merge = ctx.addNode("junction", "");
    ctx.addEdge(trueEnd, merge);
    if (falseEnd !== decision) {
      ctx.addEdge(falseEnd, merge);
    }
    return merge;
  }

  private visitForLoop(
    statement: ForLoopStatement,
    parent: string,
    depth: number
  ): string {
    const condition = statement.condition?.trim()
      ? statement.condition
      : DEFAULT_LOOP_CONDITION;
    return this.visitLoop(
      {
        label: `For: ${this.ctx.sanitizeCondition(condition)}`,
        enterLabel: "Loop",
        exitLabel: "Exit",
        body: statement.body,
      },
      parent,
      depth
    );
  }

  private visitForEachLoop(
    statement: ForEachLoopStatement,
    parent: string,
    depth: number
  ): string {
    return this.visitLoop(
      {
        label: `ForEach: ${this.ctx.sanitizeCondition(statement.collection)}`,
        enterLabel: "Each",
        exitLabel: "Done",
        body: statement.body,
      },
      parent,
      depth
    );
  }

  private visitWhileLoop(
    statement: WhileLoopStatement,
    parent: string,
    depth: number
  ): string {
    const condition = statement.condition.trim()
      ? statement.condition
      : DEFAULT_LOOP_CONDITION;
    return this.visitLoop(
      {
        label: `While: ${this.ctx.sanitizeCondition(condition)}`,
        enterLabel: "True",
        exitLabel: "False",
        body: statement.body,
      },
      parent,
      depth
    );
  }

  // One pass through the body plus the back-edge; iterations are not unrolled.
  private visitLoop(loop: LoopShape, parent: string, depth: number): string {
    const ctx = this.ctx;
    const loopNode = ctx.connect(parent, "decision", loop.label, "loop");

    const bodyStart = ctx.createJunction(loopNode, { label: loop.enterLabel });
    const bodyEnd = this.visit(loop.body, bodyStart, depth + 1);
    ctx.addEdge(bodyEnd, loopNode);

    return ctx.createJunction(loopNode, { label: loop.exitLabel });
  }

  private visitSwitch(
    statement: SwitchStatement,
    parent: string,
    depth: number
  ): string {
    const ctx = this.ctx;
    const switchNode = ctx.connect(
      parent,
      "decision",
      `Switch: ${ctx.sanitizeCondition(statement.selector)}`
    );

    // Fallthrough is not modelled; each case runs into the merge on its own.
    const caseEnds = statement.cases.map((switchCase) => {
      const label =
        switchCase.value === undefined
          ? "default"
          : ctx.sanitizeCondition(switchCase.value);
      const caseStart = ctx.createJunction(switchNode, { label });
      return this.visitSequence(switchCase.statements, caseStart, depth + 1);
    });

    const merge = ctx.addNode("junction", "");
    for (const end of caseEnds) {
      ctx.addEdge(end, merge);
    }
    return merge;
  }

  private visitTry(
    statement: TryStatement,
    parent: string,
    depth: number
  ): string {
    const ctx = this.ctx;
    const tryNode = ctx.connect(parent, "action", "Try Block", "try");

    const ends = [this.visit(statement.block, tryNode, depth + 1)];

    for (const clause of statement.catches) {
      const exceptionType = clause.exceptionType?.trim()
        ? clause.exceptionType
        : DEFAULT_EXCEPTION_TYPE;
      const catchNode = ctx.connect(tryNode, "action", "Catch", undefined, {
        label: `Catch: ${ctx.sanitizeCondition(exceptionType)}`,
        dashed: true,
      });
      ends.push(this.visit(clause.block, catchNode, depth + 1));
    }

    if (statement.finallyBlock) {
      // The finally block runs last; its exit replaces the merge node.
      const finallyNode = ctx.addNode("action", "Finally");
      for (const end of ends) {
        ctx.addEdge(end, finallyNode);
      }
      return this.visit(statement.finallyBlock, finallyNode, depth + 1);
    }

    const merge = ctx.addNode("junction", "");
    for (const end of ends) {
      ctx.addEdge(end, merge);
    }
    return merge;
  }

  // Statements after a return are still drawn, attached to the return node.
  private visitReturn(statement: ReturnStatement, parent: string): string {
    const value = statement.expression?.trim()
      ? this.ctx.sanitizeCondition(statement.expression)
      : "void";
    return this.ctx.connect(
      parent,
      "terminal",
      `Return: ${value}`,
      "return"
    );
  }

  private visitExpression(
    statement: ExpressionStatement,
    parent: string
  ): string {
    const ctx = this.ctx;
    const expression = statement.expression;

    if (expression.kind === "plain") {
      return ctx.connect(parent, "action", ctx.sanitizeLabel(expression.text));
    }

    const name = resolveCallName(expression.target);
    if (ctx.serviceCallPolicy(name, expression)) {
      return ctx.connect(
        parent,
        "service",
        `Service: ${ctx.sanitizeLabel(name)}`,
        "service"
      );
    }
    return ctx.connect(parent, "action", ctx.sanitizeLabel(`${name}()`));
  }
}
