export enum StatementKind {
  CONDITIONAL = "conditional",
  FOR_LOOP = "for_loop",
  FOR_EACH_LOOP = "for_each_loop",
  WHILE_LOOP = "while_loop",
  SWITCH = "switch",
  TRY = "try",
  RETURN = "return",
  EXPRESSION = "expression",
  VARIABLE_DECLARATION = "variable_declaration",
  BLOCK = "block",
  OTHER = "other",
}

export type CallTarget =
  | { kind: "member_access"; text: string; memberName: string }
  | { kind: "identifier"; text: string }
  | { kind: "other"; text: string };

export interface InvocationExpression {
  kind: "invocation";
  text: string;
  target: CallTarget;
}

// Assignments, increments, awaits and anything else that is not a call.
export interface PlainExpression {
  kind: "plain";
  text: string;
}

export type Expression = InvocationExpression | PlainExpression;

export interface ConditionalStatement {
  kind: StatementKind.CONDITIONAL;
  condition: string;
  thenBranch: Statement;
  elseBranch?: Statement;
}

export interface ForLoopStatement {
  kind: StatementKind.FOR_LOOP;
  condition?: string;
  body: Statement;
}

export interface ForEachLoopStatement {
  kind: StatementKind.FOR_EACH_LOOP;
  collection: string;
  body: Statement;
}

export interface WhileLoopStatement {
  kind: StatementKind.WHILE_LOOP;
  condition: string;
  body: Statement;
}

export interface SwitchCase {
  /** Case value as written; absent for the `default` label. */
  value?: string;
  statements: Statement[];
}

export interface SwitchStatement {
  kind: StatementKind.SWITCH;
  selector: string;
  cases: SwitchCase[];
}

export interface CatchClause {
  exceptionType?: string;
  block: Statement;
}

export interface TryStatement {
  kind: StatementKind.TRY;
  block: Statement;
  catches: CatchClause[];
  finallyBlock?: Statement;
}

export interface ReturnStatement {
  kind: StatementKind.RETURN;
  expression?: string;
}

export interface ExpressionStatement {
  kind: StatementKind.EXPRESSION;
  expression: Expression;
}

export interface VariableDeclarationStatement {
  kind: StatementKind.VARIABLE_DECLARATION;
  text: string;
}

export interface BlockStatement {
  kind: StatementKind.BLOCK;
  statements: Statement[];
}

export interface OtherStatement {
  kind: StatementKind.OTHER;
  /** Display name of the construct, e.g. `Throw` or `Using`. */
  syntaxKind: string;
}

export type Statement =
  | ConditionalStatement
  | ForLoopStatement
  | ForEachLoopStatement
  | WhileLoopStatement
  | SwitchStatement
  | TryStatement
  | ReturnStatement
  | ExpressionStatement
  | VariableDeclarationStatement
  | BlockStatement
  | OtherStatement;

export interface MethodDeclaration {
  name: string;
  // absent for abstract, partial and extern declarations
  body?: Statement[];
}

export interface ClassDeclaration {
  name: string;
  methods: MethodDeclaration[];
}

export interface CompilationUnit {
  classes: ClassDeclaration[];
}
