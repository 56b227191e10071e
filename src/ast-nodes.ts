/**
 * Tangle AST Types
 * Statement and expression trees handed from the parser to the runtime.
 * Every node carries a span used only for diagnostics.
 */

import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// SCRIPT STRUCTURE
// ============================================================

export interface ScriptNode extends BaseNode {
  readonly type: 'Script';
  /** Raw YAML between the leading --- delimiters, if present */
  readonly frontmatter: string | null;
  readonly statements: StatementNode[];
}

// ============================================================
// SHARED PIECES
// ============================================================

/** Declared type on a variable declaration: `num x = 1` */
export type TypeAnnotation =
  | 'num'
  | 'bignum'
  | 'string'
  | 'bool'
  | 'list'
  | 'map'
  | 'graph';

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
  readonly defaultValue: ExpressionNode | null;
  readonly isVariadic: boolean;
}

export interface PositionalArgNode extends BaseNode {
  readonly type: 'PositionalArg';
  readonly value: ExpressionNode;
  /** `x!` marks a write-back argument */
  readonly mutable: boolean;
}

export interface NamedArgNode extends BaseNode {
  readonly type: 'NamedArg';
  readonly name: string;
  readonly value: ExpressionNode;
  readonly mutable: boolean;
}

export type ArgumentNode = PositionalArgNode | NamedArgNode;

/** Literal usable inside a pattern */
export type PatternLiteral =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'none' };

/** Function-clause pattern: |0|, |x|, |_| */
export type ClausePattern =
  | { readonly kind: 'literal'; readonly literal: PatternLiteral }
  | { readonly kind: 'variable'; readonly name: string }
  | { readonly kind: 'wildcard' };

/** Match-expression pattern; adds list patterns with optional rest */
export type MatchPattern =
  | ClausePattern
  | {
      readonly kind: 'list';
      readonly elements: MatchPattern[];
      /** `...rest` name; `_` for an anonymous rest; null when absent */
      readonly rest: string | null;
    };

export interface PatternClauseNode extends BaseNode {
  readonly type: 'PatternClause';
  readonly pattern: ClausePattern;
  readonly guard: ExpressionNode | null;
  readonly body: ExpressionNode;
}

export interface MatchArmNode extends BaseNode {
  readonly type: 'MatchArm';
  readonly pattern: MatchPattern;
  readonly body: ExpressionNode;
}

// ============================================================
// STATEMENTS
// ============================================================

export interface VariableDeclNode extends BaseNode {
  readonly type: 'VariableDecl';
  readonly name: string;
  readonly typeAnnotation: TypeAnnotation | null;
  readonly value: ExpressionNode;
  readonly isPrivate: boolean;
}

export type AssignTarget =
  | { readonly kind: 'variable'; readonly name: string }
  | {
      readonly kind: 'index';
      readonly object: ExpressionNode;
      readonly index: ExpressionNode;
    }
  | {
      readonly kind: 'property';
      readonly object: ExpressionNode;
      readonly property: string;
    };

export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly target: AssignTarget;
  readonly value: ExpressionNode;
}

export interface FunctionDeclNode extends BaseNode {
  readonly type: 'FunctionDecl';
  readonly name: string;
  /** `fn Graph.method()` attaches the function to the graph named here */
  readonly receiver: string | null;
  readonly params: ParamNode[];
  readonly body: StatementNode[];
  /** Pattern-clause functions have clauses and an empty body */
  readonly clauses: PatternClauseNode[] | null;
  readonly isPrivate: boolean;
  readonly isSetter: boolean;
  readonly isStatic: boolean;
  readonly guard: ExpressionNode | null;
}

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode[];
  readonly elseBranch: StatementNode[] | null;
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
}

export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly variable: string;
  readonly iterable: ExpressionNode;
  readonly body: StatementNode[];
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

export interface ImportNode extends BaseNode {
  readonly type: 'Import';
  readonly path: string;
  readonly alias: string | null;
}

export interface LoadNode extends BaseNode {
  readonly type: 'Load';
  readonly path: string;
}

export interface ModuleDeclNode extends BaseNode {
  readonly type: 'ModuleDecl';
  readonly name: string;
  readonly alias: string | null;
}

export interface ConfigEntryNode extends BaseNode {
  readonly type: 'ConfigEntry';
  readonly key: string;
  readonly value: ExpressionNode;
}

export interface ConfigureNode extends BaseNode {
  readonly type: 'Configure';
  readonly settings: ConfigEntryNode[];
  /** Without a body the settings stay active for the rest of the file */
  readonly body: StatementNode[] | null;
}

export interface PrecisionNode extends BaseNode {
  readonly type: 'Precision';
  readonly places: number;
  readonly body: StatementNode[];
}

export interface CatchClauseNode extends BaseNode {
  readonly type: 'CatchClause';
  readonly errorType: string | null;
  readonly variable: string | null;
  readonly body: StatementNode[];
}

export interface TryNode extends BaseNode {
  readonly type: 'Try';
  readonly body: StatementNode[];
  readonly catchClauses: CatchClauseNode[];
  readonly finallyBlock: StatementNode[] | null;
}

export interface GraphPropertyNode extends BaseNode {
  readonly type: 'GraphProperty';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface GraphMethodNode extends BaseNode {
  readonly type: 'GraphMethod';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: StatementNode[];
  readonly isStatic: boolean;
  readonly isSetter: boolean;
  readonly isPrivate: boolean;
  readonly guard: ExpressionNode | null;
}

export interface GraphRuleNode extends BaseNode {
  readonly type: 'GraphRule';
  readonly name: string;
  readonly param: ExpressionNode | null;
}

/** `configure { readable: [:a], writable: :b, accessible: [:c] }` in a graph body */
export interface AccessorConfig {
  readonly readable: string[];
  readonly writable: string[];
  readonly accessible: string[];
}

export interface GraphDeclNode extends BaseNode {
  readonly type: 'GraphDecl';
  readonly name: string;
  readonly graphType: string | null;
  readonly parent: ExpressionNode | null;
  readonly properties: GraphPropertyNode[];
  readonly methods: GraphMethodNode[];
  readonly rules: GraphRuleNode[];
  readonly accessors: AccessorConfig;
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

export type StatementNode =
  | VariableDeclNode
  | AssignmentNode
  | FunctionDeclNode
  | IfNode
  | WhileNode
  | ForNode
  | ReturnNode
  | BreakNode
  | ContinueNode
  | ImportNode
  | LoadNode
  | ModuleDeclNode
  | ConfigureNode
  | PrecisionNode
  | TryNode
  | GraphDeclNode
  | ExpressionStatementNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
  /** Source digits without separators, kept for exact big-integer literals */
  readonly raw: string;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NoneLiteralNode extends BaseNode {
  readonly type: 'NoneLiteral';
}

export interface SymbolLiteralNode extends BaseNode {
  readonly type: 'SymbolLiteral';
  readonly name: string;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type BitwiseOp = '&' | '|' | '^' | '<<' | '>>';
export type ComparisonOp = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type LogicalOp = 'and' | 'or';
export type RegexOp = '=~' | '!~';

export type BinaryOp =
  | ArithmeticOp
  | BitwiseOp
  | ComparisonOp
  | LogicalOp
  | RegexOp;

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  /** `.+`, `.==`, ... apply the operator element by element */
  readonly elementWise: boolean;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: '-' | 'not' | '~';
  readonly operand: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ArgumentNode[];
}

export interface MethodCallNode extends BaseNode {
  readonly type: 'MethodCall';
  readonly object: ExpressionNode;
  /** Trailing `!` is kept in the name: `append!` */
  readonly method: string;
  readonly args: ArgumentNode[];
}

export interface SuperCallNode extends BaseNode {
  readonly type: 'SuperCall';
  readonly method: string;
  readonly args: ArgumentNode[];
}

export interface PropertyAccessNode extends BaseNode {
  readonly type: 'PropertyAccess';
  readonly object: ExpressionNode;
  readonly property: string;
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface LambdaNode extends BaseNode {
  readonly type: 'Lambda';
  readonly params: string[];
  /** Expression bodies are wrapped as a single `return` statement */
  readonly body: StatementNode[];
}

export interface ListLiteralNode extends BaseNode {
  readonly type: 'ListLiteral';
  readonly elements: ExpressionNode[];
}

export interface MapEntryNode extends BaseNode {
  readonly type: 'MapEntry';
  readonly key: string;
  readonly value: ExpressionNode;
}

export interface MapLiteralNode extends BaseNode {
  readonly type: 'MapLiteral';
  readonly entries: MapEntryNode[];
}

export interface GraphLiteralNode extends BaseNode {
  readonly type: 'GraphLiteral';
  readonly config: MapEntryNode[];
  readonly parent: ExpressionNode | null;
}

export interface ConditionalNode extends BaseNode {
  readonly type: 'Conditional';
  readonly condition: ExpressionNode;
  readonly thenExpr: ExpressionNode;
  readonly elseExpr: ExpressionNode | null;
  readonly isUnless: boolean;
}

export interface RaiseNode extends BaseNode {
  readonly type: 'Raise';
  readonly error: ExpressionNode;
}

export interface MatchNode extends BaseNode {
  readonly type: 'Match';
  readonly value: ExpressionNode;
  readonly arms: MatchArmNode[];
}

export interface InstantiateNode extends BaseNode {
  readonly type: 'Instantiate';
  readonly className: ExpressionNode;
  readonly overrides: MapEntryNode[];
}

export type ExpressionNode =
  | NumberLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NoneLiteralNode
  | SymbolLiteralNode
  | VariableNode
  | BinaryExprNode
  | UnaryExprNode
  | CallNode
  | MethodCallNode
  | SuperCallNode
  | PropertyAccessNode
  | IndexNode
  | LambdaNode
  | ListLiteralNode
  | MapLiteralNode
  | GraphLiteralNode
  | ConditionalNode
  | RaiseNode
  | MatchNode
  | InstantiateNode;

export type ASTNode =
  | ScriptNode
  | StatementNode
  | ExpressionNode
  | ParamNode
  | ArgumentNode
  | PatternClauseNode
  | MatchArmNode
  | CatchClauseNode
  | GraphPropertyNode
  | GraphMethodNode
  | GraphRuleNode
  | ConfigEntryNode
  | MapEntryNode;
