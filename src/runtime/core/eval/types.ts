/**
 * Evaluator Composition Types
 *
 * Each mixin adds one family of node evaluators to the base class. Calls
 * that cross mixin boundaries go through `EvaluatorSurface`, which the base
 * class merges in, so every mixin sees the whole evaluator's API.
 *
 * @internal
 */

import type {
  ArgumentNode,
  BinaryExprNode,
  CallNode,
  ConditionalNode,
  ConfigureNode,
  ExpressionNode,
  ForNode,
  FunctionDeclNode,
  GraphDeclNode,
  GraphLiteralNode,
  IfNode,
  ImportNode,
  IndexNode,
  InstantiateNode,
  LambdaNode,
  ListLiteralNode,
  LoadNode,
  MapLiteralNode,
  MatchNode,
  MethodCallNode,
  ModuleDeclNode,
  NumberLiteralNode,
  PrecisionNode,
  PropertyAccessNode,
  RaiseNode,
  ScriptNode,
  SourceLocation,
  StatementNode,
  SuperCallNode,
  TryNode,
  UnaryExprNode,
  VariableDeclNode,
  AssignmentNode,
  WhileNode,
} from '../../../types.js';
import type { TangleError } from '../../../types.js';
import type { CallArgument, FunctionValue } from '../callable.js';
import type { Completion } from '../completion.js';
import type { Environment } from '../environment.js';
import type { Graph } from '../graph.js';
import type { Value } from '../values.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for mixin composition.
 * The `any[]` rest parameter is what TypeScript requires of a mixin base.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> = new (...args: any[]) => TBase;

/** Result of running a graph method: its value and the updated receiver */
export interface MethodResult {
  readonly value: Value;
  readonly self: Graph;
}

/** Methods each mixin provides to the others */
export interface EvaluatorSurface {
  // CoreMixin
  evaluateExpression(node: ExpressionNode): Value;
  executeStatement(node: StatementNode): Completion;
  executeStatements(statements: readonly StatementNode[]): Completion;
  executeBlock(statements: readonly StatementNode[], scope?: Environment): Completion;
  executeScript(script: ScriptNode): Value;

  // LiteralsMixin
  evaluateNumberLiteral(node: NumberLiteralNode): Value;
  evaluateListLiteral(node: ListLiteralNode): Value;
  evaluateMapLiteral(node: MapLiteralNode): Value;
  evaluateGraphLiteral(node: GraphLiteralNode): Value;
  evaluateLambda(node: LambdaNode): Value;

  // VariablesMixin
  executeVariableDecl(node: VariableDeclNode): void;
  executeAssignment(node: AssignmentNode): void;
  evaluateVariable(name: string, location?: SourceLocation): Value;
  evaluateIndex(node: IndexNode): Value;
  evaluatePropertyAccess(node: PropertyAccessNode): Value;
  /** Store into an assignable expression; false when `target` is not one */
  writeBack(target: ExpressionNode, value: Value): boolean;

  // ControlFlowMixin
  executeIf(node: IfNode): Completion;
  executeWhile(node: WhileNode): Completion;
  executeFor(node: ForNode): Completion;
  executeConfigure(node: ConfigureNode): Completion;
  executePrecision(node: PrecisionNode): Completion;
  evaluateConditional(node: ConditionalNode): Value;
  evaluateMatch(node: MatchNode): Value;

  // ClosuresMixin
  executeFunctionDecl(node: FunctionDeclNode): void;
  evaluateCall(node: CallNode): Value;
  evaluateArguments(args: readonly ArgumentNode[]): CallArgument[];
  invokeFunction(fn: FunctionValue, args: readonly CallArgument[], location?: SourceLocation): Value;
  /**
   * Bind `args` into `scope` and run the body there. The caller builds the
   * scope (and reads it afterwards, e.g. for the final `self`).
   */
  invokeInScope(
    fn: FunctionValue,
    args: readonly CallArgument[],
    scope: Environment,
    location?: SourceLocation,
    label?: string
  ): Value;
  /** Add a global function to the overload table for its name */
  registerOverload(fn: FunctionValue): void;
  /** Does `fn`'s overload guard accept these arguments? */
  guardAccepts(fn: FunctionValue, args: readonly CallArgument[], self?: Value): boolean;

  // GraphsMixin
  executeGraphDecl(node: GraphDeclNode): void;
  evaluateInstantiate(node: InstantiateNode): Value;
  evaluateSuperCall(node: SuperCallNode): Value;
  /** Dispatch `name` on a graph; null when no user method answers to it */
  callGraphMethod(
    receiver: Graph,
    name: string,
    args: readonly CallArgument[],
    options: { fromSelf: boolean; location?: SourceLocation | undefined }
  ): MethodResult | null;
  invokeMethod(
    receiver: Graph,
    fn: FunctionValue,
    args: readonly CallArgument[],
    location?: SourceLocation
  ): MethodResult;

  // MethodsMixin
  evaluateMethodCall(node: MethodCallNode): Value;
  /** Generic or kind-specific builtin; undefined when none has `name` */
  callBuiltinMethod(
    receiver: Value,
    name: string,
    args: readonly Value[],
    location?: SourceLocation
  ): Value | undefined;

  // ExpressionsMixin
  evaluateBinaryExpr(node: BinaryExprNode): Value;
  evaluateUnaryExpr(node: UnaryExprNode): Value;

  // ErrorsMixin
  executeTry(node: TryNode): Completion;
  evaluateRaise(node: RaiseNode): Value;
  /** In `:collect` mode record the error and yield none; otherwise rethrow */
  collectOrThrow(error: TangleError): Value;

  // ModulesMixin
  executeImport(node: ImportNode): void;
  executeLoad(node: LoadNode): void;
  executeModuleDecl(node: ModuleDeclNode): void;
  applyFrontmatter(script: ScriptNode): void;
}
