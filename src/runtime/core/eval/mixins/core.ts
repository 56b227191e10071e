/**
 * CoreMixin: Statement and Expression Dispatch
 *
 * Main entry points for evaluation. Dispatches on node type to the
 * specialized evaluators of the other mixins and attaches a source
 * location to errors that do not carry one yet.
 *
 * @internal
 */

import type {
  ExpressionNode,
  ScriptNode,
  StatementNode,
} from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import { BREAK, CONTINUE, NORMAL, returnWith, type Completion } from '../../completion.js';
import type { Environment } from '../../environment.js';
import { locate } from '../../errors.js';
import { symbol, type Value } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createCoreMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class CoreEvaluator extends Base {
    override executeScript(script: ScriptNode): Value {
      this.applyFrontmatter(script);
      this.lastValue = null;
      const completion = this.executeStatements(script.statements);
      switch (completion.kind) {
        case 'return':
          return completion.value;
        case 'break':
        case 'continue':
          throw new RuntimeError(
            TANGLE_ERROR_CODES.RUNTIME_CONTROL_FLOW,
            `'${completion.kind}' outside of loop`
          );
        case 'normal':
          return this.lastValue;
      }
    }

    override executeStatements(statements: readonly StatementNode[]): Completion {
      for (const statement of statements) {
        const completion = this.executeStatement(statement);
        if (completion.kind !== 'normal') return completion;
      }
      return NORMAL;
    }

    /** Statements in a fresh child scope (or `scope` when given) */
    override executeBlock(
      statements: readonly StatementNode[],
      scope?: Environment
    ): Completion {
      return this.withScope(scope ?? this.ctx.env.child(), () =>
        this.executeStatements(statements)
      );
    }

    override executeStatement(node: StatementNode): Completion {
      try {
        return this.dispatchStatement(node);
      } catch (error) {
        throw locate(error, this.getNodeLocation(node));
      }
    }

    dispatchStatement(node: StatementNode): Completion {
      switch (node.type) {
        case 'ExpressionStatement':
          this.lastValue = this.evaluateExpression(node.expression);
          return NORMAL;
        case 'VariableDecl':
          this.executeVariableDecl(node);
          return NORMAL;
        case 'Assignment':
          this.executeAssignment(node);
          return NORMAL;
        case 'FunctionDecl':
          this.executeFunctionDecl(node);
          return NORMAL;
        case 'GraphDecl':
          this.executeGraphDecl(node);
          return NORMAL;
        case 'If':
          return this.executeIf(node);
        case 'While':
          return this.executeWhile(node);
        case 'For':
          return this.executeFor(node);
        case 'Return':
          return returnWith(node.value ? this.evaluateExpression(node.value) : null);
        case 'Break':
          return BREAK;
        case 'Continue':
          return CONTINUE;
        case 'Try':
          return this.executeTry(node);
        case 'Configure':
          return this.executeConfigure(node);
        case 'Precision':
          return this.executePrecision(node);
        case 'Import':
          this.executeImport(node);
          return NORMAL;
        case 'Load':
          this.executeLoad(node);
          return NORMAL;
        case 'ModuleDecl':
          this.executeModuleDecl(node);
          return NORMAL;
      }
    }

    override evaluateExpression(node: ExpressionNode): Value {
      try {
        return this.dispatchExpression(node);
      } catch (error) {
        throw locate(error, this.getNodeLocation(node));
      }
    }

    dispatchExpression(node: ExpressionNode): Value {
      switch (node.type) {
        case 'NumberLiteral':
          return this.evaluateNumberLiteral(node);
        case 'StringLiteral':
          return node.value;
        case 'BoolLiteral':
          return node.value;
        case 'NoneLiteral':
          return null;
        case 'SymbolLiteral':
          return symbol(node.name);
        case 'Variable':
          return this.evaluateVariable(node.name, this.getNodeLocation(node));
        case 'BinaryExpr':
          return this.evaluateBinaryExpr(node);
        case 'UnaryExpr':
          return this.evaluateUnaryExpr(node);
        case 'Call':
          return this.evaluateCall(node);
        case 'MethodCall':
          return this.evaluateMethodCall(node);
        case 'SuperCall':
          return this.evaluateSuperCall(node);
        case 'PropertyAccess':
          return this.evaluatePropertyAccess(node);
        case 'Index':
          return this.evaluateIndex(node);
        case 'Lambda':
          return this.evaluateLambda(node);
        case 'ListLiteral':
          return this.evaluateListLiteral(node);
        case 'MapLiteral':
          return this.evaluateMapLiteral(node);
        case 'GraphLiteral':
          return this.evaluateGraphLiteral(node);
        case 'Conditional':
          return this.evaluateConditional(node);
        case 'Raise':
          return this.evaluateRaise(node);
        case 'Match':
          return this.evaluateMatch(node);
        case 'Instantiate':
          return this.evaluateInstantiate(node);
      }
    }
  };
}

export const CoreMixin = createCoreMixin;
