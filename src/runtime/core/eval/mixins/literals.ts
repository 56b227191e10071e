/**
 * LiteralsMixin: Literal Evaluation
 *
 * Numbers (under the active precision mode), lists, maps, graph literals
 * and lambdas. Lambdas capture the current scope itself, not a copy.
 *
 * @internal
 */

import type {
  GraphLiteralNode,
  LambdaNode,
  ListLiteralNode,
  MapLiteralNode,
  NumberLiteralNode,
} from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import { FunctionValue } from '../../callable.js';
import { Graph, type GraphType } from '../../graph.js';
import { numericLiteral } from '../../numbers.js';
import { isRuleset, rulesetRules } from '../../rules.js';
import {
  ListValue,
  MapValue,
  isGraph,
  isSymbol,
  typeName,
  type Value,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createLiteralsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class LiteralsEvaluator extends Base {
    override evaluateNumberLiteral(node: NumberLiteralNode): Value {
      return numericLiteral(node.raw, node.value, this.ctx.config.numericMode());
    }

    override evaluateListLiteral(node: ListLiteralNode): Value {
      return new ListValue(node.elements.map((e) => this.evaluateExpression(e)));
    }

    /** Later duplicate keys overwrite earlier ones */
    override evaluateMapLiteral(node: MapLiteralNode): Value {
      const entries = new Map<string, Value>();
      for (const entry of node.entries) {
        entries.set(entry.key, this.evaluateExpression(entry.value));
      }
      return new MapValue(entries);
    }

    /**
     * `graph {}`, `graph { type: :undirected }`, `graph { type: :dag }`,
     * `graph from Parent`
     */
    override evaluateGraphLiteral(node: GraphLiteralNode): Value {
      if (node.parent) {
        const parent = this.evaluateExpression(node.parent);
        if (!isGraph(parent)) {
          throw RuntimeError.fromNode(
            TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
            `Cannot inherit from non-graph type '${typeName(parent)}'. Expected graph.`,
            node
          );
        }
        return Graph.fromParent(parent);
      }

      let graphType: GraphType = 'directed';
      let ruleset: string | null = null;
      for (const entry of node.config) {
        if (entry.key !== 'type') {
          throw RuntimeError.fromNode(
            TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR,
            `Unknown graph option '${entry.key}'`,
            entry
          );
        }
        const value = this.evaluateExpression(entry.value);
        if (!isSymbol(value)) {
          throw RuntimeError.fromNode(
            TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
            `Graph type must be a symbol, got ${typeName(value)}`,
            entry
          );
        }
        if (value.name === 'directed' || value.name === 'undirected') {
          graphType = value.name;
        } else if (isRuleset(value.name)) {
          ruleset = value.name;
        } else {
          throw RuntimeError.fromNode(
            TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
            `Invalid graph type: :${value.name}. Expected :directed or :undirected`,
            entry
          );
        }
      }

      const graph = new Graph(graphType);
      if (ruleset !== null) {
        graph.ruleset = ruleset;
        for (const rule of rulesetRules(ruleset)) graph.addRule(rule);
      }
      return graph;
    }

    override evaluateLambda(node: LambdaNode): Value {
      return new FunctionValue({
        name: null,
        params: node.params.map((name) => ({
          name,
          defaultValue: null,
          isVariadic: false,
        })),
        body: node.body,
        env: this.ctx.env,
      });
    }
  };
}

export const LiteralsMixin = createLiteralsMixin;
