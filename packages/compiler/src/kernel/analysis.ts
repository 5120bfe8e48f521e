import type { CxxSymbol } from "../cxx/ir.js";
import { symbol } from "../cxx/ir.js";
import { Action, Tensor, TensorOp, type TensorExpr } from "../expr/nodes.js";
import { collectReferenceCount, countOperands, traverseDags } from "../expr/traversal.js";

export type ExprData = {
  /** Terminal tensor -> temporary symbol, in first-encounter order. */
  readonly temps: ReadonlyMap<Tensor, CxxSymbol>;
  /** Operator nodes sorted by ascending operand count, ties in discovery order. */
  readonly tensorOps: readonly TensorOp[];
};

export function temporaryName(index: number): string {
  return `T${index}`;
}

/**
 * Assigns a temporary to every terminal tensor and collects the operator
 * nodes of `expr`. Ordering matters: every participant of a distributed run
 * compiles the same expression on its own and the names must agree.
 */
export function generateExprData(expr: TensorExpr): ExprData {
  const temps = new Map<Tensor, CxxSymbol>();
  const tensorOps: TensorOp[] = [];
  for (const node of traverseDags([expr])) {
    if (node instanceof Tensor) {
      if (!temps.has(node)) temps.set(node, symbol(temporaryName(temps.size)));
    } else if (node instanceof TensorOp) {
      tensorOps.push(node);
    }
  }

  const memo = new Map<TensorExpr, bigint>();
  const keyed = tensorOps.map((op, pos) => ({ op, pos, size: countOperands(op, memo) }));
  keyed.sort((a, b) => (a.size < b.size ? -1 : a.size > b.size ? 1 : a.pos - b.pos));

  return {
    temps,
    tensorOps: Object.freeze(keyed.map((k) => k.op)),
  };
}

/**
 * Operators that need a temporary of their own: those referenced more than
 * once in the whole graph, and every action (its acting coefficient is stored
 * before the product).
 */
export function collectAuxiliaryExpressions(expr: TensorExpr, tensorOps: readonly TensorOp[]): readonly TensorOp[] {
  const refCounts = collectReferenceCount([expr]);
  return Object.freeze(tensorOps.filter((op) => (refCounts.get(op) ?? 0) > 1 || op instanceof Action));
}
