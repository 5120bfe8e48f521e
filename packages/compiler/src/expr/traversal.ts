import type { TensorExpr } from "./nodes.js";

/**
 * Yields every node reachable from `roots` exactly once.
 *
 * Depth-first pre-order over an explicit stack; operands are pushed in reverse
 * so the first operand is visited first. The order depends only on the shape
 * of the graph, which keeps generated symbol names stable between
 * independent compilations of the same expression.
 */
export function* traverseDags(roots: readonly TensorExpr[]): Generator<TensorExpr, void, undefined> {
  const seen = new Set<TensorExpr>();
  const stack: TensorExpr[] = [];
  for (let i = roots.length - 1; i >= 0; i--) {
    const root = roots[i];
    if (root === undefined || seen.has(root)) continue;
    seen.add(root);
    stack.push(root);
  }
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    yield node;
    for (let i = node.operands.length - 1; i >= 0; i--) {
      const operand = node.operands[i];
      if (operand === undefined || seen.has(operand)) continue;
      seen.add(operand);
      stack.push(operand);
    }
  }
}

/** Number of operand edges pointing at each reachable node. Roots without parents are absent. */
export function collectReferenceCount(roots: readonly TensorExpr[]): Map<TensorExpr, number> {
  const counts = new Map<TensorExpr, number>();
  for (const node of traverseDags(roots)) {
    for (const operand of node.operands) {
      counts.set(operand, (counts.get(operand) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Operand edges in the expression tree below `expr`. A node shared by several
 * parents is counted once per path, so the count doubles with every level of
 * a shared diamond; it is a bigint to stay exact.
 *
 * Post-order over an explicit stack, filling `memo` for every node below
 * `expr`.
 */
export function countOperands(expr: TensorExpr, memo: Map<TensorExpr, bigint> = new Map()): bigint {
  const stack: { node: TensorExpr; expanded: boolean }[] = [{ node: expr, expanded: false }];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top === undefined) break;
    if (memo.has(top.node)) {
      stack.pop();
      continue;
    }
    if (!top.expanded) {
      top.expanded = true;
      for (const operand of top.node.operands) {
        if (!memo.has(operand)) stack.push({ node: operand, expanded: false });
      }
      continue;
    }
    stack.pop();
    let total = 0n;
    for (const operand of top.node.operands) {
      total += 1n + (memo.get(operand) ?? 0n);
    }
    memo.set(top.node, total);
  }
  return memo.get(expr) ?? 0n;
}
