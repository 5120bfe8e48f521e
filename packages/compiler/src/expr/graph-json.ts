import { fail } from "@cellkern/core";

import {
  Action,
  Add,
  Coefficient,
  Inverse,
  mixedSpace,
  Mul,
  Negative,
  simpleSpace,
  Sub,
  Tensor,
  Transpose,
  type FunctionSpace,
  type SimpleSpace,
  type TensorExpr,
} from "./nodes.js";

export type ExpressionGraph = {
  readonly root: TensorExpr;
  readonly nodesById: ReadonlyMap<string, TensorExpr>;
  readonly coefficientsById: ReadonlyMap<string, Coefficient>;
};

const DOC = "expression graph";

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    fail("CK1004", `${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      fail("CK1004", `${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    fail("CK1004", `${label} must be a non-empty string.`);
  }
  return value;
}

function asInteger(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    fail("CK1004", `${label} must be an integer.`);
  }
  return value;
}

function asArray(value: unknown, label: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    fail("CK1004", `${label} must be an array.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  return asArray(value, label).map((entry, i) => asString(entry, `${label}[${i}]`));
}

function lookup<T>(table: ReadonlyMap<string, T>, id: string, what: string, label: string): T {
  const found = table.get(id);
  if (found === undefined) {
    fail("CK1004", `${label}: unknown ${what} '${id}' (ids must be declared before use).`);
  }
  return found;
}

function defineOnce<T>(table: Map<string, T>, id: string, value: T, label: string): void {
  if (table.has(id)) {
    fail("CK1004", `${label}: duplicate id '${id}'.`);
  }
  table.set(id, value);
}

function parseSpaces(value: unknown): ReadonlyMap<string, FunctionSpace> {
  const spaces = new Map<string, FunctionSpace>();
  asArray(value ?? [], `${DOC}: 'spaces'`).forEach((raw, i) => {
    const label = `${DOC}: 'spaces[${i}]'`;
    const entry = asRecord(raw, label);
    const id = asString(entry.id, `${label}.id`);
    if (entry.kind === "simple") {
      assertKnownKeys(entry, ["id", "kind", "dim"], label);
      defineOnce(spaces, id, simpleSpace(id, asInteger(entry.dim, `${label}.dim`)), label);
      return;
    }
    if (entry.kind === "mixed") {
      assertKnownKeys(entry, ["id", "kind", "parts"], label);
      const parts: SimpleSpace[] = asStringArray(entry.parts, `${label}.parts`).map((partId) => {
        const part = lookup(spaces, partId, "space", label);
        if (part.kind !== "simple") {
          fail("CK1004", `${label}: mixed space parts must be simple spaces ('${partId}' is mixed).`);
        }
        return part;
      });
      defineOnce(spaces, id, mixedSpace(id, parts), label);
      return;
    }
    fail("CK1004", `${label}.kind must be 'simple' or 'mixed'.`);
  });
  return spaces;
}

function parseCoefficients(
  value: unknown,
  spaces: ReadonlyMap<string, FunctionSpace>
): ReadonlyMap<string, Coefficient> {
  const coefficients = new Map<string, Coefficient>();
  asArray(value ?? [], `${DOC}: 'coefficients'`).forEach((raw, i) => {
    const label = `${DOC}: 'coefficients[${i}]'`;
    const entry = asRecord(raw, label);
    assertKnownKeys(entry, ["id", "count", "space"], label);
    const id = asString(entry.id, `${label}.id`);
    const count = asInteger(entry.count, `${label}.count`);
    const space = lookup(spaces, asString(entry.space, `${label}.space`), "space", label);
    defineOnce(coefficients, id, new Coefficient(count, id, space), label);
  });
  return coefficients;
}

function operandsOf(
  entry: Record<string, unknown>,
  arity: number,
  nodes: ReadonlyMap<string, TensorExpr>,
  label: string
): readonly TensorExpr[] {
  const ids = asStringArray(entry.operands, `${label}.operands`);
  if (ids.length !== arity) {
    fail("CK1004", `${label}: '${String(entry.op)}' takes ${arity} operand(s), got ${ids.length}.`);
  }
  return ids.map((id) => lookup(nodes, id, "node", label));
}

function parseNode(
  entry: Record<string, unknown>,
  nodes: ReadonlyMap<string, TensorExpr>,
  spaces: ReadonlyMap<string, FunctionSpace>,
  coefficients: ReadonlyMap<string, Coefficient>,
  label: string
): TensorExpr {
  const op = asString(entry.op, `${label}.op`);
  if (op === "tensor") {
    assertKnownKeys(entry, ["id", "op", "form"], label);
    const form = asRecord(entry.form, `${label}.form`);
    assertKnownKeys(form, ["name", "arguments", "coefficients"], `${label}.form`);
    return new Tensor({
      name: asString(form.name, `${label}.form.name`),
      arguments: asStringArray(form.arguments ?? [], `${label}.form.arguments`).map((id) =>
        lookup(spaces, id, "space", label)
      ),
      coefficients: asStringArray(form.coefficients ?? [], `${label}.form.coefficients`).map((id) =>
        lookup(coefficients, id, "coefficient", label)
      ),
    });
  }

  if (op === "action") {
    assertKnownKeys(entry, ["id", "op", "operands", "coefficient"], label);
    const [a] = operandsOf(entry, 1, nodes, label);
    if (!a) fail("CK1004", `${label}: missing operand.`);
    const coefficient = lookup(coefficients, asString(entry.coefficient, `${label}.coefficient`), "coefficient", label);
    return new Action(a, coefficient);
  }

  assertKnownKeys(entry, ["id", "op", "operands"], label);
  switch (op) {
    case "add":
    case "sub":
    case "mul": {
      const [a, b] = operandsOf(entry, 2, nodes, label);
      if (!a || !b) fail("CK1004", `${label}: missing operand.`);
      if (op === "add") return new Add(a, b);
      if (op === "sub") return new Sub(a, b);
      return new Mul(a, b);
    }
    case "negative":
    case "transpose":
    case "inverse": {
      const [a] = operandsOf(entry, 1, nodes, label);
      if (!a) fail("CK1004", `${label}: missing operand.`);
      if (op === "negative") return new Negative(a);
      if (op === "transpose") return new Transpose(a);
      return new Inverse(a);
    }
    default:
      return fail("CK1004", `${label}: unknown op '${op}'.`);
  }
}

/**
 * Builds an expression graph from its JSON document. Nodes may only refer to
 * ids declared earlier in `nodes`, so every document describes a DAG, and each
 * id becomes exactly one node instance: an id referenced twice is one shared
 * subexpression.
 */
export function parseExpressionGraph(value: unknown): ExpressionGraph {
  const root = asRecord(value, DOC);
  assertKnownKeys(root, ["schema", "spaces", "coefficients", "nodes", "root"], DOC);
  if (root.schema !== 1) {
    fail("CK1004", `Unsupported ${DOC} schema (expected 1).`);
  }

  const spaces = parseSpaces(root.spaces);
  const coefficients = parseCoefficients(root.coefficients, spaces);

  const nodes = new Map<string, TensorExpr>();
  asArray(root.nodes, `${DOC}: 'nodes'`).forEach((raw, i) => {
    const label = `${DOC}: 'nodes[${i}]'`;
    const entry = asRecord(raw, label);
    const id = asString(entry.id, `${label}.id`);
    defineOnce(nodes, id, parseNode(entry, nodes, spaces, coefficients, label), label);
  });

  const rootId = asString(root.root, `${DOC}: 'root'`);
  return {
    root: lookup(nodes, rootId, "node", DOC),
    nodesById: nodes,
    coefficientsById: coefficients,
  };
}
