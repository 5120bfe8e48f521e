import { fail } from "@cellkern/core";

export type SimpleSpace = {
  readonly kind: "simple";
  readonly name: string;
  readonly dim: number;
};

export type MixedSpace = {
  readonly kind: "mixed";
  readonly name: string;
  readonly parts: readonly SimpleSpace[];
};

export type FunctionSpace = SimpleSpace | MixedSpace;

export function simpleSpace(name: string, dim: number): SimpleSpace {
  if (!Number.isInteger(dim) || dim <= 0) {
    fail("CK1006", `Function space '${name}' must have a positive integer dimension (got ${dim}).`);
  }
  return Object.freeze({ kind: "simple", name, dim });
}

export function mixedSpace(name: string, parts: readonly SimpleSpace[]): MixedSpace {
  if (parts.length < 2) {
    fail("CK1006", `Mixed function space '${name}' needs at least two parts (got ${parts.length}).`);
  }
  return Object.freeze({ kind: "mixed", name, parts: Object.freeze([...parts]) });
}

export function spaceDim(space: FunctionSpace): number {
  if (space.kind === "simple") return space.dim;
  return space.parts.reduce((acc, part) => acc + part.dim, 0);
}

/** Parts a coefficient splits into when passed to a kernel. */
export function splitSpace(space: FunctionSpace): readonly SimpleSpace[] {
  return space.kind === "mixed" ? space.parts : [space];
}

export class Coefficient {
  readonly count: number;
  readonly name: string;
  readonly space: FunctionSpace;

  constructor(count: number, name: string, space: FunctionSpace) {
    if (!Number.isInteger(count) || count < 0) {
      fail("CK1006", `Coefficient '${name}' must have a non-negative integer count (got ${count}).`);
    }
    this.count = count;
    this.name = name;
    this.space = space;
  }

  split(): readonly SimpleSpace[] {
    return splitSpace(this.space);
  }

  toString(): string {
    return this.name;
  }
}

export type Form = {
  readonly name: string;
  readonly arguments: readonly FunctionSpace[];
  readonly coefficients: readonly Coefficient[];
};

export const EXPR_TEXT_LIMIT = 240;

export abstract class TensorExpr {
  abstract readonly operands: readonly TensorExpr[];
  abstract readonly shape: readonly number[];

  get rank(): number {
    return this.shape.length;
  }

  /** Coefficients this node references directly, before collecting operands. */
  protected ownCoefficients(): readonly Coefficient[] {
    return [];
  }

  /**
   * Every coefficient reachable from this node, deduplicated by identity and
   * ordered by ascending `count`.
   */
  coefficients(): readonly Coefficient[] {
    const seen = new Set<Coefficient>();
    const out: Coefficient[] = [];
    const stack: TensorExpr[] = [this];
    const visited = new Set<TensorExpr>([this]);
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      for (const c of node.ownCoefficients()) {
        if (seen.has(c)) continue;
        seen.add(c);
        out.push(c);
      }
      for (const operand of node.operands) {
        if (visited.has(operand)) continue;
        visited.add(operand);
        stack.push(operand);
      }
    }
    return out.sort((a, b) => a.count - b.count);
  }

  /** Literal text and operands, in print order. */
  protected abstract textParts(): readonly (string | TensorExpr)[];

  /**
   * Infix rendering, cut off after `limit` characters. Shared subexpressions
   * print once per path, so the full text of a deep diamond is exponentially
   * long.
   */
  render(limit: number = EXPR_TEXT_LIMIT): string {
    let out = "";
    const stack: (string | TensorExpr)[] = [this];
    while (stack.length > 0) {
      const item = stack.pop();
      if (item === undefined) break;
      if (typeof item === "string") {
        out += item;
        if (out.length > limit) return out.slice(0, limit) + "...";
        continue;
      }
      const parts = item.textParts();
      for (let i = parts.length - 1; i >= 0; i--) {
        const part = parts[i];
        if (part !== undefined) stack.push(part);
      }
    }
    return out;
  }

  toString(): string {
    return this.render();
  }
}

export class Tensor extends TensorExpr {
  readonly form: Form;
  readonly operands: readonly TensorExpr[] = Object.freeze([]);
  readonly shape: readonly number[];

  constructor(form: Form) {
    super();
    this.form = form;
    this.shape = Object.freeze(form.arguments.map(spaceDim));
  }

  protected override ownCoefficients(): readonly Coefficient[] {
    return this.form.coefficients;
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return [this.form.name];
  }
}

function shapeText(shape: readonly number[]): string {
  return `(${shape.join(", ")})`;
}

function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

export abstract class TensorOp extends TensorExpr {
  readonly operands: readonly TensorExpr[];

  protected constructor(operands: readonly TensorExpr[]) {
    super();
    for (const operand of operands) {
      if (!(operand instanceof TensorExpr)) {
        fail("CK1001", `Operands of ${new.target.name} must be tensor expressions.`);
      }
    }
    this.operands = Object.freeze([...operands]);
  }
}

export class Add extends TensorOp {
  readonly shape: readonly number[];

  constructor(a: TensorExpr, b: TensorExpr) {
    super([a, b]);
    if (!sameShape(a.shape, b.shape)) {
      fail("CK1005", `Cannot add tensors of shape ${shapeText(a.shape)} and ${shapeText(b.shape)}.`);
    }
    this.shape = a.shape;
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return ["(", this.operands[0], " + ", this.operands[1], ")"];
  }
}

export class Sub extends TensorOp {
  readonly shape: readonly number[];

  constructor(a: TensorExpr, b: TensorExpr) {
    super([a, b]);
    if (!sameShape(a.shape, b.shape)) {
      fail("CK1005", `Cannot subtract tensors of shape ${shapeText(a.shape)} and ${shapeText(b.shape)}.`);
    }
    this.shape = a.shape;
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return ["(", this.operands[0], " - ", this.operands[1], ")"];
  }
}

export class Mul extends TensorOp {
  readonly shape: readonly number[];

  constructor(a: TensorExpr, b: TensorExpr) {
    super([a, b]);
    const inner = a.shape[a.shape.length - 1];
    if (a.rank === 0 || b.rank === 0 || inner !== b.shape[0]) {
      fail("CK1005", `Cannot multiply tensors of shape ${shapeText(a.shape)} and ${shapeText(b.shape)}.`);
    }
    this.shape = Object.freeze([...a.shape.slice(0, -1), ...b.shape.slice(1)]);
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return ["(", this.operands[0], " * ", this.operands[1], ")"];
  }
}

export class Negative extends TensorOp {
  readonly shape: readonly number[];

  constructor(a: TensorExpr) {
    super([a]);
    this.shape = a.shape;
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return ["-", this.operands[0]];
  }
}

export class Transpose extends TensorOp {
  readonly shape: readonly number[];

  constructor(a: TensorExpr) {
    super([a]);
    if (a.rank !== 2) {
      fail("CK1005", `Only rank-2 tensors can be transposed (got shape ${shapeText(a.shape)}).`);
    }
    this.shape = Object.freeze([...a.shape].reverse());
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return [this.operands[0], ".T"];
  }
}

export class Inverse extends TensorOp {
  readonly shape: readonly number[];

  constructor(a: TensorExpr) {
    super([a]);
    if (a.rank !== 2 || a.shape[0] !== a.shape[1]) {
      fail("CK1005", `Only square rank-2 tensors can be inverted (got shape ${shapeText(a.shape)}).`);
    }
    this.shape = a.shape;
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return [this.operands[0], ".inv"];
  }
}

/**
 * Application of a tensor to an already assembled coefficient. The acting
 * coefficient always needs its own temporary in the driver.
 */
export class Action extends TensorOp {
  readonly shape: readonly number[];
  readonly coefficient: Coefficient;

  constructor(a: TensorExpr, coefficient: Coefficient) {
    super([a]);
    const last = a.shape[a.shape.length - 1];
    if (a.rank === 0 || last !== spaceDim(coefficient.space)) {
      fail(
        "CK1005",
        `Cannot act tensor of shape ${shapeText(a.shape)} on coefficient '${coefficient.name}' of dimension ${spaceDim(coefficient.space)}.`
      );
    }
    this.coefficient = coefficient;
    this.shape = Object.freeze(a.shape.slice(0, -1));
  }

  protected override ownCoefficients(): readonly Coefficient[] {
    return [this.coefficient];
  }

  protected textParts(): readonly (string | TensorExpr)[] {
    return ["action(", this.operands[0], `, ${this.coefficient.name})`];
  }
}
