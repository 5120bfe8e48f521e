import { expect } from "chai";

import { KernelError } from "@cellkern/core";

import {
  Action,
  Add,
  Coefficient,
  EXPR_TEXT_LIMIT,
  Inverse,
  mixedSpace,
  Mul,
  Negative,
  simpleSpace,
  spaceDim,
  Sub,
  Tensor,
  Transpose,
  type FunctionSpace,
  type TensorExpr,
} from "./nodes.js";

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof KernelError) return err.code;
    throw err;
  }
  return "none";
}

function tensor(name: string, args: readonly FunctionSpace[], coefficients: readonly Coefficient[] = []): Tensor {
  return new Tensor({ name, arguments: args, coefficients });
}

describe("@cellkern/compiler expression nodes", () => {
  const V = simpleSpace("V", 3);
  const Q = simpleSpace("Q", 2);

  it("derives shapes from argument spaces", () => {
    const W = mixedSpace("W", [V, Q]);
    expect(spaceDim(W)).to.equal(5);
    expect(tensor("mass", [V, V]).shape).to.deep.equal([3, 3]);
    expect(tensor("mixed", [W, Q]).shape).to.deep.equal([5, 2]);
    expect(tensor("scalar", []).rank).to.equal(0);
  });

  it("propagates shapes through operators", () => {
    const a = tensor("a", [V, Q]);
    const b = tensor("b", [Q, V]);
    expect(new Mul(a, b).shape).to.deep.equal([3, 3]);
    expect(new Transpose(a).shape).to.deep.equal([2, 3]);
    expect(new Negative(a).shape).to.deep.equal([3, 2]);
    expect(new Add(a, a).shape).to.deep.equal([3, 2]);
    expect(new Sub(a, a).shape).to.deep.equal([3, 2]);
    expect(new Inverse(new Mul(a, b)).shape).to.deep.equal([3, 3]);

    const f = new Coefficient(0, "f", Q);
    expect(new Action(a, f).shape).to.deep.equal([3]);
  });

  it("rejects incompatible shapes", () => {
    const a = tensor("a", [V, Q]);
    const b = tensor("b", [V, V]);
    expect(codeOf(() => new Add(a, b))).to.equal("CK1005");
    expect(codeOf(() => new Sub(a, b))).to.equal("CK1005");
    expect(codeOf(() => new Mul(a, a))).to.equal("CK1005");
    expect(codeOf(() => new Inverse(a))).to.equal("CK1005");
    expect(codeOf(() => new Transpose(tensor("v", [V])))).to.equal("CK1005");
    expect(codeOf(() => new Action(a, new Coefficient(0, "f", V)))).to.equal("CK1005");
    expect(() => new Add(a, b)).to.throw("Cannot add tensors of shape (3, 2) and (3, 3).");
  });

  it("validates spaces and coefficients", () => {
    expect(codeOf(() => simpleSpace("Z", 0))).to.equal("CK1006");
    expect(codeOf(() => mixedSpace("W", [V]))).to.equal("CK1006");
    expect(codeOf(() => new Coefficient(-1, "f", V))).to.equal("CK1006");
    expect(new Coefficient(0, "g", mixedSpace("W", [V, Q])).split().map((s) => s.name)).to.deep.equal(["V", "Q"]);
  });

  it("prints expressions", () => {
    const a = tensor("a", [V, V]);
    const b = tensor("b", [V, V]);
    const f = new Coefficient(0, "f", V);
    const expr = new Action(new Mul(new Inverse(new Sub(a, b)), new Transpose(new Negative(b))), f);
    expect(String(expr)).to.equal("action(((a - b).inv * -b.T), f)");
  });

  it("cuts long renderings off at the text limit", () => {
    const a = tensor("a", [V, V]);
    const b = tensor("b", [V, V]);
    expect(new Add(a, b).render(7)).to.equal("(a + b)");
    expect(new Add(a, b).render(4)).to.equal("(a +...");

    let chain: TensorExpr = a;
    for (let i = 0; i < 20_000; i++) chain = new Negative(chain);
    expect(String(chain)).to.equal("-".repeat(EXPR_TEXT_LIMIT) + "...");

    let diamond: TensorExpr = a;
    for (let i = 0; i < 40; i++) diamond = new Add(diamond, diamond);
    expect(String(diamond).length).to.equal(EXPR_TEXT_LIMIT + 3);
    expect(String(diamond).startsWith("((((")).to.equal(true);
  });

  it("collects coefficients once each, ordered by count", () => {
    const f = new Coefficient(2, "f", V);
    const g = new Coefficient(0, "g", V);
    const h = new Coefficient(1, "h", V);
    const a = tensor("a", [V, V], [f, g]);
    const b = tensor("b", [V, V], [g]);
    const expr = new Action(new Add(a, b), h);
    expect(expr.coefficients().map((c) => c.name)).to.deep.equal(["g", "h", "f"]);
    expect(tensor("plain", [V]).coefficients()).to.deep.equal([]);
  });
});
