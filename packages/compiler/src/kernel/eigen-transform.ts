import type { CxxExpr, CxxFunction, CxxParam, CxxStmt, CxxType } from "../cxx/ir.js";
import type { KernelRewriter } from "./context.js";

const TEMPLATE_HEADER = "template <typename Derived>";

function matrixBaseType(): CxxType {
  return {
    kind: "template",
    name: "Eigen::MatrixBase",
    args: [{ kind: "named", name: "Derived", qualifiers: [] }],
  };
}

/**
 * Turns generated subkernels into Eigen template functions:
 *
 *   template <typename Derived>
 *   static inline void foo(Eigen::MatrixBase<Derived> const &A, ...)
 *
 * Writes to the output tensor go through a `const_cast` of the matrix base,
 * `A[i][j]` becoming `const_cast<Eigen::MatrixBase<Derived> &>(A)(i, j)`.
 */
export class EigenTransformer implements KernelRewriter {
  rewrite(kernel: CxxFunction): CxxFunction {
    const [output, ...rest] = kernel.params;
    if (!output) return kernel;

    const outParam: CxxParam = {
      type: { kind: "ref", const: true, inner: matrixBaseType() },
      name: output.name,
      dims: [],
    };
    const name = output.name;
    return {
      ...kernel,
      template: TEMPLATE_HEADER,
      params: [outParam, ...rest],
      body: { kind: "block", body: kernel.body.body.map((st) => this.visitStmt(st, name)) },
    };
  }

  private visitStmt(st: CxxStmt, name: string): CxxStmt {
    switch (st.kind) {
      case "decl":
        return st.init ? { ...st, init: this.visitExpr(st.init, name) } : st;
      case "assign":
        return { ...st, target: this.visitExpr(st.target, name), expr: this.visitExpr(st.expr, name) };
      case "expr":
        return { ...st, expr: this.visitExpr(st.expr, name) };
      case "block":
        return { ...st, body: st.body.map((s) => this.visitStmt(s, name)) };
      case "for":
        return {
          ...st,
          end: this.visitExpr(st.end, name),
          body: st.body.map((s) => this.visitStmt(s, name)),
        };
      case "return":
        return st.expr ? { ...st, expr: this.visitExpr(st.expr, name) } : st;
      case "comment":
        return st;
    }
  }

  private visitExpr(expr: CxxExpr, name: string): CxxExpr {
    switch (expr.kind) {
      case "symbol": {
        const rank = expr.rank.map((r) => this.visitExpr(r, name));
        if (expr.name !== name || rank.length === 0) return { ...expr, rank };
        return {
          kind: "apply",
          callee: {
            kind: "cast",
            cast: "const_cast",
            type: { kind: "ref", const: false, inner: matrixBaseType() },
            expr: { kind: "symbol", name, rank: [] },
          },
          args: rank,
        };
      }
      case "number":
        return expr;
      case "paren":
      case "unary":
        return { ...expr, expr: this.visitExpr(expr.expr, name) };
      case "cast":
        return { ...expr, expr: this.visitExpr(expr.expr, name) };
      case "binary":
        return { ...expr, left: this.visitExpr(expr.left, name), right: this.visitExpr(expr.right, name) };
      case "call":
        return { ...expr, args: expr.args.map((a) => this.visitExpr(a, name)) };
      case "method_call":
        return {
          ...expr,
          target: this.visitExpr(expr.target, name),
          args: expr.args.map((a) => this.visitExpr(a, name)),
        };
      case "apply":
        return {
          ...expr,
          callee: this.visitExpr(expr.callee, name),
          args: expr.args.map((a) => this.visitExpr(a, name)),
        };
    }
  }
}
