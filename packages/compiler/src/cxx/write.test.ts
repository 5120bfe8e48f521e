import { expect } from "chai";

import { block, namedType, numberExpr, param, pointerType, symbol, voidType, type CxxProgram } from "./ir.js";
import { writeCxxProgram } from "./write.js";

describe("@cellkern/compiler cxx writer", () => {
  const real = namedType("double");

  it("writes includes, headers and function bodies", () => {
    const i = symbol("i");
    const program: CxxProgram = {
      kind: "program",
      items: [
        { kind: "include", header: "Eigen/Dense", system: true },
        {
          kind: "fn",
          pred: ["static", "inline"],
          ret: voidType(),
          name: "driver",
          params: [param(real, "A", [2, 2])],
          body: block([
            { kind: "decl", type: real, name: "T0", dims: [2, 2] },
            {
              kind: "for",
              index: "i",
              start: 0,
              end: numberExpr(2),
              body: [
                {
                  kind: "assign",
                  op: "=",
                  target: symbol("A", [i, numberExpr(0)]),
                  expr: { kind: "binary", op: "+", left: symbol("T0", [i, numberExpr(0)]), right: numberExpr("1.0") },
                },
              ],
            },
            { kind: "comment", text: "done" },
            { kind: "return" },
          ]),
        },
      ],
    };

    expect(writeCxxProgram(program, { header: ["// hdr"] })).to.equal(
      [
        "// hdr",
        "",
        "#include <Eigen/Dense>",
        "",
        "static inline void driver(double A[2][2])",
        "{",
        "  double T0[2][2];",
        "  for (int i = 0; i < 2; i++) {",
        "    A[i][0] = (T0[i][0] + 1.0);",
        "  }",
        "  /* done */",
        "  return;",
        "}",
        "",
      ].join("\n")
    );
  });

  it("writes pointers, references, casts and calls", () => {
    const program: CxxProgram = {
      kind: "program",
      items: [
        { kind: "comment", text: "kernels" },
        { kind: "include", header: "local.h", system: false },
        {
          kind: "fn",
          pred: [],
          template: "template <typename Derived>",
          ret: real,
          name: "f",
          params: [
            param({ kind: "ref", const: true, inner: { kind: "template", name: "Eigen::MatrixBase", args: [namedType("Derived")] } }, "A"),
            param(pointerType(namedType("double", ["const"]), true), "w_0"),
            param(pointerType(real), "out"),
          ],
          body: block([
            {
              kind: "decl",
              type: namedType("int"),
              name: "n",
              dims: [],
              init: { kind: "cast", cast: "static_cast", type: namedType("int"), expr: symbol("w_0", [numberExpr(0)]) },
            },
            { kind: "expr", expr: { kind: "call", callee: "helper", args: [symbol("out"), { kind: "unary", op: "-", expr: symbol("n") }] } },
            {
              kind: "block",
              body: [
                {
                  kind: "assign",
                  op: "+=",
                  target: symbol("out", [numberExpr(0)]),
                  expr: { kind: "method_call", target: { kind: "paren", expr: symbol("A") }, member: "sum", args: [] },
                },
              ],
            },
            { kind: "return", expr: numberExpr("0.0") },
          ]),
        },
      ],
    };

    expect(writeCxxProgram(program)).to.equal(
      [
        "/* kernels */",
        "",
        '#include "local.h"',
        "",
        "template <typename Derived>",
        "double f(Eigen::MatrixBase<Derived> const &A, const double *__restrict__ w_0, double *out)",
        "{",
        "  int n = static_cast<int>(w_0[0]);",
        "  helper(out, -n);",
        "  {",
        "    out[0] += (A).sum();",
        "  }",
        "  return 0.0;",
        "}",
        "",
      ].join("\n")
    );
  });

  it("keeps comment text from closing the comment", () => {
    const program: CxxProgram = {
      kind: "program",
      items: [
        { kind: "comment", text: "mass */ int x;" },
        {
          kind: "fn",
          pred: [],
          ret: voidType(),
          name: "k",
          params: [],
          body: block([{ kind: "comment", text: "a*/b" }]),
        },
      ],
    };

    expect(writeCxxProgram(program)).to.equal(
      ["/* mass * / int x; */", "", "void k()", "{", "  /* a* /b */", "}", ""].join("\n")
    );
  });
});
