import { expect } from "chai";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { EXPR_TEXT_LIMIT, parseExpressionGraph } from "@cellkern/compiler";

import { buildAnalysisReport, runAnalyze } from "./analyze.js";
import { runInit } from "./init.js";

describe("@cellkern/cli analyze", () => {
  function capture(): { readonly lines: string[]; readonly log: (line: string) => void } {
    const lines: string[] = [];
    return { lines, log: (line) => lines.push(line) };
  }

  it("reports temporaries, auxiliary expressions and coefficients", async () => {
    const dir = mkdtempSync(join(tmpdir(), "cellkern-analyze-"));
    await runInit({ dir });
    const out = capture();

    await runAnalyze({ dir, argv: [], log: out.log });

    expect(out.lines).to.deep.equal([
      [
        "temporaries:",
        "  T0 = mass (3, 3)",
        "  T1 = stiffness (3, 3)",
        "auxiliary expressions:",
        "  action((mass + stiffness), f) (3)",
        "coefficients:",
        "  f -> w_0",
      ].join("\n"),
    ]);
  });

  it("prints a json report when the project asks for one", async () => {
    const dir = mkdtempSync(join(tmpdir(), "cellkern-analyze-json-"));
    await runInit({ dir });
    writeFileSync(
      join(dir, "cellkern.json"),
      JSON.stringify({ schema: 1, entry: "graph.json", report: { format: "json" } }) + "\n",
      "utf-8"
    );
    const out = capture();

    await runAnalyze({ dir, argv: [], log: out.log });

    expect(out.lines.length).to.equal(1);
    expect(JSON.parse(out.lines[0] ?? "")).to.deep.equal({
      temporaries: [
        { symbol: "T0", tensor: "mass", shape: [3, 3] },
        { symbol: "T1", tensor: "stiffness", shape: [3, 3] },
      ],
      auxiliary: [{ expr: "action((mass + stiffness), f)", shape: [3] }],
      coefficients: [{ name: "f", symbols: ["w_0"] }],
    });
  });

  it("analyzes a graph named on the command line", async () => {
    const dir = mkdtempSync(join(tmpdir(), "cellkern-analyze-arg-"));
    await runInit({ dir });
    writeFileSync(
      join(dir, "shared.json"),
      JSON.stringify({
        schema: 1,
        spaces: [{ id: "V", kind: "simple", dim: 2 }],
        nodes: [
          { id: "A", op: "tensor", form: { name: "load", arguments: ["V"] } },
          { id: "S", op: "add", operands: ["A", "A"] },
        ],
        root: "S",
      }),
      "utf-8"
    );
    const out = capture();

    await runAnalyze({ dir, argv: ["shared.json"], log: out.log });

    expect(out.lines).to.deep.equal(
      [
        [
          "temporaries:",
          "  T0 = load (2)",
          "auxiliary expressions:",
          "  (none)",
          "coefficients:",
          "  (none)",
        ].join("\n"),
      ]
    );
  });

  it("reports deeply shared graphs with bounded expression text", () => {
    const nodes: unknown[] = [{ id: "X0", op: "tensor", form: { name: "load", arguments: ["V"] } }];
    for (let i = 1; i <= 30; i++) nodes.push({ id: `X${i}`, op: "add", operands: [`X${i - 1}`, `X${i - 1}`] });
    const graph = parseExpressionGraph({
      schema: 1,
      spaces: [{ id: "V", kind: "simple", dim: 2 }],
      nodes,
      root: "X30",
    });

    const report = buildAnalysisReport(graph.root);

    expect(report.temporaries).to.deep.equal([{ symbol: "T0", tensor: "load", shape: [2] }]);
    expect(report.auxiliary.length).to.equal(29);
    expect(report.auxiliary[0]).to.deep.equal({ expr: "(load + load)", shape: [2] });
    expect(report.auxiliary[28]?.expr.length).to.equal(EXPR_TEXT_LIMIT + 3);
  });
});
