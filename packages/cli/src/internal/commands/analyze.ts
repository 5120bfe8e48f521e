import { resolve } from "node:path";

import { KernelBuilder, parseExpressionGraph, type TensorExpr } from "@cellkern/compiler";

import { loadProjectContext, readJson, type ReportFormat } from "../config.js";

export type AnalyzeArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly log?: (line: string) => void;
};

export type AnalysisReport = {
  readonly temporaries: readonly { readonly symbol: string; readonly tensor: string; readonly shape: readonly number[] }[];
  readonly auxiliary: readonly { readonly expr: string; readonly shape: readonly number[] }[];
  readonly coefficients: readonly { readonly name: string; readonly symbols: readonly string[] }[];
};

export function buildAnalysisReport(root: TensorExpr): AnalysisReport {
  const builder = new KernelBuilder(root);
  return {
    temporaries: [...builder.temps.entries()].map(([tensor, sym]) => ({
      symbol: sym.name,
      tensor: tensor.form.name,
      shape: tensor.shape,
    })),
    auxiliary: builder.auxExprs.map((op) => ({ expr: String(op), shape: op.shape })),
    coefficients: [...builder.coefficientMap.entries()].map(([c, symbols]) => ({
      name: c.name,
      symbols: symbols.map((s) => s.name),
    })),
  };
}

function shapeText(shape: readonly number[]): string {
  return `(${shape.join(", ")})`;
}

export function renderAnalysisReport(report: AnalysisReport, format: ReportFormat): string {
  if (format === "json") return JSON.stringify(report, null, 2);

  const lines: string[] = [];
  lines.push("temporaries:");
  for (const t of report.temporaries) lines.push(`  ${t.symbol} = ${t.tensor} ${shapeText(t.shape)}`);
  lines.push("auxiliary expressions:");
  if (report.auxiliary.length === 0) lines.push("  (none)");
  for (const a of report.auxiliary) lines.push(`  ${a.expr} ${shapeText(a.shape)}`);
  lines.push("coefficients:");
  if (report.coefficients.length === 0) lines.push("  (none)");
  for (const c of report.coefficients) lines.push(`  ${c.name} -> ${c.symbols.join(", ")}`);
  return lines.join("\n");
}

export async function runAnalyze(args: AnalyzeArgs): Promise<void> {
  const { projectRoot, project } = loadProjectContext(args.dir);
  const [graphArg] = args.argv;
  const graphPath = graphArg ? resolve(args.dir, graphArg) : resolve(projectRoot, project.entry);

  const graph = parseExpressionGraph(readJson(graphPath));
  const report = buildAnalysisReport(graph.root);
  (args.log ?? console.log)(renderAnalysisReport(report, project.report.format));
}
