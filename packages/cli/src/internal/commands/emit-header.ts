import { writeFileSync } from "node:fs";
import { resolve } from "node:path";

import {
  block,
  constructMacroKernel,
  KernelBuilder,
  namedType,
  param,
  parseExpressionGraph,
  pointerType,
  writeCxxProgram,
  type CxxFunction,
  type CxxParam,
  type TensorExpr,
} from "@cellkern/compiler";

import { loadProjectContext, readJson } from "../config.js";

export type EmitHeaderArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  readonly log?: (line: string) => void;
};

const DEFAULT_KERNEL_NAME = "macro_kernel";

type EmitHeaderFlags = {
  readonly graph?: string;
  readonly name: string;
  readonly out?: string;
};

export function parseEmitHeaderArgs(argv: readonly string[]): EmitHeaderFlags {
  let graph: string | undefined;
  let name = DEFAULT_KERNEL_NAME;
  let out: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--name" || a === "--out") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${a}.`);
      }
      if (a === "--name") name = value;
      else out = value;
      i++;
      continue;
    }
    if (a !== undefined && a.startsWith("--")) {
      throw new Error(`Unknown emit-header flag '${a}'.`);
    }
    if (graph !== undefined) {
      throw new Error("emit-header takes at most one graph path.");
    }
    graph = a;
  }
  return { graph, name, out };
}

/**
 * Signature of the driver kernel for `root`: the output tensor, the cell
 * coordinates and one pointer per coefficient symbol, with an empty body for
 * the caller to fill in.
 */
export function macroKernelSkeleton(root: TensorExpr, name: string): CxxFunction {
  const builder = new KernelBuilder(root);
  const real = namedType("double");
  const params: CxxParam[] = [
    param(real, "A", root.rank === 0 ? [1] : root.shape),
    param(pointerType(namedType("double", ["const"]), true), "coords"),
  ];
  for (const symbols of builder.coefficientMap.values()) {
    for (const s of symbols) params.push(param(pointerType(namedType("double", ["const"]), true), s.name));
  }
  return constructMacroKernel(name, params, block([{ kind: "comment", text: String(root) }]));
}

export async function runEmitHeader(args: EmitHeaderArgs): Promise<void> {
  const { projectRoot, project } = loadProjectContext(args.dir);
  const flags = parseEmitHeaderArgs(args.argv);
  const graphPath = flags.graph ? resolve(args.dir, flags.graph) : resolve(projectRoot, project.entry);

  const graph = parseExpressionGraph(readJson(graphPath));
  const kernel = macroKernelSkeleton(graph.root, flags.name);
  const text = writeCxxProgram(
    {
      kind: "program",
      items: [{ kind: "include", header: "Eigen/Dense", system: true }, kernel],
    },
    { header: ["/* generated by cellkern */"] }
  );

  if (flags.out) {
    writeFileSync(resolve(args.dir, flags.out), text, "utf-8");
    return;
  }
  (args.log ?? console.log)(text);
}
