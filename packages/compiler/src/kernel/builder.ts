import { fail } from "@cellkern/core";

import type { CxxFunction, CxxItem, CxxProgram, CxxSymbol } from "../cxx/ir.js";
import { symbol } from "../cxx/ir.js";
import type { Coefficient, Tensor, TensorOp } from "../expr/nodes.js";
import { TensorExpr } from "../expr/nodes.js";
import { collectAuxiliaryExpressions, generateExprData } from "./analysis.js";
import {
  compilationError,
  DEFAULT_SUBDOMAIN_ID,
  subkernelPrefix,
  type CompilerParameters,
  type ContextKernel,
  type KernelRewriter,
  type TerminalFormCompiler,
} from "./context.js";
import { EigenTransformer } from "./eigen-transform.js";

export type BuilderState = "constructed" | "finalized";

export type KernelBuilderOptions = {
  /** Required before `contextKernels` is read; analysis alone does not need it. */
  readonly compileTerminal?: TerminalFormCompiler;
  readonly parameters?: CompilerParameters;
  /** Defaults to the Eigen `MatrixBase` rewriter. */
  readonly rewriter?: KernelRewriter;
};

/**
 * Compilation state for one tensor expression.
 *
 * Gives access to the temporaries and subkernels of the expression and to the
 * operator nodes that need special handling in the driver (shared
 * subexpressions and actions on assembled coefficients). Kernels are
 * assembled in two phases: `finalize()` rewrites every subkernel and merges
 * orientation information, then `construct()` returns the compilation unit.
 *
 * A builder is driven by one caller at a time; the memoized accessors are not
 * guarded against concurrent first access.
 */
export class KernelBuilder {
  readonly expression: TensorExpr;
  readonly parameters: CompilerParameters | undefined;
  readonly temps: ReadonlyMap<Tensor, CxxSymbol>;
  readonly auxExprs: readonly TensorOp[];

  needsCellFacets = false;
  needsMeshLayers = false;
  oriented = false;

  #state: BuilderState = "constructed";
  #finalizedAst: readonly CxxFunction[] | undefined;
  #coefficientMap: ReadonlyMap<Coefficient, readonly CxxSymbol[]> | undefined;
  #contextKernels: readonly ContextKernel[] | undefined;
  readonly #compileTerminal: TerminalFormCompiler | undefined;
  readonly #rewriter: KernelRewriter;

  constructor(expression: unknown, opts: KernelBuilderOptions = {}) {
    if (!(expression instanceof TensorExpr)) {
      fail("CK1001", "KernelBuilder expects a tensor expression.");
    }
    this.expression = expression;
    this.parameters = opts.parameters;
    this.#compileTerminal = opts.compileTerminal;
    this.#rewriter = opts.rewriter ?? new EigenTransformer();

    const { temps, tensorOps } = generateExprData(expression);
    this.temps = temps;
    this.auxExprs = collectAuxiliaryExpressions(expression, tensorOps);
  }

  get state(): BuilderState {
    return this.#state;
  }

  get finalizedAst(): readonly CxxFunction[] | undefined {
    return this.#finalizedAst;
  }

  /**
   * These kernels do element-local dense linear algebra, so they are always
   * cell integrals. Facet data can still be requested through
   * `requireCellFacets()`.
   */
  get integralType(): "cell" {
    return "cell";
  }

  requireCellFacets(): void {
    this.needsCellFacets = true;
  }

  requireMeshLayers(): void {
    this.needsMeshLayers = true;
  }

  /**
   * Kernel argument symbols for every coefficient of the expression. A
   * coefficient on a mixed space gets one symbol per component.
   */
  get coefficientMap(): ReadonlyMap<Coefficient, readonly CxxSymbol[]> {
    if (this.#coefficientMap) return this.#coefficientMap;
    const map = new Map<Coefficient, readonly CxxSymbol[]>();
    this.expression.coefficients().forEach((coefficient, i) => {
      const space = coefficient.space;
      const symbols =
        space.kind === "mixed" ? space.parts.map((_, j) => symbol(`w_${i}_${j}`)) : [symbol(`w_${i}`)];
      map.set(coefficient, Object.freeze(symbols));
    });
    this.#coefficientMap = map;
    return map;
  }

  coefficient(coefficient: Coefficient): readonly CxxSymbol[] {
    const symbols = this.coefficientMap.get(coefficient);
    if (!symbols) {
      fail("CK4001", `Coefficient '${coefficient.name}' does not appear in the kernel expression.`);
    }
    return symbols;
  }

  /**
   * Context kernels of every terminal tensor, in temporary order. Each
   * terminal is compiled on its own under the prefix `subkernel<i>_`.
   */
  get contextKernels(): readonly ContextKernel[] {
    if (this.#contextKernels) return this.#contextKernels;
    const compileTerminal = this.#compileTerminal;
    const out: ContextKernel[] = [];
    let i = 0;
    for (const tensor of this.temps.keys()) {
      if (!compileTerminal) {
        throw compilationError(tensor, "no terminal-form compiler was configured for this builder.");
      }
      out.push(...compileTerminal(tensor, subkernelPrefix(i), this.parameters));
      i++;
    }
    this.#contextKernels = Object.freeze(out);
    return this.#contextKernels;
  }

  /**
   * Rewrites every subkernel into the numerical library form and merges
   * orientation requirements. Runs once; later calls return immediately.
   */
  finalize(): void {
    if (this.#state === "finalized") return;

    const kernels: CxxFunction[] = [];
    let oriented = this.oriented;
    const splitKernels = this.contextKernels.flatMap((ctx) => ctx.subkernels);
    for (const split of splitKernels) {
      oriented = oriented || split.kinfo.oriented;
      // TODO: support subdomain integrals once driver loops can restrict by marker.
      if (split.kinfo.subdomainId !== DEFAULT_SUBDOMAIN_ID) {
        fail(
          "CK3001",
          `Subkernel '${split.kinfo.kernel.name}' is restricted to subdomain '${split.kinfo.subdomainId}'.`
        );
      }
      kernels.push(this.#rewriter.rewrite(split.kinfo.kernel));
    }

    this.oriented = oriented;
    this.#finalizedAst = Object.freeze(kernels);
    this.#state = "finalized";
  }

  /** Finalized subkernels followed by the macro kernels, as one compilation unit. */
  construct(macroKernels: unknown): CxxProgram {
    const finalized = this.#finalizedAst;
    if (this.#state !== "finalized" || !finalized) {
      fail("CK2001", "Kernel AST is not finalized. Call finalize() before construct().");
    }
    if (!Array.isArray(macroKernels)) {
      fail("CK1003", "Macro kernel functions must be wrapped in an array.");
    }
    const macros: readonly unknown[] = macroKernels;
    const items: CxxItem[] = [...finalized];
    for (const macro of macros) {
      if (!isFunctionItem(macro)) {
        fail("CK1003", "Macro kernels must be function items.");
      }
      items.push(macro);
    }
    return { kind: "program", items };
  }
}

function isFunctionItem(value: unknown): value is CxxFunction {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "fn";
}
