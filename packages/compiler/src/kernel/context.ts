import { KernelError } from "@cellkern/core";

import type { CxxFunction } from "../cxx/ir.js";
import type { Coefficient, Tensor } from "../expr/nodes.js";

export type IntegralType =
  | "cell"
  | "interior_facet"
  | "exterior_facet"
  | "interior_facet_horiz"
  | "interior_facet_vert"
  | "exterior_facet_top"
  | "exterior_facet_bottom"
  | "exterior_facet_vert";

export const DEFAULT_SUBDOMAIN_ID = "otherwise";

export type KernelInfo = {
  readonly kernel: CxxFunction;
  readonly integralType: IntegralType;
  readonly subdomainId: string;
  readonly oriented: boolean;
  readonly needsCellFacets?: boolean;
};

export type SplitKernel = {
  readonly indices: readonly number[];
  readonly kinfo: KernelInfo;
};

/** Everything the terminal-form compiler produced for one terminal tensor. */
export type ContextKernel = {
  readonly tensor: Tensor;
  readonly originalIntegralType: IntegralType;
  readonly coefficients: readonly Coefficient[];
  readonly subkernels: readonly SplitKernel[];
};

export type CompilerParameters = Readonly<Record<string, unknown>>;

export type TerminalFormCompiler = (
  tensor: Tensor,
  prefix: string,
  parameters: CompilerParameters | undefined
) => readonly ContextKernel[];

/** Rewrites one generated subkernel into the numerical library's calling convention. */
export type KernelRewriter = {
  rewrite(kernel: CxxFunction): CxxFunction;
};

/**
 * Error for terminal-form compilers that cannot lower a terminal tensor
 * (unsupported element, malformed form). Kernel builders let it propagate.
 */
export function compilationError(tensor: Tensor, reason: string): KernelError {
  return new KernelError("CK5001", `Cannot compile terminal '${tensor.form.name}': ${reason}`);
}

export function subkernelPrefix(index: number): string {
  return `subkernel${index}_`;
}
