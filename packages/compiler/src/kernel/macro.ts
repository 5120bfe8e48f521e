import { fail } from "@cellkern/core";

import type { CxxFunction, CxxParam } from "../cxx/ir.js";
import { isBlock, voidType } from "../cxx/ir.js";

/**
 * Wraps driver statements (temporary declarations, subkernel calls, facet and
 * action loops) into a `static inline void` function usable as a macro kernel.
 */
export function constructMacroKernel(name: string, params: readonly CxxParam[], body: unknown): CxxFunction {
  if (!isBlock(body)) {
    fail("CK1002", `Body of macro kernel '${name}' must be wrapped in a block statement.`);
  }
  return {
    kind: "fn",
    pred: ["static", "inline"],
    ret: voidType(),
    name,
    params: [...params],
    body,
  };
}
