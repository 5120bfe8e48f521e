export type { CxxBlock, CxxExpr, CxxFunction, CxxItem, CxxParam, CxxProgram, CxxStmt, CxxSymbol, CxxType } from "./cxx/ir.js";
export { block, isBlock, namedType, numberExpr, param, pointerType, symbol, voidType } from "./cxx/ir.js";
export { writeCxxProgram } from "./cxx/write.js";

export type { ExpressionGraph } from "./expr/graph-json.js";
export { parseExpressionGraph } from "./expr/graph-json.js";
export type { Form, FunctionSpace, MixedSpace, SimpleSpace } from "./expr/nodes.js";
export {
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
  splitSpace,
  Sub,
  Tensor,
  TensorExpr,
  TensorOp,
  Transpose,
} from "./expr/nodes.js";
export { collectReferenceCount, countOperands, traverseDags } from "./expr/traversal.js";

export type { ExprData } from "./kernel/analysis.js";
export { collectAuxiliaryExpressions, generateExprData, temporaryName } from "./kernel/analysis.js";
export type { BuilderState, KernelBuilderOptions } from "./kernel/builder.js";
export { KernelBuilder } from "./kernel/builder.js";
export type {
  CompilerParameters,
  ContextKernel,
  IntegralType,
  KernelInfo,
  KernelRewriter,
  SplitKernel,
  TerminalFormCompiler,
} from "./kernel/context.js";
export { compilationError, DEFAULT_SUBDOMAIN_ID, subkernelPrefix } from "./kernel/context.js";
export { EigenTransformer } from "./kernel/eigen-transform.js";
export { constructMacroKernel } from "./kernel/macro.js";
