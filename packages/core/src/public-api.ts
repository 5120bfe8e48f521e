export type { DiagnosticCode, DiagnosticDomain } from "./diagnostics.js";
export {
  assertDiagnosticCode,
  DIAGNOSTIC_CODES,
  diagnosticDomain,
  diagnosticSummary,
  fail,
  isDiagnosticCode,
  KernelError,
} from "./diagnostics.js";
