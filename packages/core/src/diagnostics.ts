export type DiagnosticDomain =
  | "invalid-argument"
  | "precondition"
  | "unsupported"
  | "compilation"
  | "lookup"
  | "other";

// Codes are grouped by leading digit: 1xxx invalid argument, 2xxx lifecycle
// precondition, 3xxx unsupported configuration, 4xxx lookup, 5xxx compilation.
const DIAGNOSTIC_MESSAGES = {
  CK1001: "Kernel builder input must be a tensor expression.",
  CK1002: "Macro kernel body must be a block statement.",
  CK1003: "Macro kernels must be passed as an array.",
  CK1004: "Malformed expression graph document.",
  CK1005: "Operand shapes do not agree.",
  CK1006: "Malformed function space or coefficient.",
  CK2001: "Kernel AST has not been finalized.",
  CK3001: "Subdomain integrals are not supported.",
  CK3002: "Unsupported global-to-local insert mode.",
  CK3003: "Unsupported local-to-global insert mode.",
  CK3004: "Unknown base datatype.",
  CK3005: "Windowed star forests are not supported.",
  CK4001: "Coefficient is not part of the expression.",
  CK5001: "Terminal tensor could not be lowered.",
} as const;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_MESSAGES;

export function isDiagnosticCode(code: string): code is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_MESSAGES, code);
}

export const DIAGNOSTIC_CODES: readonly DiagnosticCode[] = Object.freeze(
  Object.keys(DIAGNOSTIC_MESSAGES)
    .filter(isDiagnosticCode)
    .sort((a, b) => a.localeCompare(b))
);

export function assertDiagnosticCode(code: string): asserts code is DiagnosticCode {
  if (!isDiagnosticCode(code)) {
    throw new Error(`Unknown diagnostic code '${code}'.`);
  }
}

export function diagnosticSummary(code: DiagnosticCode): string {
  return DIAGNOSTIC_MESSAGES[code];
}

export function diagnosticDomain(code: string): DiagnosticDomain {
  if (!isDiagnosticCode(code)) return "other";
  switch (code[2]) {
    case "1":
      return "invalid-argument";
    case "2":
      return "precondition";
    case "3":
      return "unsupported";
    case "4":
      return "lookup";
    case "5":
      return "compilation";
    default:
      return "other";
  }
}

export class KernelError extends Error {
  readonly code: DiagnosticCode;
  readonly domain: DiagnosticDomain;

  constructor(code: DiagnosticCode, message: string) {
    assertDiagnosticCode(code);
    super(message);
    this.code = code;
    this.domain = diagnosticDomain(code);
    this.name = "KernelError";
  }
}

export function fail(code: DiagnosticCode, message: string): never {
  throw new KernelError(code, message);
}

