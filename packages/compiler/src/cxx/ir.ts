export type CxxType =
  | { readonly kind: "named"; readonly name: string; readonly qualifiers: readonly string[] }
  | { readonly kind: "pointer"; readonly inner: CxxType; readonly restrict: boolean }
  | { readonly kind: "ref"; readonly inner: CxxType; readonly const: boolean }
  | { readonly kind: "template"; readonly name: string; readonly args: readonly CxxType[] };

export type CxxExpr =
  | { readonly kind: "symbol"; readonly name: string; readonly rank: readonly CxxExpr[] }
  | { readonly kind: "number"; readonly text: string }
  | { readonly kind: "paren"; readonly expr: CxxExpr }
  | { readonly kind: "unary"; readonly op: string; readonly expr: CxxExpr }
  | { readonly kind: "binary"; readonly op: string; readonly left: CxxExpr; readonly right: CxxExpr }
  | { readonly kind: "call"; readonly callee: string; readonly args: readonly CxxExpr[] }
  | { readonly kind: "method_call"; readonly target: CxxExpr; readonly member: string; readonly args: readonly CxxExpr[] }
  | { readonly kind: "cast"; readonly cast: "static_cast" | "const_cast"; readonly type: CxxType; readonly expr: CxxExpr }
  | { readonly kind: "apply"; readonly callee: CxxExpr; readonly args: readonly CxxExpr[] };

export type CxxStmt =
  | {
      readonly kind: "decl";
      readonly type: CxxType;
      readonly name: string;
      readonly dims: readonly number[];
      readonly init?: CxxExpr;
    }
  | { readonly kind: "assign"; readonly op: "=" | "+=" | "-="; readonly target: CxxExpr; readonly expr: CxxExpr }
  | { readonly kind: "expr"; readonly expr: CxxExpr }
  | { readonly kind: "block"; readonly body: readonly CxxStmt[] }
  | {
      readonly kind: "for";
      readonly index: string;
      readonly start: number;
      readonly end: CxxExpr;
      readonly body: readonly CxxStmt[];
    }
  | { readonly kind: "comment"; readonly text: string }
  | { readonly kind: "return"; readonly expr?: CxxExpr };

export type CxxSymbol = Extract<CxxExpr, { readonly kind: "symbol" }>;

export type CxxBlock = Extract<CxxStmt, { readonly kind: "block" }>;

export type CxxParam = {
  readonly type: CxxType;
  readonly name: string;
  readonly dims: readonly number[];
};

export type CxxFunction = {
  readonly kind: "fn";
  readonly pred: readonly string[];
  readonly template?: string;
  readonly ret: CxxType;
  readonly name: string;
  readonly params: readonly CxxParam[];
  readonly body: CxxBlock;
};

export type CxxItem =
  | CxxFunction
  | { readonly kind: "include"; readonly header: string; readonly system: boolean }
  | { readonly kind: "comment"; readonly text: string };

export type CxxProgram = {
  readonly kind: "program";
  readonly items: readonly CxxItem[];
};

export function namedType(name: string, qualifiers: readonly string[] = []): CxxType {
  return { kind: "named", name, qualifiers };
}

export function pointerType(inner: CxxType, restrict = false): CxxType {
  return { kind: "pointer", inner, restrict };
}

export function voidType(): CxxType {
  return namedType("void");
}

export function symbol(name: string, rank: readonly CxxExpr[] = []): CxxSymbol {
  return { kind: "symbol", name, rank };
}

export function numberExpr(value: number | string): CxxExpr {
  return { kind: "number", text: String(value) };
}

export function block(body: readonly CxxStmt[]): CxxBlock {
  return { kind: "block", body };
}

export function param(type: CxxType, name: string, dims: readonly number[] = []): CxxParam {
  return { type, name, dims };
}

export function isBlock(value: unknown): value is CxxBlock {
  if (typeof value !== "object" || value === null) return false;
  if (!("kind" in value) || value.kind !== "block") return false;
  return "body" in value && Array.isArray(value.body);
}
