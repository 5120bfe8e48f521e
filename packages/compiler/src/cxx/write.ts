import type { CxxExpr, CxxFunction, CxxItem, CxxParam, CxxProgram, CxxStmt, CxxType } from "./ir.js";

function emitType(ty: CxxType): string {
  switch (ty.kind) {
    case "named":
      return [...ty.qualifiers, ty.name].join(" ");
    case "pointer": {
      const restrict = ty.restrict ? "__restrict__" : "";
      return `${emitType(ty.inner)} *${restrict}`;
    }
    case "ref": {
      const constText = ty.const ? " const" : "";
      return `${emitType(ty.inner)}${constText} &`;
    }
    case "template":
      return `${ty.name}<${ty.args.map(emitType).join(", ")}>`;
  }
}

// Comment text can carry graph names; a closing token inside it is split.
function emitComment(text: string): string {
  return `/* ${text.replaceAll("*/", "* /")} */`;
}

function emitDims(dims: readonly number[]): string {
  return dims.map((d) => `[${d}]`).join("");
}

function emitDeclarator(type: CxxType, name: string, dims: readonly number[]): string {
  const typeText = emitType(type);
  const sep = typeText.endsWith("*") || typeText.endsWith("&") ? "" : " ";
  return `${typeText}${sep}${name}${emitDims(dims)}`;
}

function emitExpr(expr: CxxExpr): string {
  switch (expr.kind) {
    case "symbol":
      return `${expr.name}${expr.rank.map((r) => `[${emitExpr(r)}]`).join("")}`;
    case "number":
      return expr.text;
    case "paren":
      return `(${emitExpr(expr.expr)})`;
    case "unary":
      return `${expr.op}${emitExpr(expr.expr)}`;
    case "binary":
      return `(${emitExpr(expr.left)} ${expr.op} ${emitExpr(expr.right)})`;
    case "call":
      return `${expr.callee}(${expr.args.map(emitExpr).join(", ")})`;
    case "method_call":
      return `${emitExpr(expr.target)}.${expr.member}(${expr.args.map(emitExpr).join(", ")})`;
    case "cast":
      return `${expr.cast}<${emitType(expr.type)}>(${emitExpr(expr.expr)})`;
    case "apply":
      return `${emitExpr(expr.callee)}(${expr.args.map(emitExpr).join(", ")})`;
  }
}

function emitStmtLines(st: CxxStmt, indent: string): string[] {
  switch (st.kind) {
    case "decl": {
      const init = st.init ? ` = ${emitExpr(st.init)}` : "";
      return [`${indent}${emitDeclarator(st.type, st.name, st.dims)}${init};`];
    }
    case "assign":
      return [`${indent}${emitExpr(st.target)} ${st.op} ${emitExpr(st.expr)};`];
    case "expr":
      return [`${indent}${emitExpr(st.expr)};`];
    case "block": {
      const out: string[] = [];
      out.push(`${indent}{`);
      for (const s of st.body) out.push(...emitStmtLines(s, `${indent}  `));
      out.push(`${indent}}`);
      return out;
    }
    case "for": {
      const out: string[] = [];
      const i = st.index;
      out.push(`${indent}for (int ${i} = ${st.start}; ${i} < ${emitExpr(st.end)}; ${i}++) {`);
      for (const s of st.body) out.push(...emitStmtLines(s, `${indent}  `));
      out.push(`${indent}}`);
      return out;
    }
    case "comment":
      return [`${indent}${emitComment(st.text)}`];
    case "return":
      return [st.expr ? `${indent}return ${emitExpr(st.expr)};` : `${indent}return;`];
  }
}

function emitParam(p: CxxParam): string {
  return emitDeclarator(p.type, p.name, p.dims);
}

function emitFunction(fn: CxxFunction): string[] {
  const out: string[] = [];
  if (fn.template) out.push(fn.template);
  const pred = fn.pred.length > 0 ? `${fn.pred.join(" ")} ` : "";
  out.push(`${pred}${emitType(fn.ret)} ${fn.name}(${fn.params.map(emitParam).join(", ")})`);
  out.push("{");
  for (const st of fn.body.body) out.push(...emitStmtLines(st, "  "));
  out.push("}");
  return out;
}

function emitItem(item: CxxItem): string[] {
  switch (item.kind) {
    case "fn":
      return emitFunction(item);
    case "include":
      return [item.system ? `#include <${item.header}>` : `#include "${item.header}"`];
    case "comment":
      return [emitComment(item.text)];
  }
}

export function writeCxxProgram(program: CxxProgram, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  for (const item of program.items) {
    if (parts.length > 0) parts.push("");
    parts.push(...emitItem(item));
  }
  parts.push("");
  return parts.join("\n");
}
