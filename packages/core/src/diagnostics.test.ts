import { expect } from "chai";
import { readdirSync, readFileSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import {
  assertDiagnosticCode,
  DIAGNOSTIC_CODES,
  diagnosticDomain,
  diagnosticSummary,
  KernelError,
} from "./diagnostics.js";

describe("@cellkern/core diagnostics registry", () => {
  function repoRoot(): string {
    const here = fileURLToPath(import.meta.url);
    return resolve(dirname(here), "../../..");
  }

  function sourceFiles(): readonly string[] {
    const packagesDir = join(repoRoot(), "packages");
    const out: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir)) {
        if (entry === "node_modules") continue;
        const abs = join(dir, entry);
        const st = statSync(abs);
        if (st.isDirectory()) {
          walk(abs);
          continue;
        }
        if (!abs.endsWith(".ts")) continue;
        if (abs.endsWith(".test.ts")) continue;
        if (abs.endsWith("diagnostics.ts")) continue;
        out.push(abs);
      }
    };
    walk(packagesDir);
    return out.sort((a, b) => a.localeCompare(b));
  }

  it("keeps diagnostic codes normalized and unique", () => {
    const values = [...DIAGNOSTIC_CODES];
    expect(new Set(values).size).to.equal(values.length);
    for (const code of values) {
      expect(code).to.match(/^CK\d{4}$/);
    }
  });

  it("keeps diagnostic usage synchronized with the registry", () => {
    const used = new Set<string>();
    for (const file of sourceFiles()) {
      for (const code of readFileSync(file, "utf-8").match(/\bCK\d{4}\b/g) ?? []) used.add(code);
    }
    expect([...used].sort((a, b) => a.localeCompare(b))).to.deep.equal([...DIAGNOSTIC_CODES]);
  });

  it("maps each registered code into a known domain", () => {
    for (const code of DIAGNOSTIC_CODES) {
      expect(diagnosticDomain(code)).to.not.equal("other");
      expect(diagnosticSummary(code).length).to.be.greaterThan(0);
    }
    expect(diagnosticDomain("CK1001")).to.equal("invalid-argument");
    expect(diagnosticDomain("CK2001")).to.equal("precondition");
    expect(diagnosticDomain("CK3001")).to.equal("unsupported");
    expect(diagnosticDomain("CK4001")).to.equal("lookup");
    expect(diagnosticDomain("CK5001")).to.equal("compilation");
    expect(diagnosticDomain("XX0000")).to.equal("other");
  });

  it("rejects unknown diagnostic codes", () => {
    expect(() => assertDiagnosticCode("CK9999")).to.throw("Unknown diagnostic code 'CK9999'.");
  });

  it("carries code and domain on KernelError", () => {
    const err = new KernelError("CK2001", "not finalized");
    expect(err).to.be.instanceOf(Error);
    expect(err.name).to.equal("KernelError");
    expect(err.code).to.equal("CK2001");
    expect(err.domain).to.equal("precondition");
    expect(err.message).to.equal("not finalized");
  });
});
