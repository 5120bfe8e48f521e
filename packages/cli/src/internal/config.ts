import { readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

export const PROJECT_CONFIG_FILE = "cellkern.json";

export type ReportFormat = "text" | "json";

export type ProjectConfig = {
  readonly schema: 1;
  readonly entry: string;
  readonly report: {
    readonly format: ReportFormat;
  };
};

export type ProjectContext = {
  readonly projectRoot: string;
  readonly project: ProjectConfig;
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(
  value: Record<string, unknown>,
  allowed: readonly string[],
  label: string
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

export function parseProjectConfig(value: unknown): ProjectConfig {
  const root = asRecord(value, PROJECT_CONFIG_FILE);
  assertKnownKeys(root, ["schema", "entry", "report"], PROJECT_CONFIG_FILE);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${PROJECT_CONFIG_FILE} schema.`);
  }

  const entry = asString(root.entry, `${PROJECT_CONFIG_FILE}: 'entry'`);

  let format: ReportFormat = "text";
  if (root.report !== undefined) {
    const report = asRecord(root.report, `${PROJECT_CONFIG_FILE}: 'report'`);
    assertKnownKeys(report, ["format"], `${PROJECT_CONFIG_FILE}: 'report'`);
    if (report.format !== undefined) {
      if (report.format !== "text" && report.format !== "json") {
        throw new Error(`${PROJECT_CONFIG_FILE}: 'report.format' must be 'text' or 'json'.`);
      }
      format = report.format;
    }
  }

  return { schema: 1, entry, report: { format } };
}

export function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  return JSON.parse(raw) as unknown;
}

export function writeProjectConfig(path: string, value: ProjectConfig): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

export function findProjectRoot(fromDir: string): string {
  let cur = resolve(fromDir);
  while (true) {
    const candidate = join(cur, PROJECT_CONFIG_FILE);
    try {
      readFileSync(candidate, "utf-8");
      return cur;
    } catch {
      // continue
    }
    const parent = dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  throw new Error(`Could not find ${PROJECT_CONFIG_FILE} in this directory or any parent.`);
}

export function loadProjectConfig(path: string): ProjectConfig {
  return parseProjectConfig(readJson(path));
}

export function loadProjectContext(fromDir: string): ProjectContext {
  const projectRoot = findProjectRoot(fromDir);
  const project = loadProjectConfig(join(projectRoot, PROJECT_CONFIG_FILE));
  return { projectRoot, project };
}
