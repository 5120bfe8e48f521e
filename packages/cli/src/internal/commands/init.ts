import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { PROJECT_CONFIG_FILE, writeProjectConfig, type ProjectConfig } from "../config.js";

export type InitArgs = {
  readonly dir: string;
};

const SAMPLE_GRAPH = {
  schema: 1,
  spaces: [{ id: "V", kind: "simple", dim: 3 }],
  coefficients: [{ id: "f", count: 0, space: "V" }],
  nodes: [
    { id: "M", op: "tensor", form: { name: "mass", arguments: ["V", "V"] } },
    { id: "K", op: "tensor", form: { name: "stiffness", arguments: ["V", "V"] } },
    { id: "S", op: "add", operands: ["M", "K"] },
    { id: "R", op: "action", operands: ["S"], coefficient: "f" },
  ],
  root: "R",
} as const;

export async function runInit(args: InitArgs): Promise<void> {
  const root = resolve(args.dir);
  const project: ProjectConfig = {
    schema: 1,
    entry: "graph.json",
    report: { format: "text" },
  };
  const configPath = join(root, PROJECT_CONFIG_FILE);
  const graphPath = join(root, project.entry);
  for (const [file, path] of [
    [PROJECT_CONFIG_FILE, configPath],
    [project.entry, graphPath],
  ] as const) {
    if (existsSync(path)) {
      throw new Error(`${file} already exists in ${root}.`);
    }
  }
  mkdirSync(root, { recursive: true });

  writeProjectConfig(configPath, project);
  writeFileSync(graphPath, JSON.stringify(SAMPLE_GRAPH, null, 2) + "\n", "utf-8");
}
