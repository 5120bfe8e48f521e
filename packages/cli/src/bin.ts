#!/usr/bin/env -S node --import tsx
import { realpathSync } from "node:fs";
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { KernelError } from "@cellkern/core";

import { runAnalyze } from "./internal/commands/analyze.js";
import { runEmitHeader } from "./internal/commands/emit-header.js";
import { runInit } from "./internal/commands/init.js";

export type Cmd = "init" | "analyze" | "emit-header" | "help";

function usage(): void {
  console.log(
    [
      "cellkern",
      "",
      "Usage:",
      "  cellkern init",
      "  cellkern analyze [graph.json]",
      "  cellkern emit-header [graph.json] [--name <kernel>] [--out <file>]",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "init" || cmd === "analyze" || cmd === "emit-header" || cmd === "help") return cmd;
  return "help";
}

export function formatError(err: unknown): string {
  if (err instanceof KernelError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "init":
        await runInit({ dir: cwd() });
        return;
      case "analyze":
        await runAnalyze({ dir: cwd(), argv: argv.slice(3) });
        return;
      case "emit-header":
        await runEmitHeader({ dir: cwd(), argv: argv.slice(3) });
        return;
      default:
        usage();
        exit(argv.length > 2 && argv[2] !== "help" ? 1 : 0);
    }
  } catch (err: unknown) {
    console.error(formatError(err));
    exit(1);
  }
}

if (argv[1] && import.meta.url === pathToFileURL(realpathSync(argv[1])).href) {
  void main();
}
