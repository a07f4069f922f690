#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import { EXIT_USAGE, runFile } from "./lox.js";
import { runPrompt } from "./repl.js";

export async function main(args: string[]): Promise<number> {
  const printAst = args.includes("--ast");
  const scripts = args.filter((a) => a !== "--ast");

  if (scripts.length > 1) {
    console.log("Usage: lox [--ast] [script]");
    return EXIT_USAGE;
  }

  if (scripts.length === 1) {
    return runFile(scripts[0], { printAst });
  }

  return runPrompt({ printAst });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e) => {
      console.error(e);
      process.exitCode = 1;
    }
  );
}
