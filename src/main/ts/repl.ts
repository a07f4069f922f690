import readline from "node:readline";
import { Lox, type LoxOptions, EXIT_OK } from "./lox.js";

export type PromptOptions = Omit<LoxOptions, "print"> & {
  input?: NodeJS.ReadableStream;
  /** Carries the prompt, values and command replies; diagnostics go to stderr. */
  output?: NodeJS.WritableStream;
};

function help(print: (text: string) => void) {
  print(
    [
      "Lox expression prompt",
      "  Each line is evaluated on its own.",
      "Commands:",
      "  :ast    toggle printing the parsed tree",
      "  :help   show this help",
      "  :quit   exit",
    ].join("\n")
  );
}

/**
 * Reads one expression per line until `:quit` or end of input. A diagnostic
 * is reported and the prompt carries on.
 */
export function runPrompt(options: PromptOptions = {}): Promise<number> {
  const { input = process.stdin, output = process.stdout, ...loxOptions } =
    options;
  const print = (text: string) => {
    output.write(`${text}\n`);
  };
  const lox = new Lox({ ...loxOptions, print });
  const rl = readline.createInterface({
    input,
    output,
    terminal: false,
  });

  rl.setPrompt("> ");
  rl.prompt();

  rl.on("line", (line) => {
    const trimmed = line.trim();

    if (trimmed === ":quit" || trimmed === ":q") {
      rl.close();
      return;
    }

    if (trimmed === ":help" || trimmed === ":h") {
      help(print);
    } else if (trimmed === ":ast") {
      lox.printAst = !lox.printAst;
      print(`AST printing ${lox.printAst ? "on" : "off"}`);
    } else if (trimmed !== "") {
      lox.reporter.reset();
      lox.runSource(line);
    }

    rl.prompt();
  });

  return new Promise((resolve) => {
    rl.on("close", () => resolve(EXIT_OK));
  });
}
