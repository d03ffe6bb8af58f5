/**
 * @tally/cli — Line-oriented terminal I/O.
 */

import { createInterface } from "node:readline/promises";

/**
 * Where the session reads answers and writes output.
 * `ask` resolves undefined once input has ended.
 */
export interface Terminal {
  ask(question: string): Promise<string | undefined>;
  write(line: string): void;
}

export interface ReadlineTerminal extends Terminal {
  close(): void;
}

/**
 * Terminal over readline. Lines are pulled from the interface's async
 * iterator, so piped input that arrives ahead of a prompt is kept.
 * Ctrl-C closes the input, which the session sees as end of input.
 */
export function createReadlineTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ReadlineTerminal {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();

  rl.on("SIGINT", () => {
    rl.close();
  });

  return {
    async ask(question: string): Promise<string | undefined> {
      output.write(question);
      const next = await lines.next();
      return next.done === true ? undefined : next.value;
    },
    write(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    },
  };
}
