import * as readline from 'node:readline/promises';

/** Where commands print and ask. Tests swap in a recording implementation. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  ask(question: string): Promise<string>;
}

export function consoleIO(): CliIO {
  return {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    ask: async (question) => {
      const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
      try {
        return await rl.question(question);
      } finally {
        rl.close();
      }
    },
  };
}
