// packages/cli/src/output.ts

export type Output = {
  /** stdout line */
  print: (line: string) => void;
  /** stderr line */
  note: (line: string) => void;
  /** stderr status line, rewritten in place */
  progress: (text: string) => void;
};

export const consoleOutput: Output = {
  print: (line) => console.log(line),
  note: (line) => console.error(line),
  progress: (text) => {
    if (process.stderr.isTTY) process.stderr.write(`\r${text}`);
  },
};
