/**
 * Where a session writes what the user reads: check lines and the report on
 * the main channel, debug traces on the diagnostic channel.
 */
export interface SmokeOutput {
  line(text: string): void;
  diagnostic(text: string): void;
}

export const consoleOutput: SmokeOutput = {
  line: (text) => {
    process.stdout.write(`${text}\n`);
  },
  diagnostic: (text) => {
    process.stderr.write(`${text}\n`);
  }
};

export class BufferedOutput implements SmokeOutput {
  readonly lines: string[] = [];
  readonly diagnostics: string[] = [];

  line(text: string): void {
    this.lines.push(text);
  }

  diagnostic(text: string): void {
    this.diagnostics.push(text);
  }
}
