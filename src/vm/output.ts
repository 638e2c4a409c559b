/** Where `print` writes. */
export interface OutputSink {
  write(text: string): void;
}

export const consoleOutput: OutputSink = {
  write(text) {
    process.stdout.write(text);
  },
};

export class BufferedOutput implements OutputSink {
  private stdout = "";

  write(text: string): void {
    this.stdout += text;
  }

  getOutput(): string {
    return this.stdout;
  }

  lines(): string[] {
    const lines = this.stdout.split("\n");
    // Every write ends in a newline, so the last piece is always empty.
    lines.pop();
    return lines;
  }

  clear(): void {
    this.stdout = "";
  }
}
