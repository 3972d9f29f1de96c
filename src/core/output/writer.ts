export interface OutputWriter {
  write(text: string): void;
}

export const stdoutWriter: OutputWriter = {
  write: (text) => {
    process.stdout.write(text);
  },
};

/** Collects everything written; used where output must be inspected rather than shown. */
export class BufferWriter implements OutputWriter {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  text(): string {
    return this.chunks.join("");
  }
}
