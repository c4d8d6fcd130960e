/**
 * In-memory stand-in for stdout, owned by exactly one file execution. Writes after
 * release() are dropped, so late callbacks cannot leak into the next file's report.
 */
export class OutputChannel {
  private chunks: string[] = [];
  private released = false;

  write(text: string): void {
    if (!this.released) this.chunks.push(text);
  }

  text(): string {
    return this.chunks.join('');
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    this.released = true;
    this.chunks = [];
  }
}

/** Runs `body` with a fresh channel and releases it on every exit path. */
export async function withOutputChannel<T>(body: (channel: OutputChannel) => Promise<T>): Promise<T> {
  const channel = new OutputChannel();
  try {
    return await body(channel);
  } finally {
    channel.release();
  }
}
