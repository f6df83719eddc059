/**
 * Unbounded single-consumer queue of text lines.
 *
 * The producer pushes lines and closes the channel when it is done; the
 * consumer iterates with `for await`, which yields every line pushed before
 * `close()` and then ends.
 */
export class LineChannel implements AsyncIterable<string> {
  private buffer: string[] = [];
  private closed = false;
  private waiter: (() => void) | null = null;

  push(line: string): void {
    if (this.closed) {
      return;
    }
    this.buffer.push(line);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    while (true) {
      const line = this.buffer.shift();
      if (line !== undefined) {
        yield line;
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }
}
