export const TRUNCATION_MARKER = '[...] ';

/** Keeps only the last `limitBytes` bytes written to it. */
export class TailBuffer {
  private buffer = Buffer.alloc(0);
  private truncated = false;

  constructor(private readonly limitBytes: number) {}

  push(chunk: Buffer | string) {
    const next = Buffer.concat([
      this.buffer,
      typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk,
    ]);
    if (next.length > this.limitBytes) {
      this.buffer = next.subarray(next.length - this.limitBytes);
      this.truncated = true;
    } else {
      this.buffer = next;
    }
  }

  get isTruncated() {
    return this.truncated;
  }

  toString() {
    const text = this.buffer.toString('utf8').trim();
    if (!text) return '';
    return this.truncated ? `${TRUNCATION_MARKER}${text}` : text;
  }
}
