const EMPTY = Buffer.alloc(0);

/**
 * FIFO of output chunks read back in bounded slices. Adjacent chunks are
 * joined in arrival order; a chunk larger than the slice is split.
 */
export class OutputQueue {
  private chunks: Buffer[] = [];
  private bytes = 0;

  get size(): number {
    return this.bytes;
  }

  push(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.bytes += chunk.length;
  }

  take(maxBytes: number): Buffer {
    if (this.bytes === 0 || maxBytes <= 0) return EMPTY;

    const parts: Buffer[] = [];
    let taken = 0;

    while (taken < maxBytes) {
      const head = this.chunks.shift();
      if (!head) break;

      const room = maxBytes - taken;
      if (head.length > room) {
        parts.push(head.subarray(0, room));
        this.chunks.unshift(head.subarray(room));
        taken += room;
      } else {
        parts.push(head);
        taken += head.length;
      }
    }

    this.bytes -= taken;
    return parts.length === 1 ? parts[0] : Buffer.concat(parts, taken);
  }

  clear(): void {
    this.chunks = [];
    this.bytes = 0;
  }
}
