/**
 * Line Offsets
 * Maps UTF-8 byte offsets back to 1-indexed line numbers
 */

export class LineOffsets {
  /** Byte offset at which each line starts; line 1 starts at 0 */
  private readonly starts: number[] = [0];

  constructor(source: string) {
    let offset = 0;
    for (const ch of source) {
      offset += Buffer.byteLength(ch, 'utf8');
      if (ch === '\n') this.starts.push(offset);
    }
  }

  /** Line containing `offset`. A newline belongs to the line it ends. */
  line(offset: number): number {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((this.starts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }

  get lineCount(): number {
    return this.starts.length;
  }
}
