/**
 * Splits streamed output chunks into complete lines
 */
export class LineBuffer {
  private pending = '';

  /**
   * Add a chunk and return the lines it completed
   */
  push(chunk: string): string[] {
    this.pending += chunk;
    const parts = this.pending.split('\n');
    // Keep incomplete line buffered
    this.pending = parts.pop() ?? '';
    return parts.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  /**
   * Return whatever is left after the stream ends
   */
  flush(): string[] {
    const rest = this.pending;
    this.pending = '';
    return rest ? [rest] : [];
  }
}
