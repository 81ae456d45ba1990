/**
 * Collects raw terminal input across polls until whole lines are available.
 */
export class InputAccumulator {
  private buffer = '';

  /**
   * Append a chunk and take out every line it completes.
   * The terminator and a trailing carriage return are dropped.
   */
  append(chunk: string): string[] {
    if (chunk.length === 0) {
      return [];
    }

    this.buffer += chunk;
    const parts = this.buffer.split('\n');
    this.buffer = parts.pop() ?? '';

    return parts.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }
}
