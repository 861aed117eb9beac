/**
 * Output shortening for captured streams and report error text.
 */

export interface TruncateLimits {
  maxChars: number;
  head: number;
  tail: number;
}

/**
 * Keep the first `head` and last `tail` characters of a stream longer
 * than `maxChars`, with a marker naming how much was dropped.
 */
export function truncateOutput(output: string, limits: TruncateLimits): string {
  if (output.length <= limits.maxChars) {
    return output;
  }
  const omitted = output.length - limits.head - limits.tail;
  return `${output.slice(0, limits.head)}\n[... ${omitted} characters omitted ...]\n${output.slice(-limits.tail)}`;
}

/**
 * Line-based variant for report error summaries: text over `maxLines`
 * lines keeps its first `head` and last `tail` lines.
 */
export function truncateLines(text: string, maxLines = 10, head = 8, tail = 2): string {
  const lines = text.trim().split('\n');
  if (lines.length <= maxLines) {
    return lines.join('\n');
  }
  return [...lines.slice(0, head), '... (truncated) ...', ...lines.slice(-tail)].join('\n');
}
