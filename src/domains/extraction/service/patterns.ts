/**
 * Small regular-expression helpers shared by the extractors.
 */

/** Escape a literal string for embedding in a RegExp source. */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Number of capturing groups (numbered or named) in a RegExp source. */
export function countCaptureGroups(source: string): number {
  const match = new RegExp(`(?:${source})|`).exec('');
  return match ? match.length - 1 : 0;
}

/** Run `pattern` and return its first capture, trimmed, or undefined when blank. */
export function firstCapture(pattern: RegExp, text: string): string | undefined {
  const captured = pattern.exec(text)?.[1]?.trim();
  return captured ? captured : undefined;
}
