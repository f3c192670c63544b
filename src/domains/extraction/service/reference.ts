/**
 * Incident / ticket / case reference code extraction.
 */

const THREE_SEGMENT = '(\\w+-\\d+-\\d+)';
const TWO_SEGMENT = '(\\w+-\\d+)';

const REFERENCE_LABELS = ['incident', 'reference', 'ref', 'case', 'ticket'] as const;

/**
 * Labeled codes in label order (three segments before two), then bare codes.
 * A labeled code always outranks an unlabeled one found earlier in the text.
 */
const REFERENCE_PATTERNS: readonly RegExp[] = [
  ...REFERENCE_LABELS.flatMap((label) => [
    new RegExp(`${label}[:\\s#]+${THREE_SEGMENT}`, 'i'),
    new RegExp(`${label}[:\\s#]+${TWO_SEGMENT}`, 'i'),
  ]),
  new RegExp(THREE_SEGMENT, 'i'),
  new RegExp(TWO_SEGMENT, 'i'),
];

/** Best-guess reference code, upper-cased; undefined when nothing looks like one. */
export function extractReference(text: string): string | undefined {
  for (const pattern of REFERENCE_PATTERNS) {
    const code = pattern.exec(text)?.[1];
    if (code !== undefined) {
      return code.toUpperCase();
    }
  }
  return undefined;
}
