/**
 * Classifies container entries by path alone. Only parts listed in
 * PART_PATTERNS are rewritten; every other entry is copied as is.
 */

export type PartRole = 'body' | 'header' | 'footer' | 'footnotes' | 'endnotes' | 'comments';

export const PART_PATTERNS: ReadonlyArray<{ readonly pattern: RegExp; readonly role: PartRole }> = [
  { pattern: /^word\/document\.xml$/, role: 'body' },
  { pattern: /^word\/header\d+\.xml$/, role: 'header' },
  { pattern: /^word\/footer\d+\.xml$/, role: 'footer' },
  { pattern: /^word\/footnotes\.xml$/, role: 'footnotes' },
  { pattern: /^word\/endnotes\.xml$/, role: 'endnotes' },
  { pattern: /^word\/comments\.xml$/, role: 'comments' },
];

export function classifyPart(entryName: string): PartRole | null {
  for (const { pattern, role } of PART_PATTERNS) {
    if (pattern.test(entryName)) return role;
  }
  return null;
}

export function isTextBearing(entryName: string): boolean {
  return classifyPart(entryName) !== null;
}
