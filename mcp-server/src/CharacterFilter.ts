/**
 * Code point filtering for run text.
 *
 * Strings are walked by code point, so a denylisted astral character is
 * removed whole and never leaves half a surrogate pair behind.
 */

export type CodePointSet = ReadonlySet<number>;

/**
 * Return `text` without the code points in `denylist`. Nothing else changes:
 * no normalization, no case folding, no whitespace handling.
 */
export function filterText(
  text: string,
  denylist: CodePointSet,
  onRemoved?: (codePoint: number) => void,
): string {
  if (text.length === 0 || denylist.size === 0) return text;

  let result = '';
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint !== undefined && denylist.has(codePoint)) {
      onRemoved?.(codePoint);
      continue;
    }
    result += char;
  }
  return result;
}

/**
 * Filter bound to one denylist that remembers what it removed.
 * One instance per run; counts accumulate across `filter` calls.
 */
export class CharacterFilter {
  private readonly _removed = new Map<number, number>();
  private _total = 0;

  constructor(public readonly denylist: CodePointSet) {}

  filter(text: string): string {
    return filterText(text, this.denylist, codePoint => {
      this._removed.set(codePoint, (this._removed.get(codePoint) ?? 0) + 1);
      this._total++;
    });
  }

  get removedCount(): number {
    return this._total;
  }

  /** Removal counts keyed by code point, in first-seen order */
  get removedByCodePoint(): ReadonlyMap<number, number> {
    return this._removed;
  }
}
