import { formatCodePoint, type DenyList } from './DenyList';
import type { Summary } from './types';

export interface RemovalLine {
  codePoint: number;
  name: string;
  count: number;
}

/** Removed characters, most frequent first, ties by code point */
export function removalLines(summary: Summary, denylist: DenyList): RemovalLine[] {
  return [...summary.removedByCodePoint]
    .filter(([, count]) => count > 0)
    .map(([codePoint, count]) => ({ codePoint, count, name: denylist.names.get(codePoint) ?? 'UNKNOWN' }))
    .sort((a, b) => b.count - a.count || a.codePoint - b.codePoint);
}

export function formatReport(summary: Summary, denylist: DenyList): string {
  const lines = ['Character Removal Statistics:', '============================'];

  for (const line of removalLines(summary, denylist)) {
    lines.push(`${line.name} (${formatCodePoint(line.codePoint)}): ${line.count}`);
  }

  lines.push('');
  lines.push(`Total characters removed: ${summary.charactersRemoved}`);
  lines.push(`Text parts processed: ${summary.partsProcessed} (${summary.partsChanged} changed)`);

  for (const warning of summary.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  if (summary.outputPath !== null) {
    lines.push(`Saved as: ${summary.outputPath}`);
  }
  return lines.join('\n');
}

export interface SummaryJson {
  entries: number;
  parts_processed: number;
  parts_changed: number;
  characters_removed: number;
  removed: Array<{ code_point: string; name: string; count: number }>;
  parts: Array<{ name: string; role: string; removed: number; skipped?: string }>;
  warnings: string[];
  output_path: string | null;
}

/** JSON-safe view of a Summary for tool responses */
export function summaryToJson(summary: Summary, denylist: DenyList): SummaryJson {
  return {
    entries: summary.entries,
    parts_processed: summary.partsProcessed,
    parts_changed: summary.partsChanged,
    characters_removed: summary.charactersRemoved,
    removed: removalLines(summary, denylist).map(line => ({
      code_point: formatCodePoint(line.codePoint),
      name: line.name,
      count: line.count,
    })),
    parts: summary.parts.map(part => ({ ...part })),
    warnings: summary.warnings,
    output_path: summary.outputPath,
  };
}
