import type { PartRole } from './PartSelector';
import type { SanitizeError } from './SanitizeError';

/** Which timestamp a rewritten part carries; pass-through entries always keep theirs */
export type TimestampPolicy = 'preserve' | 'now';

export interface ProcessOptions {
  /** Replace an existing output file (default: false, fails with OutputExists) */
  overwrite?: boolean;
  timestamps?: TimestampPolicy;
}

export type RunState = 'opened' | 'iterating' | 'finalizing' | 'done' | 'aborted';

export interface PartReport {
  name: string;
  role: PartRole;
  removed: number;
  /** Set when the part could not be traversed safely and was passed through */
  skipped?: string;
}

export interface Summary {
  /** Total number of entries in the container */
  entries: number;
  partsProcessed: number;
  partsChanged: number;
  charactersRemoved: number;
  /** Removal counts keyed by code point */
  removedByCodePoint: Map<number, number>;
  parts: PartReport[];
  warnings: string[];
  /** null for a scan, which writes nothing */
  outputPath: string | null;
}

export type ProcessResult =
  | { success: true; summary: Summary }
  | { success: false; error: SanitizeError };
