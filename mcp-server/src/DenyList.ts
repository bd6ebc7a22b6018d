import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { CodePointSet } from './CharacterFilter';
import { SanitizeError, describeError } from './SanitizeError';

export interface DenyList {
  readonly codePoints: CodePointSet;
  /** Display name per code point */
  readonly names: ReadonlyMap<number, string>;
}

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../config/default-characters.json', import.meta.url));

const UNKNOWN_NAME = 'UNKNOWN';
const MAX_CODE_POINT = 0x10ffff;

// { "U+200B": "ZERO WIDTH SPACE" } or { "<char>": ["ZERO WIDTH SPACE", "<replacement>"] }
const MappingSchema = z.record(z.string(), z.union([z.string(), z.array(z.string()).min(1)]));

// [ "U+200B", { "char": "\\u00AD", "name": "SOFT HYPHEN" } ]
const ListSchema = z.array(
  z.union([z.string(), z.object({ char: z.string(), name: z.string().optional() })]),
);

const DenyListConfigSchema = z.union([MappingSchema, ListSchema]);

export type DenyListConfig = z.infer<typeof DenyListConfigSchema>;

export function formatCodePoint(codePoint: number): string {
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Resolve one configured character: the character itself, `U+XXXX`,
 * `\uXXXX` or `\u{XXXXX}`.
 */
export function parseCharacterKey(key: string): number {
  const notation = /^U\+([0-9A-Fa-f]{4,6})$/.exec(key)
    ?? /^\\u\{([0-9A-Fa-f]{1,6})\}$/.exec(key)
    ?? /^\\u([0-9A-Fa-f]{4})$/.exec(key);

  let codePoint: number | undefined;
  if (notation) {
    codePoint = Number.parseInt(notation[1], 16);
  } else {
    const chars = [...key];
    if (chars.length === 1) codePoint = chars[0].codePointAt(0);
  }

  if (codePoint === undefined || codePoint > MAX_CODE_POINT) {
    throw new SanitizeError('InvalidConfig', `Cannot resolve '${key}' to a single character`);
  }
  return codePoint;
}

export function parseDenyList(json: unknown): DenyList {
  const parsed = DenyListConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SanitizeError('InvalidConfig', `Invalid character list${where}: ${issue?.message ?? 'unexpected shape'}`);
  }

  const names = new Map<number, string>();
  const config = parsed.data;
  if (Array.isArray(config)) {
    for (const item of config) {
      const key = typeof item === 'string' ? item : item.char;
      const name = typeof item === 'string' ? undefined : item.name;
      names.set(parseCharacterKey(key), name ?? UNKNOWN_NAME);
    }
  } else {
    for (const [key, value] of Object.entries(config)) {
      names.set(parseCharacterKey(key), typeof value === 'string' ? value : value[0]);
    }
  }

  return { codePoints: new Set(names.keys()), names };
}

/**
 * Load a character list from a JSON file; the bundled list when no path is given.
 */
export async function loadDenyList(configPath: string = DEFAULT_CONFIG_PATH): Promise<DenyList> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(configPath, 'utf-8');
  } catch (err) {
    throw new SanitizeError('IoError', `Cannot read character list ${configPath}: ${describeError(err)}`, {
      cause: err,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new SanitizeError('InvalidConfig', `Character list ${configPath} is not valid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }
  return parseDenyList(json);
}
