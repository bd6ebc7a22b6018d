import JSZip from 'jszip';
import * as fs from 'fs';
import * as path from 'path';
import { CharacterFilter, type CodePointSet } from './CharacterFilter';
import { classifyPart, type PartRole } from './PartSelector';
import { SanitizeError, describeError, isSanitizeError } from './SanitizeError';
import { decodePart, encodePart, rewriteXmlText } from './TextRunRewriter';
import type { PartReport, ProcessOptions, ProcessResult, RunState, Summary, TimestampPolicy } from './types';

// Compression method ids as JSZip keeps them on loaded entries
const COMPRESSION_BY_MAGIC: Readonly<Record<string, JSZip.JSZipObjectOptions['compression']>> = {
  '\x00\x00': 'STORE',
  '\x08\x00': 'DEFLATE',
};

/**
 * Compression method an entry was stored with in the source container.
 * JSZip keeps the still-compressed payload of a loaded entry and copies it
 * verbatim on generate when the method is unchanged, so pinning the method
 * is what keeps pass-through entries byte-identical.
 */
function sourceCompression(file: JSZip.JSZipObject): JSZip.JSZipObjectOptions['compression'] | undefined {
  const data: unknown = Reflect.get(file, '_data');
  if (typeof data !== 'object' || data === null) return undefined;
  const compression: unknown = Reflect.get(data, 'compression');
  if (typeof compression !== 'object' || compression === null) return undefined;
  const magic: unknown = Reflect.get(compression, 'magic');
  return typeof magic === 'string' ? COMPRESSION_BY_MAGIC[magic] : undefined;
}

// JavaScript objects list integer-like keys first, and JSZip keeps its entries
// in one, so such names cannot keep their place in the output.
const INTEGER_KEY = /^(0|[1-9]\d{0,9})$/;

function isReorderedKey(name: string): boolean {
  return INTEGER_KEY.test(name) && Number(name) < 2 ** 32 - 1;
}

/**
 * `<dir>/<stem>_cleaned<ext>` beside the input.
 */
export function defaultOutputPath(inputPath: string): string {
  const ext = path.extname(inputPath);
  const stem = path.basename(inputPath, ext);
  return path.join(path.dirname(inputPath), `${stem}_cleaned${ext}`);
}

/**
 * One sanitizing run over one container.
 *
 * open(), then rewrite(), then writeTo(). Any failure moves the run to `aborted`;
 * writeTo() never leaves a partial output file behind.
 */
export class ContainerRewriter {
  private _state: RunState = 'opened';

  private constructor(
    public readonly inputPath: string,
    private readonly zip: JSZip,
  ) {}

  static async open(inputPath: string): Promise<ContainerRewriter> {
    let data: Buffer;
    try {
      data = fs.readFileSync(inputPath);
    } catch (err) {
      throw new SanitizeError('IoError', `Cannot read ${inputPath}: ${describeError(err)}`, { cause: err });
    }

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (err) {
      throw new SanitizeError('InvalidContainer', `${inputPath} is not a readable zip container: ${describeError(err)}`, {
        cause: err,
      });
    }

    const reordered = Object.keys(zip.files).find(isReorderedKey);
    if (reordered !== undefined) {
      throw new SanitizeError('InvalidContainer', 'Integer entry names cannot keep their position in the container', {
        entryName: reordered,
      });
    }
    return new ContainerRewriter(inputPath, zip);
  }

  get state(): RunState {
    return this._state;
  }

  /** Entry names in container order */
  get entryNames(): string[] {
    return Object.keys(this.zip.files);
  }

  /**
   * Filter every text-bearing part in memory. Parts from which nothing was
   * removed, and parts that cannot be traversed safely, stay untouched.
   */
  async rewrite(denylist: CodePointSet, timestamps: TimestampPolicy = 'preserve'): Promise<Summary> {
    if (this._state !== 'opened') {
      throw new Error(`Cannot rewrite a container in state '${this._state}'`);
    }
    this._state = 'iterating';

    const summary: Summary = {
      entries: 0,
      partsProcessed: 0,
      partsChanged: 0,
      charactersRemoved: 0,
      removedByCodePoint: new Map(),
      parts: [],
      warnings: [],
      outputPath: null,
    };

    try {
      for (const file of Object.values(this.zip.files)) {
        const name = file.name;
        summary.entries++;
        file.options.compression = sourceCompression(file) ?? 'DEFLATE';

        const role = classifyPart(name);
        if (file.dir || role === null) continue;

        const part = new CharacterFilter(denylist);
        const report = await this.rewritePart(file, role, part, timestamps);
        summary.partsProcessed++;
        summary.parts.push(report);

        if (report.skipped) {
          summary.warnings.push(`${name}: ${report.skipped}; copied unchanged`);
          continue;
        }
        if (report.removed > 0) summary.partsChanged++;
        summary.charactersRemoved += part.removedCount;
        for (const [codePoint, count] of part.removedByCodePoint) {
          summary.removedByCodePoint.set(codePoint, (summary.removedByCodePoint.get(codePoint) ?? 0) + count);
        }
      }
    } catch (err) {
      this._state = 'aborted';
      throw err;
    }

    this._state = 'finalizing';
    return summary;
  }

  private async rewritePart(
    file: JSZip.JSZipObject,
    role: PartRole,
    filter: CharacterFilter,
    timestamps: TimestampPolicy,
  ): Promise<PartReport> {
    let bytes: Uint8Array;
    try {
      bytes = await file.async('uint8array');
    } catch (err) {
      throw new SanitizeError('InvalidContainer', `Cannot decompress entry: ${describeError(err)}`, {
        entryName: file.name,
        cause: err,
      });
    }

    let output: Uint8Array;
    let removed: number;
    try {
      const decoded = decodePart(bytes);
      const result = rewriteXmlText(decoded.text, filter);
      removed = result.removed;
      output = encodePart(result.xml, decoded.hasBom);
    } catch (err) {
      if (isSanitizeError(err, 'UnsupportedPart')) {
        return { name: file.name, role, removed: 0, skipped: err.message };
      }
      if (isSanitizeError(err)) {
        throw new SanitizeError(err.code, err.message, { entryName: file.name, cause: err });
      }
      throw err;
    }

    if (removed > 0) {
      this.zip.file(file.name, output, {
        compression: file.options.compression,
        date: timestamps === 'now' ? new Date() : file.date,
        comment: file.comment,
        unixPermissions: file.unixPermissions,
        dosPermissions: file.dosPermissions,
        createFolders: false,
      });
    }
    return { name: file.name, role, removed };
  }

  /**
   * Write the container to `outputPath` through a temporary file renamed
   * into place on success.
   */
  async writeTo(outputPath: string, overwrite = false): Promise<void> {
    if (this._state !== 'finalizing') {
      throw new Error(`Cannot write a container in state '${this._state}'`);
    }

    const tempPath = `${outputPath}.${process.pid}-${Date.now().toString(36)}.tmp`;
    let tempCreated = false;
    try {
      if (path.resolve(outputPath) === path.resolve(this.inputPath)) {
        throw new SanitizeError('IoError', 'Output path must differ from the input path');
      }
      if (!overwrite && fs.existsSync(outputPath)) {
        throw new SanitizeError('OutputExists', `Output file already exists: ${outputPath}`);
      }

      const data = await this.zip.generateAsync({
        type: 'nodebuffer',
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
        platform: this.platform(),
      });

      try {
        // 'wx' fails instead of replacing a file that happens to have the temporary name
        fs.writeFileSync(tempPath, data, { flag: 'wx' });
        tempCreated = true;
        fs.renameSync(tempPath, outputPath);
        tempCreated = false;
      } catch (err) {
        throw new SanitizeError('IoError', `Cannot write ${outputPath}: ${describeError(err)}`, { cause: err });
      }
    } catch (err) {
      this._state = 'aborted';
      if (tempCreated) {
        fs.unlinkSync(tempPath);
      }
      throw err;
    }

    this._state = 'done';
  }

  // Unix permissions survive only when the output is marked as made on Unix
  private platform(): 'UNIX' | 'DOS' {
    return Object.values(this.zip.files).some(file => file.unixPermissions !== null && file.unixPermissions !== undefined)
      ? 'UNIX'
      : 'DOS';
  }
}

function toSanitizeError(err: unknown): SanitizeError {
  return err instanceof SanitizeError ? err : new SanitizeError('IoError', describeError(err), { cause: err });
}

/**
 * Sanitize `inputPath` into a new container at `outputPath`.
 * Never throws; failures come back as `{ success: false, error }`.
 */
export async function processDocument(
  inputPath: string,
  outputPath: string,
  denylist: CodePointSet,
  options: ProcessOptions = {},
): Promise<ProcessResult> {
  try {
    if (path.resolve(inputPath) === path.resolve(outputPath)) {
      throw new SanitizeError('IoError', 'Output path must differ from the input path');
    }
    if (!options.overwrite && fs.existsSync(outputPath)) {
      throw new SanitizeError('OutputExists', `Output file already exists: ${outputPath}`);
    }

    const rewriter = await ContainerRewriter.open(inputPath);
    const summary = await rewriter.rewrite(denylist, options.timestamps);
    await rewriter.writeTo(outputPath, options.overwrite);
    return { success: true, summary: { ...summary, outputPath } };
  } catch (err) {
    return { success: false, error: toSanitizeError(err) };
  }
}

/**
 * Report what sanitizing would remove without writing anything.
 */
export async function scanDocument(inputPath: string, denylist: CodePointSet): Promise<ProcessResult> {
  try {
    const rewriter = await ContainerRewriter.open(inputPath);
    const summary = await rewriter.rewrite(denylist);
    return { success: true, summary };
  } catch (err) {
    return { success: false, error: toSanitizeError(err) };
  }
}
