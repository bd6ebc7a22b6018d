/**
 * Tests for whole-container sanitizing
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import JSZip from 'jszip';
import { ContainerRewriter, defaultOutputPath, processDocument, scanDocument } from './ContainerRewriter';

const W = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const DECL = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';
const ZWSP = 0x200b;
const DENYLIST = new Set([ZWSP]);
const FIXED_DATE = new Date(Date.UTC(2020, 0, 2, 3, 4, 6));
const MEDIA_PAYLOAD = 'A'.repeat(4096);

function part(root: string, body: string): string {
  return `${DECL}<w:${root} xmlns:w="${W}">${body}</w:${root}>`;
}

function runs(...texts: string[]): string {
  return `<w:p>${texts.map(text => `<w:r><w:t>${text}</w:t></w:r>`).join('')}</w:p>`;
}

interface TestParts {
  document?: string;
  header?: string;
  footer?: string;
}

async function createTestDocx(filePath: string, parts: TestParts = {}): Promise<void> {
  const zip = new JSZip();
  const options = { date: FIXED_DATE, createFolders: false };

  zip.file('[Content_Types].xml', `${DECL}<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>`, options);
  zip.file('_rels/.rels', `${DECL}<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"/>`, options);
  zip.file('word/document.xml', parts.document ?? part('document', `<w:body>${runs('Hello\u200BWorld')}</w:body>`), options);
  zip.file('word/styles.xml', part('styles', '<w:style w:styleId="Odd\u200BName"/>'), {
    ...options,
    comment: 'styles keep their comment',
  });
  zip.file('word/header1.xml', parts.header ?? part('hdr', runs('Head\u200B')), options);
  zip.file('word/footer1.xml', parts.footer ?? part('ftr', runs('Foot')), options);
  zip.file('word/media/image1.png', MEDIA_PAYLOAD, { ...options, compression: 'STORE' });

  const buffer = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  fs.writeFileSync(filePath, buffer);
}

async function loadZip(filePath: string): Promise<JSZip> {
  return JSZip.loadAsync(fs.readFileSync(filePath));
}

async function entryText(zip: JSZip, name: string): Promise<string> {
  const file = zip.file(name);
  if (!file) throw new Error(`missing entry ${name}`);
  return file.async('string');
}

// Compressed payload of an entry as stored after its local file header
function storedData(archive: Buffer, name: string): Buffer {
  let offset = 0;
  while (archive.readUInt32LE(offset) === 0x04034b50) {
    const compressedSize = archive.readUInt32LE(offset + 18);
    const nameLength = archive.readUInt16LE(offset + 26);
    const extraLength = archive.readUInt16LE(offset + 28);
    const dataStart = offset + 30 + nameLength + extraLength;
    if (archive.toString('utf-8', offset + 30, offset + 30 + nameLength) === name) {
      return archive.subarray(dataStart, dataStart + compressedSize);
    }
    offset = dataStart + compressedSize;
  }
  throw new Error(`missing local entry ${name}`);
}

describe('ContainerRewriter', () => {
  let tempDir: string;
  let inputPath: string;
  let outputPath: string;

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docx-sanitize-test-'));
    inputPath = path.join(tempDir, 'input.docx');
    outputPath = path.join(tempDir, 'output.docx');
    await createTestDocx(inputPath);
  });

  afterEach(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true });
    }
  });

  it('removes denylisted characters from run text', async () => {
    const result = await processDocument(inputPath, outputPath, DENYLIST);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.summary.outputPath).toBe(outputPath);
    expect(result.summary.entries).toBe(7);
    expect(result.summary.partsProcessed).toBe(3);
    expect(result.summary.partsChanged).toBe(2);
    expect(result.summary.charactersRemoved).toBe(2);
    expect(result.summary.removedByCodePoint.get(ZWSP)).toBe(2);
    expect(result.summary.parts.map(p => [p.name, p.role, p.removed])).toEqual([
      ['word/document.xml', 'body', 1],
      ['word/header1.xml', 'header', 1],
      ['word/footer1.xml', 'footer', 0],
    ]);

    const out = await loadZip(outputPath);
    expect(await entryText(out, 'word/document.xml')).toBe(
      part('document', `<w:body>${runs('HelloWorld')}</w:body>`),
    );
    expect(await entryText(out, 'word/header1.xml')).toBe(part('hdr', runs('Head')));
  });

  it('never modifies the input file', async () => {
    const before = fs.readFileSync(inputPath);
    await processDocument(inputPath, outputPath, DENYLIST);
    expect(fs.readFileSync(inputPath).equals(before)).toBe(true);
  });

  it('keeps entry order and copies pass-through entries exactly', async () => {
    await processDocument(inputPath, outputPath, DENYLIST);
    const input = await loadZip(inputPath);
    const out = await loadZip(outputPath);

    expect(Object.keys(out.files)).toEqual(Object.keys(input.files));

    for (const name of ['[Content_Types].xml', '_rels/.rels', 'word/styles.xml', 'word/media/image1.png']) {
      const a = input.file(name);
      const b = out.file(name);
      expect(a).not.toBeNull();
      expect(b).not.toBeNull();
      if (!a || !b) continue;
      expect(Buffer.from(await b.async('uint8array')).equals(Buffer.from(await a.async('uint8array')))).toBe(true);
      expect(b.date.getTime()).toBe(a.date.getTime());
      expect(b.comment).toBe(a.comment);
    }
    expect(out.file('word/styles.xml')?.comment).toBe('styles keep their comment');
    expect(await entryText(out, 'word/styles.xml')).toContain('Odd\u200BName');
  });

  it('keeps stored entries stored', async () => {
    await processDocument(inputPath, outputPath, DENYLIST);
    // An uncompressed payload appears verbatim in the archive bytes
    expect(fs.readFileSync(outputPath).includes(Buffer.from(MEDIA_PAYLOAD))).toBe(true);
  });

  it('copies the compressed bytes of deflated pass-through entries', async () => {
    const styles = part(
      'styles',
      Array.from({ length: 300 }, (_, i) => `<w:style w:styleId="S${i}" w:default="${i % 3}"/>`).join(''),
    );
    const zip = new JSZip();
    zip.file('word/document.xml', part('document', `<w:body>${runs('a\u200Bb')}</w:body>`), { createFolders: false });
    zip.file('word/styles.xml', styles, { createFolders: false });
    fs.writeFileSync(
      inputPath,
      await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE', compressionOptions: { level: 1 } }),
    );

    const result = await processDocument(inputPath, outputPath, DENYLIST);
    expect(result.success).toBe(true);

    const source = storedData(fs.readFileSync(inputPath), 'word/styles.xml');
    const written = storedData(fs.readFileSync(outputPath), 'word/styles.xml');
    expect(written.equals(source)).toBe(true);
    expect(await entryText(await loadZip(outputPath), 'word/styles.xml')).toBe(styles);
  });

  it('rejects integer entry names whose position cannot be kept', async () => {
    const zip = new JSZip();
    const options = { createFolders: false };
    zip.file('[Content_Types].xml', `${DECL}<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>`, options);
    zip.file('word/document.xml', part('document', `<w:body>${runs('a\u200Bb')}</w:body>`), options);
    zip.file('customXml/1', 'item', options);
    zip.file('10', 'last', options);
    fs.writeFileSync(inputPath, await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' }));

    const result = await processDocument(inputPath, outputPath, DENYLIST);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('InvalidContainer');
    expect(result.error.entryName).toBe('10');
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('keeps entry names that only contain digits after a folder', async () => {
    const zip = new JSZip();
    zip.file('word/document.xml', part('document', `<w:body>${runs('a\u200Bb')}</w:body>`), { createFolders: false });
    zip.file('customXml/1', 'item', { createFolders: false });
    zip.file('01', 'leading zero', { createFolders: false });
    fs.writeFileSync(inputPath, await zip.generateAsync({ type: 'nodebuffer' }));

    const result = await processDocument(inputPath, outputPath, DENYLIST);

    expect(result.success).toBe(true);
    expect(Object.keys((await loadZip(outputPath)).files)).toEqual(['word/document.xml', 'customXml/1', '01']);
  });

  it('keeps timestamps of rewritten parts by default', async () => {
    await processDocument(inputPath, outputPath, DENYLIST);
    const out = await loadZip(outputPath);
    expect(out.file('word/document.xml')?.date.getTime()).toBe(FIXED_DATE.getTime());
  });

  it('stamps rewritten parts with the current time when asked', async () => {
    await processDocument(inputPath, outputPath, DENYLIST, { timestamps: 'now' });
    const out = await loadZip(outputPath);

    expect(out.file('word/document.xml')?.date.getTime()).toBeGreaterThan(FIXED_DATE.getTime());
    expect(out.file('word/footer1.xml')?.date.getTime()).toBe(FIXED_DATE.getTime());
  });

  it('is an identity run with an empty denylist', async () => {
    const result = await processDocument(inputPath, outputPath, new Set());
    expect(result.success).toBe(true);

    const input = await loadZip(inputPath);
    const out = await loadZip(outputPath);
    for (const name of Object.keys(input.files)) {
      const a = input.file(name);
      const b = out.file(name);
      if (!a || !b) throw new Error(`missing entry ${name}`);
      expect(Buffer.from(await b.async('uint8array')).equals(Buffer.from(await a.async('uint8array')))).toBe(true);
      expect(b.date.getTime()).toBe(a.date.getTime());
    }
  });

  it('keeps a text node emptied by filtering', async () => {
    await createTestDocx(inputPath, { document: part('document', `<w:body>${runs('\u200B\u200B')}</w:body>`) });
    const result = await processDocument(inputPath, outputPath, DENYLIST);

    expect(result.success).toBe(true);
    const out = await loadZip(outputPath);
    expect(await entryText(out, 'word/document.xml')).toBe(
      part('document', '<w:body><w:p><w:r><w:t/></w:r></w:p></w:body>'),
    );
  });

  it('aborts without output when one part is malformed', async () => {
    await createTestDocx(inputPath, { footer: `${DECL}<w:ftr xmlns:w="${W}"><w:p>` });
    const result = await processDocument(inputPath, outputPath, DENYLIST);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('MalformedXml');
    expect(result.error.entryName).toBe('word/footer1.xml');
    expect(fs.readdirSync(tempDir)).toEqual(['input.docx']);
  });

  it('leaves an unrelated .tmp file alone', async () => {
    fs.writeFileSync(outputPath + '.tmp', 'user data');
    const result = await processDocument(inputPath, outputPath, DENYLIST);

    expect(result.success).toBe(true);
    expect(fs.readFileSync(outputPath + '.tmp', 'utf-8')).toBe('user data');
    expect(fs.readdirSync(tempDir).sort()).toEqual(['input.docx', 'output.docx', 'output.docx.tmp']);
  });

  it('passes unsupported parts through with a warning', async () => {
    const foreignHeader = `${DECL}<x:hdr xmlns:x="urn:other"><x:t>keep\u200B</x:t></x:hdr>`;
    await createTestDocx(inputPath, { header: foreignHeader });
    const result = await processDocument(inputPath, outputPath, DENYLIST);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.summary.warnings).toEqual([
      'word/header1.xml: Root element <x:hdr> is not in the WordprocessingML namespace; copied unchanged',
    ]);
    expect(result.summary.charactersRemoved).toBe(1);

    const out = await loadZip(outputPath);
    expect(await entryText(out, 'word/header1.xml')).toBe(foreignHeader);
  });

  it('refuses to replace an existing output unless asked', async () => {
    fs.writeFileSync(outputPath, 'existing');

    const refused = await processDocument(inputPath, outputPath, DENYLIST);
    expect(refused.success).toBe(false);
    if (!refused.success) expect(refused.error.code).toBe('OutputExists');
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe('existing');

    const replaced = await processDocument(inputPath, outputPath, DENYLIST, { overwrite: true });
    expect(replaced.success).toBe(true);
    expect(await entryText(await loadZip(outputPath), 'word/header1.xml')).toBe(part('hdr', runs('Head')));
  });

  it('rejects writing over the input', async () => {
    const result = await processDocument(inputPath, inputPath, DENYLIST, { overwrite: true });

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('IoError');
  });

  it('reports a file that is not a zip container', async () => {
    const notZip = path.join(tempDir, 'plain.docx');
    fs.writeFileSync(notZip, 'just some text');
    const result = await processDocument(notZip, outputPath, DENYLIST);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('InvalidContainer');
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('reports a missing input', async () => {
    const result = await processDocument(path.join(tempDir, 'missing.docx'), outputPath, DENYLIST);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('IoError');
  });

  it('scans without writing anything', async () => {
    const result = await scanDocument(inputPath, DENYLIST);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.summary.outputPath).toBeNull();
    expect(result.summary.charactersRemoved).toBe(2);
    expect(fs.readdirSync(tempDir)).toEqual(['input.docx']);
  });

  it('moves through its run states', async () => {
    const rewriter = await ContainerRewriter.open(inputPath);
    expect(rewriter.state).toBe('opened');

    await rewriter.rewrite(DENYLIST);
    expect(rewriter.state).toBe('finalizing');

    await rewriter.writeTo(outputPath);
    expect(rewriter.state).toBe('done');
  });

  it('ends aborted when a part fails', async () => {
    await createTestDocx(inputPath, { document: `${DECL}<w:document xmlns:w="${W}">` });
    const rewriter = await ContainerRewriter.open(inputPath);

    await expect(rewriter.rewrite(DENYLIST)).rejects.toMatchObject({ code: 'MalformedXml' });
    expect(rewriter.state).toBe('aborted');
  });
});

describe('defaultOutputPath', () => {
  it('adds _cleaned before the extension', () => {
    expect(defaultOutputPath(path.join('docs', 'report.docx'))).toBe(path.join('docs', 'report_cleaned.docx'));
    expect(defaultOutputPath('notes')).toBe('notes_cleaned');
  });
});
