import { CharacterFilter, type CodePointSet } from './CharacterFilter';
import { SanitizeError } from './SanitizeError';
import { parseXml, serializeXml, type XmlElement, type XmlNode } from './XmlTree';

export const WORDPROCESSING_NAMESPACES: ReadonlySet<string> = new Set([
  'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
  'http://purl.oclc.org/ooxml/wordprocessingml/main',
]);

export const MATH_NAMESPACES: ReadonlySet<string> = new Set([
  'http://schemas.openxmlformats.org/officeDocument/2006/math',
  'http://purl.oclc.org/ooxml/officeDocument/math',
]);

// Local names per namespace family. Field codes (instrText) are not run text.
const RUN_ELEMENTS = { wordprocessing: ['r'], math: ['r'] } as const;
const RUN_TEXT_ELEMENTS = { wordprocessing: ['t', 'delText'], math: ['t'] } as const;

const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

type NamespaceScope = ReadonlyMap<string, string>;

interface ResolvedName {
  namespace: string | undefined;
  local: string;
}

export interface RewriteResult {
  /** Serialized part; equals the input string when nothing was removed */
  xml: string;
  removed: number;
}

export interface DecodedPart {
  text: string;
  hasBom: boolean;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];

/**
 * Decode a part's bytes. Parts must be UTF-8; UTF-16 parts are reported as
 * unsupported so the caller can pass them through untouched.
 */
export function decodePart(bytes: Uint8Array): DecodedPart {
  if ((bytes[0] === 0xfe && bytes[1] === 0xff) || (bytes[0] === 0xff && bytes[1] === 0xfe)) {
    throw new SanitizeError('UnsupportedPart', 'UTF-16 encoded parts are not supported');
  }
  const hasBom = UTF8_BOM.every((b, i) => bytes[i] === b);
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(hasBom ? bytes.subarray(3) : bytes);
    return { text, hasBom };
  } catch (err) {
    throw new SanitizeError('MalformedXml', 'Part is not valid UTF-8', { cause: err });
  }
}

export function encodePart(text: string, hasBom: boolean): Uint8Array {
  const encoded = new TextEncoder().encode(text);
  if (!hasBom) return encoded;
  const out = new Uint8Array(encoded.length + UTF8_BOM.length);
  out.set(UTF8_BOM, 0);
  out.set(encoded, UTF8_BOM.length);
  return out;
}

/**
 * Filter run text in a parsed part, in place. Returns the number of code
 * points removed; the filter's counters accumulate them as well.
 */
export function filterRunText(nodes: readonly XmlNode[], filter: CharacterFilter): number {
  checkDeclaration(nodes);

  const root = nodes.find((node): node is XmlElement => node.kind === 'element');
  if (!root) {
    throw new SanitizeError('MalformedXml', 'Document has no root element');
  }
  const rootScope = extendScope(new Map([['xml', XML_NAMESPACE]]), root);
  const rootName = resolveName(root.name, rootScope);
  if (rootName.namespace === undefined || !WORDPROCESSING_NAMESPACES.has(rootName.namespace)) {
    throw new SanitizeError(
      'UnsupportedPart',
      `Root element <${root.name}> is not in the WordprocessingML namespace`,
    );
  }

  const before = filter.removedCount;
  filterElement(root, rootScope, false, filter);
  return filter.removedCount - before;
}

/**
 * Filter the run text of one WordprocessingML part held as a string.
 * The source string comes back unchanged when nothing was removed.
 */
export function rewriteXmlText(xml: string, filter: CharacterFilter): RewriteResult {
  const nodes = parseXml(xml);
  const removed = filterRunText(nodes, filter);
  return { xml: removed > 0 ? serializeXml(nodes) : xml, removed };
}

/**
 * Bytes in, bytes out. Throws SanitizeError with code MalformedXml or
 * UnsupportedPart.
 */
export function rewrite(xmlBytes: Uint8Array, denylist: CodePointSet): Uint8Array {
  const { text, hasBom } = decodePart(xmlBytes);
  const result = rewriteXmlText(text, new CharacterFilter(denylist));
  return encodePart(result.xml, hasBom);
}

function checkDeclaration(nodes: readonly XmlNode[]): void {
  for (const node of nodes) {
    if (node.kind !== 'instruction' || node.name !== 'xml') continue;
    const encoding = node.attributes.find(attr => attr.name === 'encoding');
    if (encoding && !/^utf-?8$/i.test(encoding.value)) {
      throw new SanitizeError('UnsupportedPart', `Declared encoding ${encoding.value} is not supported`);
    }
  }
}

function filterElement(
  element: XmlElement,
  scope: NamespaceScope,
  inRun: boolean,
  filter: CharacterFilter,
): void {
  const name = resolveName(element.name, scope);

  if (inRun && isOneOf(name, RUN_TEXT_ELEMENTS)) {
    for (const child of element.children) {
      if (child.kind === 'text' || child.kind === 'cdata') {
        child.value = filter.filter(child.value);
      } else if (child.kind === 'element') {
        throw new SanitizeError(
          'UnsupportedPart',
          `Text element <${element.name}> contains element <${child.name}>`,
        );
      }
    }
    return;
  }

  const childInRun = inRun || isOneOf(name, RUN_ELEMENTS);
  for (const child of element.children) {
    if (child.kind === 'element') {
      filterElement(child, extendScope(scope, child), childInRun, filter);
    }
  }
}

function isOneOf(
  name: ResolvedName,
  table: { readonly wordprocessing: readonly string[]; readonly math: readonly string[] },
): boolean {
  if (name.namespace === undefined) return false;
  if (WORDPROCESSING_NAMESPACES.has(name.namespace)) return table.wordprocessing.includes(name.local);
  if (MATH_NAMESPACES.has(name.namespace)) return table.math.includes(name.local);
  return false;
}

function extendScope(scope: NamespaceScope, element: XmlElement): NamespaceScope {
  let extended: Map<string, string> | null = null;
  for (const attr of element.attributes) {
    let prefix: string | null = null;
    if (attr.name === 'xmlns') prefix = '';
    else if (attr.name.startsWith('xmlns:')) prefix = attr.name.slice('xmlns:'.length);
    if (prefix === null) continue;

    extended ??= new Map(scope);
    extended.set(prefix, attr.value);
  }
  return extended ?? scope;
}

function resolveName(qualifiedName: string, scope: NamespaceScope): ResolvedName {
  const colon = qualifiedName.indexOf(':');
  const prefix = colon === -1 ? '' : qualifiedName.slice(0, colon);
  const local = colon === -1 ? qualifiedName : qualifiedName.slice(colon + 1);
  const namespace = scope.get(prefix);
  return { namespace: namespace === '' ? undefined : namespace, local };
}
