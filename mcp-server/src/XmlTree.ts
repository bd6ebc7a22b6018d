import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { SanitizeError } from './SanitizeError';

// ============================================================
// Node model
// ============================================================

export interface XmlAttribute {
  readonly name: string;
  readonly value: string;
}

export interface XmlElement {
  readonly kind: 'element';
  readonly name: string;
  readonly attributes: readonly XmlAttribute[];
  readonly children: XmlNode[];
}

/** Character data. `value` is decoded (entities resolved) and is the only mutable field in the tree. */
export interface XmlText {
  readonly kind: 'text';
  value: string;
}

export interface XmlCData {
  readonly kind: 'cdata';
  value: string;
}

export interface XmlComment {
  readonly kind: 'comment';
  readonly value: string;
}

/** XML declaration or processing instruction */
export interface XmlInstruction {
  readonly kind: 'instruction';
  readonly name: string;
  readonly attributes: readonly XmlAttribute[];
  /** Everything between `<?` and `?>`, as written */
  readonly source: string;
}

export type XmlNode = XmlElement | XmlText | XmlCData | XmlComment | XmlInstruction;

// ============================================================
// Parsing
// ============================================================

const TEXT_KEY = '#text';
const COMMENT_KEY = '#comment';
const CDATA_KEY = '#cdata';
const ATTRIBUTES_KEY = ':@';
const ATTRIBUTE_PREFIX = '@_';

const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  preserveOrder: true,
  textNodeName: TEXT_KEY,
  commentPropName: COMMENT_KEY,
  cdataPropName: CDATA_KEY,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  // References are resolved by decodeReferences, which rejects undeclared entities
  processEntities: false,
  htmlEntities: false,
} satisfies ConstructorParameters<typeof XMLParser>[0];

/**
 * Parse an XML string into an ordered node list (declaration, comments and
 * the root element, in source order).
 *
 * Throws SanitizeError('MalformedXml') when the input is not well-formed.
 */
export function parseXml(xml: string): XmlNode[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new SanitizeError('MalformedXml', `${msg} (line ${line}, column ${col})`);
  }

  const parser = new XMLParser(PARSER_OPTIONS);
  const parsed: unknown = parser.parse(xml);
  return toNodes(parsed, { sources: instructionSources(xml), next: 0 });
}

interface InstructionCursor {
  readonly sources: readonly string[];
  next: number;
}

// Comments and CDATA sections are matched so that `<?` inside them is skipped
const MARKUP_WITH_INSTRUCTIONS = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?([\s\S]*?)\?>/g;

function instructionSources(xml: string): string[] {
  const sources: string[] = [];
  for (const match of xml.matchAll(MARKUP_WITH_INSTRUCTIONS)) {
    if (match[1] !== undefined) sources.push(match[1]);
  }
  return sources;
}

// ============================================================
// References
// ============================================================

const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
]);

const REFERENCE = /&([^\s&;<]*)(;?)/g;

function isXmlChar(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xa ||
    codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff)
  );
}

function resolveReference(name: string): string {
  let codePoint: number | undefined;
  if (/^#x[0-9A-Fa-f]+$/.test(name)) codePoint = parseInt(name.slice(2), 16);
  else if (/^#[0-9]+$/.test(name)) codePoint = parseInt(name.slice(1), 10);
  else {
    const entity = PREDEFINED_ENTITIES.get(name);
    if (entity === undefined) {
      throw new SanitizeError('MalformedXml', `Reference to undeclared entity &${name};`);
    }
    return entity;
  }

  if (!isXmlChar(codePoint)) {
    throw new SanitizeError('MalformedXml', `Character reference &${name}; is not a legal XML character`);
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Resolve the five predefined entities and numeric character references.
 * Any other entity reference is undeclared, since parts carry no DTD.
 */
export function decodeReferences(raw: string): string {
  return raw.replace(REFERENCE, (_match: string, name: string, semicolon: string) => {
    if (semicolon === '') {
      throw new SanitizeError('MalformedXml', `Unterminated reference &${name}`);
    }
    return resolveReference(name);
  });
}

// Line ends read as \n; in attribute values, literal whitespace reads as a space
function decodeText(raw: string): string {
  return decodeReferences(raw.replace(/\r\n?/g, '\n'));
}

function decodeAttribute(raw: string): string {
  return decodeReferences(raw.replace(/\r\n?/g, '\n').replace(/[\t\n]/g, ' '));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodes(raw: unknown, cursor: InstructionCursor): XmlNode[] {
  if (!Array.isArray(raw)) return [];
  const nodes: XmlNode[] = [];
  for (const item of raw) {
    const node = toNode(item, cursor);
    if (node) nodes.push(node);
  }
  return nodes;
}

function toNode(raw: unknown, cursor: InstructionCursor): XmlNode | null {
  if (!isRecord(raw)) return null;

  const key = Object.keys(raw).find(k => k !== ATTRIBUTES_KEY);
  if (key === undefined) return null;
  const content = raw[key];

  if (key === TEXT_KEY) {
    return { kind: 'text', value: decodeText(scalarToString(content)) };
  }
  if (key === COMMENT_KEY) {
    return { kind: 'comment', value: collectText(content) };
  }
  if (key === CDATA_KEY) {
    return { kind: 'cdata', value: collectText(content) };
  }

  const attributes = toAttributes(raw[ATTRIBUTES_KEY]);
  if (key.startsWith('?')) {
    const name = key.slice(1);
    const source = cursor.sources[cursor.next++];
    return {
      kind: 'instruction',
      name,
      attributes,
      source: source !== undefined && source.startsWith(name) ? source : `${name}${serializeAttributes(attributes)}`,
    };
  }
  return { kind: 'element', name: key, attributes, children: toNodes(content, cursor) };
}

function toAttributes(raw: unknown): XmlAttribute[] {
  if (!isRecord(raw)) return [];
  return Object.entries(raw).map(([name, value]) => ({
    name: name.startsWith(ATTRIBUTE_PREFIX) ? name.slice(ATTRIBUTE_PREFIX.length) : name,
    value: decodeAttribute(scalarToString(value)),
  }));
}

function collectText(raw: unknown): string {
  if (!Array.isArray(raw)) return scalarToString(raw);
  return raw.map(item => (isRecord(item) ? scalarToString(item[TEXT_KEY]) : '')).join('');
}

function scalarToString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

// ============================================================
// Serialization
// ============================================================

/**
 * Serialize a node list. Attributes keep their order and are double quoted;
 * an element with no serialized content is written self-closing, so the
 * output parses back to a tree that serializes to the same string.
 */
export function serializeXml(nodes: readonly XmlNode[]): string {
  return nodes.map(serializeNode).join('');
}

function serializeNode(node: XmlNode): string {
  switch (node.kind) {
    case 'text':
      return escapeText(node.value);
    case 'cdata':
      return node.value.length > 0 ? `<![CDATA[${node.value}]]>` : '';
    case 'comment':
      return `<!--${node.value}-->`;
    case 'instruction':
      return `<?${node.source}?>`;
    case 'element': {
      const open = `${node.name}${serializeAttributes(node.attributes)}`;
      const inner = serializeXml(node.children);
      return inner.length > 0 ? `<${open}>${inner}</${node.name}>` : `<${open}/>`;
    }
  }
}

function serializeAttributes(attributes: readonly XmlAttribute[]): string {
  return attributes.map(attr => ` ${attr.name}="${escapeAttribute(attr.value)}"`).join('');
}

export function escapeText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\r/g, '&#13;');
}

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/"/g, '&quot;')
    .replace(/\t/g, '&#9;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;');
}
