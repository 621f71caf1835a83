import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { XsdParseError } from '../validation/errors.js';
import type {
  ChildElementRef,
  ComplexTypeDef,
  MaxOccurs,
  SchemaModel,
  SimpleTypeDef,
  TopLevelElement,
} from './types.js';

// ---------------------------------------------------------------------------
// Internal node model (fast-xml-parser preserveOrder output)
// ---------------------------------------------------------------------------

/**
 * One XML element with its tag reduced to the local name, so `xs:`, `xsd:`
 * and default-namespace schemas look the same.
 */
interface XsdNode {
  tag: string;
  attrs: Record<string, string>;
  children: XsdNode[];
}

const ANY_NAMESPACE = '##any';

const CONTAINER_TAGS = new Set(['sequence', 'choice', 'all']);

// Subtrees that never hold element particles of the enclosing type.
const OPAQUE_TAGS = new Set(['element', 'annotation', 'attribute', 'attributeGroup', 'anyAttribute', 'any']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function localName(qname: string): string {
  const idx = qname.indexOf(':');
  return idx === -1 ? qname : qname.slice(idx + 1);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith('@_') && typeof value === 'string') {
      attrs[key.slice(2)] = value;
    }
  }
  return attrs;
}

function toNodes(raw: unknown): XsdNode[] {
  if (!Array.isArray(raw)) return [];
  const items: unknown[] = raw;
  const nodes: XsdNode[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const attrs = readAttributes(item[':@']);
    for (const [key, value] of Object.entries(item)) {
      if (key === ':@' || key === '#text' || key.startsWith('?')) continue;
      nodes.push({ tag: localName(key), attrs, children: toNodes(value) });
    }
  }
  return nodes;
}

function childrenByTag(node: XsdNode, tag: string): XsdNode[] {
  return node.children.filter((c) => c.tag === tag);
}

/**
 * Depth-first, document-order search below `node`. Nested element
 * declarations are not entered, so an anonymous type of a child element
 * never leaks into its parent.
 */
function findDescendant(node: XsdNode, predicate: (n: XsdNode) => boolean): XsdNode | undefined {
  for (const child of node.children) {
    if (predicate(child)) return child;
    if (child.tag === 'element') continue;
    const found = findDescendant(child, predicate);
    if (found) return found;
  }
  return undefined;
}

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * The file has already been decoded by `readFile(..., 'utf-8')`, so a declared
 * `ISO-8859-1` (or similar) encoding is misleading and makes `fast-xml-parser`
 * reject the document.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(
    /(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i,
    '$1 encoding="UTF-8"',
  );
}

function makeParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    preserveOrder: true,
    allowBooleanAttributes: true,
    parseTagValue: false,
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseMaxOccurs(value: string | undefined): MaxOccurs {
  if (value === 'unbounded') return 'unbounded';
  if (value === undefined) return 1;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? 1 : n;
}

function parseMinOccurs(value: string | undefined): number {
  const parsed = parseMaxOccurs(value);
  return parsed === 'unbounded' ? 1 : parsed;
}

// ---------------------------------------------------------------------------
// SimpleType parsing
// ---------------------------------------------------------------------------

function parseSimpleType(node: XsdNode, name: string): SimpleTypeDef {
  const def: SimpleTypeDef = { name, enumeration: [] };
  const restriction = findDescendant(node, (n) => n.tag === 'restriction');
  if (!restriction) return def;

  def.base = restriction.attrs.base;
  for (const facet of restriction.children) {
    const value = facet.attrs.value;
    if (value === undefined) continue;
    switch (facet.tag) {
      case 'minLength':
        def.minLength = value;
        break;
      case 'maxLength':
        def.maxLength = value;
        break;
      case 'totalDigits':
        def.totalDigits = value;
        break;
      case 'fractionDigits':
        def.fractionDigits = value;
        break;
      case 'pattern':
        def.pattern = value;
        break;
      case 'enumeration':
        def.enumeration.push(value);
        break;
      default:
        break;
    }
  }
  return def;
}

// ---------------------------------------------------------------------------
// ComplexType parsing
// ---------------------------------------------------------------------------

function parseChildElement(node: XsdNode, name: string, isChoice: boolean): ChildElementRef {
  const ref: ChildElementRef = {
    name,
    type: node.attrs.type || undefined,
    minOccurs: parseMinOccurs(node.attrs.minOccurs),
    maxOccurs: parseMaxOccurs(node.attrs.maxOccurs),
    isChoice,
  };
  const inline = childrenByTag(node, 'complexType')[0];
  if (inline) ref.inlineType = parseComplexType(inline, name);
  return ref;
}

/**
 * Collects every named element particle that sits directly inside a
 * sequence/choice/all, at any container depth, in document order. Particles
 * of an anonymous child type stay on that child (see `inlineType`).
 */
function collectChildElements(node: XsdNode, container?: string): ChildElementRef[] {
  const refs: ChildElementRef[] = [];
  for (const child of node.children) {
    if (child.tag === 'element') {
      const name = child.attrs.name;
      // ref= particles carry no name of their own
      if (container && name) refs.push(parseChildElement(child, name, container === 'choice'));
      continue;
    }
    if (OPAQUE_TAGS.has(child.tag)) continue;
    refs.push(...collectChildElements(child, CONTAINER_TAGS.has(child.tag) ? child.tag : undefined));
  }
  return refs;
}

function parseComplexType(node: XsdNode, name: string): ComplexTypeDef {
  const simpleContent = childrenByTag(node, 'simpleContent')[0];
  if (simpleContent) {
    const ext = childrenByTag(simpleContent, 'extension')[0];
    const base = ext?.attrs.base;
    // simpleContent/restriction has no alias base: the type stays a bare leaf
    return base ? { kind: 'simpleContent', name, base } : { kind: 'elements', name, children: [] };
  }

  const wildcard = findDescendant(node, (n) => n.tag === 'any' && n.attrs.namespace === ANY_NAMESPACE);
  if (wildcard) return { kind: 'wildcard', name };

  const complexContent = childrenByTag(node, 'complexContent')[0];
  const ext = complexContent ? childrenByTag(complexContent, 'extension')[0] : undefined;

  return {
    kind: 'elements',
    name,
    children: collectChildElements(node),
    extends: ext?.attrs.base || undefined,
  };
}

// ---------------------------------------------------------------------------
// Document parsing
// ---------------------------------------------------------------------------

interface SchemaReference {
  kind: 'include' | 'import';
  schemaLocation: string;
  namespace?: string;
}

interface ParsedDocument {
  model: SchemaModel;
  references: SchemaReference[];
  /** prefix → namespace URI, from xmlns:* on the schema element */
  prefixes: Map<string, string>;
}

function emptyModel(): SchemaModel {
  return {
    elements: [],
    complexTypes: new Map(),
    simpleTypes: new Map(),
  };
}

function parseDocument(content: string, source: string): ParsedDocument {
  const normalized = normalizeXmlEncodingDeclaration(content);

  const validation = XMLValidator.validate(normalized);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XsdParseError(`Failed to parse XSD XML content from: ${source} (${msg} at ${line}:${col})`);
  }

  let roots: XsdNode[];
  try {
    roots = toNodes(makeParser().parse(normalized));
  } catch (err) {
    throw new XsdParseError(`Failed to parse XSD XML content from: ${source}`, err);
  }

  const schema = roots.find((n) => n.tag === 'schema');
  if (!schema) {
    throw new XsdParseError(`Invalid XSD: root element <xs:schema> not found in ${source}`);
  }

  const prefixes = new Map<string, string>();
  for (const [key, value] of Object.entries(schema.attrs)) {
    if (key.startsWith('xmlns:')) prefixes.set(key.slice('xmlns:'.length), value);
  }

  const model = emptyModel();
  model.targetNamespace = schema.attrs.targetNamespace;
  const references: SchemaReference[] = [];

  for (const node of schema.children) {
    const name = node.attrs.name;
    switch (node.tag) {
      case 'element': {
        if (!name) break;
        const el: TopLevelElement = { name, type: node.attrs.type || undefined };
        model.elements.push(el);
        break;
      }
      case 'complexType':
        if (name && !model.complexTypes.has(name)) model.complexTypes.set(name, parseComplexType(node, name));
        break;
      case 'simpleType':
        if (name && !model.simpleTypes.has(name)) model.simpleTypes.set(name, parseSimpleType(node, name));
        break;
      case 'include':
      case 'import': {
        const schemaLocation = node.attrs.schemaLocation;
        if (schemaLocation) {
          references.push({
            kind: node.tag === 'include' ? 'include' : 'import',
            schemaLocation,
            namespace: node.attrs.namespace,
          });
        }
        break;
      }
      default:
        break;
    }
  }

  // Types written as `tns:Name` where tns is bound to the schema's own namespace.
  registerPrefixedNames(model, model, prefixes, model.targetNamespace);

  return { model, references, prefixes };
}

/**
 * Registers the types of `source` in `target` under every prefix bound to `namespace`.
 */
function registerPrefixedNames(
  target: SchemaModel,
  source: SchemaModel,
  prefixes: Map<string, string>,
  namespace: string | undefined,
): void {
  if (namespace === undefined) return;
  const matching = [...prefixes].filter(([, uri]) => uri === namespace).map(([pfx]) => pfx);
  for (const pfx of matching) {
    for (const [k, v] of [...source.complexTypes]) {
      if (k.includes(':')) continue;
      const pk = `${pfx}:${k}`;
      if (!target.complexTypes.has(pk)) target.complexTypes.set(pk, v);
    }
    for (const [k, v] of [...source.simpleTypes]) {
      if (k.includes(':')) continue;
      const pk = `${pfx}:${k}`;
      if (!target.simpleTypes.has(pk)) target.simpleTypes.set(pk, v);
    }
  }
}

function mergeMissing(target: SchemaModel, source: SchemaModel): void {
  const known = new Set(target.elements.map((e) => e.name));
  for (const el of source.elements) {
    if (!known.has(el.name)) target.elements.push(el);
  }
  for (const [k, v] of source.complexTypes) {
    if (!target.complexTypes.has(k)) target.complexTypes.set(k, v);
  }
  for (const [k, v] of source.simpleTypes) {
    if (!target.simpleTypes.has(k)) target.simpleTypes.set(k, v);
  }
}

/**
 * Parses XSD text into a SchemaModel. `xs:include` and `xs:import` are not
 * followed; use `parseXsd` for that.
 *
 * @param source - Label used in error messages.
 */
export function parseXsdContent(content: string, source = '<inline>'): SchemaModel {
  return parseDocument(content, source).model;
}

export interface ParseXsdOptions {
  /** Base directory for resolving a relative `xsdPath`. Defaults to `process.cwd()`. */
  baseDir?: string;
  /** Receives a warning for every include/import that cannot be loaded. */
  logger?: Logger;
}

/**
 * Internal recursive implementation. `visited` holds the absolute paths
 * already loaded so circular xs:include / xs:import chains terminate.
 */
async function parseXsdInternal(
  xsdPath: string,
  baseDir: string | undefined,
  visited: Set<string>,
  logger: Logger,
): Promise<SchemaModel> {
  const resolvedPath = baseDir ? resolve(baseDir, xsdPath) : resolve(xsdPath);

  if (visited.has(resolvedPath)) return emptyModel();
  visited.add(resolvedPath);

  let xsdContent: string;
  try {
    xsdContent = await readFile(resolvedPath, 'utf-8');
  } catch (err) {
    throw new XsdParseError(`Cannot read XSD file: ${resolvedPath}`, err);
  }

  const { model, references, prefixes } = parseDocument(xsdContent, resolvedPath);
  const schemaBaseDir = dirname(resolvedPath);

  for (const ref of references) {
    let referenced: SchemaModel;
    try {
      referenced = await parseXsdInternal(ref.schemaLocation, schemaBaseDir, visited, logger);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Skipping xs:${ref.kind} "${ref.schemaLocation}" from ${resolvedPath}: ${reason}`);
      continue;
    }
    mergeMissing(model, referenced);
    // included definitions join this schema's namespace
    const namespace = ref.kind === 'include' ? model.targetNamespace : ref.namespace;
    registerPrefixedNames(model, referenced, prefixes, namespace);
  }

  return model;
}

/**
 * Reads an XSD file from disk and parses it into a SchemaModel, merging the
 * definitions of every xs:include and xs:import it references. Definitions
 * of the including file win on name clashes.
 *
 * @param xsdPath - Absolute or relative path to the .xsd file.
 */
export async function parseXsd(xsdPath: string, options: ParseXsdOptions = {}): Promise<SchemaModel> {
  const { baseDir, logger = defaultLogger } = options;
  return parseXsdInternal(xsdPath, baseDir, new Set<string>(), logger);
}
