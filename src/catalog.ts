import { traverseHierarchy, resolveLeafType } from './hierarchy/traverser.js';
import type { LeafRecord } from './hierarchy/traverser.js';
import { parseXsd } from './xsd/parser.js';
import type { ParseXsdOptions } from './xsd/parser.js';
import type { SchemaModel, SimpleTypeDef } from './xsd/types.js';
import { SchemaWalker } from './xsd/walker.js';
import { EmptyCatalogError } from './validation/errors.js';

// Re-export for external typing convenience
export type { SchemaModel } from './xsd/types.js';

/**
 * One row of the type summary: a distinct type used by the leaf records.
 */
export interface TypeSummaryRow {
  typeName: string;
  format: string;
  /** Resolved facets; undefined for wildcard and unregistered types. */
  facets?: SimpleTypeDef;
}

export interface LeafCatalog {
  rootElement: string;
  rootType: string;
  records: readonly LeafRecord[];
  /** Sorted by type name. */
  types: readonly TypeSummaryRow[];
}

/**
 * Options for `extractLeafCatalog`.
 */
export type ExtractOptions = ParseXsdOptions;

/**
 * Builds one summary row per distinct, non-empty type name in `records`.
 */
export function summarizeTypes(walker: SchemaWalker, records: readonly LeafRecord[]): TypeSummaryRow[] {
  const names = [...new Set(records.map((r) => r.typeName).filter((t) => t !== ''))].sort();
  return names.map((typeName) => ({ typeName, ...resolveLeafType(walker, typeName) }));
}

/**
 * Resolves the root of a parsed schema and lists its leaf elements.
 *
 * @throws `RootResolutionError` if no top-level element has a complex type with children.
 * @throws `EmptyCatalogError`   if the walk produced no leaf element. A root
 *                              found by `resolveRoot` always has a child, and
 *                              every child yields at least one record, so this
 *                              only guards against changes to either rule.
 * @throws `RecursiveTypeError`  if a complex type contains itself.
 */
export function buildLeafCatalog(model: SchemaModel): LeafCatalog {
  const walker = new SchemaWalker(model);
  const root = walker.resolveRoot();

  const records = traverseHierarchy(walker, root.name, root.type);
  if (records.length === 0) {
    throw new EmptyCatalogError(root.name);
  }

  return {
    rootElement: root.name,
    rootType: root.type,
    records,
    types: summarizeTypes(walker, records),
  };
}

/**
 * Reads an XSD file (with its includes and imports) and lists its leaf elements.
 *
 * @param xsdPath - Path to the `.xsd` schema file (absolute or relative to `baseDir`).
 *
 * @throws `XsdParseError` if the XSD file cannot be read or parsed, plus
 *   everything `buildLeafCatalog` throws.
 *
 * @example
 * ```typescript
 * import { extractLeafCatalog } from 'xsd-leaf-catalog';
 *
 * const catalog = await extractLeafCatalog('./pain.001.001.09.xsd');
 * for (const r of catalog.records) {
 *   console.log(r.path.join('/'), r.isoStatus, r.format);
 * }
 * ```
 */
export async function extractLeafCatalog(xsdPath: string, options: ExtractOptions = {}): Promise<LeafCatalog> {
  const model = await parseXsd(xsdPath, options);
  return buildLeafCatalog(model);
}
