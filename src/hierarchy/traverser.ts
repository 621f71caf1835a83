import { ANY_FORMAT, deriveFormat } from '../format/derive.js';
import { RecursiveTypeError } from '../validation/errors.js';
import type { ComplexTypeDef, MaxOccurs, SimpleTypeDef } from '../xsd/types.js';
import type { SchemaWalker } from '../xsd/walker.js';

/**
 * Mandatory, Optional, or Conditional (on an optional ancestor or a choice).
 */
export type IsoStatus = 'M' | 'O' | 'C';

/**
 * One terminal field of the schema.
 */
export interface LeafRecord {
  /** Element names from the root down, occurrence-annotated where repeatable. */
  readonly path: readonly string[];
  readonly isoStatus: IsoStatus;
  /** Declared type name; empty for elements with an anonymous type. */
  readonly typeName: string;
  readonly pattern: string;
  /** Enumeration values joined with `", "`. */
  readonly enumeration: string;
  readonly format: string;
}

/**
 * Facets and format a leaf type resolves to.
 */
export interface ResolvedLeafType {
  format: string;
  /** `undefined` for wildcard and unregistered types. */
  facets?: SimpleTypeDef;
}

interface TraversalContext {
  readonly path: readonly string[];
  readonly parentOptionalSeen: boolean;
  readonly inChoice: boolean;
  /** Complex types on the way down, for recursion detection. */
  readonly ancestors: readonly string[];
}

interface NodeRef {
  name: string;
  type?: string;
  minOccurs: number;
  maxOccurs: MaxOccurs;
  inlineType?: ComplexTypeDef;
}

export function formatOccurrence(minOccurs: number, maxOccurs: MaxOccurs): string {
  const maxDisplay = maxOccurs === 'unbounded' ? '∞' : String(maxOccurs);
  return `[${minOccurs}...${maxDisplay}]`;
}

/**
 * Resolves a leaf type the same way for records and for the type summary:
 * wildcard types are `<ANY>`, simpleContent aliases take the facets (and the
 * name, for the name-based rules) of their base type.
 */
export function resolveLeafType(
  walker: SchemaWalker,
  typeName: string | undefined,
  inlineType?: ComplexTypeDef,
): ResolvedLeafType {
  if (walker.isWildcard(typeName, inlineType)) return { format: ANY_FORMAT };

  const aliasBase = walker.lookupSimpleContentBase(typeName, inlineType);
  const effectiveName = aliasBase ?? typeName;
  const facets = walker.lookupFacets(effectiveName);
  return { format: deriveFormat(effectiveName ?? '', facets), facets };
}

function visit(walker: SchemaWalker, node: NodeRef, ctx: TraversalContext): LeafRecord[] {
  const children = walker.getChildren(node.type, node.inlineType);

  const repeatable = node.maxOccurs === 'unbounded' || node.maxOccurs > 1;
  const displayName =
    children.length > 0 && repeatable
      ? `${node.name}${formatOccurrence(node.minOccurs, node.maxOccurs)}`
      : node.name;
  const path = [...ctx.path, displayName];

  let isoStatus: IsoStatus;
  let parentOptionalSeen = ctx.parentOptionalSeen;
  if (ctx.inChoice) {
    isoStatus = 'C';
  } else if (node.minOccurs === 0) {
    isoStatus = 'O';
    parentOptionalSeen = true;
  } else if (ctx.parentOptionalSeen) {
    isoStatus = 'C';
  } else {
    isoStatus = 'M';
  }

  if (children.length === 0) {
    const { format, facets } = resolveLeafType(walker, node.type, node.inlineType);
    return [
      {
        path,
        isoStatus,
        typeName: node.type ?? '',
        pattern: facets?.pattern ?? '',
        enumeration: facets ? facets.enumeration.join(', ') : '',
        format,
      },
    ];
  }

  // anonymous types cannot be referenced again, so only named ones can recurse
  let ancestors = ctx.ancestors;
  if (node.type !== undefined) {
    if (ancestors.includes(node.type)) {
      throw new RecursiveTypeError([...ancestors, node.type]);
    }
    ancestors = [...ancestors, node.type];
  }

  return children.flatMap((child) =>
    visit(walker, child, {
      path,
      parentOptionalSeen,
      inChoice: ctx.inChoice || child.isChoice,
      ancestors,
    }),
  );
}

/**
 * Walks the type graph depth-first from the root element and returns every
 * leaf element in declaration order.
 *
 * @throws `RecursiveTypeError` when a complex type contains itself.
 */
export function traverseHierarchy(walker: SchemaWalker, rootName: string, rootType: string): LeafRecord[] {
  return visit(
    walker,
    { name: rootName, type: rootType, minOccurs: 1, maxOccurs: 1 },
    { path: [], parentOptionalSeen: false, inChoice: false, ancestors: [] },
  );
}
