import { RootResolutionError } from '../validation/errors.js';
import type { ChildElementRef, ComplexTypeDef, SchemaModel, SimpleTypeDef } from './types.js';

/**
 * The element a hierarchy walk starts from.
 */
export interface ResolvedRoot {
  name: string;
  type: string;
}

/**
 * Read-only queries over a parsed SchemaModel.
 */
export class SchemaWalker {
  constructor(private readonly model: SchemaModel) {}

  /**
   * Returns the facets of a named simple type. `undefined` stands for the
   * empty facet set of an unregistered (e.g. built-in) type.
   */
  lookupFacets(name: string | undefined): SimpleTypeDef | undefined {
    return name === undefined ? undefined : this.model.simpleTypes.get(name);
  }

  /**
   * Returns the base type of a simpleContent alias, if `typeName` (or the
   * element's anonymous type) is one.
   */
  lookupSimpleContentBase(typeName: string | undefined, inlineType?: ComplexTypeDef): string | undefined {
    const ct = this.complexTypeOf(typeName, inlineType);
    return ct?.kind === 'simpleContent' ? ct.base : undefined;
  }

  /**
   * Returns true when the type contains `<xs:any namespace="##any">`.
   */
  isWildcard(typeName: string | undefined, inlineType?: ComplexTypeDef): boolean {
    return this.complexTypeOf(typeName, inlineType)?.kind === 'wildcard';
  }

  /**
   * Gets the child element particles of a type, including those inherited via
   * xs:complexContent/xs:extension (base first). An empty list means leaf.
   */
  getChildren(typeName: string | undefined, inlineType?: ComplexTypeDef): ChildElementRef[] {
    const ct = this.complexTypeOf(typeName, inlineType);
    return ct ? this.resolveAllElements(ct) : [];
  }

  // An anonymous type wins over the type= attribute, as an element cannot carry both.
  private complexTypeOf(
    typeName: string | undefined,
    inlineType: ComplexTypeDef | undefined,
  ): ComplexTypeDef | undefined {
    if (inlineType) return inlineType;
    return typeName === undefined ? undefined : this.model.complexTypes.get(typeName);
  }

  /**
   * Recursively resolves all element children following the xs:extension inheritance chain.
   */
  private resolveAllElements(ct: ComplexTypeDef, visited = new Set<string>()): ChildElementRef[] {
    if (ct.kind !== 'elements') return [];
    if (visited.has(ct.name)) return ct.children;
    visited.add(ct.name);
    if (!ct.extends) return ct.children;
    const baseCt = this.model.complexTypes.get(ct.extends);
    if (!baseCt) return ct.children;
    return [...this.resolveAllElements(baseCt, visited), ...ct.children];
  }

  /**
   * Finds the document root: the first top-level element, in document order,
   * whose type has child elements.
   *
   * @throws `RootResolutionError` when no top-level element qualifies.
   */
  resolveRoot(): ResolvedRoot {
    for (const el of this.model.elements) {
      if (el.type !== undefined && this.getChildren(el.type).length > 0) {
        return { name: el.name, type: el.type };
      }
    }
    throw new RootResolutionError(this.model.elements.map((e) => e.name));
  }
}
