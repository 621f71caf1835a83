/**
 * Occurrence bound as declared on xs:element (`minOccurs` / `maxOccurs`).
 */
export type MaxOccurs = number | 'unbounded';

/**
 * Represents a named simple type definition (xs:simpleType) with the facets
 * of its first xs:restriction. Facet values keep the literal text written in
 * the schema; an absent facet is `undefined`, never zero.
 */
export interface SimpleTypeDef {
  name: string;
  /** xs:restriction base */
  base?: string;
  minLength?: string;
  maxLength?: string;
  totalDigits?: string;
  fractionDigits?: string;
  pattern?: string;
  /** Literal values in declaration order. */
  enumeration: string[];
}

/**
 * A named element particle found inside a complex type's sequence/choice/all.
 */
export interface ChildElementRef {
  name: string;
  /** Referenced type name. Undefined for elements with an anonymous type. */
  type?: string;
  minOccurs: number;
  maxOccurs: MaxOccurs;
  /** Whether the immediate container is an xs:choice. */
  isChoice: boolean;
  /** Anonymous xs:complexType declared inside the element, named after it. */
  inlineType?: ComplexTypeDef;
}

/**
 * xs:complexType with xs:simpleContent/xs:extension: a transparent alias for
 * the facets of its base type.
 */
export interface SimpleContentTypeDef {
  kind: 'simpleContent';
  name: string;
  base: string;
}

/**
 * xs:complexType containing `<xs:any namespace="##any">`. Treated as an opaque leaf.
 */
export interface WildcardTypeDef {
  kind: 'wildcard';
  name: string;
}

/**
 * xs:complexType built from element particles.
 */
export interface ElementsTypeDef {
  kind: 'elements';
  name: string;
  children: ChildElementRef[];
  /** Base type name when using xs:complexContent/xs:extension */
  extends?: string;
}

export type ComplexTypeDef = SimpleContentTypeDef | WildcardTypeDef | ElementsTypeDef;

/**
 * A top-level xs:element declaration, a candidate document root.
 */
export interface TopLevelElement {
  name: string;
  type?: string;
}

/**
 * The parsed schema model.
 */
export interface SchemaModel {
  /** Top-level element declarations in document order. */
  elements: TopLevelElement[];
  /** All named complex type definitions keyed by name. */
  complexTypes: Map<string, ComplexTypeDef>;
  /** All named simple type definitions keyed by name. */
  simpleTypes: Map<string, SimpleTypeDef>;
  /** xs:schema targetNamespace, if present. */
  targetNamespace?: string;
}
