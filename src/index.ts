export { buildLeafCatalog, extractLeafCatalog, summarizeTypes } from './catalog.js';
export type { ExtractOptions, LeafCatalog, SchemaModel, TypeSummaryRow } from './catalog.js';

export { parseXsd, parseXsdContent } from './xsd/parser.js';
export type { ParseXsdOptions } from './xsd/parser.js';
export { SchemaWalker } from './xsd/walker.js';
export type { ResolvedRoot } from './xsd/walker.js';
export type { ChildElementRef, ComplexTypeDef, MaxOccurs, SimpleTypeDef } from './xsd/types.js';

export { traverseHierarchy } from './hierarchy/traverser.js';
export type { IsoStatus, LeafRecord } from './hierarchy/traverser.js';

export { deriveFormat, explainFormat, TYPE_NAME_LEXICON } from './format/derive.js';
export type { FormatExplanation, FormatRule } from './format/derive.js';
export { analyzePattern, classifyPatternChars, estimatePatternLength } from './format/pattern.js';
export type { PatternAnalysis, PatternCharClass } from './format/pattern.js';

export { buildWorkbook, writeWorkbook } from './report/workbook.js';
export type { WorkbookOptions } from './report/workbook.js';

export type { Logger } from './logger.js';

export { EmptyCatalogError, RecursiveTypeError, RootResolutionError, XsdParseError } from './validation/errors.js';
