import type { SimpleTypeDef } from '../xsd/types.js';
import { analyzePattern, classifyPatternChars } from './pattern.js';

export const ANY_FORMAT = '<ANY>';

// Lexicon marker for payload-carrying type names; wildcard types use ANY_FORMAT.
const ANY_NAME_FORMAT = '<any>';

/**
 * Which step of the cascade produced a format.
 */
export type FormatRule =
  | 'unregistered'
  | 'boolean'
  | 'enumeration'
  | 'pattern'
  | 'totalDigits'
  | 'maxLength'
  | 'lexicon'
  | 'typeName'
  | 'none';

export interface FormatExplanation {
  format: string;
  rule: FormatRule;
  /** Set when rule is `pattern` and the pattern left the supported grammar. */
  unsupportedConstruct?: string;
}

/**
 * Known semantic type names, tried in this order as case-sensitive
 * substrings of the type name. Longer keys come first so that e.g.
 * `ISODateTime` is not taken for `ISODate`.
 */
export const TYPE_NAME_LEXICON: ReadonlyArray<readonly [key: string, format: string]> = [
  ['SupplementaryDataEnvelope1', ANY_NAME_FORMAT],
  ['ISOYearMonth', 'ISOYearMonth'],
  ['LanguageCode', 'X(2)'],
  ['ISODateTime', 'ISODateTime'],
  ['SkipPayload', ANY_NAME_FORMAT],
  ['ISODate', 'ISODate'],
  ['ISOTime', 'ISOTime'],
];

const MAX_TEXT_RE = /Max(\d+).*Text/;
const MAX_NUMERIC_RE = /Max(\d+).*Numeric/;

function isBooleanBase(base: string | undefined): boolean {
  if (!base) return false;
  const local = base.slice(base.indexOf(':') + 1);
  return local.toLowerCase() === 'boolean';
}

function charLength(value: string): number {
  return [...value].length;
}

function fromTypeName(typeName: string): FormatExplanation {
  for (const [key, format] of TYPE_NAME_LEXICON) {
    if (typeName.includes(key)) return { format, rule: 'lexicon' };
  }

  const text = MAX_TEXT_RE.exec(typeName);
  if (text) return { format: `X(${text[1]})`, rule: 'typeName' };

  const numeric = MAX_NUMERIC_RE.exec(typeName);
  if (numeric) return { format: `XN(${numeric[1]})`, rule: 'typeName' };

  return { format: '', rule: 'none' };
}

/**
 * Runs the format cascade and reports which rule decided it.
 *
 * @param facets - `undefined` for a type with no simple-type declaration.
 */
export function explainFormat(typeName: string, facets: SimpleTypeDef | undefined): FormatExplanation {
  if (!facets) return { format: '', rule: 'unregistered' };

  if (isBooleanBase(facets.base)) return { format: 'boolean', rule: 'boolean' };

  if (facets.enumeration.length > 0) {
    const longest = Math.max(...facets.enumeration.map(charLength));
    return { format: `X(${longest})`, rule: 'enumeration' };
  }

  if (facets.pattern) {
    const analysis = analyzePattern(facets.pattern);
    switch (analysis.status) {
      case 'measured': {
        const digitsOnly = classifyPatternChars(facets.pattern) === 'digits';
        const format = digitsOnly ? `XN(${analysis.length})` : `X(${analysis.length})`;
        return { format, rule: 'pattern' };
      }
      case 'unsupported':
        return { format: '', rule: 'pattern', unsupportedConstruct: analysis.construct };
      case 'unknown':
        return { format: '', rule: 'pattern' };
    }
  }

  if (facets.totalDigits) {
    return { format: `N(${facets.totalDigits},${facets.fractionDigits || '0'})`, rule: 'totalDigits' };
  }

  if (facets.maxLength) return { format: `X(${facets.maxLength})`, rule: 'maxLength' };

  return fromTypeName(typeName);
}

/**
 * Derives the format code (`X(35)`, `XN(10)`, `N(18,5)`, `boolean`, ...) of a
 * type from its facets. An empty string means the format is undetermined.
 */
export function deriveFormat(typeName: string, facets: SimpleTypeDef | undefined): string {
  return explainFormat(typeName, facets).format;
}
