import { describe, expect, it } from 'vitest';
import { deriveFormat, explainFormat } from '../src/format/derive.js';
import type { SimpleTypeDef } from '../src/xsd/types.js';

function facets(overrides: Partial<SimpleTypeDef> = {}): SimpleTypeDef {
  return { name: 'T', base: 'xs:string', enumeration: [], ...overrides };
}

describe('deriveFormat — cascade', () => {
  it('detects boolean bases case-insensitively', () => {
    expect(deriveFormat('Flag', facets({ base: 'xs:boolean' }))).toBe('boolean');
    expect(deriveFormat('Flag', facets({ base: 'XS:Boolean' }))).toBe('boolean');
    expect(deriveFormat('Flag', facets({ base: 'boolean' }))).toBe('boolean');
    expect(deriveFormat('Flag', facets({ base: 'xsd:boolean' }))).toBe('boolean');
  });

  it('gives boolean priority over pattern and enumeration', () => {
    const f = facets({ base: 'xs:boolean', pattern: '[0-9]{10}', enumeration: ['true', 'false'] });
    expect(deriveFormat('Flag', f)).toBe('boolean');
  });

  it('uses the longest enumeration value', () => {
    expect(deriveFormat('Code', facets({ enumeration: ['A', 'ABCD', 'AB'] }))).toBe('X(4)');
  });

  it('counts enumeration length in characters', () => {
    expect(deriveFormat('Code', facets({ enumeration: ['été', 'ab'] }))).toBe('X(3)');
  });

  it('prefers enumeration over pattern and length facets', () => {
    expect(deriveFormat('Code', facets({ enumeration: ['AB'], pattern: '[0-9]{10}', maxLength: '35' }))).toBe('X(2)');
  });

  it('emits XN for digit-only patterns', () => {
    expect(deriveFormat('Id', facets({ pattern: '[0-9]{10}' }))).toBe('XN(10)');
  });

  it('emits X for patterns with other characters', () => {
    expect(deriveFormat('Phone', facets({ pattern: '[0-9]{3}-[0-9]{4}' }))).toBe('X(8)');
    expect(deriveFormat('Country', facets({ pattern: '[A-Z]{2,2}' }))).toBe('X(2)');
  });

  it('leaves the format empty when a pattern cannot be measured', () => {
    expect(deriveFormat('Max35Text', facets({ pattern: '[A-Z]+', maxLength: '35' }))).toBe('');
  });

  it('formats totalDigits with fractionDigits, defaulting to 0', () => {
    expect(deriveFormat('Amount', facets({ totalDigits: '18', fractionDigits: '5' }))).toBe('N(18,5)');
    expect(deriveFormat('Count', facets({ totalDigits: '9' }))).toBe('N(9,0)');
  });

  it('prefers totalDigits over maxLength', () => {
    expect(deriveFormat('Amount', facets({ totalDigits: '5', maxLength: '12' }))).toBe('N(5,0)');
  });

  it('uses maxLength', () => {
    expect(deriveFormat('Whatever', facets({ maxLength: '140' }))).toBe('X(140)');
  });

  it('returns an empty format for unregistered types', () => {
    expect(deriveFormat('Max35Text', undefined)).toBe('');
    expect(deriveFormat('ISODate', undefined)).toBe('');
  });
});

describe('deriveFormat — type name fallback', () => {
  it('reads MaxNText and MaxNNumeric names', () => {
    expect(deriveFormat('Max35Text', facets())).toBe('X(35)');
    expect(deriveFormat('Max15Numeric', facets())).toBe('XN(15)');
    expect(deriveFormat('Max15PlusSignedNumericText', facets())).toBe('X(15)');
  });

  it('matches lexicon entries as substrings', () => {
    expect(deriveFormat('ISODate', facets({ base: 'xs:date' }))).toBe('ISODate');
    expect(deriveFormat('ISOTime', facets())).toBe('ISOTime');
    expect(deriveFormat('ISOYearMonth', facets())).toBe('ISOYearMonth');
    expect(deriveFormat('LanguageCode', facets())).toBe('X(2)');
    expect(deriveFormat('SkipPayload', facets())).toBe('<any>');
    expect(deriveFormat('SupplementaryDataEnvelope1', facets())).toBe('<any>');
  });

  it('tries longer lexicon keys before their prefixes', () => {
    expect(deriveFormat('ISODateTime', facets())).toBe('ISODateTime');
    expect(deriveFormat('ISODateTimeLocal', facets())).toBe('ISODateTime');
  });

  it('returns an empty format when no name rule matches', () => {
    expect(deriveFormat('Unnamed', facets())).toBe('');
  });
});

describe('explainFormat', () => {
  it('names the deciding rule', () => {
    expect(explainFormat('Max35Text', facets({ maxLength: '35' }))).toEqual({ format: 'X(35)', rule: 'maxLength' });
    expect(explainFormat('Max35Text', facets())).toEqual({ format: 'X(35)', rule: 'typeName' });
    expect(explainFormat('T', undefined)).toEqual({ format: '', rule: 'unregistered' });
  });

  it('reports the unsupported construct of a pattern', () => {
    expect(explainFormat('Code', facets({ pattern: '[A-Z]{2}|[0-9]{3}' }))).toEqual({
      format: '',
      rule: 'pattern',
      unsupportedConstruct: '|',
    });
  });

  it('is deterministic for identical input', () => {
    const f = facets({ pattern: '[A-Z0-9]{4,4}[A-Z]{2,2}' });
    expect(explainFormat('BIC', f)).toEqual(explainFormat('BIC', f));
  });
});
