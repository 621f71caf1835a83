import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it, vi } from 'vitest';
import { buildLeafCatalog, extractLeafCatalog } from '../src/catalog.js';
import { RootResolutionError } from '../src/validation/errors.js';
import type { ComplexTypeDef, SchemaModel } from '../src/xsd/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixturesDir = resolve(__dirname, 'fixtures');
const payment = resolve(fixturesDir, 'payment.xsd');

// ---------------------------------------------------------------------------
// payment.xsd
// ---------------------------------------------------------------------------

describe('extractLeafCatalog — payment.xsd', () => {
  it('skips top-level elements of simple types when resolving the root', async () => {
    const catalog = await extractLeafCatalog(payment);

    expect(catalog.rootElement).toBe('Document');
    expect(catalog.rootType).toBe('Document');
  });

  it('lists every leaf with its path, ISO status and format', async () => {
    const catalog = await extractLeafCatalog(payment);

    expect(catalog.records.map((r) => [r.path.join('/'), r.isoStatus, r.typeName, r.format])).toEqual([
      ['Document/PmtInit/MsgId', 'M', 'Max35Text', 'X(35)'],
      ['Document/PmtInit/CreDtTm', 'M', 'ISODateTime', 'ISODateTime'],
      ['Document/PmtInit/Urgnt', 'O', 'TrueFalseIndicator', 'boolean'],
      ['Document/PmtInit/Cdtr/Nm', 'C', 'Max140Text', 'X(140)'],
      ['Document/PmtInit/Cdtr/Id/BIC', 'C', 'BICIdentifier', 'X(11)'],
      ['Document/PmtInit/Cdtr/Id/Prtry', 'C', 'Max35Text', 'X(35)'],
      ['Document/PmtInit/Cdtr/Ctry', 'O', 'CountryCode', 'X(2)'],
      ['Document/PmtInit/Tx[1...∞]/Amt', 'M', 'ActiveCurrencyAndAmount', 'N(18,5)'],
      ['Document/PmtInit/Tx[1...∞]/Sts', 'M', 'StatusCode', 'X(8)'],
      ['Document/PmtInit/Tx[1...∞]/Phne', 'O', 'PhoneNumber', 'X(35)'],
      ['Document/PmtInit/Tx[1...∞]/Ref', 'M', 'Max15NumericText', 'XN(15)'],
      ['Document/PmtInit/SplmtryData[0...∞]/PlcAndNm', 'O', 'Max350Text', 'X(350)'],
      ['Document/PmtInit/SplmtryData[0...∞]/Envlp', 'C', 'SupplementaryDataEnvelope1', '<ANY>'],
    ]);
  });

  it('records pattern and enumeration text on the leaf', async () => {
    const catalog = await extractLeafCatalog(payment);
    const sts = catalog.records.find((r) => r.typeName === 'StatusCode');
    const phone = catalog.records.find((r) => r.typeName === 'PhoneNumber');

    expect(sts?.enumeration).toBe('ACCEPTED, REJECTED, PENDING');
    expect(sts?.pattern).toBe('');
    expect(phone?.pattern).toBe('\\+[0-9]{1,3}-[0-9()+\\-]{1,30}');
  });

  it('summarises each distinct type once, sorted by name', async () => {
    const catalog = await extractLeafCatalog(payment);

    expect(catalog.types.map((t) => [t.typeName, t.format])).toEqual([
      ['ActiveCurrencyAndAmount', 'N(18,5)'],
      ['BICIdentifier', 'X(11)'],
      ['CountryCode', 'X(2)'],
      ['ISODateTime', 'ISODateTime'],
      ['Max140Text', 'X(140)'],
      ['Max15NumericText', 'XN(15)'],
      ['Max350Text', 'X(350)'],
      ['Max35Text', 'X(35)'],
      ['PhoneNumber', 'X(35)'],
      ['StatusCode', 'X(8)'],
      ['SupplementaryDataEnvelope1', '<ANY>'],
      ['TrueFalseIndicator', 'boolean'],
    ]);
  });

  it('carries the alias base facets in the summary', async () => {
    const catalog = await extractLeafCatalog(payment);
    const amount = catalog.types.find((t) => t.typeName === 'ActiveCurrencyAndAmount');
    const envelope = catalog.types.find((t) => t.typeName === 'SupplementaryDataEnvelope1');

    expect(amount?.facets?.name).toBe('ActiveCurrencyAndAmount_SimpleType');
    expect(amount?.facets?.totalDigits).toBe('18');
    expect(envelope?.facets).toBeUndefined();
  });

  it('produces the same catalog on repeated runs', async () => {
    const first = await extractLeafCatalog(payment);
    const second = await extractLeafCatalog(payment);

    expect(second).toEqual(first);
  });
});

// ---------------------------------------------------------------------------
// Other fixtures
// ---------------------------------------------------------------------------

describe('extractLeafCatalog — other fixtures', () => {
  it('follows includes and prefixed type references', async () => {
    const logger = { info: vi.fn(), warn: vi.fn() };
    const catalog = await extractLeafCatalog('include-main.xsd', { baseDir: fixturesDir, logger });

    expect(catalog.records.map((r) => [r.path.join('/'), r.typeName, r.format])).toEqual([
      ['Order/Code', 'tns:Code', 'X(10)'],
      ['Order/Qty', 'tns:Quantity', 'N(9,0)'],
    ]);
  });

  it('walks complexContent extensions', async () => {
    const catalog = await extractLeafCatalog(resolve(fixturesDir, 'extension.xsd'));

    expect(catalog.records.map((r) => [r.path.join('/'), r.isoStatus, r.format])).toEqual([
      ['Party/Name', 'M', 'X(70)'],
      ['Party/Email', 'O', 'X(256)'],
    ]);
  });

  it('throws RootResolutionError when no element has a complex type with children', async () => {
    await expect(extractLeafCatalog(resolve(fixturesDir, 'no-root.xsd'))).rejects.toThrow(RootResolutionError);
  });
});

describe('buildLeafCatalog', () => {
  it('throws RootResolutionError when the only candidate type has no children', () => {
    const model: SchemaModel = {
      elements: [{ name: 'Doc', type: 'Root' }],
      complexTypes: new Map<string, ComplexTypeDef>([['Root', { kind: 'elements', name: 'Root', children: [] }]]),
      simpleTypes: new Map(),
    };

    expect(() => buildLeafCatalog(model)).toThrow(RootResolutionError);
    expect(() => buildLeafCatalog(model)).toThrow('Top-level elements: Doc');
  });
});
