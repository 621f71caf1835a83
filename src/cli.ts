import { basename, extname } from 'node:path';
import { parseArgs } from 'node:util';
import { buildLeafCatalog } from './catalog.js';
import { explainFormat } from './format/derive.js';
import { defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { writeWorkbook } from './report/workbook.js';
import { parseXsd } from './xsd/parser.js';

const USAGE = 'Usage: xsd-leaf-catalog <schema[.xsd]> [--out <file.xlsx>]';

export interface CliOptions {
  schemaPath: string;
  outPath: string;
}

/**
 * Appends `.xsd` when missing and derives the workbook name from the schema.
 */
export function resolveCliOptions(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
    },
  });

  const input = positionals[0];
  if (!input) throw new Error(USAGE);

  const schemaPath = input.toLowerCase().endsWith('.xsd') ? input : `${input}.xsd`;
  const outPath = values.out ?? `${schemaPath.slice(0, -extname(schemaPath).length)}.xlsx`;
  return { schemaPath, outPath };
}

/**
 * Extracts the catalog of `argv`'s schema and writes it as a workbook.
 */
export async function run(argv: string[], logger: Logger = defaultLogger): Promise<void> {
  const { schemaPath, outPath } = resolveCliOptions(argv);

  const model = await parseXsd(schemaPath, { logger });
  const catalog = buildLeafCatalog(model);
  logger.info(`Root element "${catalog.rootElement}" (${catalog.rootType}): ${catalog.records.length} leaf elements, ${catalog.types.length} types.`);

  for (const t of catalog.types) {
    if (!t.facets) continue;
    const { unsupportedConstruct } = explainFormat(t.typeName, t.facets);
    if (unsupportedConstruct !== undefined) {
      logger.warn(`Type "${t.typeName}": pattern uses unsupported construct "${unsupportedConstruct}", format left empty.`);
    }
  }

  await writeWorkbook(catalog, outPath, { sourceName: basename(schemaPath) });
  logger.info(`Wrote ${outPath}`);
}
