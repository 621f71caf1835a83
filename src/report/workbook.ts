import { writeFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { LeafCatalog } from '../catalog.js';

export const HIERARCHY_SHEET = 'Hierarchy';
export const TYPES_SHEET = 'Types';

/** Row of the first leaf record on the hierarchy sheet (1-based). */
const FIRST_RECORD_ROW = 3;

const TRAILING_HEADERS = ['Full Path', 'Type name', 'ISO Status', 'Format', 'Patterns', 'Enumerations'];

const TYPES_HEADERS = [
  'type',
  'format',
  'minLength',
  'maxLength',
  'totalDigits',
  'fractionDigits',
  'pattern',
  'enumeration',
];

export interface WorkbookOptions {
  /** Written to cell A1 of the hierarchy sheet, usually the schema file name. */
  sourceName: string;
}

function cellRef(row: number, col: number): string {
  return XLSX.utils.encode_cell({ r: row - 1, c: col - 1 });
}

function fullPathFormula(row: number, depth: number): string {
  const parts: string[] = [];
  for (let col = 1; col <= depth; col++) {
    const ref = cellRef(row, col);
    parts.push(col === 1 ? `IF(${ref}="","",${ref})` : `IF(${ref}="","","/" & ${ref})`);
  }
  return parts.join(' & ');
}

function formatLookupFormula(typeRef: string): string {
  const lookup = `VLOOKUP(${typeRef},${TYPES_SHEET}!$A:$H,2,FALSE)`;
  return `IFERROR(IF(${lookup}="","ERROR",${lookup}),"ERROR")`;
}

function buildHierarchySheet(catalog: LeafCatalog, sourceName: string): XLSX.WorkSheet {
  const depth = Math.max(...catalog.records.map((r) => r.path.length));
  const levelHeaders = Array.from({ length: depth }, (_, i) => `Level ${i + 1}`);

  const rows: string[][] = [[sourceName], [...levelHeaders, ...TRAILING_HEADERS]];
  for (const r of catalog.records) {
    const levels = [...r.path, ...Array<string>(depth - r.path.length).fill('')];
    rows.push([...levels, '', r.typeName, r.isoStatus, '', r.pattern, r.enumeration]);
  }
  const sheet = XLSX.utils.aoa_to_sheet(rows);

  const fullPathCol = depth + 1;
  const typeCol = depth + 2;
  const formatCol = depth + 4;
  const knownFormats = new Map(catalog.types.map((t) => [t.typeName, t.format]));

  catalog.records.forEach((r, i) => {
    const row = FIRST_RECORD_ROW + i;
    sheet[cellRef(row, fullPathCol)] = { t: 's', v: r.path.join('/'), f: fullPathFormula(row, depth) };
    sheet[cellRef(row, formatCol)] = {
      t: 's',
      v: knownFormats.get(r.typeName) || 'ERROR',
      f: formatLookupFormula(cellRef(row, typeCol)),
    };
  });

  return sheet;
}

function buildTypesSheet(catalog: LeafCatalog): XLSX.WorkSheet {
  const rows: string[][] = [TYPES_HEADERS];
  for (const t of catalog.types) {
    const f = t.facets;
    rows.push([
      t.typeName,
      t.format,
      f?.minLength ?? '',
      f?.maxLength ?? '',
      f?.totalDigits ?? '',
      f?.fractionDigits ?? '',
      f?.pattern ?? '',
      f ? f.enumeration.join(', ') : '',
    ]);
  }
  return XLSX.utils.aoa_to_sheet(rows);
}

/**
 * Renders a catalog as a two-sheet workbook. The hierarchy sheet looks up
 * each row's format in the types sheet through a `VLOOKUP` formula.
 */
export function buildWorkbook(catalog: LeafCatalog, options: WorkbookOptions): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, buildHierarchySheet(catalog, options.sourceName), HIERARCHY_SHEET);
  XLSX.utils.book_append_sheet(workbook, buildTypesSheet(catalog), TYPES_SHEET);
  return workbook;
}

/**
 * Renders a catalog and writes it to `outPath` as `.xlsx`.
 */
export async function writeWorkbook(catalog: LeafCatalog, outPath: string, options: WorkbookOptions): Promise<void> {
  const data: Buffer = XLSX.write(buildWorkbook(catalog, options), { type: 'buffer', bookType: 'xlsx' });
  await writeFile(outPath, data);
}
