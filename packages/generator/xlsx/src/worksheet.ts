import type { ColumnId, CubeRecord, SheetLayout } from '@cubesheet/core';
import { cellRef, escXml, NS_MAIN, NS_REL, STYLE_VERTICAL_CENTER, XML_DECLARATION } from './ooxml.js';

type CellValue =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'number'; readonly value: number };

const HEADER_ROW = 1;
const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;
const DIGITS_RE = /^\d+$/;

/** Cube numbers made only of digits are written as numbers, like the strength. */
export function toCellValue(record: CubeRecord, column: ColumnId): CellValue | null {
  const value = record[column];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : null;
  }
  if (value.length === 0) return null;
  if (column === 'markNumber' && DIGITS_RE.test(value)) {
    return { kind: 'number', value: Number.parseInt(value, 10) };
  }
  return { kind: 'text', text: value };
}

export function worksheetXml(sheet: SheetLayout): string {
  const anchors = new Set(
    sheet.merges.map((span) => cellRef(columnNumber(sheet, span.column), span.startRow)),
  );

  const header = rowXml(
    HEADER_ROW,
    sheet.header.map((text, i) => cellXml(cellRef(i + 1, HEADER_ROW), { kind: 'text', text }, false)),
  );
  const rows = sheet.rows.map((record, i) => {
    const row = HEADER_ROW + i + 1;
    return rowXml(
      row,
      sheet.columns.flatMap((column, c) => {
        const ref = cellRef(c + 1, row);
        const value = toCellValue(record, column);
        if (value === null && !anchors.has(ref)) return [];
        return [cellXml(ref, value, anchors.has(ref))];
      }),
    );
  });

  const merges =
    sheet.merges.length > 0
      ? `<mergeCells count="${sheet.merges.length}">` +
        sheet.merges
          .map((span) => {
            const column = columnNumber(sheet, span.column);
            return `<mergeCell ref="${cellRef(column, span.startRow)}:${cellRef(column, span.endRow)}"/>`;
          })
          .join('') +
        '</mergeCells>'
      : '';

  return (
    `${XML_DECLARATION}\n<worksheet xmlns="${NS_MAIN}" xmlns:r="${NS_REL}">` +
    colsXml(sheet) +
    `<sheetData>${header}${rows.join('')}</sheetData>` +
    merges +
    '</worksheet>'
  );
}

function columnNumber(sheet: SheetLayout, column: ColumnId): number {
  const index = sheet.columns.indexOf(column);
  if (index < 0) {
    throw new Error(`Merge span refers to column '${column}' missing from sheet '${sheet.name}'`);
  }
  return index + 1;
}

function rowXml(row: number, cells: readonly string[]): string {
  return `<row r="${row}">${cells.join('')}</row>`;
}

function cellXml(ref: string, value: CellValue | null, centered: boolean): string {
  const style = centered ? ` s="${STYLE_VERTICAL_CENTER}"` : '';
  if (value === null) {
    return `<c r="${ref}"${style}/>`;
  }
  if (value.kind === 'number') {
    return `<c r="${ref}"${style}><v>${value.value}</v></c>`;
  }
  const space = /^\s|\s$/.test(value.text) ? ' xml:space="preserve"' : '';
  return `<c r="${ref}"${style} t="inlineStr"><is><t${space}>${escXml(value.text)}</t></is></c>`;
}

function colsXml(sheet: SheetLayout): string {
  const cols = sheet.columns.map((column, i) => {
    const longest = sheet.rows.reduce((max, record) => {
      const value = toCellValue(record, column);
      const length = value === null ? 0 : displayText(value).length;
      return Math.max(max, length);
    }, sheet.header[i]?.length ?? 0);
    const width = Math.min(MAX_COLUMN_WIDTH, Math.max(MIN_COLUMN_WIDTH, longest + 2));
    return `<col min="${i + 1}" max="${i + 1}" width="${width}" customWidth="1"/>`;
  });
  return `<cols>${cols.join('')}</cols>`;
}

function displayText(value: CellValue): string {
  return value.kind === 'number' ? String(value.value) : value.text;
}
