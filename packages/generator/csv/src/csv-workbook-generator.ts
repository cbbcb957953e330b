import type {
  ColumnId,
  CubeRecord,
  GeneratorOutput,
  SheetLayout,
  WorkbookGeneratorPort,
  WorkbookLayout,
} from '@cubesheet/core';

export interface CsvOptions {
  readonly delimiter: string;
}

export const DEFAULT_CSV_OPTIONS: CsvOptions = {
  delimiter: '|',
};

/** Writes the first sheet of the layout, which is the raw record list. */
export class CsvWorkbookGenerator implements WorkbookGeneratorPort {
  readonly id = 'csv';
  readonly displayName = 'Delimited text';
  readonly extension = '.csv';

  constructor(private readonly options: CsvOptions = DEFAULT_CSV_OPTIONS) {
    if (options.delimiter.length !== 1 || /["\r\n]/.test(options.delimiter)) {
      throw new Error(`Invalid CSV delimiter: ${JSON.stringify(options.delimiter)}`);
    }
  }

  generate(layout: WorkbookLayout, _outputName: string): GeneratorOutput {
    const sheet = layout.sheets[0];
    const text = sheet ? this.formatSheet(sheet) : '';
    return { content: new TextEncoder().encode(text), extension: this.extension };
  }

  private formatSheet(sheet: SheetLayout): string {
    const lines = [
      this.formatLine(sheet.header),
      ...sheet.rows.map((record) =>
        this.formatLine(sheet.columns.map((column) => formatValue(record, column))),
      ),
    ];
    return `${lines.join('\n')}\n`;
  }

  private formatLine(fields: readonly string[]): string {
    return fields.map((field) => this.quote(field)).join(this.options.delimiter);
  }

  private quote(field: string): string {
    const needsQuotes =
      field.includes(this.options.delimiter) || field.includes('"') || /[\r\n]/.test(field);
    return needsQuotes ? `"${field.replace(/"/g, '""')}"` : field;
  }
}

function formatValue(record: CubeRecord, column: ColumnId): string {
  const value = record[column];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  return value;
}
