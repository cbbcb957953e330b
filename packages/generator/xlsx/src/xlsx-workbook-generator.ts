import type { GeneratorOutput, WorkbookGeneratorPort, WorkbookLayout } from '@cubesheet/core';
import JSZip from 'jszip';
import {
  contentTypesXml,
  corePropertiesXml,
  rootRelsXml,
  sanitizeSheetName,
  stylesXml,
  workbookRelsXml,
  workbookXml,
} from './ooxml.js';
import { worksheetXml } from './worksheet.js';

export class XlsxWorkbookGenerator implements WorkbookGeneratorPort {
  readonly id = 'xlsx';
  readonly displayName = 'Excel Workbook';
  readonly extension = '.xlsx';

  async generate(layout: WorkbookLayout, outputName: string): Promise<GeneratorOutput> {
    const zip = new JSZip();
    const sheetCount = layout.sheets.length;

    zip.file('[Content_Types].xml', contentTypesXml(sheetCount));
    zip.file('_rels/.rels', rootRelsXml());
    zip.file('docProps/core.xml', corePropertiesXml(outputName));
    zip.file('xl/workbook.xml', workbookXml(uniqueSheetNames(layout)));
    zip.file('xl/_rels/workbook.xml.rels', workbookRelsXml(sheetCount));
    zip.file('xl/styles.xml', stylesXml());

    layout.sheets.forEach((sheet, i) => {
      zip.file(`xl/worksheets/sheet${i + 1}.xml`, worksheetXml(sheet));
    });

    const content = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
    return { content, extension: this.extension };
  }
}

/** Sheet names compare case-insensitively in Excel, so clashes get a numeric suffix. */
export function uniqueSheetNames(layout: WorkbookLayout): string[] {
  const seen = new Set<string>();
  return layout.sheets.map((sheet) => {
    const base = sanitizeSheetName(sheet.name);
    let name = base;
    for (let n = 2; seen.has(name.toLowerCase()); n++) {
      const suffix = ` (${n})`;
      name = `${base.slice(0, 31 - suffix.length)}${suffix}`;
    }
    seen.add(name.toLowerCase());
    return name;
  });
}
