import * as path from 'node:path';
import type { ConversionResult, FileSystemPort } from '@cubesheet/core';
import { ConversionError } from '@cubesheet/core';

export type SaveConversionFn = (
  result: ConversionResult,
  outputDir: string,
  baseName: string,
) => Promise<string>;

export async function writeConversionOutput(
  result: ConversionResult,
  outputPath: string,
  fileSystem: FileSystemPort,
): Promise<string> {
  try {
    await fileSystem.writeFile(outputPath, result.output.content);
    return outputPath;
  } catch (error) {
    if (error instanceof ConversionError) throw error;
    throw new ConversionError('save', error);
  }
}

/** Writes `<outputDir>/<baseName><extension>`, the extension coming from the generator. */
export function saveConversionResult(
  result: ConversionResult,
  outputDir: string,
  baseName: string,
  fileSystem: FileSystemPort,
): Promise<string> {
  const outputPath = path.join(outputDir, `${baseName}${result.output.extension}`);
  return writeConversionOutput(result, outputPath, fileSystem);
}
