import { ConversionError, FileSystemError } from '@cubesheet/core';

export function formatConversionError(fileName: string, error: unknown): string {
  if (error instanceof ConversionError) {
    switch (error.phase) {
      case 'read': return `Read failed: ${fileName}`;
      case 'generate': return `Generate failed: ${fileName}`;
      case 'save': return `Save failed: ${fileName}`;
    }
  }
  if (error instanceof FileSystemError) {
    return `File ${error.operation} failed: ${fileName}`;
  }
  return `Conversion failed: ${fileName}`;
}
