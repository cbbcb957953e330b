import { ConversionError, FileSystemError } from '@cubesheet/core';
import { describe, expect, it } from 'vitest';
import { formatConversionError } from '../src/format-conversion-error.js';

describe('formatConversionError', () => {
  it('ConversionError(read) → "Read failed: {fileName}"', () => {
    const error = new ConversionError('read', new Error('invalid'));
    expect(formatConversionError('report.pdf', error)).toBe('Read failed: report.pdf');
  });

  it('ConversionError(generate) → "Generate failed: {fileName}"', () => {
    const error = new ConversionError('generate', new Error('zip'));
    expect(formatConversionError('report.pdf', error)).toBe('Generate failed: report.pdf');
  });

  it('ConversionError(save) → "Save failed: {fileName}"', () => {
    const error = new ConversionError('save', new Error('ENOSPC'));
    expect(formatConversionError('report.pdf', error)).toBe('Save failed: report.pdf');
  });

  it('FileSystemError names the failed operation', () => {
    const error = new FileSystemError('read', '/reports/report.pdf');
    expect(formatConversionError('report.pdf', error)).toBe('File read failed: report.pdf');
  });

  it('plain Error → "Conversion failed: {fileName}"', () => {
    expect(formatConversionError('report.pdf', new Error('unexpected'))).toBe(
      'Conversion failed: report.pdf',
    );
  });

  it('string error → "Conversion failed: {fileName}"', () => {
    expect(formatConversionError('report.pdf', 'string error')).toBe('Conversion failed: report.pdf');
  });
});
