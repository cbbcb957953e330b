import * as fs from 'node:fs/promises';
import type { ColumnId } from '@cubesheet/core';
import { DEFAULT_VALIDATION_OPTIONS, DEFAULT_WORKBOOK_LAYOUT_OPTIONS } from '@cubesheet/core';
import { z } from 'zod';

export type OutputFormat = 'xlsx' | 'csv';

export interface ValidationSettings {
  minStrength: number;
  maxStrength: number;
}

export interface LayoutSettings {
  rawSheetName: string;
  pairColumns: ColumnId[];
  includeUnrecognized: boolean;
}

export interface CsvSettings {
  delimiter: string;
}

export interface BatchSettings {
  /** Appended to the report's file stem to name its output */
  outputSuffix: string;
}

export interface WatchSettings {
  ignoreInitial: boolean;
  stabilityThresholdMs: number;
}

export interface CubesheetSettings {
  outputFormat: OutputFormat;
  validate: boolean;
  validation: ValidationSettings;
  layout: LayoutSettings;
  csv: CsvSettings;
  batch: BatchSettings;
  watch: WatchSettings;
}

export const DEFAULT_CONFIG_FILE = 'cubesheet.config.json';

export const DEFAULT_SETTINGS: CubesheetSettings = {
  outputFormat: 'xlsx',
  validate: false,
  validation: {
    minStrength: DEFAULT_VALIDATION_OPTIONS.minStrength,
    maxStrength: DEFAULT_VALIDATION_OPTIONS.maxStrength,
  },
  layout: {
    rawSheetName: DEFAULT_WORKBOOK_LAYOUT_OPTIONS.rawSheetName,
    pairColumns: [...DEFAULT_WORKBOOK_LAYOUT_OPTIONS.pairColumns],
    includeUnrecognized: DEFAULT_WORKBOOK_LAYOUT_OPTIONS.includeUnrecognized,
  },
  csv: {
    delimiter: '|',
  },
  batch: {
    outputSuffix: '_processed',
  },
  watch: {
    ignoreInitial: false,
    stabilityThresholdMs: 500,
  },
};

const columnIdSchema = z.enum([
  'markPrefix',
  'markNumber',
  'markSuffix',
  'reportNumber',
  'dateCast',
  'strengthMpa',
  'pourLocation',
]);

const settingsSchema = z
  .object({
    outputFormat: z.enum(['xlsx', 'csv']).default(DEFAULT_SETTINGS.outputFormat),
    validate: z.boolean().default(DEFAULT_SETTINGS.validate),
    validation: z
      .object({
        minStrength: z.number().nonnegative().default(DEFAULT_SETTINGS.validation.minStrength),
        maxStrength: z.number().positive().default(DEFAULT_SETTINGS.validation.maxStrength),
      })
      .strict()
      .default({}),
    layout: z
      .object({
        rawSheetName: z.string().trim().min(1).max(31).default(DEFAULT_SETTINGS.layout.rawSheetName),
        pairColumns: z
          .array(columnIdSchema)
          .refine((columns) => !columns.includes('pourLocation'), {
            message: 'pourLocation is merged by value and cannot be a pair column',
          })
          .refine((columns) => new Set(columns).size === columns.length, {
            message: 'pair columns must not repeat',
          })
          .default(DEFAULT_SETTINGS.layout.pairColumns),
        includeUnrecognized: z.boolean().default(DEFAULT_SETTINGS.layout.includeUnrecognized),
      })
      .strict()
      .default({}),
    csv: z
      .object({
        delimiter: z
          .string()
          .length(1)
          .refine((value) => !/["\r\n]/.test(value), 'must not be a quote or a line break')
          .default(DEFAULT_SETTINGS.csv.delimiter),
      })
      .strict()
      .default({}),
    batch: z
      .object({
        outputSuffix: z.string().default(DEFAULT_SETTINGS.batch.outputSuffix),
      })
      .strict()
      .default({}),
    watch: z
      .object({
        ignoreInitial: z.boolean().default(DEFAULT_SETTINGS.watch.ignoreInitial),
        stabilityThresholdMs: z
          .number()
          .int()
          .nonnegative()
          .default(DEFAULT_SETTINGS.watch.stabilityThresholdMs),
      })
      .strict()
      .default({}),
  })
  .strict()
  .refine((settings) => settings.validation.minStrength <= settings.validation.maxStrength, {
    message: 'minStrength must not exceed maxStrength',
    path: ['validation'],
  });

export class SettingsError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'SettingsError';
    this.cause = cause;
  }
}

/** Fills missing keys with defaults and rejects unknown keys and out-of-range values. */
export function parseSettings(raw: unknown, source = 'settings'): CubesheetSettings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SettingsError(`Invalid ${source}: ${issues}`, result.error);
  }
  return result.data;
}

export type ReadTextFn = (filePath: string) => Promise<string>;

export const readTextFile: ReadTextFn = (filePath) => fs.readFile(filePath, 'utf8');

/**
 * Loads settings from `configPath`, or from the default config file when it
 * exists. Without either, the defaults apply.
 */
export async function loadSettings(
  configPath: string | undefined,
  read: ReadTextFn = readTextFile,
): Promise<CubesheetSettings> {
  const filePath = configPath ?? DEFAULT_CONFIG_FILE;

  let text: string;
  try {
    text = await read(filePath);
  } catch (error) {
    if (configPath === undefined && isNotFound(error)) {
      return parseSettings({});
    }
    throw new SettingsError(`Cannot read config file: ${filePath}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SettingsError(`Config file is not valid JSON: ${filePath}`, error);
  }

  return parseSettings(raw, `config file ${filePath}`);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
