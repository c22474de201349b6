import { z } from 'zod';
import { EXPORT_FORMATS, MERGE_MODES } from './types';
import { ValidationError } from './errors';

// --- Fixed constants ---

export const NORMALIZED_KEY_SUFFIX = '__norm';
export const KEY_COLUMN_DELIMITER = '_&_';

// Columns that usually hold abbreviated player names, checked before the generic ones.
export const SHORT_NAME_ALIASES = [
  'Short Name',
  'ShortName',
  'Player Short Name',
  'Nome Curto',
  'Abbrev',
  'Abbreviated',
  'NameShort',
] as const;

export const GENERIC_NAME_ALIASES = ['Player', 'Jogador', 'Name', 'Nome'] as const;

export const GENERIC_KEY_ALIAS = GENERIC_NAME_ALIASES[0];

export const DEFAULT_SUFFIXES: [string, string] = ['_SC', '_SRC2'];

export const MERGED_SHEET_NAME = 'Merged';
export const MERGED_FILE_NAME = 'merged_players.xlsx';
export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const MAX_FILE_SIZE_MB = 100;
export const DEFAULT_PREVIEW_ROWS = 10;

// --- Schemas ---

export const MergeModeSchema = z.enum(MERGE_MODES);

export const NormalizationConfigSchema = z.object({
  toLowerCase: z.boolean().default(true),
  trimWhitespace: z.boolean().default(true),
  removeAccents: z.boolean().default(true),
  removeSpecialChars: z.boolean().default(false),
  removeNumbers: z.boolean().default(false),
});

export const DEFAULT_NORMALIZATION = NormalizationConfigSchema.parse({});

const KeyListSchema = z.array(z.string().min(1, 'key column names cannot be empty'));

export const MergeRequestSchema = z.object({
  leftKeys: KeyListSchema.default([]),
  rightKeys: KeyListSchema.default([]),
  normalize: z.boolean().default(true),
  how: MergeModeSchema.default('outer'),
  indicator: z.boolean().default(false),
  normalization: NormalizationConfigSchema.default({}),
});

export type MergeRequest = z.infer<typeof MergeRequestSchema>;
export type MergeRequestInput = z.input<typeof MergeRequestSchema>;

export const MergeCommandOptionsSchema = z.object({
  sheet1: z.string().optional(),
  sheet2: z.string().optional(),
  leftKey: KeyListSchema.optional(),
  rightKey: KeyListSchema.optional(),
  key: KeyListSchema.optional(),
  normalize: z.boolean().default(true),
  keepCase: z.boolean().default(false),
  keepAccents: z.boolean().default(false),
  keepWhitespace: z.boolean().default(false),
  stripSpecial: z.boolean().default(false),
  stripNumbers: z.boolean().default(false),
  how: MergeModeSchema.default('outer'),
  indicator: z.boolean().default(false),
  output: z.string().min(1).optional(),
  format: z.enum(EXPORT_FORMATS).default('xlsx'),
  preview: z.coerce.number().int().nonnegative().default(DEFAULT_PREVIEW_ROWS),
});

export type MergeCommandOptions = z.infer<typeof MergeCommandOptionsSchema>;

export const InspectCommandOptionsSchema = z.object({
  sheet: z.string().optional(),
  rows: z.coerce.number().int().nonnegative().default(DEFAULT_PREVIEW_ROWS),
});

export type InspectCommandOptions = z.infer<typeof InspectCommandOptionsSchema>;

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

/**
 * Parse input against a schema, turning zod issues into a ValidationError.
 */
export const parseWith = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
};

export const parseMergeRequest = (input: unknown): MergeRequest => parseWith(MergeRequestSchema, input);
