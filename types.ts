export type CellValue = string | number | boolean | Date | null;

export interface Row {
  [key: string]: CellValue;
}

export type DataType = 'text' | 'number' | 'date' | 'boolean';

export interface ColumnDef {
  name: string;
  type: DataType;
}

export interface Dataset {
  name: string;
  type: 'csv' | 'excel' | 'merged';
  columns: ColumnDef[];
  data: Row[];
  rowCount: number;
  sheets: string[] | null; // Workbooks only
  selectedSheet: string | null;
  size?: string;
  rawSize?: number; // bytes
}

export interface NormalizationConfig {
  toLowerCase: boolean;
  trimWhitespace: boolean;
  removeAccents: boolean;
  removeSpecialChars: boolean;
  removeNumbers: boolean;
}

export const MERGE_MODES = ['inner', 'left', 'right', 'outer'] as const;

export type MergeMode = (typeof MERGE_MODES)[number];

export type MergeOrigin = 'both' | 'left_only' | 'right_only';

export interface MergeOptions {
  how: MergeMode;
  leftOn: string[];
  rightOn: string[];
  suffixes: [string, string];
  indicator: boolean;
  /** Treat keys with a missing or empty part as unmatched instead of equal to each other. */
  skipBlankKeys: boolean;
}

export interface MergeStats {
  matched: number;
  leftOnly: number;
  rightOnly: number;
}

export interface MergeResult {
  dataset: Dataset;
  stats: MergeStats;
  leftOn: string[];
  rightOn: string[];
}

export const EXPORT_FORMATS = ['xlsx', 'csv', 'json'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportArtifact {
  fileName: string;
  mimeType: string;
  data: Buffer;
}
